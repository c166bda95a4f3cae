import { describe, it, expect } from 'vitest';
import { formatAmount, formatPosting, MIN_ACCOUNT_GAP } from '../../src/formatter/posting-formatter.js';
import { LayoutState } from '../../src/formatter/layout-state.js';
import { BufferSink } from '../../src/formatter/sink.js';
import { parseLedger } from '../../src/parser/ledger-parser/index.js';
import type { SyntaxNode } from '../../src/parser/ledger-parser/index.js';
import { StructuralInconsistencyError } from '../../src/utils/errors.js';
import { fakeNode } from '../helpers/fake-tree.js';

function postingFrom(line: string): SyntaxNode {
  const tree = parseLedger(`2024/01/01 Payee\n${line}\n`);
  expect(tree.rootNode.hasError).toBe(false);
  const posting = tree.rootNode.child(0)?.child(0)?.child(0)?.namedChildren.find(c => c.type === 'posting');
  if (!posting) throw new Error(`no posting in ${line}`);
  return posting;
}

/** Format a posting one level deep, the way a transaction body does. */
function layoutPosting(line: string): string {
  const state = new LayoutState(new BufferSink());
  state.nested(() => {
    state.indent();
    formatPosting(state, postingFrom(line));
  });
  return state.finish();
}

describe('Posting Formatter', () => {
  it('should end the quantity one column before the alignment column', () => {
    const output = layoutPosting('  Assets:Checking  100.00 USD');

    expect(output).toBe(`  Assets:Checking${' '.repeat(36)}100.00 USD\n`);
    expect(output.indexOf('100.00') + '100.00'.length).toBe(59);
  });

  it('should align negative quantities by their sign', () => {
    expect(layoutPosting('\tAssets:Cash    -20.00 USD')).toBe(`  Assets:Cash${' '.repeat(40)}-20.00 USD\n`);
  });

  it('should move a prefix commodity after the quantity', () => {
    expect(layoutPosting('  Assets:Cash  $-5')).toBe(`  Assets:Cash${' '.repeat(44)}-5 $\n`);
  });

  it('should print an account without an amount on its own', () => {
    expect(layoutPosting('      Income:Salary')).toBe('  Income:Salary\n');
  });

  it('should glue the status to the account', () => {
    expect(layoutPosting('  * Assets:Cash  5 USD')).toBe(`  *Assets:Cash${' '.repeat(44)}5 USD\n`);
  });

  it('should keep at least two spaces after a long account', () => {
    const account = `Expenses:${'X'.repeat(49)}`;

    expect(MIN_ACCOUNT_GAP).toBe(2);
    expect(layoutPosting(`  ${account}  1 USD`)).toBe(`  ${account}  1 USD\n`);
  });

  it('should print price, balance assertion and note after the amount', () => {
    expect(layoutPosting('  Assets:Broker   10 AAPL   @@   1500.00 USD   =   10 AAPL   ;   lot  ')).toBe(
      `  Assets:Broker${' '.repeat(42)}10 AAPL @@ 1500.00 USD = 10 AAPL ;   lot\n`
    );
  });

  it('should keep a per-unit price keyword', () => {
    expect(layoutPosting('  Assets:Savings  100 USD @ 0.91 EUR')).toBe(
      `  Assets:Savings${' '.repeat(40)}100 USD @ 0.91 EUR\n`
    );
  });

  it('should start a note at the alignment column when there is no amount', () => {
    const output = layoutPosting('  Assets:Cash  ; check');

    expect(output).toBe(`  Assets:Cash${' '.repeat(47)}; check\n`);
    expect(output.indexOf(';')).toBe(60);
  });

  it('should start a balance assertion at the alignment column when there is no amount', () => {
    expect(layoutPosting('  Assets:Cash  = 100 USD')).toBe(`  Assets:Cash${' '.repeat(47)}= 100 USD\n`);
  });

  it('should fail on an amount without a quantity', () => {
    const amount = fakeNode('amount', { row: 1, column: 14, children: [fakeNode('commodity', { text: 'USD' })] });
    const posting = fakeNode('posting', {
      row: 1,
      column: 2,
      children: [fakeNode('account', { text: 'Assets:Cash' }), amount],
    });
    const state = new LayoutState(new BufferSink());

    expect(() => formatPosting(state, posting)).toThrow(StructuralInconsistencyError);
    expect(() => formatPosting(state, posting)).toThrow(
      "Error accessing 'quantity|negative_quantity' in amount around line 2 col 15"
    );
  });

  describe('formatAmount', () => {
    it('should print a bare quantity', () => {
      const state = new LayoutState(new BufferSink());
      formatAmount(state, fakeNode('amount', { children: [fakeNode('quantity', { text: '1,000' })] }));

      expect(state.finish()).toBe('1,000');
    });

    it('should keep a quoted commodity as written', () => {
      const state = new LayoutState(new BufferSink());
      const posting = postingFrom('  Assets:Vault  "Gold Bar" 2');
      const amount = posting.namedChildren.find(c => c.type === 'amount');
      if (!amount) throw new Error('no amount');
      formatAmount(state, amount);

      expect(state.finish()).toBe('2 "Gold Bar"');
    });
  });
});
