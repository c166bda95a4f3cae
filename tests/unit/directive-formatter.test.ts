import { describe, it, expect } from 'vitest';
import { formatLedger, beautifyTree } from '../../src/beautifier.js';
import { StructuralInconsistencyError } from '../../src/utils/errors.js';
import { fakeNode, fakeToken, fakeTree, journalItem } from '../helpers/fake-tree.js';

describe('Directive Formatter', () => {
  describe('account', () => {
    it('should indent a subdirective by one level', () => {
      expect(formatLedger('account Assets:Checking\n    note Primary account\n')).toBe(
        'account Assets:Checking\n  note Primary account\n'
      );
    });

    it('should print every subdirective kind', () => {
      const input = [
        'account   Expenses:Food',
        '\talias food',
        '      payee ^Grocery',
        '  check commodity == "$"',
        '  assert    true',
        '   default',
        '',
      ].join('\n');

      expect(formatLedger(input)).toBe(
        [
          'account Expenses:Food',
          '  alias food',
          '  payee ^Grocery',
          '  check commodity == "$"',
          '  assert true',
          '  default',
          '',
        ].join('\n')
      );
    });

    it('should skip a subdirective kind it does not know', () => {
      const directive = fakeNode('directive', {
        children: [
          fakeNode('account_directive', {
            children: [
              fakeToken('account'),
              fakeNode('account', { text: 'Assets:Cash' }),
              fakeNode('account_subdirective', {
                children: [fakeNode('eval_subdirective', { text: 'eval 1' })],
              }),
            ],
          }),
        ],
      });

      expect(beautifyTree(fakeTree([journalItem(directive)]), { inplace: true })).toBe('account Assets:Cash\n');
    });

    it('should fail on an argument subdirective without a value', () => {
      const directive = fakeNode('directive', {
        children: [
          fakeNode('account_directive', {
            children: [
              fakeNode('account', { text: 'Assets:Cash' }),
              fakeNode('account_subdirective', {
                children: [fakeNode('note_subdirective', { row: 1, column: 2, children: [fakeToken('note')] })],
              }),
            ],
          }),
        ],
      });

      expect(() => beautifyTree(fakeTree([journalItem(directive)]), { inplace: true })).toThrow(
        new StructuralInconsistencyError(fakeNode('note_subdirective', { row: 1, column: 2 }), 'value')
      );
    });
  });

  describe('commodity', () => {
    it('should print the format amount quantity first', () => {
      expect(formatLedger('commodity USD\n  format -1,000.00 USD\n')).toBe('commodity USD\n  format -1,000.00 USD\n');
      expect(formatLedger('commodity $\n    format $1,000.00\n')).toBe('commodity $\n  format 1,000.00 $\n');
    });

    it('should print note, alias and bare subdirectives', () => {
      const input = 'commodity EUR\n\tnote Euro\n\tnomarket\n\tdefault\n\talias €\n';

      expect(formatLedger(input)).toBe('commodity EUR\n  note Euro\n  nomarket\n  default\n  alias €\n');
    });
  });

  describe('tag', () => {
    it('should print the tag name and its checks', () => {
      const input = "tag   receipt  \n    assert value != ''\n      check   true\n";

      expect(formatLedger(input)).toBe("tag receipt\n  assert value != ''\n  check true\n");
    });
  });

  describe('single-line directives', () => {
    it('should collapse the spacing of word directives', () => {
      expect(formatLedger('include    other.ledger\napply  account   Personal\nend   apply\n')).toBe(
        'include other.ledger\napply account Personal\nend apply\n'
      );
    });

    it('should collapse the spacing of char directives', () => {
      expect(formatLedger('P   2024/01/01   EUR   1.10 USD\nY 2024\n')).toBe('P 2024/01/01 EUR 1.10 USD\nY 2024\n');
    });

    it('should print an option line as written', () => {
      expect(formatLedger('--input-date-format %Y/%m/%d   \n')).toBe('--input-date-format %Y/%m/%d\n');
    });
  });
});
