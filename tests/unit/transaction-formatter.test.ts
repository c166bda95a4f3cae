import { describe, it, expect } from 'vitest';
import { formatLedger, beautifyTree } from '../../src/beautifier.js';
import { StructuralInconsistencyError } from '../../src/utils/errors.js';
import { fakeNode, fakeToken, fakeTree, journalItem } from '../helpers/fake-tree.js';

describe('Transaction Formatter', () => {
  describe('plain transactions', () => {
    it('should indent postings and align amounts', () => {
      const output = formatLedger('2024/01/15 Deposit\n  Assets:Checking  100.00 USD\n  Income:Salary\n');

      expect(output).toBe(`2024/01/15 Deposit\n  Assets:Checking${' '.repeat(36)}100.00 USD\n  Income:Salary\n`);
    });

    it('should normalize header spacing and move the header note into the body', () => {
      const input = [
        '2024/01/15=2024/01/20   *   (42)   Grocery Store   ; weekly',
        '      Expenses:Food      42.50 EUR',
        '    ; paid by card',
        '      Assets:Checking',
        '',
      ].join('\n');

      expect(formatLedger(input)).toBe(
        [
          '2024/01/15=2024/01/20 * (42) Grocery Store',
          '  ; weekly',
          `  Expenses:Food${' '.repeat(39)}42.50 EUR`,
          '  ; paid by card',
          '  Assets:Checking',
          '',
        ].join('\n')
      );
    });

    it('should print a date-only header', () => {
      expect(formatLedger('2024-01-15\n  Assets:Cash\n')).toBe('2024-01-15\n  Assets:Cash\n');
    });

    it('should print a header with only a pending status', () => {
      expect(formatLedger('2024/01/15 !\n  Assets:Cash\n')).toBe('2024/01/15 !\n  Assets:Cash\n');
    });
  });

  describe('periodic transactions', () => {
    it('should keep the header note on the header line', () => {
      const input = '~   Monthly   ; budget\n    Expenses:Rent    1000 USD\n  ; body note\n    Assets:Checking\n';

      expect(formatLedger(input)).toBe(
        [
          '~ Monthly ; budget',
          `  Expenses:Rent${' '.repeat(40)}1000 USD`,
          '  ; body note',
          '  Assets:Checking',
          '',
        ].join('\n')
      );
    });

    it('should fail on a periodic transaction without an interval', () => {
      const periodic = fakeNode('periodic_xact', { row: 3, children: [fakeToken('~')] });
      const tree = fakeTree([journalItem(fakeNode('xact', { children: [periodic] }))]);

      expect(() => beautifyTree(tree, { inplace: true })).toThrow(StructuralInconsistencyError);
      expect(() => beautifyTree(tree, { inplace: true })).toThrow(
        "Error accessing 'interval' in periodic_xact around line 4 col 1"
      );
    });
  });

  describe('automated transactions', () => {
    it('should print the query after an equals sign', () => {
      const input = '=    expr account =~ /Food/\n  (Budget:Food)  -1\n';

      expect(formatLedger(input)).toBe(`= expr account =~ /Food/\n  (Budget:Food)${' '.repeat(42)}-1\n`);
    });

    it('should keep a header note with the query', () => {
      expect(formatLedger('= /Food/   ;   auto\n  [Budget]  -1\n')).toBe(
        `= /Food/ ;   auto\n  [Budget]${' '.repeat(47)}-1\n`
      );
    });
  });

  it('should skip an unknown transaction kind', () => {
    const tree = fakeTree([
      journalItem(fakeNode('xact', { children: [fakeNode('timeclock_xact', { text: 'i 2024/01/01' })] })),
      journalItem(fakeNode('comment', { text: '; kept' })),
    ]);

    expect(beautifyTree(tree, { inplace: true })).toBe('; kept\n');
  });
});
