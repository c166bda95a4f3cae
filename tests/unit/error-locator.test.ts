import { describe, it, expect } from 'vitest';
import { assertNoSyntaxErrors, findFirstErrorNode } from '../../src/formatter/error-locator.js';
import { parseLedger } from '../../src/parser/ledger-parser/index.js';
import { InconsistentTreeError, LedgerSyntaxError } from '../../src/utils/errors.js';
import { fakeNode, fakeTree, journalItem } from '../helpers/fake-tree.js';

describe('Error Locator', () => {
  it('should accept a tree without errors', () => {
    const tree = parseLedger('account A\n\n2024/01/01 Pay\n  Assets:Cash  5\n');

    expect(findFirstErrorNode(tree.rootNode)).toBeNull();
    expect(() => assertNoSyntaxErrors(tree.rootNode)).not.toThrow();
  });

  it('should report the first error in source order', () => {
    const tree = parseLedger('; fine\nbogus line\n2024/01/01 Pay\n  Assets:Cash  5 USD ???\n');

    expect(() => assertNoSyntaxErrors(tree.rootNode)).toThrow(LedgerSyntaxError);
    expect(() => assertNoSyntaxErrors(tree.rootNode)).toThrow('Parsed file contains errors (at line 2).');
  });

  it('should search depth first before moving to later siblings', () => {
    const deep = fakeNode('ERROR', { row: 9 });
    const shallow = fakeNode('ERROR', { row: 2 });
    const tree = fakeTree([
      journalItem(fakeNode('xact', { children: [fakeNode('plain_xact', { children: [deep] })] })),
      shallow,
    ]);

    expect(findFirstErrorNode(tree.rootNode)).toBe(deep);
  });

  it('should not descend into an error node', () => {
    const inner = fakeNode('ERROR', { row: 5 });
    const outer = fakeNode('ERROR', { row: 4, children: [inner] });

    expect(findFirstErrorNode(fakeTree([outer]).rootNode)).toBe(outer);
  });

  it('should report the error line of a nested subdirective', () => {
    const tree = parseLedger('account Assets:Checking\n  note fine\n  bogus\n');

    try {
      assertNoSyntaxErrors(tree.rootNode);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(LedgerSyntaxError);
      if (error instanceof LedgerSyntaxError) {
        expect(error.location).toEqual({ line: 3, column: 3 });
      }
    }
  });

  it('should fail when the root reports an error that cannot be found', () => {
    const tree = fakeTree([journalItem(fakeNode('comment', { text: '; a' }))], { hasError: true });

    expect(() => assertNoSyntaxErrors(tree.rootNode)).toThrow(InconsistentTreeError);
  });
});
