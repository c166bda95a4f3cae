/**
 * Finds the first grammar error of a tree before anything is formatted.
 */

import type { SyntaxNode } from '../parser/ledger-parser/types.js';
import { InconsistentTreeError, LedgerSyntaxError } from '../utils/errors.js';

/**
 * Depth-first, children in source order. Does not descend into an ERROR node.
 */
export function findFirstErrorNode(node: SyntaxNode): SyntaxNode | null {
  if (node.isError) return node;

  for (const child of node.children) {
    const found = findFirstErrorNode(child);
    if (found) return found;
  }
  return null;
}

/**
 * @throws LedgerSyntaxError with the 1-based line of the first ERROR node
 * @throws InconsistentTreeError if the root reports an error that cannot be found
 */
export function assertNoSyntaxErrors(root: SyntaxNode): void {
  if (!root.hasError) return;

  const errorNode = findFirstErrorNode(root);
  if (!errorNode) {
    throw new InconsistentTreeError();
  }
  throw new LedgerSyntaxError(errorNode.startPosition);
}
