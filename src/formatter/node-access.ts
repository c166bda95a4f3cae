/**
 * Child lookups used by the node formatters. The `require*` variants turn a
 * missing child into a StructuralInconsistencyError located at the parent.
 */

import type { SyntaxNode } from '../parser/ledger-parser/types.js';
import { StructuralInconsistencyError } from '../utils/errors.js';

export function findChild(node: SyntaxNode, type: string): SyntaxNode | null {
  return node.children.find(child => child.type === type) ?? null;
}

export function findNamedChild(node: SyntaxNode, ...types: string[]): SyntaxNode | null {
  return node.namedChildren.find(child => types.includes(child.type)) ?? null;
}

export function requireChild(node: SyntaxNode, type: string): SyntaxNode {
  const child = findChild(node, type);
  if (!child) throw new StructuralInconsistencyError(node, type);
  return child;
}

export function requireNamedChild(node: SyntaxNode, ...types: string[]): SyntaxNode {
  const child = findNamedChild(node, ...types);
  if (!child) throw new StructuralInconsistencyError(node, types.join('|'));
  return child;
}

/** First child (named or not). */
export function requireFirstChild(node: SyntaxNode): SyntaxNode {
  const child = node.child(0);
  if (!child) throw new StructuralInconsistencyError(node);
  return child;
}

/** First named child, whatever its type. */
export function requireFirstNamedChild(node: SyntaxNode): SyntaxNode {
  const child = node.namedChild(0);
  if (!child) throw new StructuralInconsistencyError(node);
  return child;
}
