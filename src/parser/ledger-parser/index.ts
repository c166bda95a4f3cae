/**
 * Ledger Parser: public API
 *
 * Produces a concrete syntax tree with tree-sitter-shaped nodes, so the
 * formatter never depends on how the tree was built.
 */

import { ParseFailureError } from '../../utils/errors.js';
import { LedgerParser } from './parser.js';
import type { SyntaxTree } from './types.js';

export type { SyntaxNode, SyntaxTree, SourcePosition } from './types.js';
export { LedgerParser } from './parser.js';

const BYTE_ORDER_MARK = '\uFEFF';

/**
 * Parse a ledger journal into a syntax tree.
 *
 * The tree is always produced for text input; grammar errors show up as
 * ERROR nodes (check `tree.rootNode.hasError`).
 *
 * @throws ParseFailureError if byte input is not valid UTF-8
 *
 * @example
 * ```ts
 * const tree = parseLedger('account Assets:Checking\n  note Primary account\n');
 * tree.rootNode.child(0)?.type; // "journal_item"
 * ```
 */
export function parseLedger(input: string | Uint8Array): SyntaxTree {
  const text = typeof input === 'string' ? input : decode(input);
  const source = text.startsWith(BYTE_ORDER_MARK) ? text.slice(BYTE_ORDER_MARK.length) : text;
  return new LedgerParser(source).parse();
}

function decode(bytes: Uint8Array): string {
  try {
    return new TextDecoder('utf-8', { fatal: true }).decode(bytes);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ParseFailureError(`input is not valid UTF-8 (${reason})`);
  }
}
