/**
 * Main Beautifier
 * Orchestrates parse → error check → layout for one journal.
 */

import { parseLedger } from './parser/ledger-parser/index.js';
import type { SyntaxTree } from './parser/ledger-parser/types.js';
import { assertNoSyntaxErrors } from './formatter/error-locator.js';
import { formatDocument } from './formatter/document-formatter.js';
import { LayoutState } from './formatter/layout-state.js';
import { BufferSink, StreamSink, type OutputStream, type Sink } from './formatter/sink.js';

export interface BeautifyOptions {
  /** Accumulate the result and return it (true) or stream it to `output` (false) */
  inplace: boolean;
  /** Stream used when `inplace` is false (default: process.stdout) */
  output?: OutputStream;
}

/**
 * Format a ledger journal.
 *
 * @returns the formatted text when `inplace` is set, an empty string when streaming
 * @throws ParseFailureError, LedgerSyntaxError, InconsistentTreeError or
 *   StructuralInconsistencyError; nothing is written before a syntax error is detected
 */
export function beautify(source: string | Uint8Array, options: BeautifyOptions): string {
  return beautifyTree(parseLedger(source), options);
}

/**
 * Format an already parsed tree. The tree may come from any provider that
 * produces the ledger node kinds.
 */
export function beautifyTree(tree: SyntaxTree, options: BeautifyOptions): string {
  assertNoSyntaxErrors(tree.rootNode);

  const state = new LayoutState(createSink(options));
  formatDocument(state, tree.rootNode);
  return state.finish();
}

/**
 * Shorthand for `beautify(source, { inplace: true })`.
 */
export function formatLedger(source: string | Uint8Array): string {
  return beautify(source, { inplace: true });
}

function createSink(options: BeautifyOptions): Sink {
  if (options.inplace) return new BufferSink();
  return new StreamSink(options.output ?? process.stdout);
}
