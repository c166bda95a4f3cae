/**
 * ledger-fmt: canonical pretty-printer for ledger journals
 *
 * Library entry point. For CLI, see cli.ts.
 */

export { beautify, beautifyTree, formatLedger } from './beautifier.js';
export type { BeautifyOptions } from './beautifier.js';

export { formatFiles, STDIN } from './format-files.js';
export type { FormatFilesOptions, FormatFilesOutput, FileResult, FileStatus } from './format-files.js';

// Syntax tree provider
export { parseLedger, LedgerParser } from './parser/ledger-parser/index.js';
export type { SyntaxNode, SyntaxTree, SourcePosition } from './parser/ledger-parser/index.js';

// Formatter building blocks
export { LayoutState, INDENT_WIDTH, ALIGNMENT_COLUMN } from './formatter/layout-state.js';
export { BufferSink, StreamSink } from './formatter/sink.js';
export type { Sink, OutputStream } from './formatter/sink.js';
export { findFirstErrorNode, assertNoSyntaxErrors } from './formatter/error-locator.js';
export { formatDocument } from './formatter/document-formatter.js';

export {
  BeautifyError,
  ParseFailureError,
  LedgerSyntaxError,
  InconsistentTreeError,
  StructuralInconsistencyError,
  describeError,
} from './utils/errors.js';
export type { BeautifyErrorCode, SourceLocation } from './utils/errors.js';
