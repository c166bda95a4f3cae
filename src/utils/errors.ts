/**
 * Error Handling Utilities
 *
 * Every failure of a formatting run is fatal and reaches the caller as one of
 * the classes below.
 */

import type { SourcePosition, SyntaxNode } from '../parser/ledger-parser/types.js';

export type BeautifyErrorCode =
  | 'PARSE_FAILURE'
  | 'SYNTAX_ERROR'
  | 'INCONSISTENT_TREE'
  | 'STRUCTURAL_INCONSISTENCY';

/** 1-based line and column. */
export interface SourceLocation {
  line: number;
  column: number;
}

export class BeautifyError extends Error {
  constructor(
    message: string,
    public readonly location?: SourceLocation,
    public readonly code?: BeautifyErrorCode
  ) {
    super(message);
    this.name = 'BeautifyError';
  }

  toString(): string {
    if (this.location) {
      return `${this.name} at line ${this.location.line}, column ${this.location.column}: ${this.message}`;
    }
    return `${this.name}: ${this.message}`;
  }
}

/**
 * The provider could not produce a tree at all.
 */
export class ParseFailureError extends BeautifyError {
  constructor(reason?: string) {
    super(reason ? `Could not parse file: ${reason}` : 'Could not parse file.', undefined, 'PARSE_FAILURE');
    this.name = 'ParseFailureError';
  }
}

/**
 * The tree contains grammar error nodes. Only the first one is reported.
 */
export class LedgerSyntaxError extends BeautifyError {
  constructor(position: SourcePosition) {
    const line = position.row + 1;
    super(`Parsed file contains errors (at line ${line}).`, { line, column: position.column + 1 }, 'SYNTAX_ERROR');
    this.name = 'LedgerSyntaxError';
  }
}

/**
 * The root claims to contain errors but no ERROR node is reachable.
 */
export class InconsistentTreeError extends BeautifyError {
  constructor() {
    super('An error occurred, but no ERROR node was found.', undefined, 'INCONSISTENT_TREE');
    this.name = 'InconsistentTreeError';
  }
}

/**
 * A formatter expected a child that the node does not have.
 */
export class StructuralInconsistencyError extends BeautifyError {
  constructor(
    node: SyntaxNode,
    public readonly expected?: string
  ) {
    const line = node.startPosition.row + 1;
    const column = node.startPosition.column + 1;
    const what = expected ? `'${expected}' in ${node.type}` : `token in ${node.type}`;
    super(`Error accessing ${what} around line ${line} col ${column}`, { line, column }, 'STRUCTURAL_INCONSISTENCY');
    this.name = 'StructuralInconsistencyError';
  }
}

/**
 * Render anything thrown by a run as a single diagnostic line.
 */
export function describeError(error: unknown): string {
  if (error instanceof BeautifyError) {
    return `${error.name}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
