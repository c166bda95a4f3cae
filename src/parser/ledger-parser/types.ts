/**
 * Type abstractions for the ledger syntax tree.
 * These mirror the tree-sitter node API so the formatter can run on any
 * provider that produces the same node kinds.
 */

/**
 * Position in source code (0-indexed row and column).
 */
export interface SourcePosition {
  row: number;
  column: number;
}

/**
 * A node in the concrete syntax tree of a ledger journal.
 */
export interface SyntaxNode {
  /** Grammar node type, e.g. "plain_xact", "posting", "\n" */
  readonly type: string;
  /** Whether this is a named node in the grammar (vs keywords, whitespace and newlines) */
  readonly isNamed: boolean;
  /** Whether this node is a grammar ERROR node */
  readonly isError: boolean;
  /** Whether this node or any descendant is an ERROR node */
  readonly hasError: boolean;
  /** Offset of the first character of this node in the source */
  readonly startIndex: number;
  /** Offset just past the last character of this node */
  readonly endIndex: number;
  readonly startPosition: SourcePosition;
  readonly endPosition: SourcePosition;
  /** The source text this node spans */
  readonly text: string;
  /** All children in source order */
  readonly children: readonly SyntaxNode[];
  /** Children that are named in the grammar */
  readonly namedChildren: readonly SyntaxNode[];
  readonly childCount: number;
  readonly namedChildCount: number;
  child(index: number): SyntaxNode | null;
  namedChild(index: number): SyntaxNode | null;
}

/**
 * A parsed journal. The tree is immutable once produced.
 */
export interface SyntaxTree {
  readonly rootNode: SyntaxNode;
  readonly source: string;
}
