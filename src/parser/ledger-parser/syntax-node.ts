/**
 * Concrete SyntaxNode implementation backed by a shared source text.
 * Nodes are immutable; `hasError` and the named-children view are computed
 * once at construction.
 */

import { ERROR_NODE } from '../../types/ledger-cst.js';
import type { SourcePosition, SyntaxNode, SyntaxTree } from './types.js';

/**
 * Source text with a line-start index for offset → position lookups.
 */
export class SourceText {
  private readonly lineStarts: number[] = [0];

  constructor(readonly text: string) {
    for (let i = 0; i < text.length; i++) {
      if (text[i] === '\n') this.lineStarts.push(i + 1);
    }
  }

  positionAt(offset: number): SourcePosition {
    let low = 0;
    let high = this.lineStarts.length - 1;
    while (low < high) {
      const mid = (low + high + 1) >> 1;
      if (this.lineStarts[mid] <= offset) {
        low = mid;
      } else {
        high = mid - 1;
      }
    }
    return { row: low, column: offset - this.lineStarts[low] };
  }

  slice(start: number, end: number): string {
    return this.text.slice(start, end);
  }
}

export class LedgerSyntaxNode implements SyntaxNode {
  readonly isError: boolean;
  readonly hasError: boolean;
  readonly startPosition: SourcePosition;
  readonly endPosition: SourcePosition;
  readonly namedChildren: readonly SyntaxNode[];

  constructor(
    private readonly source: SourceText,
    readonly type: string,
    readonly isNamed: boolean,
    readonly startIndex: number,
    readonly endIndex: number,
    readonly children: readonly SyntaxNode[] = []
  ) {
    this.isError = type === ERROR_NODE;
    this.hasError = this.isError || children.some(child => child.hasError);
    this.startPosition = source.positionAt(startIndex);
    this.endPosition = source.positionAt(endIndex);
    this.namedChildren = children.filter(child => child.isNamed);
  }

  get text(): string {
    return this.source.slice(this.startIndex, this.endIndex);
  }

  get childCount(): number {
    return this.children.length;
  }

  get namedChildCount(): number {
    return this.namedChildren.length;
  }

  child(index: number): SyntaxNode | null {
    return this.children[index] ?? null;
  }

  namedChild(index: number): SyntaxNode | null {
    return this.namedChildren[index] ?? null;
  }
}

/**
 * Builds nodes over one source text. Branch ranges default to the span of
 * their children.
 */
export class NodeFactory {
  constructor(readonly source: SourceText) {}

  leaf(type: string, start: number, end: number, named = true): SyntaxNode {
    return new LedgerSyntaxNode(this.source, type, named, start, end);
  }

  token(type: string, start: number, end: number): SyntaxNode {
    return this.leaf(type, start, end, false);
  }

  branch(type: string, children: readonly SyntaxNode[], range?: { start: number; end: number }): SyntaxNode {
    const first = children[0];
    const last = children[children.length - 1];
    const start = range?.start ?? first?.startIndex ?? 0;
    const end = range?.end ?? last?.endIndex ?? start;
    return new LedgerSyntaxNode(this.source, type, true, start, end, children);
  }

  tree(root: SyntaxNode): SyntaxTree {
    return { rootNode: root, source: this.source.text };
  }
}
