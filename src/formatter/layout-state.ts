/**
 * Layout State
 *
 * The single mutable cursor of a formatting run. All text goes through
 * `print`/`println` so that `col` always equals the number of characters
 * written since the last line break.
 */

import type { SyntaxNode } from '../parser/ledger-parser/types.js';
import type { Sink } from './sink.js';

/** Spaces per indentation level. */
export const INDENT_WIDTH = 2;

/** Column posting amounts are aligned against. */
export const ALIGNMENT_COLUMN = 60;

/** Width of a string in characters (code points, not UTF-16 units). */
export function textWidth(text: string): number {
  return Array.from(text).length;
}

export class LayoutState {
  /** Characters written since the last line break */
  col = 0;
  /** Line breaks written so far */
  row = 0;
  /** Indentation level in units of `numSpaces` */
  level = 0;
  /** Raw spaces added after the level indentation */
  extraIndentation = 0;
  readonly numSpaces = INDENT_WIDTH;

  constructor(private readonly sink: Sink) {}

  indent(): void {
    const width = this.level * this.numSpaces + this.extraIndentation;
    if (width > 0) this.print(' '.repeat(width));
  }

  print(text: string): void {
    if (!text) return;
    this.sink.write(text);
    this.advance(text);
  }

  printNode(node: SyntaxNode): void {
    this.print(node.text);
  }

  println(text: string = ''): void {
    this.print(text);
    this.sink.write('\n');
    this.col = 0;
    this.row++;
  }

  /** Run `body` one indentation level deeper. */
  nested(body: () => void): void {
    this.level++;
    try {
      body();
    } finally {
      this.level--;
    }
  }

  finish(): string {
    this.sink.flush();
    return this.sink.contents();
  }

  private advance(text: string): void {
    const lastNewline = text.lastIndexOf('\n');
    if (lastNewline === -1) {
      this.col += textWidth(text);
      return;
    }
    for (let i = 0; i <= lastNewline; i++) {
      if (text[i] === '\n') this.row++;
    }
    this.col = textWidth(text.slice(lastNewline + 1));
  }
}
