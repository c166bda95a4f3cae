/**
 * Character cursor over the content of a single source line.
 */

export interface SourceLine {
  /** 0-based line number */
  row: number;
  /** Offset of the first character */
  start: number;
  /** Offset just past the content (before "\r\n" or "\n") */
  end: number;
  /** Offset of the next line (after the line terminator) */
  next: number;
}

export interface Span {
  start: number;
  end: number;
}

/**
 * Split text into lines. A trailing line terminator does not open a new,
 * empty line.
 */
export function splitLines(text: string): SourceLine[] {
  const lines: SourceLine[] = [];
  let start = 0;
  let row = 0;

  while (start < text.length) {
    const newline = text.indexOf('\n', start);
    const next = newline === -1 ? text.length : newline + 1;
    let end = newline === -1 ? text.length : newline;
    if (end > start && text[end - 1] === '\r') end--;
    lines.push({ row, start, end, next });
    start = next;
    row++;
  }

  return lines;
}

export function isBlank(text: string, line: SourceLine): boolean {
  return text.slice(line.start, line.end).trim() === '';
}

export function isIndented(text: string, line: SourceLine): boolean {
  const first = text[line.start];
  return first === ' ' || first === '\t';
}

export class LineCursor {
  pos: number;

  constructor(
    private readonly text: string,
    readonly line: SourceLine,
    from: number = line.start
  ) {
    this.pos = from;
  }

  atEnd(): boolean {
    return this.pos >= this.line.end;
  }

  peek(offset: number = 0): string {
    const pos = this.pos + offset;
    if (pos >= this.line.end) return '\0';
    return this.text[pos];
  }

  startsWith(value: string): boolean {
    return this.text.startsWith(value, this.pos) && this.pos + value.length <= this.line.end;
  }

  /** Consume a run of spaces/tabs. */
  whitespace(): Span | null {
    const start = this.pos;
    while (!this.atEnd() && isSpace(this.text[this.pos])) {
      this.pos++;
    }
    return this.pos > start ? { start, end: this.pos } : null;
  }

  takeWhile(predicate: (char: string) => boolean): Span | null {
    const start = this.pos;
    while (!this.atEnd() && predicate(this.text[this.pos])) {
      this.pos++;
    }
    return this.pos > start ? { start, end: this.pos } : null;
  }

  take(length: number): Span {
    const start = this.pos;
    this.pos = Math.min(this.pos + length, this.line.end);
    return { start, end: this.pos };
  }

  /** Consume up to (not including) the first occurrence of `stop`, or to the end of the line. */
  until(stop: string): Span {
    const start = this.pos;
    const index = this.text.indexOf(stop, this.pos);
    this.pos = index === -1 || index > this.line.end ? this.line.end : index;
    return { start, end: this.pos };
  }

  /** Consume the rest of the line and return it without trailing whitespace. */
  rest(): Span | null {
    const start = this.pos;
    this.pos = this.line.end;
    const span = trimEnd(this.text, { start, end: this.pos });
    return span.end > span.start ? span : null;
  }

  /** True when only whitespace remains. */
  onlyWhitespaceLeft(): boolean {
    for (let i = this.pos; i < this.line.end; i++) {
      if (!isSpace(this.text[i])) return false;
    }
    return true;
  }

  /**
   * Consume an account-like run: up to two consecutive spaces, a tab, or the
   * end of the line.
   */
  untilSeparator(): Span | null {
    const start = this.pos;
    while (!this.atEnd()) {
      const char = this.text[this.pos];
      if (char === '\t') break;
      if (char === ' ' && this.peek(1) === ' ') break;
      this.pos++;
    }
    const span = trimEnd(this.text, { start, end: this.pos });
    this.pos = span.end;
    return span.end > span.start ? span : null;
  }
}

export function isSpace(char: string): boolean {
  return char === ' ' || char === '\t';
}

export function isDigit(char: string): boolean {
  return char >= '0' && char <= '9';
}

export function isLetter(char: string): boolean {
  return (char >= 'a' && char <= 'z') || (char >= 'A' && char <= 'Z');
}

export function trimEnd(text: string, span: Span): Span {
  let end = span.end;
  while (end > span.start && isSpace(text[end - 1])) end--;
  return { start: span.start, end };
}
