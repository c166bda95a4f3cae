/**
 * Line-oriented parser producing a concrete syntax tree of a ledger journal.
 *
 * Every byte of a well-formed journal is covered by some node except trailing
 * whitespace, which the grammar treats as an extra. Lines the grammar does
 * not accept become ERROR nodes; parsing always runs to the end of the input.
 */

import {
  CHAR_DIRECTIVE_KEYWORDS,
  COMMENT_MARKERS,
  ERROR_NODE,
  NEWLINE,
  WHITESPACE,
  WORD_DIRECTIVE_KEYWORDS,
} from '../../types/ledger-cst.js';
import {
  LineCursor,
  isBlank,
  isDigit,
  isIndented,
  isLetter,
  isSpace,
  splitLines,
  trimEnd,
  type SourceLine,
  type Span,
} from './line-cursor.js';
import { NodeFactory, SourceText } from './syntax-node.js';
import type { SyntaxNode, SyntaxTree } from './types.js';

const DATE_PATTERN = /^\d{1,4}[/.-]\d{1,2}([/.-]\d{1,2})?$/;
const COMMODITY_STOP_CHARS = new Set([...'-+.,;:@=()[]{}"\'*/!&<>|?^~#%']);

interface Parsed {
  node: SyntaxNode;
  /** Index of the first line not consumed */
  next: number;
}

type SubdirectiveParser = (cursor: LineCursor) => SyntaxNode;

export class LedgerParser {
  private readonly text: string;
  private readonly lines: SourceLine[];
  private readonly nodes: NodeFactory;

  constructor(input: string) {
    this.text = input;
    this.lines = splitLines(input);
    this.nodes = new NodeFactory(new SourceText(input));
  }

  parse(): SyntaxTree {
    const children: SyntaxNode[] = [];
    let index = 0;

    while (index < this.lines.length) {
      const line = this.lines[index];
      if (isBlank(this.text, line)) {
        children.push(this.nodes.token(NEWLINE, line.start, line.next));
        index++;
        continue;
      }

      const parsed = this.parseItem(index);
      children.push(parsed.node);
      index = parsed.next;
    }

    const root = this.nodes.branch('source_file', children, { start: 0, end: this.text.length });
    return this.nodes.tree(root);
  }

  // ─── Journal items ───────────────────────────────────────────────────

  private parseItem(index: number): Parsed {
    const line = this.lines[index];
    if (isIndented(this.text, line)) {
      return this.errorItem(index);
    }

    const first = this.text[line.start];
    if (COMMENT_MARKERS.has(first)) {
      const comment = this.leaf('comment', trimEnd(this.text, { start: line.start, end: line.end }));
      return { node: this.journalItem([comment, ...this.newline(line)]), next: index + 1 };
    }
    if (isDigit(first)) return this.parsePlainXact(index);
    if (first === '~') return this.parseRuleXact(index, 'periodic_xact', 'interval');
    if (first === '=') return this.parseRuleXact(index, 'automated_xact', 'query');

    const cursor = new LineCursor(this.text, line);
    if (cursor.startsWith('--')) {
      const option = cursor.rest();
      if (!option) return this.errorItem(index);
      const directive = this.nodes.branch('directive', [this.leaf('option', option), ...this.newline(line)]);
      return { node: this.journalItem([directive]), next: index + 1 };
    }

    const word = cursor.takeWhile(isLetter);
    if (!word || !(cursor.atEnd() || isSpace(cursor.peek()))) {
      return this.errorItem(index);
    }

    const keyword = this.slice(word);
    switch (keyword) {
      case 'account':
        return this.parseBlockDirective(index, 'account_directive', word, 'account', c =>
          this.wrap('account_subdirective', this.parseAccountSubdirective(c))
        );
      case 'commodity':
        return this.parseBlockDirective(index, 'commodity_directive', word, 'commodity', c =>
          this.wrap('commodity_subdirective', this.parseCommoditySubdirective(c))
        );
      case 'tag':
        return this.parseBlockDirective(index, 'tag_directive', word, 'tag', c => this.parseTagSubdirective(c));
      case 'comment':
        return this.parseBlock(index, 'block_comment', 'end comment');
      case 'test':
        return this.parseBlock(index, 'block_test', 'end test');
    }

    if (WORD_DIRECTIVE_KEYWORDS.has(keyword)) {
      return this.parseWordDirective(index, 'word_directive', cursor, word);
    }
    if (CHAR_DIRECTIVE_KEYWORDS.has(keyword)) {
      return this.parseWordDirective(index, 'char_directive', cursor, word);
    }

    return this.errorItem(index);
  }

  private parseBlock(index: number, type: string, terminator: string): Parsed {
    const first = this.lines[index];

    for (let end = index + 1; end < this.lines.length; end++) {
      const line = this.lines[end];
      if (this.slice(line).trim() !== terminator) continue;

      const span = trimEnd(this.text, { start: first.start, end: line.end });
      return { node: this.journalItem([this.leaf(type, span), ...this.newline(line)]), next: end + 1 };
    }

    // Unterminated: everything up to the end of the file is in error.
    return { node: this.nodes.leaf(ERROR_NODE, first.start, this.text.length), next: this.lines.length };
  }

  // ─── Directives ──────────────────────────────────────────────────────

  private parseWordDirective(index: number, type: string, cursor: LineCursor, keyword: Span): Parsed {
    const line = this.lines[index];
    const children: SyntaxNode[] = [this.keyword(keyword)];

    while (!cursor.atEnd()) {
      const gap = cursor.whitespace();
      if (cursor.atEnd()) break;
      if (gap) children.push(this.space(gap));
      const argument = cursor.takeWhile(char => !isSpace(char));
      if (argument) children.push(this.leaf('argument', argument));
    }

    children.push(...this.newline(line));
    const directive = this.nodes.branch('directive', [this.nodes.branch(type, children)]);
    return { node: this.journalItem([directive]), next: index + 1 };
  }

  /**
   * `account`, `commodity` and `tag`: a name on the first line followed by
   * indented subdirective lines.
   */
  private parseBlockDirective(
    index: number,
    type: string,
    keyword: Span,
    nameType: string,
    parseSubdirective: SubdirectiveParser
  ): Parsed {
    const line = this.lines[index];
    const cursor = new LineCursor(this.text, line, keyword.end);
    const gap = cursor.whitespace();
    const name = gap ? cursor.rest() : null;
    if (!gap || !name) return this.errorItem(index);

    const children: SyntaxNode[] = [
      this.keyword(keyword),
      this.space(gap),
      this.leaf(nameType, name),
      ...this.newline(line),
    ];

    let next = index + 1;
    while (next < this.lines.length && this.isBodyLine(this.lines[next])) {
      const bodyLine = this.lines[next];
      const body = new LineCursor(this.text, bodyLine);
      const indent = body.whitespace();
      if (indent) children.push(this.space(indent));
      children.push(parseSubdirective(body), ...this.newline(bodyLine));
      next++;
    }

    const directive = this.nodes.branch('directive', [this.nodes.branch(type, children)]);
    return { node: this.journalItem([directive]), next };
  }

  private parseAccountSubdirective(cursor: LineCursor): SyntaxNode {
    const start = cursor.pos;
    const word = cursor.takeWhile(isLetter);
    const keyword = word ? this.slice(word) : '';
    if (!word) return this.errorFrom(cursor.line, start);

    switch (keyword) {
      case 'alias':
      case 'note':
      case 'assert':
      case 'check':
      case 'payee':
        return this.parseArgumentSubdirective(cursor, word);
      case 'default':
        return this.parseBareSubdirective(cursor, word);
      default:
        return this.errorFrom(cursor.line, start);
    }
  }

  private parseCommoditySubdirective(cursor: LineCursor): SyntaxNode {
    const start = cursor.pos;
    const word = cursor.takeWhile(isLetter);
    const keyword = word ? this.slice(word) : '';
    if (!word) return this.errorFrom(cursor.line, start);

    switch (keyword) {
      case 'alias':
      case 'note':
        return this.parseArgumentSubdirective(cursor, word);
      case 'format':
        return this.parseFormatSubdirective(cursor, word);
      case 'default':
      case 'nomarket':
        return this.parseBareSubdirective(cursor, word);
      default:
        return this.errorFrom(cursor.line, start);
    }
  }

  private parseTagSubdirective(cursor: LineCursor): SyntaxNode {
    const start = cursor.pos;
    const word = cursor.takeWhile(isLetter);
    const keyword = word ? this.slice(word) : '';
    if (!word || (keyword !== 'assert' && keyword !== 'check')) {
      return this.errorFrom(cursor.line, start);
    }
    return this.parseArgumentSubdirective(cursor, word);
  }

  private parseArgumentSubdirective(cursor: LineCursor, keyword: Span): SyntaxNode {
    const gap = cursor.whitespace();
    const value = gap ? cursor.rest() : null;
    if (!gap || !value) return this.errorFrom(cursor.line, keyword.start);

    return this.nodes.branch(`${this.slice(keyword)}_subdirective`, [
      this.keyword(keyword),
      this.space(gap),
      this.leaf('value', value),
    ]);
  }

  private parseBareSubdirective(cursor: LineCursor, keyword: Span): SyntaxNode {
    if (!cursor.onlyWhitespaceLeft()) return this.errorFrom(cursor.line, keyword.start);
    return this.nodes.branch(`${this.slice(keyword)}_subdirective`, [this.keyword(keyword)]);
  }

  private parseFormatSubdirective(cursor: LineCursor, keyword: Span): SyntaxNode {
    const gap = cursor.whitespace();
    const amount = gap ? this.parseAmount(cursor) : null;
    if (!gap || !amount || !cursor.onlyWhitespaceLeft()) {
      return this.errorFrom(cursor.line, keyword.start);
    }
    return this.nodes.branch('format_subdirective', [this.keyword(keyword), this.space(gap), amount]);
  }

  // ─── Transactions ────────────────────────────────────────────────────

  private parsePlainXact(index: number): Parsed {
    const line = this.lines[index];
    const cursor = new LineCursor(this.text, line);
    const children: SyntaxNode[] = [];

    const date = this.scanDate(cursor);
    if (!date) return this.errorItem(index);
    children.push(this.leaf('date', date));

    if (cursor.peek() === '=') {
      const equals = cursor.take(1);
      const effective = this.scanDate(cursor);
      if (!effective) return this.errorItem(index);
      children.push(this.keyword(equals), this.leaf('effective_date', effective));
    }

    let gap = cursor.whitespace();
    const push = (node: SyntaxNode): void => {
      if (gap) children.push(this.space(gap));
      children.push(node);
      gap = cursor.whitespace();
    };

    if (!cursor.atEnd() && !gap) return this.errorItem(index);

    const status = cursor.peek();
    if ((status === '*' || status === '!') && (isSpace(cursor.peek(1)) || cursor.peek(1) === '\0')) {
      push(this.leaf('status', cursor.take(1)));
    }

    if (cursor.peek() === '(') {
      const start = cursor.pos;
      cursor.until(')');
      if (cursor.peek() !== ')') return this.errorItem(index);
      cursor.take(1);
      push(this.leaf('code', { start, end: cursor.pos }));
    }

    if (!cursor.atEnd() && cursor.peek() !== ';') {
      const payee = trimEnd(this.text, cursor.until(';'));
      cursor.pos = payee.end;
      push(this.leaf('payee', payee));
    }

    if (cursor.peek() === ';') {
      const note = cursor.rest();
      if (note) push(this.leaf('note', note));
    }

    children.push(...this.newline(line));
    const next = this.parseXactBody(index + 1, children);
    return { node: this.xact(this.nodes.branch('plain_xact', children)), next };
  }

  /**
   * Periodic (`~ interval`) and automated (`= query`) transactions.
   */
  private parseRuleXact(index: number, type: 'periodic_xact' | 'automated_xact', fieldType: 'interval' | 'query'): Parsed {
    const line = this.lines[index];
    const cursor = new LineCursor(this.text, line);
    const children: SyntaxNode[] = [this.keyword(cursor.take(1))];

    const gap = cursor.whitespace();
    const field = trimEnd(this.text, cursor.until(';'));
    if (field.end === field.start) return this.errorItem(index);
    cursor.pos = field.end;
    if (gap) children.push(this.space(gap));
    children.push(this.leaf(fieldType, field));

    const noteGap = cursor.whitespace();
    if (cursor.peek() === ';') {
      const note = cursor.rest();
      if (noteGap) children.push(this.space(noteGap));
      if (note) children.push(this.leaf('note', note));
    }

    children.push(...this.newline(line));
    const next = this.parseXactBody(index + 1, children);
    return { node: this.xact(this.nodes.branch(type, children)), next };
  }

  /** Indented note and posting lines; returns the index of the first line after the body. */
  private parseXactBody(from: number, children: SyntaxNode[]): number {
    let next = from;
    while (next < this.lines.length && this.isBodyLine(this.lines[next])) {
      const line = this.lines[next];
      const cursor = new LineCursor(this.text, line);
      const indent = cursor.whitespace();
      if (indent) children.push(this.space(indent));

      if (cursor.peek() === ';') {
        const note = cursor.rest();
        if (note) children.push(this.leaf('note', note));
      } else {
        children.push(this.parsePosting(cursor));
      }

      children.push(...this.newline(line));
      next++;
    }
    return next;
  }

  private parsePosting(cursor: LineCursor): SyntaxNode {
    const start = cursor.pos;
    const parts: SyntaxNode[] = [];

    if (cursor.peek() === '*' || cursor.peek() === '!') {
      parts.push(this.leaf('status', cursor.take(1)));
      const gap = cursor.whitespace();
      if (gap) parts.push(this.space(gap));
    }

    const account = cursor.untilSeparator();
    if (!account) return this.errorFrom(cursor.line, start);
    parts.push(this.leaf('account', account));

    let gap = cursor.whitespace();
    const push = (node: SyntaxNode): void => {
      if (gap) parts.push(this.space(gap));
      parts.push(node);
      gap = cursor.whitespace();
    };

    if (!cursor.atEnd() && cursor.peek() !== ';' && cursor.peek() !== '=') {
      const amount = this.parseAmount(cursor);
      if (!amount) return this.errorFrom(cursor.line, start);
      push(amount);

      if (cursor.peek() === '@') {
        const price = this.parsePrice(cursor);
        if (!price) return this.errorFrom(cursor.line, start);
        push(price);
      }
    }

    if (cursor.peek() === '=') {
      const assertion = this.parseBalanceAssertion(cursor);
      if (!assertion) return this.errorFrom(cursor.line, start);
      push(assertion);
    }

    if (cursor.peek() === ';') {
      const note = cursor.rest();
      if (note) push(this.leaf('note', note));
    }

    if (!cursor.atEnd()) return this.errorFrom(cursor.line, start);
    return this.nodes.branch('posting', parts);
  }

  // ─── Amounts ─────────────────────────────────────────────────────────

  private parseAmount(cursor: LineCursor): SyntaxNode | null {
    const start = cursor.pos;
    const parts: SyntaxNode[] = [];

    if (isCommodityStart(cursor.peek())) {
      const commodity = this.scanCommodity(cursor);
      if (!commodity) return null;
      parts.push(this.leaf('commodity', commodity));
      const gap = cursor.whitespace();
      if (gap) parts.push(this.space(gap));
      const quantity = this.scanQuantity(cursor);
      if (!quantity) {
        cursor.pos = start;
        return null;
      }
      parts.push(quantity);
      return this.nodes.branch('amount', parts);
    }

    const quantity = this.scanQuantity(cursor);
    if (!quantity) return null;
    parts.push(quantity);

    const afterQuantity = cursor.pos;
    const gap = cursor.whitespace();
    const commodity = isCommodityStart(cursor.peek()) ? this.scanCommodity(cursor) : null;
    if (commodity) {
      if (gap) parts.push(this.space(gap));
      parts.push(this.leaf('commodity', commodity));
    } else {
      cursor.pos = afterQuantity;
    }

    return this.nodes.branch('amount', parts);
  }

  private scanQuantity(cursor: LineCursor): SyntaxNode | null {
    const start = cursor.pos;
    const negative = cursor.peek() === '-';
    if (negative) cursor.take(1);

    const digits = cursor.takeWhile(char => isDigit(char) || char === '.' || char === ',');
    if (!digits || !/\d/.test(this.slice(digits))) {
      cursor.pos = start;
      return null;
    }
    return this.leaf(negative ? 'negative_quantity' : 'quantity', { start, end: cursor.pos });
  }

  private scanCommodity(cursor: LineCursor): Span | null {
    if (cursor.peek() !== '"') {
      return cursor.takeWhile(isCommodityChar);
    }

    const start = cursor.pos;
    cursor.take(1);
    cursor.until('"');
    if (cursor.peek() !== '"') {
      cursor.pos = start;
      return null;
    }
    cursor.take(1);
    return { start, end: cursor.pos };
  }

  private parsePrice(cursor: LineCursor): SyntaxNode | null {
    const start = cursor.pos;
    const keyword = cursor.take(cursor.startsWith('@@') ? 2 : 1);
    const gap = cursor.whitespace();
    const amount = this.parseAmount(cursor);
    if (!amount) {
      cursor.pos = start;
      return null;
    }
    const children = [this.keyword(keyword)];
    if (gap) children.push(this.space(gap));
    children.push(amount);
    return this.nodes.branch('price', children);
  }

  private parseBalanceAssertion(cursor: LineCursor): SyntaxNode | null {
    const start = cursor.pos;
    const keyword = cursor.take(1);
    const gap = cursor.whitespace();
    const amount = this.parseAmount(cursor);
    if (!amount) {
      cursor.pos = start;
      return null;
    }
    const children = [this.keyword(keyword)];
    if (gap) children.push(this.space(gap));
    children.push(amount);
    return this.nodes.branch('balance_assertion', children);
  }

  private scanDate(cursor: LineCursor): Span | null {
    const start = cursor.pos;
    const date = cursor.takeWhile(char => isDigit(char) || char === '/' || char === '-' || char === '.');
    if (!date || !DATE_PATTERN.test(this.slice(date))) {
      cursor.pos = start;
      return null;
    }
    return date;
  }

  // ─── Node helpers ────────────────────────────────────────────────────

  private isBodyLine(line: SourceLine): boolean {
    return isIndented(this.text, line) && !isBlank(this.text, line);
  }

  private slice(span: Span): string {
    return this.text.slice(span.start, span.end);
  }

  private leaf(type: string, span: Span): SyntaxNode {
    return this.nodes.leaf(type, span.start, span.end);
  }

  /** Anonymous token whose type is its own text, e.g. "account", "@@", "=". */
  private keyword(span: Span): SyntaxNode {
    return this.nodes.token(this.slice(span), span.start, span.end);
  }

  private space(span: Span): SyntaxNode {
    return this.nodes.token(WHITESPACE, span.start, span.end);
  }

  private newline(line: SourceLine): SyntaxNode[] {
    return line.next > line.end ? [this.nodes.token(NEWLINE, line.end, line.next)] : [];
  }

  private wrap(type: string, child: SyntaxNode): SyntaxNode {
    return child.isError ? child : this.nodes.branch(type, [child]);
  }

  private journalItem(children: SyntaxNode[]): SyntaxNode {
    return this.nodes.branch('journal_item', children);
  }

  private xact(child: SyntaxNode): SyntaxNode {
    return this.journalItem([this.nodes.branch('xact', [child])]);
  }

  private errorFrom(line: SourceLine, start: number): SyntaxNode {
    const span = trimEnd(this.text, { start, end: line.end });
    return this.nodes.leaf(ERROR_NODE, span.start, Math.max(span.end, start));
  }

  private errorItem(index: number): Parsed {
    const line = this.lines[index];
    return { node: this.errorFrom(line, line.start), next: index + 1 };
  }
}

function isCommodityChar(char: string): boolean {
  return char !== '\0' && !isSpace(char) && !isDigit(char) && !COMMODITY_STOP_CHARS.has(char);
}

function isCommodityStart(char: string): boolean {
  return char === '"' || isCommodityChar(char);
}
