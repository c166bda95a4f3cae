/**
 * Ledger CST node kinds
 *
 * Closed sets of the grammar constructs the provider produces and the
 * formatter dispatches on. Anything outside these sets is passed over.
 */

export const ERROR_NODE = 'ERROR';
export const NEWLINE = '\n';
export const WHITESPACE = 'whitespace';

export const JOURNAL_ITEM_KINDS = [
  'comment',
  'block_comment',
  'block_test',
  'directive',
  'xact',
] as const;
export type JournalItemKind = (typeof JOURNAL_ITEM_KINDS)[number];

export const DIRECTIVE_KINDS = [
  'option',
  'account_directive',
  'commodity_directive',
  'tag_directive',
  'word_directive',
  'char_directive',
] as const;
export type DirectiveKind = (typeof DIRECTIVE_KINDS)[number];

export const XACT_KINDS = ['plain_xact', 'periodic_xact', 'automated_xact'] as const;
export type XactKind = (typeof XACT_KINDS)[number];

/** Subdirectives that carry a free-form `value` argument. */
export const ARGUMENT_SUBDIRECTIVES = {
  alias_subdirective: 'alias',
  note_subdirective: 'note',
  assert_subdirective: 'assert',
  check_subdirective: 'check',
  payee_subdirective: 'payee',
} as const;
export type ArgumentSubdirectiveKind = keyof typeof ARGUMENT_SUBDIRECTIVES;

/** Subdirectives that are a bare keyword. */
export const BARE_SUBDIRECTIVES = {
  default_subdirective: 'default',
  nomarket_subdirective: 'nomarket',
} as const;
export type BareSubdirectiveKind = keyof typeof BARE_SUBDIRECTIVES;

export const ACCOUNT_SUBDIRECTIVE_KINDS = [
  'alias_subdirective',
  'note_subdirective',
  'assert_subdirective',
  'check_subdirective',
  'payee_subdirective',
  'default_subdirective',
] as const;
export type AccountSubdirectiveKind = (typeof ACCOUNT_SUBDIRECTIVE_KINDS)[number];

export const COMMODITY_SUBDIRECTIVE_KINDS = [
  'alias_subdirective',
  'note_subdirective',
  'format_subdirective',
  'default_subdirective',
  'nomarket_subdirective',
] as const;
export type CommoditySubdirectiveKind = (typeof COMMODITY_SUBDIRECTIVE_KINDS)[number];

export const TAG_SUBDIRECTIVE_KINDS = ['assert_subdirective', 'check_subdirective'] as const;
export type TagSubdirectiveKind = (typeof TAG_SUBDIRECTIVE_KINDS)[number];

/** Header fields of a plain transaction, in the order they are emitted. */
export const PLAIN_XACT_HEADER_KINDS = ['date', 'effective_date', 'status', 'code', 'payee'] as const;
export type PlainXactHeaderKind = (typeof PLAIN_XACT_HEADER_KINDS)[number];

/** Keywords that open a multi-word directive line. */
export const WORD_DIRECTIVE_KEYWORDS: ReadonlySet<string> = new Set([
  'alias',
  'apply',
  'assert',
  'bucket',
  'capture',
  'check',
  'def',
  'define',
  'end',
  'eval',
  'expr',
  'fixed',
  'import',
  'include',
  'payee',
  'value',
  'year',
]);

/** Single-letter directives (timeclock entries, prices, default year...). */
export const CHAR_DIRECTIVE_KEYWORDS: ReadonlySet<string> = new Set([
  'A', 'Y', 'N', 'D', 'C', 'I', 'i', 'O', 'o', 'b', 'h', 'P',
]);

/** First characters of a top-level comment line. */
export const COMMENT_MARKERS: ReadonlySet<string> = new Set([';', '#', '%', '|', '*']);

function isOneOf<T extends string>(values: readonly T[], type: string): type is T {
  return values.some(value => value === type);
}

export function isJournalItemKind(type: string): type is JournalItemKind {
  return isOneOf(JOURNAL_ITEM_KINDS, type);
}

export function isDirectiveKind(type: string): type is DirectiveKind {
  return isOneOf(DIRECTIVE_KINDS, type);
}

export function isXactKind(type: string): type is XactKind {
  return isOneOf(XACT_KINDS, type);
}

export function isAccountSubdirectiveKind(type: string): type is AccountSubdirectiveKind {
  return isOneOf(ACCOUNT_SUBDIRECTIVE_KINDS, type);
}

export function isCommoditySubdirectiveKind(type: string): type is CommoditySubdirectiveKind {
  return isOneOf(COMMODITY_SUBDIRECTIVE_KINDS, type);
}

export function isTagSubdirectiveKind(type: string): type is TagSubdirectiveKind {
  return isOneOf(TAG_SUBDIRECTIVE_KINDS, type);
}

export function isPlainXactHeaderKind(type: string): type is PlainXactHeaderKind {
  return isOneOf(PLAIN_XACT_HEADER_KINDS, type);
}
