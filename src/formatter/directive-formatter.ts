/**
 * Directive layout: `account`, `commodity` and `tag` blocks with their
 * indented subdirectives, plus single-line word/char directives and options.
 */

import type { SyntaxNode } from '../parser/ledger-parser/types.js';
import {
  ARGUMENT_SUBDIRECTIVES,
  BARE_SUBDIRECTIVES,
  WHITESPACE,
  isAccountSubdirectiveKind,
  isCommoditySubdirectiveKind,
  isDirectiveKind,
  isTagSubdirectiveKind,
  type ArgumentSubdirectiveKind,
} from '../types/ledger-cst.js';
import type { LayoutState } from './layout-state.js';
import { formatAmount } from './posting-formatter.js';
import {
  requireChild,
  requireFirstChild,
  requireFirstNamedChild,
  requireNamedChild,
} from './node-access.js';

export function formatDirective(state: LayoutState, node: SyntaxNode): void {
  const child = requireFirstChild(node);
  if (!isDirectiveKind(child.type)) return;

  switch (child.type) {
    case 'option':
      state.println(child.text);
      break;
    case 'account_directive':
      formatAccountDirective(state, child);
      break;
    case 'commodity_directive':
      formatCommodityDirective(state, child);
      break;
    case 'tag_directive':
      formatTagDirective(state, child);
      break;
    case 'word_directive':
    case 'char_directive':
      formatWordDirective(state, child);
      break;
  }
}

export function formatAccountDirective(state: LayoutState, node: SyntaxNode): void {
  state.print('account ');
  state.println(requireFirstNamedChild(node).text);

  state.nested(() => {
    for (const wrapper of node.children.filter(c => c.type === 'account_subdirective')) {
      const child = requireFirstChild(wrapper);
      if (!isAccountSubdirectiveKind(child.type)) continue;

      state.indent();
      switch (child.type) {
        case 'default_subdirective':
          state.println(BARE_SUBDIRECTIVES[child.type]);
          break;
        default:
          formatArgumentSubdirective(state, child, child.type);
      }
    }
  });
}

export function formatCommodityDirective(state: LayoutState, node: SyntaxNode): void {
  state.print('commodity ');
  state.println(requireFirstNamedChild(node).text);

  state.nested(() => {
    for (const wrapper of node.children.filter(c => c.type === 'commodity_subdirective')) {
      const child = requireFirstChild(wrapper);
      if (!isCommoditySubdirectiveKind(child.type)) continue;

      state.indent();
      switch (child.type) {
        case 'format_subdirective':
          formatFormatSubdirective(state, child);
          break;
        case 'default_subdirective':
        case 'nomarket_subdirective':
          state.println(BARE_SUBDIRECTIVES[child.type]);
          break;
        default:
          formatArgumentSubdirective(state, child, child.type);
      }
    }
  });
}

export function formatTagDirective(state: LayoutState, node: SyntaxNode): void {
  state.print('tag ');
  state.println(requireNamedChild(node, 'tag').text.trim());

  state.nested(() => {
    for (const child of node.namedChildren) {
      if (!isTagSubdirectiveKind(child.type)) continue;
      state.indent();
      formatArgumentSubdirective(state, child, child.type);
    }
  });
}

/**
 * All non-blank tokens of the line, joined by single spaces.
 */
export function formatWordDirective(state: LayoutState, node: SyntaxNode): void {
  const tokens = node.children
    .filter(child => child.type !== WHITESPACE)
    .map(child => child.text.trim())
    .filter(token => token.length > 0);
  state.println(tokens.join(' '));
}

/** `<keyword> <value>`, value as written. */
export function formatArgumentSubdirective(
  state: LayoutState,
  node: SyntaxNode,
  kind: ArgumentSubdirectiveKind
): void {
  state.print(ARGUMENT_SUBDIRECTIVES[kind]);
  state.print(' ');
  state.println(requireChild(node, 'value').text);
}

function formatFormatSubdirective(state: LayoutState, node: SyntaxNode): void {
  state.print('format ');
  formatAmount(state, requireChild(node, 'amount'));
  state.println();
}
