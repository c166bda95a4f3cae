/**
 * Transaction layout: a header line, then notes and postings one level deeper.
 */

import type { SyntaxNode } from '../parser/ledger-parser/types.js';
import { NEWLINE, isPlainXactHeaderKind, isXactKind } from '../types/ledger-cst.js';
import type { LayoutState } from './layout-state.js';
import { requireFirstChild, requireNamedChild } from './node-access.js';
import { formatPosting } from './posting-formatter.js';

export function formatXact(state: LayoutState, node: SyntaxNode): void {
  const child = requireFirstChild(node);
  if (!isXactKind(child.type)) return;

  switch (child.type) {
    case 'plain_xact':
      formatPlainXact(state, child);
      break;
    case 'periodic_xact':
      formatRuleXact(state, child, '~', 'interval');
      break;
    case 'automated_xact':
      formatRuleXact(state, child, '=', 'query');
      break;
  }
}

export function formatPlainXact(state: LayoutState, node: SyntaxNode): void {
  for (const child of node.namedChildren) {
    if (!isPlainXactHeaderKind(child.type)) continue;

    switch (child.type) {
      case 'date':
        state.printNode(child);
        break;
      case 'effective_date':
        state.print('=');
        state.printNode(child);
        break;
      case 'status':
      case 'code':
      case 'payee':
        state.print(' ');
        state.printNode(child);
        break;
    }
  }
  state.println();

  formatXactBody(
    state,
    node.namedChildren.filter(child => !isPlainXactHeaderKind(child.type))
  );
}

/**
 * Periodic (`~ interval`) and automated (`= query`) transactions. A note on
 * the header line stays on the header line.
 */
function formatRuleXact(state: LayoutState, node: SyntaxNode, marker: '~' | '=', field: 'interval' | 'query'): void {
  const header = requireNamedChild(node, field);
  state.print(`${marker} `);
  state.print(header.text.trim());

  const headerNote = findHeaderNote(node);
  if (headerNote) {
    state.print(' ');
    state.printNode(headerNote);
  }
  state.println();

  formatXactBody(
    state,
    node.namedChildren.filter(child => child !== header && child !== headerNote)
  );
}

function formatXactBody(state: LayoutState, children: readonly SyntaxNode[]): void {
  state.nested(() => {
    for (const child of children) {
      switch (child.type) {
        case 'note':
          state.indent();
          state.println(child.text);
          break;
        case 'posting':
          state.indent();
          formatPosting(state, child);
          break;
      }
    }
  });
}

/** The note that appears before the first line break of the transaction. */
function findHeaderNote(node: SyntaxNode): SyntaxNode | null {
  for (const child of node.children) {
    if (child.type === NEWLINE) return null;
    if (child.type === 'note') return child;
  }
  return null;
}
