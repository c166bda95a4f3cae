/**
 * Top-level walk over the journal.
 */

import type { SyntaxNode } from '../parser/ledger-parser/types.js';
import { NEWLINE, isJournalItemKind } from '../types/ledger-cst.js';
import { formatDirective } from './directive-formatter.js';
import type { LayoutState } from './layout-state.js';
import { requireFirstChild } from './node-access.js';
import { formatXact } from './transaction-formatter.js';

/**
 * Blank-line markers collapse: a run of them emits one blank line, and none
 * is emitted before the first line of output. Items that produce no output
 * leave the collapsing state untouched.
 */
export function formatDocument(state: LayoutState, root: SyntaxNode): void {
  let lastLineBlank = true;

  for (const child of root.children) {
    if (child.type === NEWLINE) {
      if (!lastLineBlank) state.println();
      lastLineBlank = true;
      continue;
    }

    const rowBefore = state.row;
    formatJournalItem(state, requireFirstChild(child));
    if (state.row > rowBefore) lastLineBlank = false;
  }
}

export function formatJournalItem(state: LayoutState, node: SyntaxNode): void {
  if (!isJournalItemKind(node.type)) return;

  switch (node.type) {
    case 'comment':
    case 'block_comment':
    case 'block_test':
      state.println(node.text);
      break;
    case 'directive':
      formatDirective(state, node);
      break;
    case 'xact':
      formatXact(state, node);
      break;
  }
}
