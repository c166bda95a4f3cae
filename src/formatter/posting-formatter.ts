/**
 * Posting, amount, price and balance-assertion layout.
 */

import type { SyntaxNode } from '../parser/ledger-parser/types.js';
import { ALIGNMENT_COLUMN, textWidth, type LayoutState } from './layout-state.js';
import { findNamedChild, requireFirstChild, requireNamedChild } from './node-access.js';

/**
 * Narrowest gap allowed between an account and the field after it. The
 * grammar ends an account name at two spaces, so anything narrower would
 * change the meaning of the line.
 */
export const MIN_ACCOUNT_GAP = 2;

function padding(width: number): string {
  return ' '.repeat(Math.max(MIN_ACCOUNT_GAP, width));
}

/**
 * Render one posting line (after its indentation has been printed).
 *
 * The amount is placed so that its quantity ends just before
 * ALIGNMENT_COLUMN; without an amount, the next field starts at
 * ALIGNMENT_COLUMN. Either way at least MIN_ACCOUNT_GAP spaces follow the
 * account.
 */
export function formatPosting(state: LayoutState, node: SyntaxNode): void {
  const status = findNamedChild(node, 'status');
  if (status) state.printNode(status);

  const account = findNamedChild(node, 'account');
  if (account) state.printNode(account);

  let separator = padding(ALIGNMENT_COLUMN - state.col);

  const amount = findNamedChild(node, 'amount');
  if (amount) {
    const quantity = requireNamedChild(amount, 'quantity', 'negative_quantity');
    const quantityWidth = textWidth(quantity.text.trim());
    state.print(padding(ALIGNMENT_COLUMN - state.col - quantityWidth - 1));
    formatAmount(state, amount);
    separator = ' ';
  }

  const price = findNamedChild(node, 'price');
  if (price) {
    state.print(separator);
    formatPrice(state, price);
    separator = ' ';
  }

  const balanceAssertion = findNamedChild(node, 'balance_assertion');
  if (balanceAssertion) {
    state.print(separator);
    formatBalanceAssertion(state, balanceAssertion);
    separator = ' ';
  }

  const note = findNamedChild(node, 'note');
  if (note) {
    state.print(separator);
    state.print(note.text.trim());
  }

  state.println();
}

/**
 * Quantity first, then the commodity. Digits are passed through as written.
 */
export function formatAmount(state: LayoutState, node: SyntaxNode): void {
  const quantity = findNamedChild(node, 'negative_quantity') ?? findNamedChild(node, 'quantity');
  if (quantity) state.print(quantity.text.trim());

  const commodity = findNamedChild(node, 'commodity');
  if (commodity) {
    state.print(' ');
    state.print(commodity.text.trim());
  }
}

/** `@ amount` (per unit) or `@@ amount` (total), keyword kept as written. */
export function formatPrice(state: LayoutState, node: SyntaxNode): void {
  state.printNode(requireFirstChild(node));
  state.print(' ');
  formatAmount(state, requireNamedChild(node, 'amount'));
}

export function formatBalanceAssertion(state: LayoutState, node: SyntaxNode): void {
  state.print('= ');
  formatAmount(state, requireNamedChild(node, 'amount'));
}
