/**
 * Expense record rules: remaining balance, status and settlement.
 */
import { competencyLabel } from './competency.js';
import { formatMoney, formatMoneyInput } from './money.js';
import type { Cents, Category, Competency, Expense, ExpenseRow } from './types.js';

export interface ExpenseFields {
  title: string;
  amount: Cents;
  competency: Competency;
  category: Category;
}

/** Time-based id with a random tail */
export function generateId(): string {
  const timestamp = Date.now().toString(36);
  const randomPart = Math.random().toString(36).substring(2, 9);
  return `c${timestamp}${randomPart}`;
}

/** Unsettled portion of the amount, floored at zero */
export function remaining(expense: Expense): Cents {
  return Math.max(0, expense.amount - expense.amountPaid);
}

export function isPending(expense: Expense): boolean {
  return expense.category !== 'set_aside' && remaining(expense) > 0;
}

/**
 * Recompute the cached settlement fields from the amounts.
 *
 * - set_aside is always fully paid
 * - otherwise amountPaid is clamped to [0, amount] and paid ⇔ amountPaid ≥ amount
 * - paidAt keeps an existing stamp while paid, takes `now` when newly paid,
 *   and is cleared when the balance reopens
 */
export function applySettlement(expense: Expense, now: string): Expense {
  if (expense.category === 'set_aside') {
    return { ...expense, amountPaid: expense.amount, paid: true, paidAt: expense.paidAt ?? now };
  }

  const amountPaid = Math.min(Math.max(expense.amountPaid, 0), expense.amount);
  const paid = amountPaid >= expense.amount;
  return {
    ...expense,
    amountPaid,
    paid,
    paidAt: paid ? (expense.paidAt ?? now) : null,
  };
}

export function createExpense(id: string, fields: ExpenseFields, now: string): Expense {
  return applySettlement(
    { id, ...fields, amountPaid: 0, paid: false, paidAt: null },
    now,
  );
}

export function toRow(expense: Expense): ExpenseRow {
  const rest = remaining(expense);
  return {
    ...expense,
    remaining: rest,
    status: isPending(expense) ? 'pending' : 'paid',
    competencyLabel: competencyLabel(expense.competency),
    amountLabel: formatMoney(expense.amount),
    remainingLabel: formatMoney(rest),
    amountInput: formatMoneyInput(expense.amount),
  };
}
