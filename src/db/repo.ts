/**
 * Repository layer: the ledger's mutation operations over an ExpenseStore.
 *
 * Holds the in-memory collection. Every mutation validates its input first,
 * then writes the full collection through the store, then swaps the new
 * collection in — a failed validation or a failed write leaves it untouched.
 */
import { UNTITLED } from '../config.js';
import { normalizeCompetency } from '../domain/competency.js';
import { ledgerView } from '../domain/computations.js';
import { LedgerError } from '../domain/errors.js';
import { applySettlement, createExpense, generateId, remaining, type ExpenseFields } from '../domain/expense.js';
import { formatMoney, parseMoney } from '../domain/money.js';
import type { Expense, ExpenseDraft, ExpenseFilter, LedgerView } from '../domain/types.js';
import { isCategory } from '../domain/types.js';
import type { ExpenseStore } from './store.js';

export interface RepoOptions {
  now?: () => Date;
}

export interface PaymentOptions {
  /** Accept a payment above the remaining balance as full settlement */
  allowOverpaySettle?: boolean;
}

export interface ExpenseRepo {
  list(): Expense[];
  get(id: string): Expense;
  view(filter?: ExpenseFilter): LedgerView;
  add(draft: ExpenseDraft): Expense;
  edit(id: string, draft: ExpenseDraft): Expense;
  recordPayment(id: string, payNow: string, options?: PaymentOptions): Expense;
  remove(id: string): void;
  reload(): Expense[];
}

/** Validate raw form input. Throws LedgerError on the first bad field */
export function parseDraft(draft: ExpenseDraft): ExpenseFields {
  const title = draft.title.trim() || UNTITLED;

  const amount = parseMoney(draft.amount);
  if (amount < 0) {
    throw new LedgerError('InvalidAmount', 'Amount cannot be negative.');
  }

  const competency = normalizeCompetency(draft.competency);
  if (!competency) {
    throw new LedgerError('InvalidCompetency', 'Invalid month. Use mm/yyyy (e.g. 10/2025).');
  }

  const category = draft.category.trim().toLowerCase();
  if (!isCategory(category)) {
    throw new LedgerError('InvalidCategory', 'Choose a valid category (fixed, extra or set_aside).');
  }

  return { title, amount, competency, category };
}

export function createRepo(store: ExpenseStore, options: RepoOptions = {}): ExpenseRepo {
  const now = options.now ?? (() => new Date());
  const stamp = () => now().toISOString();

  let expenses: Expense[] = store.load();

  function find(id: string): Expense {
    const found = expenses.find((e) => e.id === id);
    if (!found) {
      throw new LedgerError('NoSelection', 'Select an item in the table.');
    }
    return found;
  }

  function commit(next: Expense[]): void {
    store.save(next);
    expenses = next;
  }

  function replace(updated: Expense): Expense {
    commit(expenses.map((e) => (e.id === updated.id ? updated : e)));
    return { ...updated };
  }

  function mintId(): string {
    let id = generateId();
    while (expenses.some((e) => e.id === id)) {
      id = generateId();
    }
    return id;
  }

  return {
    // Callers get copies; records only change through the operations below
    list: () => expenses.map((e) => ({ ...e })),

    get: (id) => ({ ...find(id) }),

    view: (filter) => ledgerView(expenses, filter, now()),

    add(draft) {
      const created = createExpense(mintId(), parseDraft(draft), stamp());
      commit([...expenses, created]);
      return { ...created };
    },

    edit(id, draft) {
      const current = find(id);
      const fields = parseDraft(draft);
      // applySettlement truncates a stored overpayment to the new amount
      return replace(applySettlement({ ...current, ...fields }, stamp()));
    },

    recordPayment(id, payNow, { allowOverpaySettle = false } = {}) {
      const current = find(id);
      if (current.category === 'set_aside') {
        throw new LedgerError('NotApplicable', 'Set-aside entries have no pending balance.');
      }
      const rest = remaining(current);
      if (rest <= 0) {
        throw new LedgerError('AlreadySettled', 'This expense is already fully paid.');
      }

      const amount = parseMoney(payNow);
      if (amount <= 0) {
        throw new LedgerError('InvalidAmount', 'Enter an amount greater than zero.');
      }
      if (amount > rest && !allowOverpaySettle) {
        throw new LedgerError(
          'OverpaymentUnconfirmed',
          `Amount exceeds the remaining ${formatMoney(rest)}. Confirm to settle the expense.`,
        );
      }

      return replace(applySettlement({ ...current, amountPaid: current.amountPaid + amount }, stamp()));
    },

    remove(id) {
      find(id);
      commit(expenses.filter((e) => e.id !== id));
    },

    reload() {
      expenses = store.load();
      return expenses.map((e) => ({ ...e }));
    },
  };
}
