/**
 * Pure ledger computations: filters and totals.
 * No DB, no IO — only data in, data out.
 */
import { availableCompetencies, currentCompetency, normalizeCompetency } from './competency.js';
import { remaining, toRow } from './expense.js';
import type {
  Category,
  Cents,
  Competency,
  Expense,
  ExpenseFilter,
  LedgerView,
  StatusFilter,
  Totals,
} from './types.js';
import { DEFAULT_FILTER } from './types.js';

const isSpend = (e: Expense) => e.category === 'fixed' || e.category === 'extra';

/** Filter to one category ('all' passes everything) */
export function forCategory(expenses: Expense[], category: Category | 'all'): Expense[] {
  if (category === 'all') return expenses;
  return expenses.filter((e) => e.category === category);
}

/** pending: open balance, never set_aside. paid: set_aside or nothing left to pay */
export function forStatus(expenses: Expense[], status: StatusFilter): Expense[] {
  switch (status) {
    case 'pending':
      return expenses.filter((e) => e.category !== 'set_aside' && remaining(e) > 0);
    case 'paid':
      return expenses.filter((e) => e.category === 'set_aside' || remaining(e) <= 0);
    default:
      return expenses;
  }
}

/**
 * Filter to a single period. Accepts the key (yyyy-mm) or the label
 * (mm/yyyy); a value that does not parse leaves the list untouched.
 */
export function forCompetency(expenses: Expense[], competency: Competency | 'all'): Expense[] {
  if (competency === 'all') return expenses;
  const key = normalizeCompetency(competency);
  if (!key) return expenses;
  return expenses.filter((e) => e.competency === key);
}

/** Case-insensitive substring match on the title */
export function forSearch(expenses: Expense[], search: string): Expense[] {
  const q = search.trim().toLowerCase();
  if (!q) return expenses;
  return expenses.filter((e) => e.title.toLowerCase().includes(q));
}

/** Category → status → period → search, keeping collection order */
export function filterExpenses(expenses: Expense[], filter: ExpenseFilter): Expense[] {
  let out = forCategory(expenses, filter.category);
  out = forStatus(out, filter.status);
  out = forCompetency(out, filter.competency);
  return forSearch(out, filter.search);
}

// --- Totals ---

/** Nominal value of fixed + extra expenses */
export function totalSpend(expenses: Expense[]): Cents {
  return expenses.filter(isSpend).reduce((sum, e) => sum + e.amount, 0);
}

/** Still owed on fixed + extra expenses */
export function totalPending(expenses: Expense[]): Cents {
  return expenses.filter(isSpend).reduce((sum, e) => sum + (e.amount - e.amountPaid), 0);
}

export function totalSetAside(expenses: Expense[]): Cents {
  return expenses
    .filter((e) => e.category === 'set_aside')
    .reduce((sum, e) => sum + e.amount, 0);
}

export function summarize(expenses: Expense[]): Totals {
  return {
    spend: totalSpend(expenses),
    pending: totalPending(expenses),
    setAside: totalSetAside(expenses),
  };
}

/** Everything the table screen renders for one filter state */
export function ledgerView(
  expenses: Expense[],
  filter: ExpenseFilter = DEFAULT_FILTER,
  now: Date = new Date(),
): LedgerView {
  const filtered = filterExpenses(expenses, filter);
  return {
    rows: filtered.map(toRow),
    competencies: availableCompetencies(expenses),
    defaultCompetency: currentCompetency(now),
    totals: {
      all: summarize(expenses),
      filtered: summarize(filtered),
    },
  };
}
