/**
 * Domain types for the expense ledger.
 * Pure data — no DB, no HTTP, no IO.
 */

/** Integer count of minor currency units (centavos). 1234 = R$ 12,34 */
export type Cents = number;

/** YYYY-MM string, or '' when the record has no period */
export type Competency = string;

export const CATEGORIES = ['fixed', 'extra', 'set_aside'] as const;

/**
 * fixed     — recurring obligation
 * extra     — one-off
 * set_aside — money saved/reserved, settled on entry
 */
export type Category = (typeof CATEGORIES)[number];

export interface Expense {
  id: string;
  title: string;
  amount: Cents;
  competency: Competency;
  category: Category;
  amountPaid: Cents;
  paid: boolean;               // cached projection of the amounts, see settle()
  paidAt: string | null;       // ISO timestamp of the last settlement
}

/** Raw user input for add/edit, validated by the repository */
export interface ExpenseDraft {
  title: string;
  amount: string;              // display convention, e.g. "1.234,56"
  competency: string;          // mm/yyyy or yyyy-mm
  category: string;
}

export type StatusFilter = 'all' | 'pending' | 'paid';

export interface ExpenseFilter {
  category: Category | 'all';
  status: StatusFilter;
  competency: Competency | 'all';
  search: string;
}

export interface Totals {
  spend: Cents;                // fixed + extra amounts
  pending: Cents;              // fixed + extra still owed
  setAside: Cents;
}

/** One table row as the presentation layer shows it */
export interface ExpenseRow extends Expense {
  remaining: Cents;
  status: 'paid' | 'pending';
  competencyLabel: string;     // mm/yyyy or '-'
  amountLabel: string;
  remainingLabel: string;
  amountInput: string;         // edit-form prefill, e.g. "1234,56"
}

export interface LedgerView {
  rows: ExpenseRow[];
  competencies: Competency[];  // filter choices, newest first
  defaultCompetency: Competency; // preselected period for a new entry
  totals: {
    all: Totals;
    filtered: Totals;
  };
}

export const DEFAULT_FILTER: ExpenseFilter = {
  category: 'all',
  status: 'all',
  competency: 'all',
  search: '',
};

export function isCategory(value: string): value is Category {
  return CATEGORIES.some((c) => c === value);
}
