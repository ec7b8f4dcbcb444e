/**
 * Competency period codec.
 * The UI speaks "mm/yyyy"; records and filters use the sortable "yyyy-mm" key.
 */
import type { Competency, Expense } from './types.js';

export interface MonthYear {
  year: number;
  month: number;   // 1–12
}

function validMonth(month: number): boolean {
  return month >= 1 && month <= 12;
}

function toKey(year: number, month: number): Competency {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}`;
}

/** "03/2025" → { year: 2025, month: 3 }. Any other shape → null */
export function parseMonthYear(text: string): MonthYear | null {
  const match = /^(\d{1,2})\/(\d{4})$/.exec(text.trim());
  if (!match) return null;
  const month = Number(match[1]);
  const year = Number(match[2]);
  return validMonth(month) ? { year, month } : null;
}

export function toMonthYearLabel(year: number, month: number): string {
  return `${String(month).padStart(2, '0')}/${year}`;
}

/**
 * Canonicalize user or stored input to "yyyy-mm".
 * Accepts "mm/yyyy" and "yyyy-mm"; blank or unparseable input gives ''.
 */
export function normalizeCompetency(text: string): Competency {
  const s = text.trim();
  if (!s) return '';

  const monthYear = parseMonthYear(s);
  if (monthYear) return toKey(monthYear.year, monthYear.month);

  const match = /^(\d{4})-(\d{1,2})$/.exec(s);
  if (!match) return '';
  const month = Number(match[2]);
  return validMonth(month) ? toKey(Number(match[1]), month) : '';
}

/** "2025-03" → "03/2025"; empty or malformed keys show as "-" */
export function competencyLabel(key: Competency): string {
  const match = /^(\d{4})-(\d{2})$/.exec(key.trim());
  if (!match) return '-';
  return toMonthYearLabel(Number(match[1]), Number(match[2]));
}

/** Current period as YYYY-MM (local time) */
export function currentCompetency(now: Date = new Date()): Competency {
  return toKey(now.getFullYear(), now.getMonth() + 1);
}

/** Legacy due date "2025-03-15" (or "2025-3-5") → "2025-03"; anything else → '' */
export function competencyFromDueDate(dueDate: string): Competency {
  const match = /^(\d{4})-(\d{1,2})-(\d{1,2})$/.exec(dueDate.trim());
  if (!match) return '';
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  // Reject dates that roll over, e.g. 2025-02-30
  if (date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return '';
  return toKey(year, month);
}

/** Distinct periods present in the collection, newest first */
export function availableCompetencies(expenses: Expense[]): Competency[] {
  const keys = new Set<Competency>();
  for (const e of expenses) {
    if (e.competency) keys.add(e.competency);
  }
  return Array.from(keys).sort().reverse();
}
