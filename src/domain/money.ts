/**
 * Money codec.
 *
 * Display convention: "R$ 1.234,56" — `.` groups thousands, `,` separates
 * cents. Stored convention: "1234.56". Internally everything is integer cents.
 */
import { CURRENCY_PREFIX } from '../config.js';
import { LedgerError } from './errors.js';
import type { Cents } from './types.js';

const brlFmt = new Intl.NumberFormat('pt-BR', {
  minimumFractionDigits: 2,
  maximumFractionDigits: 2,
});

/**
 * Convert a plain decimal ("-12.345", "7", ".5") to cents, rounding half-up
 * (away from zero) on the third fractional digit. Returns null when the text
 * is not a decimal or the result leaves the safe-integer range.
 */
function decimalToCents(text: string): Cents | null {
  const match = /^([+-]?)(\d*)(?:\.(\d*))?$/.exec(text);
  if (!match) return null;

  const sign = match[1];
  const whole = match[2] ?? '';
  const fraction = match[3] ?? '';
  if (whole === '' && fraction === '') return null;

  const digits = fraction.padEnd(3, '0');
  let cents = Number(whole || '0') * 100 + Number(digits.slice(0, 2));
  if (Number(digits.charAt(2)) >= 5) cents += 1;

  if (!Number.isSafeInteger(cents)) return null;
  return sign === '-' && cents !== 0 ? -cents : cents;
}

/** Format cents for display: 123456 → "R$ 1.234,56" */
export function formatMoney(amount: Cents): string {
  return `${CURRENCY_PREFIX} ${brlFmt.format(amount / 100)}`;
}

/**
 * Parse user-typed money in the display convention.
 * "R$ 1.234,56" → 123456, "199,9" → 19990, "10,005" → 1001.
 */
export function parseMoney(text: string): Cents {
  const cleaned = text
    .replaceAll(CURRENCY_PREFIX, '')
    .replace(/\s+/g, '')
    .replaceAll('.', '')
    .replaceAll(',', '.');

  const cents = decimalToCents(cleaned);
  if (cents === null) {
    throw new LedgerError('InvalidAmount', 'Invalid amount. Use something like 1234,56.');
  }
  return cents;
}

/** Storage form: 123456 → "1234.56" */
export function toStoredAmount(amount: Cents): string {
  const abs = Math.abs(amount);
  const whole = Math.floor(abs / 100);
  const cents = String(abs % 100).padStart(2, '0');
  return `${amount < 0 ? '-' : ''}${whole}.${cents}`;
}

/** Editable form without grouping, as prefilled in an edit form: 123456 → "1234,56" */
export function formatMoneyInput(amount: Cents): string {
  return toStoredAmount(amount).replace('.', ',');
}

/**
 * Read an amount from the store file. Older files may hold plain JSON
 * numbers instead of strings.
 */
export function parseStoredAmount(value: unknown): Cents | null {
  if (typeof value === 'number') {
    return Number.isFinite(value) ? decimalToCents(String(value)) : null;
  }
  if (typeof value === 'string') {
    return decimalToCents(value.trim());
  }
  return null;
}
