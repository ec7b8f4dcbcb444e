import { describe, expect, it } from 'vitest';
import { LedgerError } from './errors.js';
import { formatMoney, formatMoneyInput, parseMoney, parseStoredAmount, toStoredAmount } from './money.js';

function errorCode(fn: () => unknown): string | null {
  try {
    fn();
  } catch (error) {
    return error instanceof LedgerError ? error.code : 'unexpected';
  }
  return null;
}

describe('formatMoney', () => {
  it('renders the currency prefix, thousands dots and decimal comma', () => {
    expect(formatMoney(123456)).toBe('R$ 1.234,56');
    expect(formatMoney(123456789)).toBe('R$ 1.234.567,89');
  });

  it('always shows two fraction digits', () => {
    expect(formatMoney(0)).toBe('R$ 0,00');
    expect(formatMoney(50)).toBe('R$ 0,50');
    expect(formatMoney(120000)).toBe('R$ 1.200,00');
  });

  it('keeps the sign after the prefix', () => {
    expect(formatMoney(-123456)).toBe('R$ -1.234,56');
  });
});

describe('parseMoney', () => {
  it('reads the display convention', () => {
    expect(parseMoney('R$ 1.234,56')).toBe(123456);
    expect(parseMoney('1200,00')).toBe(120000);
    expect(parseMoney(' 199,9 ')).toBe(19990);
    expect(parseMoney('7')).toBe(700);
  });

  it('treats dots as thousands separators', () => {
    expect(parseMoney('1.200')).toBe(120000);
  });

  it('rounds half-up to cents', () => {
    expect(parseMoney('10,005')).toBe(1001);
    expect(parseMoney('10,004')).toBe(1000);
    expect(parseMoney('-0,015')).toBe(-2);
  });

  it('keeps negative values for the caller to reject', () => {
    expect(parseMoney('-5,00')).toBe(-500);
  });

  it.each(['', 'R$', 'abc', '1,2,3', '12a', ','])('rejects %j with InvalidAmount', (text) => {
    expect(errorCode(() => parseMoney(text))).toBe('InvalidAmount');
  });

  it('round-trips the editable form', () => {
    for (const cents of [0, 5, 99, 100, 19990, 123456, 100000000]) {
      expect(parseMoney(formatMoneyInput(cents))).toBe(cents);
    }
  });

  it('round-trips the display form', () => {
    expect(parseMoney(formatMoney(123456))).toBe(123456);
    expect(formatMoney(parseMoney(formatMoney(987654321)))).toBe('R$ 9.876.543,21');
  });
});

describe('stored amounts', () => {
  it('writes plain decimals with two digits', () => {
    expect(toStoredAmount(120000)).toBe('1200.00');
    expect(toStoredAmount(5)).toBe('0.05');
    expect(toStoredAmount(-250)).toBe('-2.50');
  });

  it('reads strings and legacy numbers', () => {
    expect(parseStoredAmount('1200.00')).toBe(120000);
    expect(parseStoredAmount('199.9')).toBe(19990);
    expect(parseStoredAmount(199.9)).toBe(19990);
    expect(parseStoredAmount('0')).toBe(0);
  });

  it('returns null for anything that is not a decimal', () => {
    expect(parseStoredAmount('1.200,00')).toBeNull();
    expect(parseStoredAmount('abc')).toBeNull();
    expect(parseStoredAmount(Number.NaN)).toBeNull();
    expect(parseStoredAmount(null)).toBeNull();
  });
});
