import { describe, expect, it } from 'vitest';
import {
  availableCompetencies,
  competencyFromDueDate,
  competencyLabel,
  currentCompetency,
  normalizeCompetency,
  parseMonthYear,
  toMonthYearLabel,
} from './competency.js';
import type { Expense } from './types.js';

describe('parseMonthYear', () => {
  it('accepts mm/yyyy', () => {
    expect(parseMonthYear('03/2025')).toEqual({ year: 2025, month: 3 });
    expect(parseMonthYear(' 12/1999 ')).toEqual({ year: 1999, month: 12 });
  });

  it('returns null for other shapes', () => {
    expect(parseMonthYear('2025-03')).toBeNull();
    expect(parseMonthYear('03/25')).toBeNull();
    expect(parseMonthYear('13/2025')).toBeNull();
    expect(parseMonthYear('00/2025')).toBeNull();
    expect(parseMonthYear('03/2025/01')).toBeNull();
    expect(parseMonthYear('')).toBeNull();
  });
});

describe('normalizeCompetency', () => {
  it('converts labels to keys', () => {
    expect(normalizeCompetency('03/2025')).toBe('2025-03');
    expect(normalizeCompetency('3/2025')).toBe('2025-03');
  });

  it('keeps canonical keys and pads one-digit months', () => {
    expect(normalizeCompetency('2025-03')).toBe('2025-03');
    expect(normalizeCompetency('2025-3')).toBe('2025-03');
  });

  it('signals invalid input with an empty string', () => {
    expect(normalizeCompetency('')).toBe('');
    expect(normalizeCompetency('   ')).toBe('');
    expect(normalizeCompetency('march')).toBe('');
    expect(normalizeCompetency('2025-13')).toBe('');
    expect(normalizeCompetency('2025-03-15')).toBe('');
  });

  it('round-trips every month label', () => {
    for (let month = 1; month <= 12; month++) {
      const label = toMonthYearLabel(2025, month);
      expect(competencyLabel(normalizeCompetency(label))).toBe(label);
    }
  });

  it('is idempotent through the label', () => {
    for (const input of ['3/2025', '2024-11', 'nope']) {
      const key = normalizeCompetency(input);
      expect(normalizeCompetency(competencyLabel(key))).toBe(key);
    }
  });
});

describe('competencyLabel', () => {
  it('renders mm/yyyy, or a dash for empty keys', () => {
    expect(competencyLabel('2025-03')).toBe('03/2025');
    expect(competencyLabel('')).toBe('-');
    expect(competencyLabel('garbage')).toBe('-');
  });
});

describe('helpers', () => {
  it('currentCompetency formats local year and month', () => {
    expect(currentCompetency(new Date(2025, 0, 15))).toBe('2025-01');
    expect(currentCompetency(new Date(2025, 11, 1))).toBe('2025-12');
  });

  it('competencyFromDueDate keeps year and month of a real date', () => {
    expect(competencyFromDueDate('2025-03-15')).toBe('2025-03');
    expect(competencyFromDueDate('2025-3-5')).toBe('2025-03');
    expect(competencyFromDueDate('2025-11-7')).toBe('2025-11');
    expect(competencyFromDueDate('2025-02-30')).toBe('');
    expect(competencyFromDueDate('15/03/2025')).toBe('');
  });

  it('availableCompetencies lists distinct periods newest first', () => {
    const make = (id: string, competency: string): Expense => ({
      id,
      title: id,
      amount: 100,
      competency,
      category: 'extra',
      amountPaid: 0,
      paid: false,
      paidAt: null,
    });
    const list = [make('a', '2025-01'), make('b', '2025-03'), make('c', ''), make('d', '2025-01'), make('e', '2024-12')];
    expect(availableCompetencies(list)).toEqual(['2025-03', '2025-01', '2024-12']);
  });
});
