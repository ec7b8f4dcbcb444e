/**
 * On-disk record shape and the one-time upgrade of legacy records.
 *
 * Field names are the ones the store file has always used. Files written
 * before competency periods existed carry a due date (`vencimento`) instead;
 * migrateLegacyRecord() rewrites those before decoding, and the next save
 * writes the canonical shape back.
 */
import { z } from 'zod';
import { UNTITLED } from '../config.js';
import { competencyFromDueDate, normalizeCompetency } from '../domain/competency.js';
import { LedgerError } from '../domain/errors.js';
import { applySettlement, generateId } from '../domain/expense.js';
import { parseStoredAmount, toStoredAmount } from '../domain/money.js';
import type { Category, Expense } from '../domain/types.js';

const storedAmount = z.union([z.string(), z.number()]);

export const rawExpenseSchema = z.object({
  id: z.union([z.string(), z.number()]).transform(String).nullish(),   // hand-edited files may hold numbers
  titulo: z.string().nullish(),
  valor: storedAmount.optional(),
  competencia: z.string().nullish(),
  vencimento: z.string().nullish(),   // legacy
  paga: z.boolean().nullish(),
  paga_em: z.string().nullish(),
  tipo: z.string().nullish(),
  valor_pago: storedAmount.optional(),
});

export const storeFileSchema = z.array(rawExpenseSchema);

export type RawExpense = z.infer<typeof rawExpenseSchema>;

/** Canonical record as written to disk */
export interface DbExpense {
  id: string;
  titulo: string;
  valor: string;        // "1234.56"
  competencia: string;  // yyyy-mm or ''
  paga: boolean;
  paga_em: string;      // ISO timestamp or ''
  tipo: 'fixo' | 'extra' | 'guardado';
  valor_pago: string;
}

const TO_DB_CATEGORY: Record<Category, DbExpense['tipo']> = {
  fixed: 'fixo',
  extra: 'extra',
  set_aside: 'guardado',
};

const FROM_DB_CATEGORY = new Map<string, Category>([
  ['fixo', 'fixed'],
  ['extra', 'extra'],
  ['guardado', 'set_aside'],
]);

/** Fill `competencia` from the legacy due date when the record has none */
export function migrateLegacyRecord(raw: RawExpense): RawExpense {
  if (raw.competencia?.trim() || !raw.vencimento) return raw;
  return { ...raw, competencia: competencyFromDueDate(raw.vencimento) };
}

/** Unknown or missing types fall back to 'extra' */
export function normalizeCategory(tipo: string | null | undefined): Category {
  return FROM_DB_CATEGORY.get((tipo || 'extra').toLowerCase()) ?? 'extra';
}

function readAmount(value: string | number | undefined, field: string, id: string): number {
  const cents = parseStoredAmount(value ?? '0');
  if (cents === null) {
    throw new LedgerError('StoreCorrupt', `Record ${id}: "${field}" is not a decimal amount`);
  }
  return Math.max(0, cents);
}

/**
 * Decode one migrated record. Settlement fields are recomputed from the
 * amounts; the stored `paga` flag is not trusted.
 */
export function decodeExpense(raw: RawExpense, now: string): Expense {
  const id = raw.id || generateId();
  return applySettlement(
    {
      id,
      title: raw.titulo || UNTITLED,
      amount: readAmount(raw.valor, 'valor', id),
      competency: normalizeCompetency(raw.competencia ?? ''),
      category: normalizeCategory(raw.tipo),
      amountPaid: readAmount(raw.valor_pago, 'valor_pago', id),
      paid: raw.paga ?? false,
      paidAt: raw.paga_em || null,
    },
    now,
  );
}

export function encodeExpense(expense: Expense): DbExpense {
  return {
    id: expense.id,
    titulo: expense.title,
    valor: toStoredAmount(expense.amount),
    competencia: expense.competency,
    paga: expense.paid,
    paga_em: expense.paidAt ?? '',
    tipo: TO_DB_CATEGORY[expense.category],
    valor_pago: toStoredAmount(expense.amountPaid),
  };
}

/**
 * Parse a whole store document. Throws on anything structurally wrong;
 * the store decides what to do with a corrupt file.
 */
export function decodeStoreFile(text: string, now: string): Expense[] {
  const records = storeFileSchema.parse(JSON.parse(text));
  const seen = new Set<string>();
  const out: Expense[] = [];

  for (const raw of records) {
    let expense = decodeExpense(migrateLegacyRecord(raw), now);
    // Duplicate ids get a fresh one so the live collection stays unique
    while (seen.has(expense.id)) {
      expense = { ...expense, id: generateId() };
    }
    seen.add(expense.id);
    out.push(expense);
  }
  return out;
}
