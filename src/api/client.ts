/**
 * Typed HTTP client for the ledger API — what the presentation layer calls.
 */
import { z } from 'zod';
import type { Expense, ExpenseDraft, ExpenseFilter, LedgerView } from '../domain/types.js';
import { CATEGORIES } from '../domain/types.js';

// --- Response shapes ---

const expenseSchema = z.object({
  id: z.string(),
  title: z.string(),
  amount: z.number().int(),
  competency: z.string(),
  category: z.enum(CATEGORIES),
  amountPaid: z.number().int(),
  paid: z.boolean(),
  paidAt: z.string().nullable(),
});

const totalsSchema = z.object({
  spend: z.number().int(),
  pending: z.number().int(),
  setAside: z.number().int(),
});

const viewSchema = z.object({
  rows: z.array(
    expenseSchema.extend({
      remaining: z.number().int(),
      status: z.enum(['paid', 'pending']),
      competencyLabel: z.string(),
      amountLabel: z.string(),
      remainingLabel: z.string(),
      amountInput: z.string(),
    }),
  ),
  competencies: z.array(z.string()),
  defaultCompetency: z.string(),
  totals: z.object({ all: totalsSchema, filtered: totalsSchema }),
});

const okSchema = z.object({ ok: z.literal(true) });

const errorBodySchema = z.object({
  error: z.string(),
  code: z.string(),
  severity: z.enum(['error', 'info']),
});

export class ApiError extends Error {
  readonly status: number;
  readonly code: string;
  readonly severity: 'error' | 'info';

  constructor(status: number, code: string, severity: 'error' | 'info', message: string) {
    super(message);
    this.name = 'ApiError';
    this.status = status;
    this.code = code;
    this.severity = severity;
  }
}

export interface LedgerClient {
  getView(filter?: Partial<ExpenseFilter>): Promise<LedgerView>;
  getExpense(id: string): Promise<Expense>;
  addExpense(draft: ExpenseDraft): Promise<Expense>;
  editExpense(id: string, draft: ExpenseDraft): Promise<Expense>;
  recordPayment(id: string, amount: string, allowOverpaySettle?: boolean): Promise<Expense>;
  deleteExpense(id: string): Promise<void>;
  reload(): Promise<LedgerView>;
}

interface RequestOptions {
  method?: 'GET' | 'POST' | 'PUT' | 'DELETE';
  body?: string;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return null;
  }
}

async function toApiError(response: Response): Promise<ApiError> {
  // Non-JSON bodies (proxy error pages etc.) fall through to the generic error
  const parsed = errorBodySchema.safeParse(parseJson(await response.text()));
  if (parsed.success) {
    return new ApiError(response.status, parsed.data.code, parsed.data.severity, parsed.data.error);
  }
  return new ApiError(response.status, 'Http', 'error', `Request failed with status ${response.status}`);
}

export function createLedgerClient(baseUrl: string): LedgerClient {
  async function request<T>(path: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, init: RequestOptions = {}): Promise<T> {
    const response = await fetch(`${baseUrl}${path}`, {
      method: init.method ?? 'GET',
      body: init.body,
      headers: { 'Content-Type': 'application/json' },
    });
    if (!response.ok) throw await toApiError(response);
    return schema.parse(await response.json());
  }

  const encodeId = (id: string) => encodeURIComponent(id);

  return {
    getView(filter = {}) {
      const params = new URLSearchParams();
      for (const [key, value] of Object.entries(filter)) {
        if (value !== undefined) params.set(key, value);
      }
      const query = params.toString();
      return request(query ? `/expenses?${query}` : '/expenses', viewSchema);
    },

    getExpense: (id) => request(`/expenses/${encodeId(id)}`, expenseSchema),

    addExpense: (draft) =>
      request('/expenses', expenseSchema, { method: 'POST', body: JSON.stringify(draft) }),

    editExpense: (id, draft) =>
      request(`/expenses/${encodeId(id)}`, expenseSchema, { method: 'PUT', body: JSON.stringify(draft) }),

    recordPayment: (id, amount, allowOverpaySettle = false) =>
      request(`/expenses/${encodeId(id)}/payments`, expenseSchema, {
        method: 'POST',
        body: JSON.stringify({ amount, allow_overpay_settle: allowOverpaySettle }),
      }),

    async deleteExpense(id) {
      await request(`/expenses/${encodeId(id)}`, okSchema, { method: 'DELETE' });
    },

    reload: () => request('/reload', viewSchema, { method: 'POST' }),
  };
}
