import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import { z } from 'zod';
import type { ExpenseRepo } from '../../src/db/repo.js';
import { isLedgerError, type LedgerErrorCode } from '../../src/domain/errors.js';
import { DEFAULT_FILTER, type ExpenseFilter } from '../../src/domain/types.js';

// --- Request validation ---

const draftSchema = z.object({
  title: z.string().default(''),
  amount: z.string(),
  competency: z.string(),
  category: z.string(),
});

const paymentSchema = z.object({
  amount: z.string(),
  allow_overpay_settle: z.boolean().default(false),
});

const filterSchema = z.object({
  category: z.enum(['all', 'fixed', 'extra', 'set_aside']).default(DEFAULT_FILTER.category),
  status: z.enum(['all', 'pending', 'paid']).default(DEFAULT_FILTER.status),
  competency: z.string().default(DEFAULT_FILTER.competency),
  search: z.string().default(DEFAULT_FILTER.search),
});

const STATUS_BY_CODE: Record<LedgerErrorCode, number> = {
  InvalidAmount: 400,
  InvalidCompetency: 400,
  InvalidCategory: 400,
  NoSelection: 404,
  NotApplicable: 409,
  AlreadySettled: 409,
  OverpaymentUnconfirmed: 409,
  StoreCorrupt: 500,
};

/**
 * HTTP surface over the repository. Routes stay thin: parse the request,
 * call one repo operation, return its result.
 */
export function createApp(repo: ExpenseRepo) {
  const app = express();

  app.use(cors());
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req, res) => {
    res.json({ ok: true });
  });

  // GET /expenses - rows + totals for the current filter state
  app.get('/expenses', (req, res) => {
    const filter: ExpenseFilter = filterSchema.parse(req.query);
    res.json(repo.view(filter));
  });

  app.get('/expenses/:id', (req, res) => {
    res.json(repo.get(req.params.id));
  });

  // POST /expenses - add an entry
  app.post('/expenses', (req, res) => {
    const created = repo.add(draftSchema.parse(req.body));
    res.status(201).json(created);
  });

  // PUT /expenses/:id - replace all editable fields
  app.put('/expenses/:id', (req, res) => {
    res.json(repo.edit(req.params.id, draftSchema.parse(req.body)));
  });

  // POST /expenses/:id/payments - record a (partial) payment
  app.post('/expenses/:id/payments', (req, res) => {
    const { amount, allow_overpay_settle } = paymentSchema.parse(req.body);
    res.json(repo.recordPayment(req.params.id, amount, { allowOverpaySettle: allow_overpay_settle }));
  });

  app.delete('/expenses/:id', (req, res) => {
    repo.remove(req.params.id);
    res.json({ ok: true });
  });

  // POST /reload - re-read the store file
  app.post('/reload', (_req, res) => {
    repo.reload();
    res.json(repo.view());
  });

  app.use((error: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (isLedgerError(error)) {
      res.status(STATUS_BY_CODE[error.code]).json({
        error: error.message,
        code: error.code,
        severity: error.severity,
      });
      return;
    }
    // Malformed JSON body
    if (error instanceof SyntaxError) {
      res.status(400).json({ error: 'Request body is not valid JSON', code: 'InvalidRequest', severity: 'error' });
      return;
    }
    if (error instanceof z.ZodError) {
      res.status(400).json({
        error: error.issues.map((i) => `${i.path.join('.') || 'body'}: ${i.message}`).join('; '),
        code: 'InvalidRequest',
        severity: 'error',
      });
      return;
    }
    console.error(`Error handling ${req.method} ${req.path}:`, error);
    res.status(500).json({ error: 'Internal error', code: 'Internal', severity: 'error' });
  });

  return app;
}
