/**
 * Ledger error taxonomy.
 *
 * `error` severity is bad input the user must correct; `info` is a notice
 * (nothing to do, or nothing selected). Either way the operation is aborted
 * before the collection changes.
 */

export type LedgerErrorCode =
  | 'InvalidAmount'
  | 'InvalidCompetency'
  | 'InvalidCategory'
  | 'NotApplicable'
  | 'AlreadySettled'
  | 'NoSelection'
  | 'OverpaymentUnconfirmed'
  | 'StoreCorrupt';

export type Severity = 'error' | 'info';

const SEVERITY: Record<LedgerErrorCode, Severity> = {
  InvalidAmount: 'error',
  InvalidCompetency: 'error',
  InvalidCategory: 'error',
  NotApplicable: 'info',
  AlreadySettled: 'info',
  NoSelection: 'info',
  OverpaymentUnconfirmed: 'info',
  StoreCorrupt: 'info',
};

export class LedgerError extends Error {
  readonly code: LedgerErrorCode;
  readonly severity: Severity;

  constructor(code: LedgerErrorCode, message: string) {
    super(message);
    this.name = 'LedgerError';
    this.code = code;
    this.severity = SEVERITY[code];
  }
}

export function isLedgerError(error: unknown): error is LedgerError {
  return error instanceof LedgerError;
}
