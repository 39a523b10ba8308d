// ═══════════════════════════════════════════════════════
// errors.ts — Typed errors surfaced by the pipeline and API
// Each carries a stable code and the HTTP status it maps to.
// ═══════════════════════════════════════════════════════

export class AppError extends Error {
  code: string;
  status: number;
  constructor(message: string, code: string, status: number) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.status = status;
  }
}

/** Mandatory column missing from the raw input. Fatal: halts loading. */
export class DataFormatError extends AppError {
  readonly missing: string[];
  constructor(missing: string[]) {
    super(`Missing mandatory column(s): ${missing.join(', ')}`, 'DATA_FORMAT', 422);
    this.name = 'DataFormatError';
    this.missing = missing;
  }
}

/** No canonical table has been published yet (cold start or failed first load). */
export class TableNotReadyError extends AppError {
  constructor() {
    super('Transaction data is still loading', 'TABLE_NOT_READY', 503);
    this.name = 'TableNotReadyError';
  }
}

/** Selection or view options the aggregator cannot satisfy. */
export class InvalidSelectionError extends AppError {
  constructor(message: string) {
    super(message, 'INVALID_SELECTION', 400);
    this.name = 'InvalidSelectionError';
  }
}

export class RefreshInProgressError extends AppError {
  constructor() {
    super('Refresh already in progress', 'REFRESH_IN_PROGRESS', 409);
    this.name = 'RefreshInProgressError';
  }
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
