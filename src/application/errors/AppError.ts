export type ErrorCategory =
  | 'VALIDATION_ERROR'
  | 'NOT_FOUND'
  | 'CONFLICT'
  | 'PERSISTENCE_FAILURE'
  | 'INTERNAL_ERROR';

export type ErrorReason =
  | 'INVALID_ACCOUNT_ID'
  | 'INVALID_OPERATION_TYPE'
  | 'ZERO_AMOUNT'
  | 'INVALID_DOCUMENT_NUMBER'
  | 'INVALID_REQUEST_BODY'
  | 'INVALID_TRANSACTION_ID'
  | 'INVALID_PAGINATION'
  | 'MISSING_IDEMPOTENCY_KEY'
  | 'ACCOUNT_NOT_FOUND'
  | 'TRANSACTION_NOT_FOUND'
  | 'ROUTE_NOT_FOUND'
  | 'DUPLICATE_DOCUMENT_NUMBER'
  | 'IDEMPOTENCY_KEY_IN_PROGRESS'
  | 'STORAGE_UNAVAILABLE'
  | 'UNEXPECTED';

export class AppError extends Error {
  readonly code: ErrorCategory;
  readonly reason: ErrorReason;
  readonly status: number;
  readonly details?: unknown;

  constructor(
    message: string,
    opts: {
      code: ErrorCategory;
      reason: ErrorReason;
      status: number;
      details?: unknown;
      cause?: unknown;
    },
  ) {
    super(message, { cause: opts.cause });
    Object.setPrototypeOf(this, new.target.prototype);

    this.name = new.target.name;
    this.code = opts.code;
    this.reason = opts.reason;
    this.status = opts.status;
    this.details = opts.details;
  }
}

export class ValidationError extends AppError {
  constructor(reason: ErrorReason, message: string, details?: unknown) {
    super(message, { code: 'VALIDATION_ERROR', reason, status: 400, details });
  }
}

export class NotFoundError extends AppError {
  constructor(reason: ErrorReason, message: string) {
    super(message, { code: 'NOT_FOUND', reason, status: 404 });
  }
}

export class ConflictError extends AppError {
  constructor(reason: ErrorReason, message: string) {
    super(message, { code: 'CONFLICT', reason, status: 409 });
  }
}

/**
 * Storage collaborator failed. The message sent to clients is fixed; the
 * driver error travels only as `cause` and ends up in the logs.
 */
export class PersistenceFailure extends AppError {
  constructor(operation: string, cause: unknown) {
    super('Internal server error', {
      code: 'PERSISTENCE_FAILURE',
      reason: 'STORAGE_UNAVAILABLE',
      status: 500,
      details: { operation },
      cause,
    });
  }
}

export const isAppError = (error: unknown): error is AppError => error instanceof AppError;

export const duplicateDocumentNumber = (): ConflictError =>
  new ConflictError('DUPLICATE_DOCUMENT_NUMBER', 'account with this document number already exists');
