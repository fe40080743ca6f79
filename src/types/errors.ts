/**
 * Error Codes for the ledger API
 *
 * Categorized by error type:
 * - 2xxx: Validation errors
 * - 3xxx: Business / concurrency outcomes
 * - 4xxx: Rate limiting
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,

  // Business errors (3xxx)
  INSUFFICIENT_FUNDS = 3001,
  ACCOUNT_NOT_FOUND = 3002,
  ACCOUNT_ALREADY_EXISTS = 3003,
  VERSION_CONFLICT = 3004,
  IDEMPOTENCY_KEY_REUSED = 3005,
  REQUEST_IN_PROGRESS = 3006,
  REQUEST_CANCELLED = 3007,
  RESOURCE_NOT_FOUND = 3010,

  // Rate limiting errors (4xxx)
  RATE_LIMIT_EXCEEDED = 4001,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  TRANSIENT_STORAGE_ERROR = 5002,
  LEDGER_INVARIANT_VIOLATION = 5003,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  [ErrorCode.VALIDATION_ERROR]: 400,

  [ErrorCode.INSUFFICIENT_FUNDS]: 422,
  [ErrorCode.ACCOUNT_NOT_FOUND]: 404,
  [ErrorCode.ACCOUNT_ALREADY_EXISTS]: 409,
  [ErrorCode.VERSION_CONFLICT]: 409,
  [ErrorCode.IDEMPOTENCY_KEY_REUSED]: 422,
  [ErrorCode.REQUEST_IN_PROGRESS]: 409,
  // Non-standard "client closed request"
  [ErrorCode.REQUEST_CANCELLED]: 499,
  [ErrorCode.RESOURCE_NOT_FOUND]: 404,

  [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,

  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.TRANSIENT_STORAGE_ERROR]: 503,
  [ErrorCode.LEDGER_INVARIANT_VIOLATION]: 500,
};

const errorCodes = new Set<number>(
  Object.values(ErrorCode).filter((value): value is ErrorCode => typeof value === 'number')
);

export const isErrorCode = (value: unknown): value is ErrorCode => {
  return typeof value === 'number' && errorCodes.has(value);
};

/**
 * Standard error response format
 */
export interface ErrorResponse {
  success: false;
  error: {
    code: ErrorCode;
    message: string;
    details?: Record<string, string[]>;
    meta?: Record<string, unknown>;
    timestamp: string;
    correlationId?: string;
  };
}
