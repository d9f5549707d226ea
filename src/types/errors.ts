/**
 * Error Codes for the Payment Request Ledger API
 *
 * Categorized by error type:
 * - 1xxx: Authentication errors
 * - 2xxx: Validation errors
 * - 3xxx: Ledger (business) errors
 * - 5xxx: System errors
 */

export enum ErrorCode {
  // Authentication errors (1xxx)
  UNAUTHORIZED = 1001,
  INVALID_TOKEN = 1002,
  TOKEN_EXPIRED = 1003,

  // Validation errors (2xxx)
  VALIDATION_ERROR = 2001,
  INVALID_AMOUNT = 2002,
  INVALID_PAYER = 2005,
  ROUTE_NOT_FOUND = 2006,

  // Ledger errors (3xxx)
  REQUEST_NOT_FOUND = 3011,
  NOT_REQUEST_PARTY = 3012,
  ALREADY_PAID = 3013,
  ALREADY_CANCELLED = 3014,
  REQUEST_EXPIRED = 3015,
  INSUFFICIENT_PAYMENT = 3016,
  PAYMENT_FAILED = 3017,
  INVALID_STATE_TRANSITION = 3018,

  // System errors (5xxx)
  INTERNAL_ERROR = 5001,
  DATABASE_ERROR = 5002,
}

/**
 * Error code to HTTP status code mapping
 */
export const errorCodeToStatus: Record<ErrorCode, number> = {
  // Auth errors -> 401
  [ErrorCode.UNAUTHORIZED]: 401,
  [ErrorCode.INVALID_TOKEN]: 401,
  [ErrorCode.TOKEN_EXPIRED]: 401,

  // Validation errors -> 400/404
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.INVALID_AMOUNT]: 400,
  [ErrorCode.INVALID_PAYER]: 400,
  [ErrorCode.ROUTE_NOT_FOUND]: 404,

  // Ledger errors -> 400/403/404/409/410/502
  [ErrorCode.REQUEST_NOT_FOUND]: 404,
  [ErrorCode.NOT_REQUEST_PARTY]: 403,
  [ErrorCode.ALREADY_PAID]: 409,
  [ErrorCode.ALREADY_CANCELLED]: 409,
  [ErrorCode.REQUEST_EXPIRED]: 410,
  [ErrorCode.INSUFFICIENT_PAYMENT]: 400,
  [ErrorCode.PAYMENT_FAILED]: 502,
  [ErrorCode.INVALID_STATE_TRANSITION]: 409,

  // System errors -> 500/503
  [ErrorCode.INTERNAL_ERROR]: 500,
  [ErrorCode.DATABASE_ERROR]: 503,
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
    timestamp: string;
    correlationId?: string;
  };
}

/**
 * Standard success response format
 */
export interface SuccessResponse<T = unknown> {
  success: true;
  data: T;
}

export type ApiResponse<T = unknown> = SuccessResponse<T> | ErrorResponse;
