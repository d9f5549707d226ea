/**
 * Error Handling Middleware
 *
 * Provides centralized error handling with consistent error response format,
 * error logging, and appropriate error sanitization for production.
 */

import { Request, Response, NextFunction } from 'express';
import { config } from '../config';
import { logger, getCorrelationId } from '../observability';
import { ErrorCode, ErrorResponse, errorCodeToStatus } from '../types/errors';

/**
 * Extended Error interface with additional properties
 */
export interface AppError extends Error {
  statusCode?: number;
  errorCode?: ErrorCode;
  isOperational?: boolean;
  validationErrors?: Record<string, string[]>;
}

/**
 * Body-parser attaches the HTTP status it wants to `status`
 */
const parserStatus = (err: AppError): number | undefined => {
  const status: unknown = Reflect.get(err, 'status');
  return typeof status === 'number' && status >= 400 && status < 500 ? status : undefined;
};

/**
 * Main error handler middleware
 *
 * Catches all errors and returns a consistent JSON response format.
 * Logs errors with correlation ID for traceability.
 */
export const errorHandler = (
  err: AppError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const clientStatus = err.errorCode === undefined ? parserStatus(err) : undefined;
  const errorCode =
    err.errorCode ?? (clientStatus !== undefined ? ErrorCode.VALIDATION_ERROR : ErrorCode.INTERNAL_ERROR);
  const statusCode = err.statusCode ?? clientStatus ?? errorCodeToStatus[errorCode];

  const logFields = {
    correlationId,
    errorCode,
    statusCode,
    error: err.message,
    stack: config.isDevelopment ? err.stack : undefined,
    path: req.path,
    method: req.method,
    isOperational: err.isOperational,
  };

  if (statusCode >= 500) {
    logger.error(logFields, `Error: ${err.message}`);
  } else {
    logger.warn(logFields, `Request rejected: ${err.message}`);
  }

  // Sanitize error message for production 5xx errors
  const message =
    config.isProduction && statusCode >= 500
      ? 'Internal server error'
      : err.message || 'An error occurred';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: errorCode,
      message,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  if (err.validationErrors) {
    response.error.details = err.validationErrors;
  }

  res.status(statusCode).json(response);
};

/**
 * Not found handler for unmatched routes
 */
export const notFoundHandler = (
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const correlationId = getCorrelationId() || 'unknown';

  const response: ErrorResponse = {
    success: false,
    error: {
      code: ErrorCode.ROUTE_NOT_FOUND,
      message: `Route ${req.method} ${req.path} not found`,
      timestamp: new Date().toISOString(),
      correlationId,
    },
  };

  res.status(404).json(response);
};

/**
 * API Error class for throwing operational errors
 *
 * Every failure the ledger can report is an ApiError carrying its ErrorCode,
 * so callers outside HTTP match on `errorCode` and the handler above maps it
 * to a status.
 */
export class ApiError extends Error implements AppError {
  statusCode: number;
  errorCode: ErrorCode;
  isOperational: boolean;
  validationErrors?: Record<string, string[]>;

  constructor(
    errorCode: ErrorCode,
    message: string,
    options?: {
      statusCode?: number;
      isOperational?: boolean;
      validationErrors?: Record<string, string[]>;
    }
  ) {
    super(message);
    this.name = 'ApiError';
    this.errorCode = errorCode;
    this.statusCode = options?.statusCode ?? errorCodeToStatus[errorCode];
    this.isOperational = options?.isOperational ?? true;
    this.validationErrors = options?.validationErrors;
    Error.captureStackTrace(this, this.constructor);
  }

  static unauthorized(message = 'Unauthorized'): ApiError {
    return new ApiError(ErrorCode.UNAUTHORIZED, message);
  }

  static invalidToken(message = 'Invalid token'): ApiError {
    return new ApiError(ErrorCode.INVALID_TOKEN, message);
  }

  static tokenExpired(message = 'Token expired'): ApiError {
    return new ApiError(ErrorCode.TOKEN_EXPIRED, message);
  }

  static validationError(
    message: string,
    validationErrors?: Record<string, string[]>
  ): ApiError {
    return new ApiError(ErrorCode.VALIDATION_ERROR, message, {
      validationErrors,
    });
  }

  static invalidAmount(message = 'Amount must be a positive integer'): ApiError {
    return new ApiError(ErrorCode.INVALID_AMOUNT, message);
  }

  static invalidPayer(message = 'Payer is not a valid identity'): ApiError {
    return new ApiError(ErrorCode.INVALID_PAYER, message);
  }

  static requestNotFound(requestId: number): ApiError {
    return new ApiError(ErrorCode.REQUEST_NOT_FOUND, `Request ${requestId} not found`);
  }

  static notRequestParty(message: string): ApiError {
    return new ApiError(ErrorCode.NOT_REQUEST_PARTY, message);
  }

  static alreadyPaid(requestId: number): ApiError {
    return new ApiError(ErrorCode.ALREADY_PAID, `Request ${requestId} is already paid`);
  }

  static alreadyCancelled(requestId: number): ApiError {
    return new ApiError(ErrorCode.ALREADY_CANCELLED, `Request ${requestId} is already cancelled`);
  }

  static requestExpired(message: string): ApiError {
    return new ApiError(ErrorCode.REQUEST_EXPIRED, message);
  }

  static insufficientPayment(required: number, supplied: number): ApiError {
    return new ApiError(
      ErrorCode.INSUFFICIENT_PAYMENT,
      `Payment of ${supplied} is below the requested amount of ${required}`
    );
  }

  static paymentFailed(message = 'Value transfer failed'): ApiError {
    return new ApiError(ErrorCode.PAYMENT_FAILED, message);
  }

  static invalidTransition(from: string, to: string, requestId: number): ApiError {
    return new ApiError(
      ErrorCode.INVALID_STATE_TRANSITION,
      `Invalid state transition from ${from} to ${to} for request ${requestId}`
    );
  }

  static internal(message = 'Internal server error'): ApiError {
    return new ApiError(ErrorCode.INTERNAL_ERROR, message, {
      isOperational: false,
    });
  }

  static database(message = 'Database error'): ApiError {
    return new ApiError(ErrorCode.DATABASE_ERROR, message);
  }
}

export const isApiError = (error: unknown): error is ApiError => error instanceof ApiError;
