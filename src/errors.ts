/**
 * Hybrid RAG API - Standardized Error Handling
 */

import { Request, Response, NextFunction } from 'express';
import { logError, logWarn, getRequestContext } from './utils';
import { Signal } from './types';

// =============================================================================
// Error Codes & Status Mapping
// =============================================================================

export enum ErrorCode {
  BAD_REQUEST = 'BAD_REQUEST',
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  RETRIEVAL_FAILED = 'RETRIEVAL_FAILED',
  SERVICE_UNAVAILABLE = 'SERVICE_UNAVAILABLE',
  INTERNAL_ERROR = 'INTERNAL_ERROR',
}

const STATUS_CODES: Record<ErrorCode, number> = {
  [ErrorCode.BAD_REQUEST]: 400,
  [ErrorCode.VALIDATION_ERROR]: 400,
  [ErrorCode.RETRIEVAL_FAILED]: 503,
  [ErrorCode.SERVICE_UNAVAILABLE]: 503,
  [ErrorCode.INTERNAL_ERROR]: 500,
};

export interface ApiErrorBody {
  code: ErrorCode;
  message: string;
  details?: Record<string, unknown>;
  requestId?: string;
}

// =============================================================================
// ApiError Class
// =============================================================================

export class ApiError extends Error {
  readonly code: ErrorCode;
  readonly statusCode: number;
  readonly details?: Record<string, unknown>;

  constructor(code: ErrorCode, message: string, details?: Record<string, unknown>) {
    super(message);
    this.name = 'ApiError';
    this.code = code;
    this.statusCode = STATUS_CODES[code];
    this.details = details;
  }

  toBody(): ApiErrorBody {
    return {
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
      requestId: getRequestContext()?.requestId,
    };
  }

  toJSON() {
    return { error: this.toBody() };
  }
}

/** Every signal required by the requested mode failed */
export class RetrievalFailedError extends ApiError {
  readonly failedSignals: Signal[];

  constructor(failedSignals: Signal[], causes: Partial<Record<Signal, string>>) {
    super(ErrorCode.RETRIEVAL_FAILED, 'All retrieval signals failed', { failedSignals, causes });
    this.name = 'RetrievalFailedError';
    this.failedSignals = failedSignals;
  }
}

// =============================================================================
// Error Factories
// =============================================================================

export const Errors = {
  badRequest: (message: string, details?: Record<string, unknown>) =>
    new ApiError(ErrorCode.BAD_REQUEST, message, details),

  serviceUnavailable: (message: string, details?: Record<string, unknown>) =>
    new ApiError(ErrorCode.SERVICE_UNAVAILABLE, message, details),
};

// =============================================================================
// Middleware
// =============================================================================

export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof ApiError) {
    if (err.statusCode >= 500) {
      logError('API error', err, { code: err.code, path: req.path });
    } else {
      logWarn('Client error', { code: err.code, message: err.message, path: req.path });
    }
    res.status(err.statusCode).json(err.toJSON());
    return;
  }

  // express.json() rejects malformed bodies with a 400 SyntaxError
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    logWarn('Malformed JSON body', { path: req.path });
    res.status(400).json({ error: { code: ErrorCode.BAD_REQUEST, message: 'Malformed JSON body' } });
    return;
  }

  logError('Unhandled error', err, { path: req.path, method: req.method });
  res.status(500).json({ error: { code: ErrorCode.INTERNAL_ERROR, message: 'An unexpected error occurred' } });
}

export function asyncHandler(fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
