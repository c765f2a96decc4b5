/**
 * Request Validation Middleware
 *
 * Zod-based body validation with a consistent VALIDATION_ERROR response.
 * The parsed (defaulted, transformed) value replaces req.body.
 */

import { Request, Response, NextFunction } from 'express';
import { ZodError, ZodType, ZodTypeDef } from 'zod';
import { ErrorCode } from '../errors';
import { getRequestContext, logWarn } from '../utils';

export interface ValidationErrorDetail {
  /** Field path (e.g., 'documents[0].filename') */
  field: string;
  message: string;
  code: string;
}

export interface ValidationError {
  code: ErrorCode.VALIDATION_ERROR;
  message: string;
  details: ValidationErrorDetail[];
  requestId?: string;
}

export function formatZodError(error: ZodError<unknown>, message = 'Request validation failed'): ValidationError {
  return {
    code: ErrorCode.VALIDATION_ERROR,
    message,
    details: error.issues.map(issue => ({
      field: formatFieldPath(issue.path),
      message: issue.message,
      code: issue.code,
    })),
    requestId: getRequestContext()?.requestId,
  };
}

/**
 * ['documents', 0, 'filename'] => 'documents[0].filename'
 */
export function formatFieldPath(path: PropertyKey[]): string {
  if (path.length === 0) return '(root)';

  return path.reduce<string>((result, segment, index) => {
    if (typeof segment === 'number') return `${result}[${segment}]`;
    const name = String(segment);
    return index === 0 ? name : `${result}.${name}`;
  }, '');
}

export function validateBody<T>(schema: ZodType<T, ZodTypeDef, unknown>, message = 'Request body validation failed') {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body);

    if (!result.success) {
      const error = formatZodError(result.error, message);
      logWarn('Request body validation failed', {
        path: req.path,
        method: req.method,
        errorCount: error.details.length,
        fields: error.details.map(d => d.field),
      });
      res.status(400).json({ error });
      return;
    }

    req.body = result.data;
    next();
  };
}
