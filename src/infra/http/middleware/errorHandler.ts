import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { DomainError } from '../../../domain/errors.js';
import { ForbiddenError, NotFoundError, UnauthorizedError } from '../../../application/errors.js';

/**
 * Standard error response shape for all API errors.
 */
export interface ErrorResponse {
  code: string;
  message: string;
  details?: object;
}

export function errorHandler(
  err: Error,
  _req: Request,
  res: Response,
  _next: NextFunction
): void {
  // Handle Zod validation errors
  if (err instanceof ZodError) {
    const response: ErrorResponse = {
      code: 'VALIDATION_ERROR',
      message: 'Validation failed',
      details: {
        issues: err.errors.map((e) => ({
          path: e.path.join('.'),
          message: e.message,
        })),
      },
    };
    res.status(400).json(response);
    return;
  }

  // Business rule violations -> 400 with their own code
  if (err instanceof DomainError) {
    const response: ErrorResponse = {
      code: err.code,
      message: err.message,
    };
    res.status(400).json(response);
    return;
  }

  if (err instanceof UnauthorizedError) {
    const response: ErrorResponse = {
      code: 'UNAUTHORIZED',
      message: err.message,
    };
    res.setHeader('WWW-Authenticate', 'Basic');
    res.status(401).json(response);
    return;
  }

  if (err instanceof ForbiddenError) {
    const response: ErrorResponse = {
      code: 'FORBIDDEN',
      message: err.message,
    };
    res.status(403).json(response);
    return;
  }

  if (err instanceof NotFoundError) {
    const response: ErrorResponse = {
      code: 'NOT_FOUND',
      message: err.message,
    };
    res.status(404).json(response);
    return;
  }

  // Malformed JSON body from express.json()
  if (err instanceof SyntaxError && 'body' in err) {
    const response: ErrorResponse = {
      code: 'VALIDATION_ERROR',
      message: 'Malformed JSON body',
    };
    res.status(400).json(response);
    return;
  }

  console.error('Error:', err);

  // Generic error fallback
  const response: ErrorResponse = {
    code: 'INTERNAL_ERROR',
    message: 'Internal server error',
  };
  res.status(500).json(response);
}
