import type { Request, Response, NextFunction } from 'express';
import { ZodError, type ZodIssue, type ZodTypeAny } from 'zod';

export interface ValidationSchemas {
  body?: ZodTypeAny;
  params?: ZodTypeAny;
}

/**
 * Zod validation middleware. Checks body and params, replaces each
 * with its parsed value, and reports the issues of every failing part in a
 * single ZodError (mapped to 400 VALIDATION_ERROR by the error handler).
 */
export function validate(schemas: ValidationSchemas) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const issues: ZodIssue[] = [];

    if (schemas.body) {
      const result = schemas.body.safeParse(req.body);
      if (result.success) {
        req.body = result.data;
      } else {
        issues.push(...result.error.issues);
      }
    }

    if (schemas.params) {
      const result = schemas.params.safeParse(req.params);
      if (result.success) {
        req.params = result.data;
      } else {
        issues.push(...result.error.issues);
      }
    }

    next(issues.length > 0 ? new ZodError(issues) : undefined);
  };
}
