import type { Request, Response, NextFunction } from 'express';
import type { UserIdentity } from '../../../domain/auth/user.js';
import type { CredentialVerifier } from '../../../application/auth/verifyCredentials.js';
import { ForbiddenError, UnauthorizedError } from '../../../application/errors.js';

export interface AuthRequest extends Request {
  user?: UserIdentity;
}

export interface BasicCredentials {
  email: string;
  password: string;
}

/**
 * Decode an `Authorization: Basic <base64(email:password)>` header.
 * The password may itself contain ':'; only the first one separates.
 */
export function parseBasicAuth(header: string | undefined): BasicCredentials | null {
  if (!header || !header.startsWith('Basic ')) {
    return null;
  }

  const decoded = Buffer.from(header.substring(6).trim(), 'base64').toString('utf-8');
  const separator = decoded.indexOf(':');
  if (separator === -1) {
    return null;
  }

  return {
    email: decoded.substring(0, separator),
    password: decoded.substring(separator + 1),
  };
}

/**
 * Checks Basic credentials on every request; there is no session.
 */
export function authMiddleware(verifier: CredentialVerifier) {
  return (req: AuthRequest, _res: Response, next: NextFunction): void => {
    const credentials = parseBasicAuth(req.headers.authorization);
    if (!credentials) {
      next(new UnauthorizedError());
      return;
    }

    void verifier
      .verify(credentials.email, credentials.password)
      .then((user) => {
        req.user = user;
        next();
      })
      .catch(next);
  };
}

export function requireUser(req: AuthRequest): UserIdentity {
  if (!req.user) {
    throw new UnauthorizedError();
  }
  return req.user;
}

export function requireAdmin(req: AuthRequest, _res: Response, next: NextFunction): void {
  if (!req.user) {
    next(new UnauthorizedError());
    return;
  }
  if (!req.user.isAdmin) {
    next(new ForbiddenError());
    return;
  }
  next();
}
