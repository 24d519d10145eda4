import express from 'express';
import type { UnitOfWork } from '../../application/ports.js';
import type { PasswordHasher } from '../../domain/auth/password.js';
import type { DenyPolicy } from '../../domain/library/borrowRequest.js';
import { StoredCredentialVerifier } from '../../application/auth/verifyCredentials.js';
import { NotFoundError } from '../../application/errors.js';
import { createAdminRoutes } from './routes/admin.js';
import { createLibraryRoutes } from './routes/library.js';
import { createSwaggerRoutes } from './routes/swagger.js';
import { authMiddleware } from './middleware/auth.js';
import { errorHandler } from './middleware/errorHandler.js';
import { createApiRateLimiter } from './middleware/rateLimit.js';

export interface AppDependencies {
  uow: UnitOfWork;
  passwords: PasswordHasher;
  denyPolicy: DenyPolicy;
  /** Requests per client per minute; 0 disables the limiter. */
  rateLimitPerMinute: number;
  /** Resolves when the store answers; used by /healthz. */
  ping: () => Promise<unknown>;
}

const HEALTH_TIMEOUT_MS = 2000;

/**
 * Helper to add timeout to a promise.
 */
function withTimeout<T>(promise: Promise<T>, ms: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<T>((_, reject) => {
    timer = setTimeout(() => reject(new Error('timeout')), ms);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  app.use(express.json());

  const limiter = createApiRateLimiter(deps.rateLimitPerMinute);
  if (limiter) {
    app.use(limiter);
  }

  // Health check endpoint (no auth required)
  app.get('/healthz', (_req, res) => {
    void withTimeout(deps.ping(), HEALTH_TIMEOUT_MS)
      .then(() => {
        res.status(200).json({ status: 'ok' });
      })
      .catch(() => {
        res.status(500).json({
          code: 'DB_UNAVAILABLE',
          message: 'Database unavailable',
        });
      });
  });

  // Swagger/OpenAPI docs
  app.use(createSwaggerRoutes());

  // Everything below requires Basic credentials
  app.use(authMiddleware(new StoredCredentialVerifier(deps.uow, deps.passwords)));
  app.use(
    '/admin',
    createAdminRoutes(deps.uow, { passwords: deps.passwords, denyPolicy: deps.denyPolicy })
  );
  app.use(createLibraryRoutes(deps.uow));

  app.use((_req, _res, next) => {
    next(new NotFoundError('Route not found'));
  });

  // Error handler (must be last)
  app.use(errorHandler);

  return app;
}
