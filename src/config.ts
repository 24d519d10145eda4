import { z } from 'zod';
import type { PasswordStorage } from './domain/auth/password.js';
import type { DenyPolicy } from './domain/library/borrowRequest.js';
import type { AdminCredentials } from './application/auth/bootstrapAdmin.js';

const envSchema = z
  .object({
    PORT: z.coerce.number().int().positive().default(3000),
    DATABASE_URL: z.string().min(1, 'DATABASE_URL is required'),
    PASSWORD_STORAGE: z.enum(['plaintext', 'argon2']).default('plaintext'),
    DENY_POLICY: z.enum(['always', 'pending-only']).default('always'),
    RATE_LIMIT_PER_MINUTE: z.coerce.number().int().nonnegative().default(60),
    ADMIN_EMAIL: z.string().min(1).optional(),
    ADMIN_PASSWORD: z.string().min(1).optional(),
  })
  .refine((env) => (env.ADMIN_EMAIL === undefined) === (env.ADMIN_PASSWORD === undefined), {
    message: 'ADMIN_EMAIL and ADMIN_PASSWORD must be set together',
    path: ['ADMIN_PASSWORD'],
  });

export interface AppConfig {
  port: number;
  databaseUrl: string;
  passwordStorage: PasswordStorage;
  denyPolicy: DenyPolicy;
  /** Requests per client per minute; 0 turns rate limiting off. */
  rateLimitPerMinute: number;
  admin?: AdminCredentials;
}

export class ConfigError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.errors.map((e) => `${e.path.join('.')}: ${e.message}`)
    );
  }

  const values = parsed.data;
  return {
    port: values.PORT,
    databaseUrl: values.DATABASE_URL,
    passwordStorage: values.PASSWORD_STORAGE,
    denyPolicy: values.DENY_POLICY,
    rateLimitPerMinute: values.RATE_LIMIT_PER_MINUTE,
    admin:
      values.ADMIN_EMAIL !== undefined && values.ADMIN_PASSWORD !== undefined
        ? { email: values.ADMIN_EMAIL, password: values.ADMIN_PASSWORD }
        : undefined,
  };
}
