import rateLimit from 'express-rate-limit';
import type { RequestHandler } from 'express';

/**
 * API rate limiter keyed by client IP, with an in-memory store (resets on
 * server restart). A limit of 0 disables it.
 */
export function createApiRateLimiter(perMinute: number): RequestHandler | null {
  if (perMinute === 0) {
    return null;
  }

  return rateLimit({
    windowMs: 60 * 1000, // 1 minute
    limit: perMinute,
    message: 'Too many requests, please try again later.',
    standardHeaders: true,
    legacyHeaders: false,
  });
}
