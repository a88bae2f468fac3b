import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

/**
 * Rate Limiting Store (in-memory, fixed window per path and client)
 */
interface RateLimitEntry {
  count: number;
  resetTime: number;
}

const store = new Map<string, RateLimitEntry>();

/**
 * Clear expired entries periodically; unref keeps the timer from holding the process open
 */
setInterval(() => {
  const now = Date.now();
  for (const [key, entry] of store) {
    if (entry.resetTime < now) {
      store.delete(key);
    }
  }
}, 60000).unref();

const getClientId = (req: Request): string => req.ip || 'unknown';

/**
 * Rate Limiting Middleware
 */
export const rateLimit = (
  windowMs: number = 15 * 60 * 1000,
  maxRequests: number = 5,
  message?: string
) => {
  return (req: Request, res: Response, next: NextFunction) => {
    const clientId = getClientId(req);
    const now = Date.now();
    const key = `${req.baseUrl}${req.path}:${clientId}`;

    let entry = store.get(key);

    if (!entry || entry.resetTime < now) {
      entry = {
        count: 0,
        resetTime: now + windowMs,
      };
      store.set(key, entry);
    }

    entry.count++;

    res.setHeader('X-RateLimit-Limit', maxRequests.toString());
    res.setHeader('X-RateLimit-Remaining', Math.max(0, maxRequests - entry.count).toString());
    res.setHeader('X-RateLimit-Reset', new Date(entry.resetTime).toISOString());

    if (entry.count > maxRequests) {
      const retryAfter = Math.ceil((entry.resetTime - now) / 1000);

      logger.warn('[Rate Limit Exceeded]', {
        clientId,
        path: req.path,
        count: entry.count,
        limit: maxRequests,
      });

      return ResponseHandler.tooManyRequests(
        res,
        message || `Too many requests. Try again in ${retryAfter} seconds.`,
        retryAfter
      );
    }

    next();
  };
};

/**
 * Predefined rate limiters
 */
export const rateLimiters = {
  // Token issuance: 10 attempts per 15 minutes
  auth: rateLimit(15 * 60 * 1000, 10, 'Too many login attempts. Try again in 15 minutes.'),

  // First-run setup
  setup: rateLimit(60 * 1000, 5),
};
