import { Request, Response, NextFunction } from 'express';
import { sendError } from '../utils/http';

type RateLimitOptions = {
  windowMs: number;
  max: number;
  message?: string;
};

type RateState = {
  count: number;
  resetAt: number;
};

// Resolved by Express according to the app's `trust proxy` setting
function getClientKey(req: Request): string {
  return req.ip || 'unknown';
}

/**
 * Fixed-window limiter keyed by client and path, kept in process memory.
 */
export function createRateLimiter(options: RateLimitOptions) {
  const storage = new Map<string, RateState>();
  const { windowMs, max } = options;

  if (process.env.NODE_ENV !== 'test') {
    setInterval(() => {
      const now = Date.now();
      for (const [key, value] of storage.entries()) {
        if (value.resetAt <= now) {
          storage.delete(key);
        }
      }
    }, Math.min(windowMs, 60_000)).unref();
  }

  return (req: Request, res: Response, next: NextFunction) => {
    const key = `${getClientKey(req)}:${req.path}`;
    const now = Date.now();
    const current = storage.get(key);

    if (!current || current.resetAt <= now) {
      storage.set(key, { count: 1, resetAt: now + windowMs });
      return next();
    }

    if (current.count >= max) {
      const retryAfterSec = Math.max(1, Math.ceil((current.resetAt - now) / 1000));
      res.setHeader('Retry-After', retryAfterSec);
      const base = options.message ?? 'Too many requests.';
      return sendError(res, 429, `${base} Retry after ${retryAfterSec}s.`, {
        code: 'RATE_LIMITED',
        retryAfterSec,
      });
    }

    current.count += 1;
    return next();
  };
}
