import { Request, Response, NextFunction } from 'express';
import { appConfig } from '../connections/config/app.config';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

/**
 * Rate Limiting Store (In-memory)
 * TODO: move to Redis once the API runs on more than one instance
 */
interface RateLimitStore {
  [key: string]: {
    count: number;
    resetTime: number;
  };
}

const store: RateLimitStore = {};

// Clear expired entries every minute; never keeps the process alive
setInterval(() => {
  const now = Date.now();
  Object.keys(store).forEach((key) => {
    if (store[key].resetTime < now) {
      delete store[key];
    }
  });
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
    if (!appConfig.rateLimitEnabled) {
      return next();
    }

    const clientId = getClientId(req);
    const now = Date.now();
    const key = `${req.baseUrl}${req.path}:${clientId}`;

    let entry = store[key];

    if (!entry || entry.resetTime < now) {
      entry = {
        count: 0,
        resetTime: now + windowMs,
      };
      store[key] = entry;
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
  // signup / signin: 10 requests per 15 minutes
  auth: rateLimit(15 * 60 * 1000, 10, 'Too many attempts. Try again in 15 minutes.'),

  // SMS codes: 3 requests per minute
  verification: rateLimit(60 * 1000, 3, 'Too many code requests. Wait a minute before asking again.'),
};
