import { Response, NextFunction } from 'express';
import { AuthRequest } from '../types/request.types';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

/**
 * Rate Limiting Store (In-memory, per process)
 */
interface RateLimitStore {
  [key: string]: {
    count: number;
    resetTime: number;
  };
}

const store: RateLimitStore = {};

/**
 * Clear expired entries periodically
 */
setInterval(() => {
  const now = Date.now();
  Object.keys(store).forEach((key) => {
    if (store[key].resetTime < now) {
      delete store[key];
    }
  });
}, 60000).unref(); // Clean up every minute

/**
 * Get client identifier for rate limiting
 */
const getClientId = (req: AuthRequest): string => {
  // Authenticated user first, IP address otherwise
  return req.user?.id.toString() || req.ip || 'unknown';
};

/**
 * Rate Limiting Middleware
 */
export const rateLimit = (
  windowMs: number = 15 * 60 * 1000, // 15 minutes default
  maxRequests: number = 5, // 5 requests per window
  message?: string
) => {
  return (req: AuthRequest, res: Response, next: NextFunction) => {
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
        message || `Too many requests. Please retry in ${retryAfter} seconds.`,
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
  // Order placement (10 requests per minute per shopkeeper)
  orders: rateLimit(60 * 1000, 10, 'Too many orders placed. Please retry in a minute.'),

  // Moderate rate limiter for general endpoints (60 requests per minute)
  general: rateLimit(60 * 1000, 60, 'Too many requests. Please retry later.'),
};
