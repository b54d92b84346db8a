/**
 * Rate Limiting Middleware
 *
 * Admits HTTP requests through a {@link TokenBucketRateLimiter}. Requests are
 * keyed by client IP, API key or endpoint path.
 *
 * @module middleware/rate-limit
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { RateLimitStrategy } from '../config/env';
import type { TokenBucketRateLimiter } from '../core/rate-limiter';
import type { IngestionMetrics } from '../services/metrics';
import { logger } from '../utils/logger';
import { hashApiKey } from './auth';
import { ErrorCode } from './error-handler';

export interface RateLimitMiddlewareOptions {
  limiter: TokenBucketRateLimiter;
  limitBy: RateLimitStrategy;
  /** Path prefixes that bypass the limiter. */
  exemptPaths?: string[];
  metrics?: IngestionMetrics;
  message?: string;
}

export const clientIp = (req: Request): string => {
  const forwarded = req.headers['x-forwarded-for'];
  if (typeof forwarded === 'string') {
    const first = forwarded.split(',')[0]?.trim();
    if (first) {
      return first;
    }
  }
  return req.ip || 'unknown';
};

/**
 * Bucket key for a request under the given strategy. API keys are hashed;
 * requests without one fall back to the client IP.
 */
export function rateLimitKey(req: Request, limitBy: RateLimitStrategy): string {
  if (limitBy === 'api_key') {
    const apiKey = req.get('x-api-key');
    if (apiKey) {
      return `api_key:${hashApiKey(apiKey)}`;
    }
  } else if (limitBy === 'endpoint') {
    return `endpoint:${req.path}`;
  }
  return `ip:${clientIp(req)}`;
}

export function createRateLimitMiddleware(options: RateLimitMiddlewareOptions): RequestHandler {
  const {
    limiter,
    limitBy,
    exemptPaths = [],
    metrics,
    message = 'Too many requests, please try again later'
  } = options;

  return function rateLimitMiddleware(req: Request, res: Response, next: NextFunction): void {
    if (exemptPaths.some(prefix => req.path.startsWith(prefix))) {
      next();
      return;
    }

    const key = rateLimitKey(req, limitBy);
    const decision = limiter.isAllowed(key);

    res.setHeader('X-RateLimit-Limit', decision.limit.toString());
    res.setHeader('X-RateLimit-Remaining', decision.remaining.toString());
    res.setHeader('X-RateLimit-Reset', decision.reset.toString());

    if (!decision.allowed) {
      metrics?.recordRateLimited();
      logger.warn('Rate limit exceeded', { limitBy, path: req.path, retryAfter: decision.retryAfterSeconds });

      res.setHeader('Retry-After', decision.retryAfterSeconds.toString());
      res.status(429).json({
        error: ErrorCode.RATE_LIMIT_EXCEEDED,
        message,
        retryAfter: decision.retryAfterSeconds
      });
      return;
    }

    next();
  };
}
