/**
 * API Key Authentication Middleware
 *
 * Accepts `Authorization: Bearer <key>` or an `X-API-Key` header and checks
 * the key against the configured list. Raw keys are never stored or logged;
 * requests carry the SHA-256 digest instead.
 *
 * @module middleware/auth
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { createHash, timingSafeEqual } from 'crypto';
import { AppError, ErrorCode } from './error-handler';
import { logger } from '../utils/logger';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      /** SHA-256 of the caller's API key, set once authenticated. */
      apiKeyHash?: string;
    }
  }
}

export interface AuthConfig {
  enabled: boolean;
  apiKeys: string[];
}

/**
 * Hash an API key. Never store or log raw keys.
 */
export function hashApiKey(apiKey: string): string {
  return createHash('sha256').update(apiKey).digest('hex');
}

/**
 * Extract API key from request headers.
 * Checks Authorization: Bearer <key> first, then x-api-key header.
 */
export function extractApiKey(req: Request): string | undefined {
  const authHeader = req.get('authorization');
  if (authHeader && authHeader.startsWith('Bearer ')) {
    const token = authHeader.slice(7).trim();
    if (token) {
      return token;
    }
  }

  const xApiKey = req.get('x-api-key');
  return xApiKey ? xApiKey.trim() || undefined : undefined;
}

const digestsMatch = (a: string, b: string): boolean =>
  timingSafeEqual(Buffer.from(a, 'hex'), Buffer.from(b, 'hex'));

export function createAuthMiddleware(authConfig: AuthConfig): RequestHandler {
  const knownDigests = authConfig.apiKeys.map(hashApiKey);

  if (authConfig.enabled && knownDigests.length === 0) {
    logger.warn('API key auth enabled but no keys configured; all requests will be rejected');
  }

  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!authConfig.enabled) {
      next();
      return;
    }

    const key = extractApiKey(req);
    if (!key) {
      next(new AppError(
        ErrorCode.UNAUTHORIZED,
        'Missing API key. Provide via Authorization: Bearer <key> or x-api-key header.',
        401
      ));
      return;
    }

    if (knownDigests.length === 0) {
      next(new AppError(ErrorCode.UNAUTHORIZED, 'API key authentication is not configured.', 401));
      return;
    }

    const keyHash = hashApiKey(key);
    // Compare against every digest so timing does not depend on the match position.
    let matched = false;
    for (const digest of knownDigests) {
      matched = digestsMatch(keyHash, digest) || matched;
    }

    if (!matched) {
      logger.warn('Invalid API key attempt', { keyHashPrefix: keyHash.slice(0, 8) });
      next(new AppError(ErrorCode.FORBIDDEN, 'Invalid API key.', 403));
      return;
    }

    req.apiKeyHash = keyHash;
    next();
  };
}
