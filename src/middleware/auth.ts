/**
 * Authentication Middleware
 *
 * Validates the bearer token from the Authorization header against the
 * configured API keys.
 *
 * Header format: Authorization: Bearer <api-key>
 */

import { Request, Response, NextFunction } from 'express';
import { createHash, timingSafeEqual } from 'crypto';
import { API_KEYS } from '../config';
import { UnauthorizedError } from '../lib/errors';
import { getLogger } from './logging';

const EXPECTED_HEADER = 'Authorization: Bearer <api-key>';

function digest(value: string): Buffer {
  return createHash('sha256').update(value).digest();
}

/**
 * Constant-time membership test against a set of keys
 */
export function isKnownApiKey(candidate: string, keys: ReadonlySet<string>): boolean {
  const candidateDigest = digest(candidate);
  let found = false;
  for (const key of keys) {
    if (timingSafeEqual(candidateDigest, digest(key))) {
      found = true;
    }
  }
  return found;
}

/**
 * Build an authentication middleware for a set of keys.
 * An empty set lets every request through (development only; validateConfig
 * rejects it in production).
 */
export function createAuth(keys: ReadonlySet<string>) {
  return function auth(req: Request, _res: Response, next: NextFunction): void {
    if (keys.size === 0) {
      next();
      return;
    }

    const authHeader = req.header('Authorization');

    if (!authHeader) {
      next(new UnauthorizedError('Missing Authorization header', { expected: EXPECTED_HEADER }));
      return;
    }

    // Parse Bearer token
    const match = authHeader.match(/^Bearer\s+(.+)$/i);
    if (!match) {
      next(new UnauthorizedError('Invalid Authorization header format', { expected: EXPECTED_HEADER }));
      return;
    }

    const apiKey = match[1].trim();

    if (!isKnownApiKey(apiKey, keys)) {
      getLogger(req).warn({ event: 'auth_failed' });
      next(new UnauthorizedError('Invalid API key'));
      return;
    }

    next();
  };
}

/**
 * Authentication against the API_KEYS configuration
 */
export const auth = createAuth(API_KEYS);
