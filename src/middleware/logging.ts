/**
 * Structured Logging Middleware
 *
 * Provides request-scoped logging with:
 * - Unique request IDs (UUID v4)
 * - Request/response logging with latency
 * - Error logging integration
 */

import { Request, Response, NextFunction } from 'express';
import { randomUUID } from 'crypto';
import pino from 'pino';
import { LOG_LEVEL, NODE_ENV } from '../config';

declare global {
  namespace Express {
    interface Request {
      id?: string;
      log?: pino.Logger;
    }
  }
}

/**
 * Create Pino logger instance
 */
export const logger = pino({
  level: LOG_LEVEL,
  transport: NODE_ENV === 'development'
    ? {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'HH:MM:ss.l',
          ignore: 'pid,hostname',
        },
      }
    : undefined,
  formatters: {
    level: (label) => {
      return { level: label };
    },
  },
});

/**
 * Logging middleware
 *
 * Attaches unique request ID and logger to each request.
 * Logs request start and completion with latency.
 */
export function loggingMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const id = randomUUID();
  const startTime = Date.now();

  req.id = id;
  res.setHeader('X-Request-Id', id);

  // Create request-scoped logger
  const log = logger.child({
    reqId: id,
    method: req.method,
    path: req.path,
    ip: req.ip,
  });
  req.log = log;

  log.info({
    event: 'request_start',
    method: req.method,
    url: req.url,
    userAgent: req.get('user-agent'),
  });

  res.on('finish', () => {
    const logContext = {
      event: 'request_finish',
      method: req.method,
      path: req.path,
      status: res.statusCode,
      latency: Date.now() - startTime,
    };

    // Log with appropriate level based on status code
    if (res.statusCode >= 500) {
      log.error(logContext);
    } else if (res.statusCode >= 400) {
      log.warn(logContext);
    } else {
      log.info(logContext);
    }
  });

  next();
}

/**
 * Get logger from request
 */
export function getLogger(req: Request): pino.Logger {
  return req.log ?? logger;
}
