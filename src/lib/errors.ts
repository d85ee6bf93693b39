import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { NODE_ENV } from '../config';
import { getLogger } from '../middleware/logging';

/**
 * Error carrying the HTTP status it is answered with
 */
export class HttpError extends Error {
  status: number;
  details?: unknown;

  constructor(status: number, message: string, details?: unknown) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error (400)
 * Malformed input, including a malformed snapshot handed to the engine
 */
export class ValidationError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(400, message, details);
    this.name = 'ValidationError';
  }
}

export class UnauthorizedError extends HttpError {
  constructor(message = 'Unauthorized', details?: unknown) {
    super(401, message, details);
    this.name = 'UnauthorizedError';
  }
}

export class NotFoundError extends HttpError {
  constructor(message = 'Resource not found') {
    super(404, message);
    this.name = 'NotFoundError';
  }
}

/**
 * Conflict error (409)
 * Thrown when a write collides with a uniqueness rule (e.g. brand name)
 */
export class ConflictError extends HttpError {
  constructor(message = 'Resource already exists', details?: unknown) {
    super(409, message, details);
    this.name = 'ConflictError';
  }
}

/**
 * JSON body of every error answer
 */
export interface ErrorBody {
  error: string;
  message: string;
  details?: unknown;
  status: number;
}

function isMalformedJson(err: Error): boolean {
  return err instanceof SyntaxError && 'status' in err && err.status === 400;
}

/**
 * Map a thrown value to the body the API answers with. Request validation
 * failures become ValidationError, unexpected errors 500 InternalError.
 */
export function toErrorBody(err: Error): ErrorBody {
  if (err instanceof ZodError) {
    return {
      error: 'ValidationError',
      message: 'Request validation failed',
      details: err.errors.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message,
        code: issue.code,
      })),
      status: 400,
    };
  }

  if (isMalformedJson(err)) {
    return { error: 'ValidationError', message: 'Malformed JSON body', status: 400 };
  }

  if (err instanceof HttpError) {
    return { error: err.name, message: err.message, details: err.details, status: err.status };
  }

  return {
    error: 'InternalError',
    message: NODE_ENV === 'production' ? 'An unexpected error occurred' : err.message,
    status: 500,
  };
}

/**
 * Last middleware in the chain: log through the request logger, answer JSON
 */
export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void {
  const body = toErrorBody(err);

  const entry = {
    event: 'request_error',
    status: body.status,
    errorName: err.name,
    errorMessage: err.message,
    details: err instanceof HttpError ? err.details : undefined,
    stack: NODE_ENV === 'development' || body.status >= 500 ? err.stack : undefined,
  };

  const log = getLogger(req);
  if (body.status >= 500) {
    log.error(entry);
  } else {
    log.warn(entry);
  }

  res.status(body.status).json(body);
}

export function notFoundHandler(req: Request, res: Response): void {
  const body: ErrorBody = {
    error: 'NotFoundError',
    message: 'The requested endpoint does not exist',
    status: 404,
  };

  getLogger(req).debug({ event: 'route_not_found', path: req.path });
  res.status(404).json(body);
}

/**
 * Forward a rejected route promise to the error handler
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
