import { Request, Response, NextFunction } from 'express';
import { logger } from '../utils/logger';
import { getConstraintViolation, isTransientDbError } from '../utils/db-errors';

interface CustomError extends Error {
  statusCode?: number;
  status?: number;
  type?: string;
}

type ErrorResponse = {
  error: string;
  message: string;
  statusCode: number;
  stack?: string;
  details?: string;
};

const SENSITIVE_KEYS = new Set(['apiKey', 'api_key', 'authorization', 'token', 'password']);

function sanitize(value: unknown): unknown {
  if (!value || typeof value !== 'object') return value;
  if (Array.isArray(value)) {
    return value.map((item) => sanitize(item));
  }
  const result: Record<string, unknown> = {};
  for (const [key, val] of Object.entries(value)) {
    result[key] = SENSITIVE_KEYS.has(key) ? '[REDACTED]' : sanitize(val);
  }
  return result;
}

/**
 * Central error handler: maps thrown errors to `{ error, message, statusCode }`.
 */
export const errorHandler = (
  err: CustomError,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  let statusCode = err.statusCode || err.status || 500;
  let message = err.message || 'Internal Server Error';
  let details: string | undefined;

  // Malformed JSON body from express.json()
  if (err.type === 'entity.parse.failed') {
    statusCode = 400;
    message = 'Malformed JSON body';
  }

  const violation = getConstraintViolation(err);
  if (violation === 'unique') {
    statusCode = 409;
    message = 'Resource already exists';
    details = err.message;
  } else if (violation === 'foreign-key') {
    statusCode = 400;
    message = 'Invalid reference to related resource';
    details = err.message;
  } else if (violation === 'check' || violation === 'not-null') {
    statusCode = 400;
    message = 'Constraint violation';
    details = err.message;
  } else if (isTransientDbError(err)) {
    statusCode = 503;
    message = 'Database temporarily unavailable';
  }

  const log = statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
  log('Error occurred:', {
    message: err.message,
    stack: statusCode >= 500 ? err.stack : undefined,
    path: req.path,
    method: req.method,
    body: sanitize(req.body),
    params: req.params,
    query: req.query,
  });

  if (statusCode >= 500 && !err.statusCode && process.env.NODE_ENV === 'production') {
    message = 'Internal Server Error';
  }

  const response: ErrorResponse = {
    error: message,
    message,
    statusCode,
  };

  if (process.env.NODE_ENV === 'development') {
    response.stack = err.stack;
    if (details) {
      response.details = details;
    }
  }

  res.status(statusCode).json(response);
};

/**
 * Handler for unmatched routes
 */
export const notFoundHandler = (req: Request, res: Response) => {
  logger.warn(`Route not found: ${req.method} ${req.path}`);
  res.status(404).json({
    error: 'Not Found',
    message: `Route ${req.method} ${req.path} does not exist`,
  });
};

