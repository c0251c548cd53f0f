import { Response } from 'express';

type ErrorPayload = {
  error: string;
  message: string;
  statusCode: number;
  code?: string;
  retryAfterSec?: number;
};

/**
 * Error carrying the HTTP status the error handler should answer with.
 */
export class HttpError extends Error {
  readonly statusCode: number;

  constructor(statusCode: number, message: string) {
    super(message);
    this.name = 'HttpError';
    this.statusCode = statusCode;
  }
}

export function sendError(
  res: Response,
  statusCode: number,
  message: string,
  extra?: Partial<ErrorPayload>
): Response {
  return res.status(statusCode).json({
    error: message,
    message,
    statusCode,
    ...extra,
  });
}
