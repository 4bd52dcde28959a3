import { Response } from 'express';
import { AppError, errorMessage } from './errors';

/**
 * Answers a failed request. AppErrors keep their status code and code;
 * anything else is an internal error.
 *
 * @example
 * catch (err) {
 *   console.error('Create client error:', err);
 *   sendError(res, err);
 * }
 */
export function sendError(res: Response, err: unknown): void {
  if (err instanceof AppError) {
    res.status(err.statusCode).json({
      message: err.message,
      code: err.code,
      ...(err.details ? { details: err.details } : {}),
    });
    return;
  }
  res.status(500).json({ message: errorMessage(err) || 'Internal server error' });
}
