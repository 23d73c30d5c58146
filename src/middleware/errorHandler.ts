import { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { DispatchError } from '../utils/errors';
import { logger } from '../utils/logger';

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

/**
 * Maps thrown errors to `{ success: false, error, code }` responses.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof DispatchError) {
    res.status(err.status).json({
      success: false,
      error: err.message,
      code: err.code
    });
    return;
  }

  if (err instanceof ZodError) {
    res.status(400).json({
      success: false,
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      details: err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }))
    });
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json({
      success: false,
      error: 'Malformed JSON body',
      code: 'MALFORMED_JSON'
    });
    return;
  }

  logger.error('Unhandled request error', err, { method: req.method, path: req.path });
  res.status(500).json({
    success: false,
    error: 'Internal server error',
    code: 'INTERNAL_ERROR'
  });
}

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    error: `Route not found: ${req.method} ${req.path}`,
    code: 'NOT_FOUND'
  });
}
