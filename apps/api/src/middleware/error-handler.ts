import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { HttpError, QueryTimeoutError } from './http-errors.js';

export function notFoundHandler(_req: Request, res: Response): void {
  res.status(404).json({ error: 'not_found' });
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction,
): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: 'validation_error', details: err.errors });
    return;
  }
  if (err instanceof QueryTimeoutError) {
    res.status(err.status).json({ error: err.code, message: err.message, pending: err.pending });
    return;
  }
  if (err instanceof HttpError) {
    res.status(err.status).json({ error: err.code, message: err.message });
    return;
  }
  // express.json() reports unparseable bodies as a SyntaxError
  if (err instanceof SyntaxError) {
    res.status(400).json({ error: 'invalid_json' });
    return;
  }
  if (err instanceof Error) {
    const status = 'status' in err && typeof err.status === 'number' ? err.status : 500;
    if (status >= 500) console.error('[api] unhandled error', err);
    res.status(status).json({ error: err.message });
    return;
  }
  console.error('[api] unhandled non-error thrown', err);
  res.status(500).json({ error: 'Internal server error' });
}
