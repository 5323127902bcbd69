import type { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { GatewayError, errorMessage } from '../errors.js';

/**
 * Maps errors to `{ error, message }` JSON. Anything not raised as a
 * GatewayError is reported as a 500.
 */
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  const requestId = req.metadata?.request_id ?? '-';

  if (err instanceof GatewayError) {
    if (err.status >= 500) {
      console.error(`[Request] ${requestId} ${err.code}: ${err.message}`);
    }
    res.status(err.status).json({ error: err.code, message: err.message });
    return;
  }

  if (err instanceof multer.MulterError) {
    res.status(400).json({ error: 'invalid_input', message: err.message });
    return;
  }

  // body-parser marks malformed payloads with a 4xx status
  if (err instanceof Error && 'status' in err && typeof err.status === 'number' && err.status < 500) {
    res.status(err.status).json({ error: 'invalid_input', message: err.message });
    return;
  }

  console.error(`[Request] ${requestId} unhandled error:`, err);
  res.status(500).json({ error: 'internal_error', message: errorMessage(err) });
}
