/**
 * Bearer token gate for mutating endpoints
 */
import { timingSafeEqual } from 'crypto';
import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { UnauthorizedError } from '../errors.js';

function tokensMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export function requireApiToken(apiToken: string): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;

    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      next(new UnauthorizedError('No valid authorization header found'));
      return;
    }

    const token = authHeader.slice('Bearer '.length).trim();
    if (!token || !tokensMatch(token, apiToken)) {
      next(new UnauthorizedError('Invalid API token'));
      return;
    }

    next();
  };
}
