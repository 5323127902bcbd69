import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { v4 as uuidv4 } from 'uuid';
import type { RequestMetadata } from '../types/logging.js';
import type { MetricsSink } from '../services/metrics.js';
import { isolateSinkFailure } from '../errors.js';

// Extend Express Request type to include metadata
declare global {
  namespace Express {
    interface Request {
      metadata?: RequestMetadata;
    }
  }
}

function firstHeader(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

/**
 * Attaches request metadata, echoes the request id, and on completion logs one
 * line and records the request duration.
 */
export function createLoggerMiddleware(metrics: MetricsSink): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const requestId = firstHeader(req.headers['x-request-id']) || uuidv4();

    // Extract IP address (handle proxies)
    const ip = (
      firstHeader(req.headers['x-forwarded-for']) ||
      firstHeader(req.headers['x-real-ip']) ||
      req.socket.remoteAddress ||
      'unknown'
    ).split(',')[0].trim();

    const metadata: RequestMetadata = {
      request_id: requestId,
      ip_address: ip,
      user_agent: req.headers['user-agent'] || 'unknown',
      started_at: performance.now(),
    };
    req.metadata = metadata;
    res.setHeader('X-Request-Id', requestId);

    res.on('finish', () => {
      const durationMs = performance.now() - metadata.started_at;
      // route pattern keeps label cardinality bounded; unmatched paths share one label
      const route = typeof req.route?.path === 'string' ? `${req.baseUrl}${req.route.path}` : 'unmatched';
      console.log(
        `[Request] ${requestId} ${req.method} ${req.originalUrl} ${res.statusCode} ${durationMs.toFixed(1)}ms`
      );
      isolateSinkFailure('Metrics', 'observeHttpRequest', () =>
        metrics.observeHttpRequest(req.method, route, res.statusCode, durationMs / 1000)
      );
    });

    next();
  };
}
