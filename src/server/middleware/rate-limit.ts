import type { Request, Response, NextFunction, RequestHandler } from 'express';
import type { RateLimitConfig } from '../config.js';

// ============================================================================
// SIMPLE IN-MEMORY RATE LIMITER
// No external dependencies, sliding window approach
// ============================================================================

export function createRateLimiter(config: RateLimitConfig): RequestHandler {
  const requestStore = new Map<string, number[]>(); // IP -> request timestamps

  // Periodic cleanup of old entries to prevent memory leak
  const cleanup = setInterval(() => {
    const cutoff = Date.now() - config.windowMs;

    for (const [ip, timestamps] of requestStore) {
      const recent = timestamps.filter(timestamp => timestamp > cutoff);
      if (recent.length === 0) {
        requestStore.delete(ip);
      } else {
        requestStore.set(ip, recent);
      }
    }
  }, config.cleanupIntervalMs);
  cleanup.unref();

  return (req: Request, res: Response, next: NextFunction): void => {
    // req.ip honours forwarding headers only under the `trust proxy` setting
    const ip = req.ip || req.socket.remoteAddress || 'unknown';
    const now = Date.now();
    const windowStart = now - config.windowMs;

    const timestamps = (requestStore.get(ip) ?? []).filter(timestamp => timestamp > windowStart);

    if (timestamps.length >= config.maxRequests) {
      const retryAfterMs = timestamps[0] + config.windowMs - now;
      const retryAfterSec = Math.ceil(retryAfterMs / 1000);

      requestStore.set(ip, timestamps);
      res.setHeader('Retry-After', String(retryAfterSec));
      res.status(429).json({
        error: 'rate_limited',
        message: `Rate limit exceeded. Maximum ${config.maxRequests} requests per ${config.windowMs / 1000} seconds.`,
        retryAfter: retryAfterSec,
      });
      return;
    }

    timestamps.push(now);
    requestStore.set(ip, timestamps);
    next();
  };
}
