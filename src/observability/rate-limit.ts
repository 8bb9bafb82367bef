import type { Request, RequestHandler, Response } from 'express';

import { baseLogger } from './logger';

export type RateLimitStore = {
  increment(key: string, windowSeconds: number): Promise<number>;
};

export type RateLimitOptions = {
  key: (req: Request) => string;
  max: number;
  windowSeconds: number;
  scope?: string;
  store?: RateLimitStore;
  onLimit?: (req: Request, res: Response) => void;
};

type MemoryBucket = {
  expiresAt: number;
  count: number;
};

export class InMemoryRateLimitStore implements RateLimitStore {
  private readonly store = new Map<string, MemoryBucket>();

  constructor(private readonly now: () => number = () => Date.now()) {}

  async increment(key: string, windowSeconds: number): Promise<number> {
    const now = this.now();
    this.evictExpired(now);

    const bucket = this.store.get(key);
    if (!bucket) {
      this.store.set(key, { count: 1, expiresAt: now + windowSeconds * 1000 });
      return 1;
    }

    bucket.count += 1;
    return bucket.count;
  }

  private evictExpired(now: number): void {
    for (const [key, bucket] of this.store) {
      if (bucket.expiresAt <= now) {
        this.store.delete(key);
      }
    }
  }
}

const RATE_LIMIT_HEADERS = {
  limit: 'X-RateLimit-Limit',
  remaining: 'X-RateLimit-Remaining',
  reset: 'X-RateLimit-Reset',
  retryAfter: 'Retry-After'
} as const;

const RATE_LIMIT_ERROR = {
  message: 'Too many requests. Please retry later.',
  code: 'RATE_LIMITED'
} as const;

export const clientKey = (req: Request): string => req.ip ?? req.socket.remoteAddress ?? 'unknown';

export const rateLimit = (options: RateLimitOptions): RequestHandler => {
  const store = options.store ?? new InMemoryRateLimitStore();
  const scope = options.scope ?? 'default';
  const logger = baseLogger.with({ component: 'rate-limit', defaultFields: { scope } });

  return async (req, res, next) => {
    let requestKey: string;
    try {
      requestKey = options.key(req);
    } catch (error) {
      logger.error('Failed to generate rate limit key; allowing request', {
        error: error instanceof Error ? error.message : String(error)
      });
      next();
      return;
    }

    let count: number;
    try {
      count = await store.increment(`${scope}:${requestKey}`, options.windowSeconds);
    } catch (error) {
      logger.error('Rate limiter store failure; allowing request', {
        error: error instanceof Error ? error.message : String(error)
      });
      next();
      return;
    }

    res.setHeader(RATE_LIMIT_HEADERS.limit, String(options.max));
    res.setHeader(RATE_LIMIT_HEADERS.remaining, String(Math.max(0, options.max - count)));
    res.setHeader(RATE_LIMIT_HEADERS.reset, String(options.windowSeconds));

    if (count > options.max) {
      res.setHeader(RATE_LIMIT_HEADERS.retryAfter, String(options.windowSeconds));

      req.log?.warn('Rate limit exceeded', {
        requestKey,
        scope,
        max: options.max,
        windowSeconds: options.windowSeconds
      });

      options.onLimit?.(req, res);

      res.status(429).json({
        error: {
          ...RATE_LIMIT_ERROR,
          status: 429,
          retryAfter: options.windowSeconds,
          scope,
          traceId: res.locals.requestId
        }
      });
      return;
    }

    next();
  };
};
