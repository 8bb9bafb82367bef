import type { NextFunction, Request, RequestHandler, Response } from 'express';

import { baseLogger, type Logger } from './logger';
import { recordHttpMetric } from './metrics';
import { createTraceContext, finishTraceContext, type TraceContext } from './tracing';

/** Metrics label for requests no router matched. */
export const UNMATCHED_ROUTE = 'unmatched';

const toLatency = (durationMs: number): string => `${(durationMs / 1000).toFixed(6)}s`;

const resolveRoute = (req: Request): string => {
  const routePath: unknown = req.route?.path;
  if (typeof routePath === 'string' && routePath.length > 0) {
    return `${req.baseUrl}${routePath === '/' && req.baseUrl ? '' : routePath}`;
  }

  return UNMATCHED_ROUTE;
};

const spanSummary = (trace: TraceContext) => ({
  name: trace.name,
  parentSpanId: trace.parentSpanId,
  startTime: trace.startTime,
  endTime: trace.endTime
});

export const createObservabilityMiddleware = (rootLogger: Logger = baseLogger): RequestHandler => (
  req: Request,
  res: Response,
  next: NextFunction
): void => {
  const startHr = process.hrtime.bigint();
  const requestTarget = req.originalUrl ?? req.path ?? 'unknown';

  const trace = createTraceContext(`${req.method} ${requestTarget}`, req.trace);

  res.locals.trace = trace;
  req.trace = trace;

  const requestId = res.locals.requestId ?? req.requestId;
  const logger = rootLogger.with({
    component: 'http',
    traceId: trace.traceId,
    spanId: trace.spanId,
    defaultFields: {
      requestId,
      method: req.method,
      path: req.originalUrl,
      host: req.get('host') ?? undefined
    }
  });

  res.locals.logger = logger;
  req.log = logger;

  const elapsedMs = (): number => Number((Number(process.hrtime.bigint() - startHr) / 1_000_000).toFixed(3));

  res.on('finish', () => {
    const resolvedRoute = resolveRoute(req);
    const durationMs = elapsedMs();
    const span = spanSummary(finishTraceContext(trace));

    logger.log('HTTP request completed', {
      severity: res.statusCode >= 500 ? 'ERROR' : 'INFO',
      context: {
        statusCode: res.statusCode,
        durationMs,
        route: resolvedRoute,
        span
      },
      httpRequest: {
        requestMethod: req.method,
        requestUrl: req.originalUrl ?? resolvedRoute,
        protocol: req.protocol?.toUpperCase(),
        status: res.statusCode,
        latency: toLatency(durationMs),
        userAgent: req.get('user-agent') ?? undefined,
        remoteIp: req.ip ?? undefined,
        referer: req.get('referer') ?? undefined
      }
    });

    recordHttpMetric({
      method: req.method,
      route: resolvedRoute,
      statusCode: res.statusCode,
      durationMs
    });
  });

  res.on('close', () => {
    if (!res.writableEnded) {
      const durationMs = elapsedMs();
      logger.warn('HTTP connection closed before response completed', {
        statusCode: res.statusCode,
        durationMs,
        span: spanSummary(finishTraceContext(trace))
      });
    }
  });

  next();
};

export const observabilityMiddleware = createObservabilityMiddleware();
