import { randomUUID } from 'crypto';
import type { NextFunction, Request, Response } from 'express';

import { randomSpanId, type TraceContext } from '../../observability/tracing';

const REQUEST_ID_HEADER = 'x-request-id';
const CLOUD_TRACE_HEADER = 'x-cloud-trace-context';

export const parseCloudTraceHeader = (headerValue: string | undefined): TraceContext | undefined => {
  if (!headerValue) {
    return undefined;
  }

  const [traceId, remainder] = headerValue.split('/');
  if (!traceId) {
    return undefined;
  }

  const spanToken = remainder?.split(';')[0];
  const spanId = spanToken && spanToken.length > 0 ? spanToken : randomSpanId();

  return {
    traceId,
    spanId,
    startTime: new Date().toISOString()
  };
};

export const requestContext = (req: Request, res: Response, next: NextFunction): void => {
  const existingHeader = req.headers[REQUEST_ID_HEADER];

  const requestId = typeof existingHeader === 'string' && existingHeader.length > 0 ? existingHeader : randomUUID();

  res.locals.requestId = requestId;
  req.requestId = requestId;
  if (!existingHeader) {
    req.headers[REQUEST_ID_HEADER] = requestId;
  }
  res.setHeader('X-Request-Id', requestId);

  const parentTrace = parseCloudTraceHeader(req.get(CLOUD_TRACE_HEADER));
  if (parentTrace) {
    req.trace = parentTrace;
    res.locals.trace = parentTrace;
  }

  next();
};
