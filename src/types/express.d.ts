import type { Logger } from '../observability/logger';
import type { TraceContext } from '../observability/tracing';

declare global {
  namespace Express {
    interface Request {
      requestId?: string;
      log?: Logger;
      trace?: TraceContext;
    }

    interface Locals {
      requestId?: string;
      logger?: Logger;
      trace?: TraceContext;
    }
  }
}

export {};
