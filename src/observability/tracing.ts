import { randomBytes } from 'crypto';

export type TraceContext = {
  traceId: string;
  spanId: string;
  parentSpanId?: string;
  name?: string;
  startTime: string;
  endTime?: string;
};

const TRACE_ID_BYTES = 16;
const SPAN_ID_BYTES = 8;

export const randomHex = (bytes: number): string => randomBytes(bytes).toString('hex');

export const randomSpanId = (): string => randomHex(SPAN_ID_BYTES);

export const createTraceContext = (name?: string, parent?: TraceContext): TraceContext => ({
  traceId: parent?.traceId ?? randomHex(TRACE_ID_BYTES),
  spanId: randomSpanId(),
  parentSpanId: parent?.spanId,
  name,
  startTime: new Date().toISOString()
});

export const finishTraceContext = (trace: TraceContext): TraceContext => {
  trace.endTime = new Date().toISOString();
  return trace;
};
