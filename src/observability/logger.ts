import env from '../config/env';

export type LogSeverity = 'DEBUG' | 'INFO' | 'WARNING' | 'ERROR';

export type HttpRequestLog = {
  requestMethod: string;
  requestUrl: string;
  status?: number;
  userAgent?: string;
  remoteIp?: string;
  latency?: string;
  protocol?: string;
  referer?: string;
};

type LogEntry = {
  serviceContext: { service: string };
  message: string;
  severity: LogSeverity;
  time: string;
  component?: string;
  context?: Record<string, unknown>;
  'logging.googleapis.com/trace'?: string;
  'logging.googleapis.com/spanId'?: string;
  httpRequest?: HttpRequestLog;
};

export type LoggerContext = {
  component?: string;
  traceId?: string;
  spanId?: string;
  defaultFields?: Record<string, unknown>;
};

type LogOptions = {
  severity: LogSeverity;
  context?: Record<string, unknown>;
  httpRequest?: HttpRequestLog;
};

export type LogWriter = (line: string, severity: LogSeverity) => void;

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  with(context: LoggerContext): Logger;
  log(message: string, options: LogOptions): void;
}

export const SERVICE_NAME = 'biomarker-report-api';

const projectId = env.GCP_PROJECT_ID && env.GCP_PROJECT_ID.length > 0 ? env.GCP_PROJECT_ID : undefined;

// Cloud Logging links entries to a trace only through the fully qualified name.
const toTraceField = (traceId?: string): string | undefined => {
  if (!traceId || !projectId || traceId.startsWith('projects/')) {
    return traceId;
  }

  return `projects/${projectId}/traces/${traceId}`;
};

const consoleWriter: LogWriter = (line, severity) => {
  if (severity === 'ERROR') {
    console.error(line);
  } else if (severity === 'WARNING') {
    console.warn(line);
  } else {
    console.log(line);
  }
};

const withoutUndefined = (payload: HttpRequestLog): HttpRequestLog => {
  const output: HttpRequestLog = { requestMethod: payload.requestMethod, requestUrl: payload.requestUrl };
  if (payload.status !== undefined) output.status = payload.status;
  if (payload.userAgent !== undefined) output.userAgent = payload.userAgent;
  if (payload.remoteIp !== undefined) output.remoteIp = payload.remoteIp;
  if (payload.latency !== undefined) output.latency = payload.latency;
  if (payload.protocol !== undefined) output.protocol = payload.protocol;
  if (payload.referer !== undefined) output.referer = payload.referer;
  return output;
};

class StructuredLogger implements Logger {
  constructor(
    private readonly context: LoggerContext,
    private readonly writer: LogWriter
  ) {}

  with(context: LoggerContext): Logger {
    const defaultFields =
      this.context.defaultFields || context.defaultFields
        ? { ...this.context.defaultFields, ...context.defaultFields }
        : undefined;

    return new StructuredLogger(
      {
        component: context.component ?? this.context.component,
        traceId: context.traceId ?? this.context.traceId,
        spanId: context.spanId ?? this.context.spanId,
        defaultFields
      },
      this.writer
    );
  }

  log(message: string, options: LogOptions): void {
    const { defaultFields } = this.context;
    const entry: LogEntry = {
      serviceContext: { service: SERVICE_NAME },
      message,
      severity: options.severity,
      time: new Date().toISOString(),
      component: this.context.component,
      context: defaultFields || options.context ? { ...defaultFields, ...options.context } : undefined,
      'logging.googleapis.com/trace': toTraceField(this.context.traceId),
      'logging.googleapis.com/spanId': this.context.spanId,
      httpRequest: options.httpRequest ? withoutUndefined(options.httpRequest) : undefined
    };

    this.writer(JSON.stringify(entry), options.severity);
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(message, { severity: 'DEBUG', context });
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(message, { severity: 'INFO', context });
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(message, { severity: 'WARNING', context });
  }

  error(message: string, context?: Record<string, unknown>): void {
    this.log(message, { severity: 'ERROR', context });
  }
}

export const createLogger = (context: LoggerContext = {}, writer: LogWriter = consoleWriter): Logger =>
  new StructuredLogger(context, writer);

export const baseLogger = createLogger({ component: 'api' });
