type HttpLabelKey = `${string}:${string}`;

type RequestMetricInput = {
  method: string;
  route: string;
  statusCode: number;
  durationMs: number;
};

export type RequestMetricSnapshot = {
  method: string;
  route: string;
  count: number;
  errorCount: number;
  averageDurationMs: number;
  maxDurationMs: number;
  p95DurationMs: number;
  lastStatusAt: string | null;
  statusCounts: Record<string, number>;
};

export type InferenceMetricSnapshot = {
  provider: string;
  count: number;
  failureCount: number;
  averageLatencyMs: number;
  lastFailureCode: string | null;
};

export type MetricsSnapshot = {
  generatedAt: string;
  http: RequestMetricSnapshot[];
  inference: InferenceMetricSnapshot[];
};

type RequestMetricBucket = {
  method: string;
  route: string;
  count: number;
  errorCount: number;
  durationSamples: number[];
  sumDuration: number;
  maxDuration: number;
  lastStatusAt: string | null;
  statusCounts: Record<string, number>;
};

type InferenceMetricBucket = {
  count: number;
  failureCount: number;
  sumLatency: number;
  lastFailureCode: string | null;
};

const MAX_DURATION_SAMPLES = 200;

const httpMetrics = new Map<HttpLabelKey, RequestMetricBucket>();
const inferenceMetrics = new Map<string, InferenceMetricBucket>();

const toKey = (method: string, route: string): HttpLabelKey => `${method.toUpperCase()}:${route}`;

const round = (value: number): number => Number(value.toFixed(2));

const computePercentile = (values: number[], percentile: number): number => {
  if (values.length === 0) {
    return 0;
  }

  const sorted = [...values].sort((a, b) => a - b);
  const index = Math.ceil((percentile / 100) * sorted.length) - 1;
  return sorted[Math.max(0, Math.min(sorted.length - 1, index))];
};

export const recordHttpMetric = ({ method, route, statusCode, durationMs }: RequestMetricInput): void => {
  const key = toKey(method, route);
  const bucket = httpMetrics.get(key) ?? {
    method: method.toUpperCase(),
    route,
    count: 0,
    errorCount: 0,
    durationSamples: [],
    sumDuration: 0,
    maxDuration: 0,
    lastStatusAt: null,
    statusCounts: {}
  };

  bucket.count += 1;
  if (statusCode >= 500) {
    bucket.errorCount += 1;
  }
  bucket.durationSamples.push(durationMs);
  if (bucket.durationSamples.length > MAX_DURATION_SAMPLES) {
    bucket.durationSamples.shift();
  }
  bucket.sumDuration += durationMs;
  bucket.maxDuration = Math.max(bucket.maxDuration, durationMs);
  bucket.lastStatusAt = new Date().toISOString();
  bucket.statusCounts[String(statusCode)] = (bucket.statusCounts[String(statusCode)] ?? 0) + 1;

  httpMetrics.set(key, bucket);
};

export const recordInferenceMetric = (input: { provider: string; latencyMs: number; failureCode?: string }): void => {
  const bucket = inferenceMetrics.get(input.provider) ?? {
    count: 0,
    failureCount: 0,
    sumLatency: 0,
    lastFailureCode: null
  };

  bucket.count += 1;
  bucket.sumLatency += input.latencyMs;
  if (input.failureCode) {
    bucket.failureCount += 1;
    bucket.lastFailureCode = input.failureCode;
  }

  inferenceMetrics.set(input.provider, bucket);
};

export const getMetricsSnapshot = (): MetricsSnapshot => {
  const http: RequestMetricSnapshot[] = [];

  for (const bucket of httpMetrics.values()) {
    const average = bucket.count > 0 ? bucket.sumDuration / bucket.count : 0;

    http.push({
      method: bucket.method,
      route: bucket.route,
      count: bucket.count,
      errorCount: bucket.errorCount,
      averageDurationMs: round(average),
      maxDurationMs: round(bucket.maxDuration),
      p95DurationMs: round(computePercentile(bucket.durationSamples, 95)),
      lastStatusAt: bucket.lastStatusAt,
      statusCounts: { ...bucket.statusCounts }
    });
  }

  const inference: InferenceMetricSnapshot[] = [...inferenceMetrics.entries()].map(([provider, bucket]) => ({
    provider,
    count: bucket.count,
    failureCount: bucket.failureCount,
    averageLatencyMs: bucket.count > 0 ? round(bucket.sumLatency / bucket.count) : 0,
    lastFailureCode: bucket.lastFailureCode
  }));

  return {
    generatedAt: new Date().toISOString(),
    http,
    inference
  };
};

export const resetMetrics = (): void => {
  httpMetrics.clear();
  inferenceMetrics.clear();
};

export const __testing = {
  MAX_DURATION_SAMPLES,
  getSampleSize(method: string, route: string): number {
    return httpMetrics.get(toKey(method, route))?.durationSamples.length ?? 0;
  }
};
