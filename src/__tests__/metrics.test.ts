import {
  getMetricsSnapshot,
  recordHttpMetric,
  recordInferenceMetric,
  resetMetrics,
  __testing
} from '../observability/metrics';

describe('metrics registry', () => {
  beforeEach(() => {
    resetMetrics();
  });

  it('limits stored duration samples per bucket', () => {
    const maxSamples = __testing.MAX_DURATION_SAMPLES;

    for (let i = 0; i < maxSamples + 50; i += 1) {
      recordHttpMetric({
        method: 'post',
        route: '/analyze',
        statusCode: 200,
        durationMs: i + 1
      });
    }

    expect(__testing.getSampleSize('POST', '/analyze')).toBe(maxSamples);

    const snapshot = getMetricsSnapshot();
    const bucket = snapshot.http.find((entry) => entry.route === '/analyze');
    expect(bucket?.method).toBe('POST');
    expect(bucket?.count).toBe(maxSamples + 50);
    expect(bucket?.statusCounts['200']).toBe(maxSamples + 50);
    expect(bucket?.maxDurationMs).toBe(maxSamples + 50);
    expect(bucket?.p95DurationMs).toBeGreaterThan(0);
  });

  it('counts only 5xx responses as errors', () => {
    recordHttpMetric({ method: 'POST', route: '/analyze', statusCode: 422, durationMs: 4 });
    recordHttpMetric({ method: 'POST', route: '/analyze', statusCode: 502, durationMs: 8 });

    const [bucket] = getMetricsSnapshot().http;
    expect(bucket.errorCount).toBe(1);
    expect(bucket.averageDurationMs).toBe(6);
    expect(bucket.statusCounts).toEqual({ '422': 1, '502': 1 });
  });

  it('tracks inference latency and failures per provider', () => {
    recordInferenceMetric({ provider: 'gradio', latencyMs: 1000 });
    recordInferenceMetric({ provider: 'gradio', latencyMs: 2001, failureCode: 'INFERENCE_TIMEOUT' });

    expect(getMetricsSnapshot().inference).toEqual([
      {
        provider: 'gradio',
        count: 2,
        failureCount: 1,
        averageLatencyMs: 1500.5,
        lastFailureCode: 'INFERENCE_TIMEOUT'
      }
    ]);
  });
});
