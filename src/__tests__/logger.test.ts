import { createLogger, type LogSeverity } from '../observability/logger';

const createCapture = () => {
  const lines: Array<{ entry: Record<string, unknown>; severity: LogSeverity | undefined }> = [];
  const writer = (line: string, severity: LogSeverity | undefined) => {
    lines.push({ entry: JSON.parse(line), severity });
  };
  return { lines, writer };
};

describe('structured logger', () => {
  it('writes one JSON entry with merged default fields', () => {
    const { lines, writer } = createCapture();
    const logger = createLogger({ component: 'api', defaultFields: { region: 'test' } }, writer).with({
      component: 'analysis',
      defaultFields: { provider: 'gradio' }
    });

    logger.warn('Report inference failed', { status: 504 });

    expect(lines).toHaveLength(1);
    expect(lines[0].severity).toBe('WARNING');
    expect(lines[0].entry).toMatchObject({
      serviceContext: { service: 'biomarker-report-api' },
      message: 'Report inference failed',
      severity: 'WARNING',
      component: 'analysis',
      context: { region: 'test', provider: 'gradio', status: 504 }
    });
  });

  it('keeps fully qualified trace ids and drops unset http fields', () => {
    const { lines, writer } = createCapture();
    const logger = createLogger({ traceId: 'projects/test/traces/abc', spanId: 'span-1' }, writer);

    logger.log('HTTP request completed', {
      severity: 'INFO',
      httpRequest: { requestMethod: 'POST', requestUrl: '/analyze', status: 200, userAgent: undefined }
    });

    expect(lines[0].entry['logging.googleapis.com/trace']).toBe('projects/test/traces/abc');
    expect(lines[0].entry['logging.googleapis.com/spanId']).toBe('span-1');
    expect(lines[0].entry.httpRequest).toEqual({ requestMethod: 'POST', requestUrl: '/analyze', status: 200 });
  });
});
