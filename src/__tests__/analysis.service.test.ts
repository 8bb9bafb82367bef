import { readFileSync } from 'fs';
import path from 'path';

import { AnalysisService } from '../modules/analysis/analysis.service';
import type { ReportInferenceClient } from '../modules/analysis/inference';
import type { BiomarkerPanel } from '../modules/analysis/types';
import { HttpError } from '../modules/observability-ops/http-error';
import { getMetricsSnapshot, resetMetrics } from '../observability/metrics';

const panel: BiomarkerPanel = {
  albumin: 4.5,
  creatinine: 1.5,
  glucose: 160,
  crp: 2.5,
  mcv: 150,
  rdw: 15,
  alp: 146,
  wbc: 10.5,
  lymphocytes: 38,
  age: 30,
  gender: 'Male',
  height: 167,
  weight: 70
};

const createInference = () => {
  const generateReport = jest.fn<Promise<string>, [BiomarkerPanel]>();
  const inference: ReportInferenceClient = { provider: 'gradio', generateReport };
  return { inference, generateReport };
};

const steppingClock = (stepMs: number) => {
  let current = 0;
  return () => {
    current += stepMs;
    return current;
  };
};

describe('AnalysisService', () => {
  beforeEach(() => {
    resetMetrics();
  });

  it('extracts the structured report from the generated markdown', async () => {
    const { inference, generateReport } = createInference();
    generateReport.mockResolvedValue(
      readFileSync(path.join(__dirname, '..', '..', 'tests', 'fixtures', 'model-report.md'), 'utf8')
    );
    const service = new AnalysisService({ inference, now: steppingClock(40) });

    const report = await service.analyze(panel);

    expect(generateReport).toHaveBeenCalledWith(panel);
    expect(report.biomarker_table).toHaveLength(4);
    expect(report.system_analysis.status).toBe('Metabolic strain');
    expect(getMetricsSnapshot().inference).toEqual([
      { provider: 'gradio', count: 1, failureCount: 0, averageLatencyMs: 40, lastFailureCode: null }
    ]);
  });

  it('returns the default report when the model output has no recognisable sections', async () => {
    const { inference, generateReport } = createInference();
    generateReport.mockResolvedValue('The model is warming up, please try again.');
    const service = new AnalysisService({ inference });

    const report = await service.analyze(panel);

    expect(report.system_analysis).toEqual({ status: 'Unknown', explanation: 'No system analysis provided.' });
    expect(report.interaction_alerts).toEqual([]);
  });

  it('passes HttpErrors from the provider through unchanged', async () => {
    const { inference, generateReport } = createInference();
    const timeout = new HttpError(504, 'Inference request timed out after 100ms.', 'INFERENCE_TIMEOUT');
    generateReport.mockRejectedValue(timeout);
    const service = new AnalysisService({ inference, now: steppingClock(100) });

    await expect(service.analyze(panel)).rejects.toBe(timeout);
    expect(getMetricsSnapshot().inference[0]).toMatchObject({
      failureCount: 1,
      lastFailureCode: 'INFERENCE_TIMEOUT'
    });
  });

  it('wraps unexpected provider errors as a bad gateway', async () => {
    const { inference, generateReport } = createInference();
    generateReport.mockRejectedValue(new Error('socket hang up'));
    const service = new AnalysisService({ inference });

    await expect(service.analyze(panel)).rejects.toMatchObject({
      status: 502,
      code: 'INFERENCE_PROVIDER_FAILURE',
      message: 'Inference request failed: socket hang up'
    } satisfies Partial<HttpError>);
  });
});
