import { baseLogger } from '../../observability/logger';
import { recordInferenceMetric } from '../../observability/metrics';
import { HttpError, isHttpError } from '../observability-ops/http-error';
import { createReportInference, type ReportInferenceClient } from './inference';
import { extractBiomarkerReport } from './report-extractor';
import type { BiomarkerPanel, BiomarkerReport } from './types';

type AnalysisServiceOptions = {
  inference?: ReportInferenceClient;
  now?: () => number;
};

export class AnalysisService {
  private readonly logger = baseLogger.with({ component: 'analysis' });
  private readonly inference: ReportInferenceClient;
  private readonly now: () => number;

  constructor(options: AnalysisServiceOptions = {}) {
    this.inference = options.inference ?? createReportInference();
    this.now = options.now ?? (() => Date.now());
  }

  async analyze(panel: BiomarkerPanel): Promise<BiomarkerReport> {
    const provider = this.inference.provider;
    const startedAt = this.now();

    let markdown: string;
    try {
      markdown = await this.inference.generateReport(panel);
    } catch (error) {
      const failure = isHttpError(error)
        ? error
        : new HttpError(
            502,
            `Inference request failed: ${error instanceof Error ? error.message : String(error)}`,
            'INFERENCE_PROVIDER_FAILURE'
          );
      const latencyMs = Math.max(0, this.now() - startedAt);

      recordInferenceMetric({ provider, latencyMs, failureCode: failure.code ?? 'UNKNOWN_ERROR' });
      this.logger.error('Report inference failed', {
        provider,
        latencyMs,
        status: failure.status,
        code: failure.code,
        error: failure.message
      });
      throw failure;
    }

    const latencyMs = Math.max(0, this.now() - startedAt);
    recordInferenceMetric({ provider, latencyMs });

    const report = extractBiomarkerReport(markdown);

    this.logger.info('Biomarker report extracted', {
      provider,
      latencyMs,
      markdownLength: markdown.length,
      normalRanges: Object.keys(report.normal_ranges).length,
      tableRows: report.biomarker_table.length,
      priorities: report.executive_summary.top_priorities.length,
      strengths: report.executive_summary.key_strengths.length,
      alerts: report.interaction_alerts.length
    });

    return report;
  }
}

export const analysisService = new AnalysisService();
