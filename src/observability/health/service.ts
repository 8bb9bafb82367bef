import env from '../../config/env';
import { resolveSpaceUrl } from '../../lib/gradio';
import { getMetricsSnapshot, type MetricsSnapshot } from '../metrics';
import { SERVICE_NAME } from '../logger';

type IntegrationStatus = 'pass' | 'degraded' | 'fail';

type InferenceEnv = Pick<
  typeof env,
  'NODE_ENV' | 'INFERENCE_PROVIDER' | 'GRADIO_SPACE' | 'GRADIO_API_NAME' | 'HF_TOKEN' | 'OPENROUTER_API_KEY' | 'OPENROUTER_REPORT_MODEL'
>;

type InferenceComponent = {
  status: IntegrationStatus;
  checkedAt: string;
  provider: InferenceEnv['INFERENCE_PROVIDER'];
  target: string;
  missingEnv: string[];
};

export type ReadinessSnapshot = {
  status: 'ok' | 'degraded' | 'fail';
  checkedAt: string;
  components: {
    inference: InferenceComponent;
    metrics: MetricsSnapshot;
  };
};

export type LivenessSnapshot = {
  status: 'ok';
  service: string;
  timestamp: string;
  uptimeSeconds: number;
};

type HealthServiceOptions = {
  now?: () => Date;
  inferenceEnv?: Partial<InferenceEnv>;
};

const defaultInferenceEnv: InferenceEnv = {
  NODE_ENV: env.NODE_ENV,
  INFERENCE_PROVIDER: env.INFERENCE_PROVIDER,
  GRADIO_SPACE: env.GRADIO_SPACE,
  GRADIO_API_NAME: env.GRADIO_API_NAME,
  HF_TOKEN: env.HF_TOKEN,
  OPENROUTER_API_KEY: env.OPENROUTER_API_KEY,
  OPENROUTER_REPORT_MODEL: env.OPENROUTER_REPORT_MODEL
};

const valueIsPresent = (value: unknown): value is string => typeof value === 'string' && value.trim().length > 0;

export class HealthService {
  private readonly now: () => Date;
  private readonly inferenceEnv: InferenceEnv;

  constructor(options: HealthServiceOptions = {}) {
    this.now = options.now ?? (() => new Date());
    this.inferenceEnv = { ...defaultInferenceEnv, ...options.inferenceEnv };
  }

  async liveness(): Promise<LivenessSnapshot> {
    return {
      status: 'ok',
      service: SERVICE_NAME,
      timestamp: this.now().toISOString(),
      uptimeSeconds: Math.round(process.uptime())
    };
  }

  async readiness(): Promise<ReadinessSnapshot> {
    const now = this.now();
    const inference = this.checkInference(now);

    return {
      status: inference.status === 'pass' ? 'ok' : inference.status,
      checkedAt: now.toISOString(),
      components: {
        inference,
        metrics: getMetricsSnapshot()
      }
    };
  }

  /**
   * Configuration check only; the remote model is never called from a health probe.
   */
  private checkInference(now: Date): InferenceComponent {
    const config = this.inferenceEnv;
    const missing: string[] = [];

    if (config.INFERENCE_PROVIDER === 'openrouter') {
      if (!valueIsPresent(config.OPENROUTER_API_KEY)) {
        missing.push('OPENROUTER_API_KEY');
      }
      if (!valueIsPresent(config.OPENROUTER_REPORT_MODEL)) {
        missing.push('OPENROUTER_REPORT_MODEL');
      }
    } else {
      if (!valueIsPresent(config.GRADIO_SPACE)) {
        missing.push('GRADIO_SPACE');
      }
      if (!valueIsPresent(config.GRADIO_API_NAME)) {
        missing.push('GRADIO_API_NAME');
      }
    }

    const status: IntegrationStatus =
      missing.length === 0 ? 'pass' : config.NODE_ENV === 'production' ? 'fail' : 'degraded';

    const target =
      config.INFERENCE_PROVIDER === 'openrouter'
        ? config.OPENROUTER_REPORT_MODEL
        : valueIsPresent(config.GRADIO_SPACE)
          ? `${resolveSpaceUrl(config.GRADIO_SPACE)} ${config.GRADIO_API_NAME}`
          : 'unconfigured';

    return {
      status,
      checkedAt: now.toISOString(),
      provider: config.INFERENCE_PROVIDER,
      target,
      missingEnv: missing
    };
  }
}

export const healthService = new HealthService();
