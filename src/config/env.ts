import { z } from 'zod';
import dotenv from 'dotenv';

const envFile = process.env.NODE_ENV === 'test' ? '.env.test' : '.env';
dotenv.config({ path: envFile });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(0).default(8000),
  GCP_PROJECT_ID: z.string().optional(),
  CORS_ORIGIN: z.string().default('http://localhost:5173'),
  INFERENCE_PROVIDER: z.enum(['gradio', 'openrouter']).default('gradio'),
  INFERENCE_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  GRADIO_SPACE: z.string().min(1).default('Muhammadidrees/MoizMedgemma27b'),
  GRADIO_API_NAME: z.string().min(1).default('/respond'),
  GRADIO_API_PREFIX: z.string().default('/gradio_api'),
  HF_TOKEN: z.string().optional(),
  OPENROUTER_API_KEY: z.string().optional(),
  OPENROUTER_BASE_URL: z.string().url().default('https://openrouter.ai/api/v1'),
  OPENROUTER_REPORT_MODEL: z.string().default('openrouter/google/gemini-2.0-flash'),
  ANALYZE_RATE_LIMIT_MAX: z.coerce.number().int().positive().default(30),
  ANALYZE_RATE_LIMIT_WINDOW_SECONDS: z.coerce.number().int().positive().default(60)
});

const parsed = envSchema.parse({ ...process.env });

if (parsed.NODE_ENV === 'production' && parsed.INFERENCE_PROVIDER === 'openrouter') {
  if (!parsed.OPENROUTER_API_KEY?.trim()) {
    throw new Error('OPENROUTER_API_KEY is required when INFERENCE_PROVIDER=openrouter and NODE_ENV=production');
  }
}

const parseCorsOrigins = (value: string): string[] => {
  if (!value) {
    return [];
  }

  const trimmed = value.trim();
  if (!trimmed) {
    return [];
  }

  if (trimmed.startsWith('[') && trimmed.endsWith(']')) {
    try {
      const parsedValue: unknown = JSON.parse(trimmed);
      if (Array.isArray(parsedValue)) {
        return parsedValue.map((origin) => `${origin}`.trim()).filter(Boolean);
      }
    } catch {
      // Fallback to delimiter-based parsing when JSON parsing fails.
    }
  }

  return trimmed
    .split(/[\s,]+/)
    .map((origin) => origin.trim())
    .filter(Boolean);
};

const corsOrigins = parseCorsOrigins(parsed.CORS_ORIGIN);

const env = {
  ...parsed,
  corsOrigins
};

export type Env = typeof env;

export default env;
