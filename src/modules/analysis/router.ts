import { Router } from 'express';
import { z } from 'zod';

import env from '../../config/env';
import { clientKey, rateLimit } from '../../observability/rate-limit';
import { HttpError } from '../observability-ops/http-error';
import { analysisService, type AnalysisService } from './analysis.service';
import { describePanelSchema } from './panel-schema';
import { GENDERS, type BiomarkerPanel } from './types';

const finiteNumber = (field: string) =>
  z
    .number({ required_error: `${field} is required`, invalid_type_error: `${field} must be a number` })
    .refine((value) => Number.isFinite(value), { message: `${field} must be finite` });

const positiveNumber = (field: string) => finiteNumber(field).refine((value) => value > 0, {
  message: `${field} must be greater than zero`
});

export const biomarkerPanelSchema = z.object({
  albumin: finiteNumber('albumin'),
  creatinine: finiteNumber('creatinine'),
  glucose: finiteNumber('glucose'),
  crp: finiteNumber('crp'),
  mcv: finiteNumber('mcv'),
  rdw: finiteNumber('rdw'),
  alp: finiteNumber('alp'),
  wbc: finiteNumber('wbc'),
  lymphocytes: finiteNumber('lymphocytes'),
  age: z
    .number({ required_error: 'age is required', invalid_type_error: 'age must be a number' })
    .int('age must be a whole number of years')
    .min(0, 'age cannot be negative'),
  gender: z.enum(GENDERS, {
    errorMap: () => ({ message: "gender must be 'Male' or 'Female'" })
  }),
  height: positiveNumber('height'),
  weight: positiveNumber('weight')
}) satisfies z.ZodType<BiomarkerPanel>;

const validate = <T>(schema: z.ZodSchema<T>, value: unknown): T => {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw new HttpError(422, 'Validation failed', 'VALIDATION_ERROR', result.error.flatten());
  }
  return result.data;
};

type AnalysisRouterOptions = {
  service?: Pick<AnalysisService, 'analyze'>;
  rateLimitMax?: number;
  rateLimitWindowSeconds?: number;
};

export const createAnalysisRouter = (options: AnalysisRouterOptions = {}): Router => {
  const service = options.service ?? analysisService;
  const router = Router();

  const limiter = rateLimit({
    scope: 'analyze',
    key: clientKey,
    max: options.rateLimitMax ?? env.ANALYZE_RATE_LIMIT_MAX,
    windowSeconds: options.rateLimitWindowSeconds ?? env.ANALYZE_RATE_LIMIT_WINDOW_SECONDS
  });

  router.get('/schema', (_req, res) => {
    res.status(200).json(describePanelSchema());
  });

  router.post('/', limiter, async (req, res, next) => {
    try {
      const panel = validate(biomarkerPanelSchema, req.body);
      const report = await service.analyze(panel);
      res.status(200).json(report);
    } catch (error) {
      next(error);
    }
  });

  return router;
};

export const analysisRouter = createAnalysisRouter();
