import express, { type NextFunction, type Request, type Response } from 'express';
import helmet from 'helmet';

import env from './config/env';
import { observabilityMiddleware } from './observability/middleware';
import { healthRouter } from './routes/health';
import { requestContext } from './modules/observability-ops/request-context';
import { errorHandler, notFoundHandler } from './modules/observability-ops/error-handler';
import { analysisRouter } from './modules/analysis/router';

const app = express();
const allowedOrigins = env.corsOrigins.length > 0 ? env.corsOrigins : ['http://localhost:5173'];
const normalizeOrigin = (origin: string) => origin.replace(/\/$/, '').toLowerCase();
const normalizedAllowedOrigins = allowedOrigins.map(normalizeOrigin);
const isAllowedOrigin = (origin?: string): origin is string => {
  if (!origin) {
    return false;
  }

  return normalizedAllowedOrigins.includes(normalizeOrigin(origin));
};

const applyCorsHeaders = (req: Request, res: Response, next: NextFunction) => {
  const origin = req.headers.origin;
  if (isAllowedOrigin(origin)) {
    res.header('Access-Control-Allow-Origin', origin);
    res.header('Vary', 'Origin');
  }

  if (req.method === 'OPTIONS') {
    if (isAllowedOrigin(origin)) {
      res.header('Access-Control-Allow-Headers', req.headers['access-control-request-headers'] ?? 'Content-Type');
      res.header('Access-Control-Allow-Methods', 'GET,POST,OPTIONS');
    }

    res.sendStatus(204);
    return;
  }

  next();
};

app.set('trust proxy', 1);
app.use(applyCorsHeaders);
app.use(requestContext);
app.use(observabilityMiddleware);
app.use(helmet());
app.use(express.json({ limit: '16kb' }));

app.use('/healthz', healthRouter);
app.use('/analyze', analysisRouter);
app.use(notFoundHandler);
app.use(errorHandler);

export { app };
