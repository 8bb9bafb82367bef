import type { NextFunction, Request, Response } from 'express';

import { baseLogger } from '../../observability/logger';
import { HttpError } from './http-error';

type ExpressError =
  | HttpError
  | (Error & { status?: number; statusCode?: number; code?: string; details?: unknown; type?: string });

const DEFAULT_ERROR_MESSAGE = 'Internal server error';
const DEFAULT_ERROR_CODE = 'UNKNOWN_ERROR';

// body-parser tags its failures with a `type`.
const BODY_PARSER_CODES: Record<string, string> = {
  'entity.parse.failed': 'INVALID_JSON',
  'entity.too.large': 'PAYLOAD_TOO_LARGE'
};

export type ErrorEnvelope = {
  error: {
    message: string;
    status: number;
    code: string;
    traceId?: string;
    details?: unknown;
  };
};

const resolveStatus = (error: ExpressError): number => {
  const status = error.status ?? ('statusCode' in error ? error.statusCode : undefined) ?? 500;
  return status >= 400 && status < 600 ? status : 500;
};

const resolveCode = (error: ExpressError): string => {
  if (error instanceof HttpError) {
    return error.code ?? DEFAULT_ERROR_CODE;
  }

  if ('type' in error && typeof error.type === 'string' && BODY_PARSER_CODES[error.type]) {
    return BODY_PARSER_CODES[error.type];
  }

  return error.code ?? DEFAULT_ERROR_CODE;
};

const safeMessage = (error: ExpressError, status: number): string => {
  if (status >= 500) {
    return error instanceof HttpError ? error.message : DEFAULT_ERROR_MESSAGE;
  }

  return error.message;
};

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction): void => {
  next(new HttpError(404, `Resource not found for ${req.method} ${req.originalUrl}`, 'NOT_FOUND'));
};

export const errorHandler = (error: ExpressError, req: Request, res: Response, next: NextFunction): void => {
  if (res.headersSent) {
    next(error);
    return;
  }

  const status = resolveStatus(error);
  const headerId = req.headers['x-request-id'];
  const traceId = res.locals.requestId ?? (typeof headerId === 'string' ? headerId : undefined);
  const code = resolveCode(error);
  const details = error.details;

  const logger = req.log ?? res.locals.logger ?? baseLogger.with({ component: 'error-handler', traceId });

  const logContext = {
    method: req.method,
    path: req.originalUrl,
    status,
    code,
    message: error.message,
    traceId,
    details
  };

  if (status >= 500) {
    logger.error('Internal server error', {
      ...logContext,
      stack: error.stack
    });
  } else {
    logger.warn('Client error', logContext);
  }

  const envelope: ErrorEnvelope = {
    error: {
      message: safeMessage(error, status),
      status,
      code,
      traceId
    }
  };

  if (status < 500 && details !== undefined) {
    envelope.error.details = details;
  }

  res.status(status).json(envelope);
};
