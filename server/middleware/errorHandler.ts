import type { NextFunction, Request, Response } from 'express';
import { errorMessage, HttpError, ModelInvocationError } from '../errors';
import { logger } from '../logger';

const statusOf = (err: unknown): number | undefined => {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
};

// Error handling middleware
export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const stack = process.env.NODE_ENV === 'development' && err instanceof Error ? { stack: err.stack } : {};

  if (err instanceof HttpError) {
    if (err.status >= 500) logger.error(`❌ ${req.method} ${req.path}: ${err.message}`);
    res.status(err.status).json({ error: err.error, code: err.code, message: err.message, ...stack });
    return;
  }

  if (err instanceof ModelInvocationError) {
    logger.error(`❌ Model call failed for ${req.method} ${req.path}: ${err.message}`);
    res.status(502).json({
      error: 'AI model request failed',
      code: 'MODEL_INVOCATION_FAILED',
      message: err.message,
      ...stack,
    });
    return;
  }

  const status = statusOf(err);
  if (status !== undefined && status >= 400 && status < 500) {
    res.status(status).json({ error: errorMessage(err), code: 'BAD_REQUEST', message: errorMessage(err) });
    return;
  }

  logger.error(`❌ Unexpected error on ${req.method} ${req.path}: ${errorMessage(err)}`);
  res.status(500).json({
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    message: 'An unexpected error occurred while processing your request',
    ...stack,
  });
};
