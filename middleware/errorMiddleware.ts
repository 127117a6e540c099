// middleware/errorMiddleware.ts
import { Request, Response, NextFunction } from 'express';
import mongoose from 'mongoose';
import logger from '../utils/logger';
import config from '../utils/config';
import AppError from '../utils/AppError';
import { PipelineError } from '../utils/pipelineErrors';

interface MongoServerError {
  code: number;
  keyValue?: Record<string, unknown>;
}

const isDuplicateKeyError = (err: unknown): err is MongoServerError =>
  typeof err === 'object' && err !== null && 'code' in err && err.code === 11000;

// Turns driver and mongoose errors into operational ones; anything else stays as is.
export const normalizeError = (err: unknown): unknown => {
  if (err instanceof mongoose.Error.CastError) {
    return new AppError(`Invalid ${err.path}: ${String(err.value)}`, 400, 'INVALID_ID');
  }
  if (err instanceof mongoose.Error.ValidationError) {
    const details = Object.values(err.errors).map(e => e.message);
    return new AppError(`Invalid input data. ${details.join('. ')}`, 400, 'VALIDATION_ERROR');
  }
  if (isDuplicateKeyError(err)) {
    const fields = Object.keys(err.keyValue ?? {}).join(', ') || 'field';
    return new AppError(`Duplicate value for ${fields}`, 409, 'DUPLICATE');
  }
  return err;
};

export interface ErrorResponse {
  statusCode: number;
  body: {
    status: 'fail' | 'error';
    message: string;
    errorCode?: string;
    errorKind?: string;
    retryable?: boolean;
    stack?: string;
  };
}

// Unknown errors answer 500 without details; the stack is only shown when asked for.
export const toErrorResponse = (error: unknown, includeStack: boolean): ErrorResponse => {
  if (!(error instanceof AppError)) {
    return {
      statusCode: 500,
      body: {
        status: 'error',
        message: 'Internal Server Error',
        stack: includeStack && error instanceof Error ? error.stack : undefined,
      },
    };
  }

  return {
    statusCode: error.statusCode,
    body: {
      status: error.status,
      message: error.message,
      errorCode: error.errorCode,
      errorKind: error instanceof PipelineError ? error.errorKind : undefined,
      retryable: error instanceof PipelineError ? error.retryable : undefined,
    },
  };
};

// Express recognises error handlers by their four parameters
export const errorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
  const error = normalizeError(err);

  if (error instanceof AppError) {
    logger.warn(`⚠️ Operational Error [${req.method} ${req.originalUrl}]: ${error.message}`);
  } else {
    logger.error({ err: error }, `🔥 Unexpected Error [${req.method} ${req.originalUrl}]`);
  }

  const { statusCode, body } = toErrorResponse(error, config.env === 'development');
  res.status(statusCode).json(body);
};
