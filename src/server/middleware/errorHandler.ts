import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';
import { isGameError } from '../../shared/errors';
import { logger } from '../utils/logger';
import { config } from '../config';

export interface AppError extends Error {
  statusCode?: number;
  code?: string;
  /** Set by body-parser on its own errors, e.g. `entity.too.large`. */
  type?: string;
}

export const errorHandler = (error: AppError, req: Request, res: Response, _next: NextFunction) => {
  let statusCode = error.statusCode || 500;
  let message = error.message || 'Internal Server Error';
  let code = error.code || 'INTERNAL_ERROR';

  if (error instanceof ZodError) {
    statusCode = 400;
    code = 'INVALID_REQUEST';
    if (error.issues.length > 0) {
      const issue = error.issues[0];
      const field = issue.path.join('.');
      message = field ? `${field}: ${issue.message}` : issue.message;
    }
  } else if (isGameError(error)) {
    statusCode = error.httpStatus;
    code = error.code;
  } else if (error instanceof SyntaxError && statusCode === 400) {
    // body-parser flags malformed JSON this way
    code = 'INVALID_JSON';
    message = 'Malformed JSON body';
  } else if (error.type === 'entity.too.large') {
    code = 'PAYLOAD_TOO_LARGE';
    message = 'Request body too large';
  }

  if (statusCode >= 500) {
    logger.error('Server Error:', {
      error: error.message,
      stack: error.stack,
      url: req.url,
      method: req.method,
    });
  } else {
    logger.warn('Client Error:', {
      error: error.message,
      url: req.url,
      method: req.method,
      statusCode,
    });
  }

  const includeDebugDetails = config.isDevelopment && statusCode >= 500;

  res.status(statusCode).json({
    success: false,
    error: {
      message,
      code,
      timestamp: new Date().toISOString(),
      ...(includeDebugDetails && { stack: error.stack }),
    },
  });
};

type AsyncRequestHandler = (req: Request, res: Response, next: NextFunction) => Promise<void> | void;

export const asyncHandler = (fn: AsyncRequestHandler): RequestHandler => {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => fn(req, res, next))
      .catch(next);
  };
};

export const createError = (message: string, statusCode: number = 500, code?: string): AppError => {
  const error: AppError = new Error(message);
  error.statusCode = statusCode;
  if (code) {
    error.code = code;
  }
  return error;
};

export const notFoundHandler = (req: Request, _res: Response, next: NextFunction) => {
  next(createError(`Route ${req.originalUrl} not found`, 404, 'NOT_FOUND'));
};
