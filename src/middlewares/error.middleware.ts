import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { appConfig } from '../connections/config/app.config';
import { AppError, UnauthorizedError } from '../utils/errors';
import { logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

// body-parser attaches an HTTP status to the errors it raises
const getHttpStatus = (err: unknown): number | undefined => {
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return undefined;
};

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
) => {
  const error = err instanceof Error ? err : new Error(String(err));

  logger.error('[Error Handler]', {
    message: error.message,
    stack: error.stack,
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
    params: req.params,
    query: req.query,
  });

  // Response already streaming (e.g. a failed sendFile): let Express close it
  if (res.headersSent) {
    return next(err);
  }

  if (err instanceof ZodError) {
    return ResponseHandler.validationError(res, err.issues);
  }

  if (err instanceof UnauthorizedError) {
    return ResponseHandler.unauthorized(res, err.message);
  }

  if (err instanceof AppError) {
    return ResponseHandler.error(res, err.message, err.statusCode, {
      code: err.code,
      details: err.details,
    });
  }

  if (err instanceof multer.MulterError) {
    return ResponseHandler.badRequest(res, err.message, { field: err.field });
  }

  const statusCode = getHttpStatus(err);
  if (statusCode !== undefined && statusCode < 500) {
    return ResponseHandler.error(res, error.message, statusCode, { code: 'BAD_REQUEST' });
  }

  return ResponseHandler.internalError(
    res,
    'Internal server error',
    appConfig.nodeEnv === 'development' ? error.stack : undefined
  );
};

export const notFoundHandler = (req: Request, res: Response) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  ResponseHandler.notFound(res, 'Route not found');
};
