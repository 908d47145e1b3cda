import { Response } from 'express';
import { logger } from './logging';

/**
 * Error envelope shared by every failing endpoint
 */
export interface ApiErrorResponse {
  success: false;
  message: string;
  error?: {
    code?: string;
    details?: unknown;
  };
}

/**
 * Response Handler - the single place responses are written from
 */
export class ResponseHandler {
  /**
   * Success Response. Resource bodies are sent as-is, without an envelope.
   */
  static success<T>(res: Response, data: T, statusCode: number = 200): Response {
    return res.status(statusCode).json(data);
  }

  /**
   * Created Response (201)
   */
  static created<T>(res: Response, data: T): Response {
    return this.success(res, data, 201);
  }

  /**
   * No Content Response (204)
   */
  static noContent(res: Response): Response {
    return res.status(204).send();
  }

  /**
   * Error Response
   */
  static error(
    res: Response,
    message: string = 'Something went wrong',
    statusCode: number = 400,
    error?: {
      code?: string;
      details?: unknown;
    }
  ): Response {
    const response: ApiErrorResponse = {
      success: false,
      message,
      error,
    };

    logger.warn(`[API Error] ${message}`, {
      statusCode,
      code: error?.code,
    });

    return res.status(statusCode).json(response);
  }

  static badRequest(res: Response, message: string = 'Bad request', details?: unknown): Response {
    return this.error(res, message, 400, {
      code: 'BAD_REQUEST',
      details,
    });
  }

  static validationError(
    res: Response,
    errors: unknown,
    message: string = 'Invalid request data'
  ): Response {
    return this.error(res, message, 400, {
      code: 'VALIDATION_ERROR',
      details: errors,
    });
  }

  static unauthorized(res: Response, message: string = 'Not authenticated'): Response {
    res.setHeader('WWW-Authenticate', 'Bearer');
    return this.error(res, message, 401, {
      code: 'UNAUTHORIZED',
    });
  }

  static notFound(res: Response, message: string = 'Not found'): Response {
    return this.error(res, message, 404, {
      code: 'NOT_FOUND',
    });
  }

  /**
   * Internal Server Error Response
   */
  static internalError(res: Response, message: string = 'Internal server error', details?: unknown): Response {
    return this.error(res, message, 500, {
      code: 'INTERNAL_ERROR',
      details,
    });
  }
}
