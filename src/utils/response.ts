import { Response } from 'express';
import { ZodError } from 'zod';
import { appConfig } from '../connections/config/app.config';
import { isAppError } from './errors';
import { logger, errorMeta } from './logging';

/**
 * Response envelope shared by every endpoint
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  error?: {
    code?: string;
    details?: unknown;
    retryable?: boolean;
  };
  meta?: Record<string, unknown>;
}

/**
 * Response Handler - builds the envelope and picks the status code
 */
export class ResponseHandler {
  /**
   * Success Response
   */
  static success<T>(
    res: Response,
    data?: T,
    message: string = 'Success',
    statusCode: number = 200,
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse<T> = {
      success: true,
      message,
      data,
      ...(meta && { meta }),
    };

    return res.status(statusCode).json(response);
  }

  /**
   * Created Response (201)
   */
  static created<T>(
    res: Response,
    data?: T,
    message: string = 'Created',
    meta?: Record<string, unknown>
  ): Response {
    return this.success(res, data, message, 201, meta);
  }

  /**
   * Error Response
   */
  static error(
    res: Response,
    message: string = 'Something went wrong',
    statusCode: number = 400,
    error?: ApiResponse['error'],
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse = {
      success: false,
      message,
      error,
      ...(meta && { meta }),
    };

    logger.warn(`[API Error] ${message}`, {
      statusCode,
      code: error?.code,
    });

    return res.status(statusCode).json(response);
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

  static unauthorized(
    res: Response,
    message: string = 'Unauthorized'
  ): Response {
    return this.error(res, message, 401, {
      code: 'UNAUTHORIZED',
    });
  }

  static forbidden(
    res: Response,
    message: string = 'Forbidden'
  ): Response {
    return this.error(res, message, 403, {
      code: 'FORBIDDEN',
    });
  }

  static notFound(
    res: Response,
    message: string = 'Not found'
  ): Response {
    return this.error(res, message, 404, {
      code: 'NOT_FOUND',
    });
  }

  /**
   * Too Many Requests Response (429)
   */
  static tooManyRequests(
    res: Response,
    message: string = 'Too many requests',
    retryAfter?: number
  ): Response {
    return this.error(res, message, 429, {
      code: 'TOO_MANY_REQUESTS',
      details: retryAfter ? { retryAfter } : undefined,
    });
  }

  /**
   * Internal Server Error Response
   */
  static internalError(
    res: Response,
    message: string = 'Internal server error',
    error?: unknown
  ): Response {
    logger.error('[Internal Server Error]', {
      message,
      ...errorMeta(error),
    });

    return this.error(res, message, 500, {
      code: 'INTERNAL_ERROR',
      details: appConfig.nodeEnv === 'development' && error instanceof Error ? error.stack : undefined,
    });
  }

  /**
   * Map a thrown value onto the envelope: AppErrors keep their code and status,
   * zod errors become validation errors, anything else is a 500
   */
  static fromError(res: Response, error: unknown, fallbackMessage: string = 'Internal server error'): Response {
    if (isAppError(error)) {
      if (error.kind === 'system') {
        logger.error(`[System Error] ${error.message}`, { code: error.code, ...errorMeta(error.cause) });
        return this.error(res, 'Service temporarily unavailable', error.status, {
          code: error.code,
          retryable: error.retryable,
        });
      }

      return this.error(res, error.message, error.status, {
        code: error.code,
        details: error.details,
        ...(error.retryable && { retryable: true }),
      });
    }

    if (error instanceof ZodError) {
      return this.validationError(res, error.errors);
    }

    return this.internalError(res, fallbackMessage, error);
  }
}
