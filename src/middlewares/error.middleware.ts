import { Request, Response, NextFunction } from 'express';
import { logger, errorMeta } from '../utils/logging';
import { ResponseHandler } from '../utils/response';
import { isAppError } from '../utils/errors';

const hasName = (err: unknown, name: string): boolean => err instanceof Error && err.name === name;

// body-parser marks malformed JSON with type 'entity.parse.failed'
const isBodyParseError = (err: unknown): boolean =>
  err instanceof Error && 'type' in err && err.type === 'entity.parse.failed';

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  if (!isAppError(err)) {
    logger.error('[Error Handler]', {
      ...errorMeta(err),
      url: req.originalUrl,
      method: req.method,
      ip: req.ip,
      userAgent: req.get('user-agent'),
      params: req.params,
      query: req.query,
    });
  }

  if (isBodyParseError(err)) {
    return ResponseHandler.validationError(res, undefined, 'Malformed JSON body');
  }

  // JWT errors
  if (hasName(err, 'JsonWebTokenError')) {
    return ResponseHandler.unauthorized(res, 'Invalid token');
  }

  if (hasName(err, 'TokenExpiredError')) {
    return ResponseHandler.unauthorized(res, 'Token expired');
  }

  return ResponseHandler.fromError(res, err);
};

export const notFoundHandler = (
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  ResponseHandler.notFound(res, 'Route not found');
};
