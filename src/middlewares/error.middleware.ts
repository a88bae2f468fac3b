import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { ZodError } from 'zod';
import { appConfig } from '../connections/config/app.config';
import { AppError } from '../utils/errors';
import { errorMeta, logger } from '../utils/logging';
import { ResponseHandler } from '../utils/response';

// PostgreSQL error codes surfaced to clients
const PG_UNIQUE_VIOLATION = '23505';
const PG_FOREIGN_KEY_VIOLATION = '23503';
const PG_STRING_TOO_LONG = '22001';
const PG_NUMERIC_OUT_OF_RANGE = '22003';

const pgErrorCode = (err: unknown): string | undefined => {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
};

/**
 * Client errors raised by express itself or body-parser carry a 4xx `status`
 */
const clientErrorStatus = (err: unknown): number | undefined => {
  if (typeof err !== 'object' || err === null) {
    return undefined;
  }
  const status = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  if (typeof status === 'number' && status >= 400 && status < 500) {
    return status;
  }
  return undefined;
};

const BODY_ERROR_MESSAGES: Record<string, string> = {
  'entity.parse.failed': 'Malformed request body',
  'entity.too.large': 'Request body too large',
  'encoding.unsupported': 'Unsupported request encoding',
};

const bodyErrorMessage = (err: object, fallback: string): string => {
  const type = 'type' in err && typeof err.type === 'string' ? err.type : undefined;
  return (type && BODY_ERROR_MESSAGES[type]) || fallback;
};

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  if (err instanceof AppError) {
    if (err.statusCode === 401) {
      return ResponseHandler.unauthorized(res, err.message);
    }
    return ResponseHandler.error(res, err.message, err.statusCode, {
      code: err.code,
      details: err.details,
    });
  }

  // Zod validation errors
  if (err instanceof ZodError) {
    return ResponseHandler.validationError(res, err.errors);
  }

  // JWT errors, TokenExpiredError extends JsonWebTokenError
  if (err instanceof jwt.TokenExpiredError) {
    return ResponseHandler.unauthorized(res, 'Token has expired');
  }

  if (err instanceof jwt.JsonWebTokenError) {
    return ResponseHandler.unauthorized(res, 'Invalid token');
  }

  // Malformed or oversized bodies
  const clientStatus = clientErrorStatus(err);
  if (clientStatus !== undefined && typeof err === 'object' && err !== null) {
    return ResponseHandler.error(res, bodyErrorMessage(err, 'Invalid request'), clientStatus, {
      code: clientStatus === 400 ? 'VALIDATION_ERROR' : 'BAD_REQUEST',
    });
  }

  // Database errors
  const code = pgErrorCode(err);

  if (code === PG_UNIQUE_VIOLATION) {
    return ResponseHandler.conflict(res, 'Resource already exists');
  }

  if (code === PG_STRING_TOO_LONG || code === PG_NUMERIC_OUT_OF_RANGE) {
    return ResponseHandler.error(res, 'Value out of range', 400, { code: 'VALIDATION_ERROR' });
  }

  if (code === PG_FOREIGN_KEY_VIOLATION) {
    return ResponseHandler.error(res, 'Referenced resource does not exist', 400, {
      code: 'FOREIGN_KEY_VIOLATION',
    });
  }

  logger.error('[Error Handler]', {
    ...errorMeta(err),
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
    userAgent: req.get('user-agent'),
    params: req.params,
    query: req.query,
  });

  return ResponseHandler.internalError(
    res,
    'Internal server error',
    appConfig.nodeEnv === 'development' && err instanceof Error ? err.stack : undefined
  );
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
