import { Response } from 'express';
import { logger } from './logging';

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
  };
  pagination?: {
    page: number;
    limit: number;
    total: number;
    totalPages: number;
  };
  meta?: Record<string, unknown>;
}

export class ResponseHandler {
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
    message: string = 'Created successfully',
    meta?: Record<string, unknown>
  ): Response {
    return this.success(res, data, message, 201, meta);
  }

  static error(
    res: Response,
    message: string = 'Something went wrong',
    statusCode: number = 400,
    error?: {
      code?: string;
      details?: unknown;
    },
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse = {
      success: false,
      message,
      error,
      ...(meta && { meta }),
    };

    // 4xx are expected outcomes, only server faults are errors
    const log = statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log(`[API Error] ${message}`, {
      statusCode,
      code: error?.code,
    });

    return res.status(statusCode).json(response);
  }

  static validationError(
    res: Response,
    errors: unknown[],
    message: string = 'Invalid data'
  ): Response {
    return this.error(
      res,
      message,
      400,
      {
        code: 'VALIDATION_ERROR',
        details: errors,
      }
    );
  }

  static unauthorized(
    res: Response,
    message: string = 'Could not validate credentials'
  ): Response {
    res.setHeader('WWW-Authenticate', 'Bearer');
    return this.error(res, message, 401, {
      code: 'UNAUTHORIZED',
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
   * Conflict Response (409)
   */
  static conflict(
    res: Response,
    message: string = 'Resource already exists',
    details?: unknown
  ): Response {
    return this.error(res, message, 409, {
      code: 'CONFLICT',
      details,
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
    if (retryAfter) {
      res.setHeader('Retry-After', retryAfter.toString());
    }
    return this.error(
      res,
      message,
      429,
      {
        code: 'TOO_MANY_REQUESTS',
        details: retryAfter ? { retryAfter } : undefined,
      }
    );
  }

  static internalError(
    res: Response,
    message: string = 'Internal server error',
    details?: unknown
  ): Response {
    return this.error(res, message, 500, {
      code: 'INTERNAL_ERROR',
      details,
    });
  }

  /**
   * Paginated Response
   */
  static paginated<T>(
    res: Response,
    data: T[],
    pagination: {
      page: number;
      limit: number;
      total: number;
    },
    message: string = 'Success'
  ): Response {
    const response: ApiResponse<T[]> = {
      success: true,
      message,
      data,
      pagination: {
        ...pagination,
        totalPages: pagination.limit > 0 ? Math.ceil(pagination.total / pagination.limit) : 0,
      },
    };

    return res.status(200).json(response);
  }
}
