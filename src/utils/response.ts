import { Response } from 'express';
import { ZodIssue } from 'zod';
import { logger, errorMessage } from './logging';

/**
 * Response envelope shared by every endpoint
 */
export interface ApiResponse<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  error?: ApiErrorBody;
  pagination?: PaginationMeta;
  meta?: Record<string, unknown>;
}

export interface ApiErrorBody {
  code?: string;
  details?: unknown;
}

export interface PaginationMeta {
  page: number;
  limit: number;
  total: number;
  totalPages: number;
}

/**
 * Groups zod issues by field path: { "birth_date": ["Birth date must be before today"] }
 */
export const formatValidationIssues = (issues: ZodIssue[]): Record<string, string[]> => {
  const fields: Record<string, string[]> = {};
  for (const issue of issues) {
    const key = issue.path.length > 0 ? issue.path.join('.') : 'non_field_errors';
    fields[key] = [...(fields[key] || []), issue.message];
  }
  return fields;
};

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

  static created<T>(
    res: Response,
    data?: T,
    message: string = 'Created',
    meta?: Record<string, unknown>
  ): Response {
    return this.success(res, data, message, 201, meta);
  }

  static error(
    res: Response,
    message: string = 'Something went wrong',
    statusCode: number = 400,
    error?: ApiErrorBody,
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse = {
      success: false,
      message,
      error,
      ...(meta && { meta }),
    };

    const log = statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log(`[API Error] ${message}`, { statusCode, error, meta });

    return res.status(statusCode).json(response);
  }

  static badRequest(
    res: Response,
    message: string = 'Bad request',
    details?: unknown,
    code: string = 'BAD_REQUEST'
  ): Response {
    return this.error(res, message, 400, { code, details });
  }

  /**
   * Per-field validation errors (400)
   */
  static validationError(
    res: Response,
    issues: ZodIssue[],
    message: string = 'Invalid data'
  ): Response {
    return this.error(res, message, 400, {
      code: 'VALIDATION_ERROR',
      details: formatValidationIssues(issues),
    });
  }

  /**
   * The cached state a multi-request flow depends on is gone; the client starts over
   */
  static sessionExpired(
    res: Response,
    message: string = 'Session expired. Please start the process again.'
  ): Response {
    return this.error(res, message, 400, { code: 'SESSION_EXPIRED' });
  }

  static unauthorized(res: Response, message: string = 'Authentication required'): Response {
    return this.error(res, message, 401, { code: 'UNAUTHORIZED' });
  }

  static forbidden(res: Response, message: string = 'Permission denied'): Response {
    return this.error(res, message, 403, { code: 'FORBIDDEN' });
  }

  static notFound(res: Response, message: string = 'Not found'): Response {
    return this.error(res, message, 404, { code: 'NOT_FOUND' });
  }

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
   * 500 carrying the underlying error message in `details`
   */
  static internalError(res: Response, message: string = 'Internal server error', error?: unknown): Response {
    logger.error('[Internal Server Error]', {
      message,
      error: error instanceof Error ? error.stack : error,
    });

    return this.error(res, message, 500, {
      code: 'INTERNAL_ERROR',
      details: error === undefined ? undefined : errorMessage(error),
    });
  }

  static paginated<T>(
    res: Response,
    data: T[],
    pagination: { page: number; limit: number; total: number },
    message: string = 'Success',
    meta?: Record<string, unknown>
  ): Response {
    const response: ApiResponse<T[]> = {
      success: true,
      message,
      data,
      pagination: {
        ...pagination,
        totalPages: Math.ceil(pagination.total / pagination.limit),
      },
      ...(meta && { meta }),
    };

    return res.status(200).json(response);
  }
}
