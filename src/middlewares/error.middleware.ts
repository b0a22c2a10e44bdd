import { Request, Response, NextFunction } from 'express';
import multer from 'multer';
import { ZodError } from 'zod';
import { logger, errorMessage } from '../utils/logging';
import { ResponseHandler } from '../utils/response';
import { InvalidTokenError } from '../utils/token';
import { isUniqueViolation } from '../connections/db/connection';

/**
 * Raised by upload filters for a rejected file type
 */
export class UploadValidationError extends Error {
  constructor(message: string, public readonly field: string) {
    super(message);
    this.name = 'UploadValidationError';
  }
}

const uploadErrorMessage = (err: multer.MulterError): string => {
  switch (err.code) {
    case 'LIMIT_FILE_SIZE':
      return 'File size must not exceed 5MB';
    case 'LIMIT_FILE_COUNT':
    case 'LIMIT_UNEXPECTED_FILE':
      return err.field ? `Too many files or unexpected field: ${err.field}` : 'Too many files';
    default:
      return err.message;
  }
};

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  _next: NextFunction
) => {
  if (err instanceof ZodError) {
    return ResponseHandler.validationError(res, err.issues);
  }

  if (err instanceof multer.MulterError) {
    return ResponseHandler.badRequest(res, uploadErrorMessage(err), err.field ? { [err.field]: [uploadErrorMessage(err)] } : undefined, 'UPLOAD_ERROR');
  }

  if (err instanceof UploadValidationError) {
    return ResponseHandler.badRequest(res, err.message, { [err.field]: [err.message] }, 'UPLOAD_ERROR');
  }

  if (err instanceof InvalidTokenError) {
    return ResponseHandler.unauthorized(res, err.message);
  }

  // body-parser rejects malformed JSON with a 400 status
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    return ResponseHandler.badRequest(res, 'Malformed JSON body');
  }

  if (isUniqueViolation(err)) {
    return ResponseHandler.badRequest(res, 'Record already exists', undefined, 'UNIQUE_VIOLATION');
  }

  logger.error('[Error Handler]', {
    message: errorMessage(err),
    stack: err instanceof Error ? err.stack : undefined,
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  return ResponseHandler.internalError(res, 'Internal server error', err);
};

export const notFoundHandler = (req: Request, res: Response, _next: NextFunction) => {
  logger.warn('[Not Found]', {
    url: req.originalUrl,
    method: req.method,
    ip: req.ip,
  });

  ResponseHandler.notFound(res, 'Route not found');
};
