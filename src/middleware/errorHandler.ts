import { Request, Response, NextFunction } from 'express';
import '../types/express';
import multer from 'multer';
import { logger } from '../utils/logger';
import {
  isAppError,
  isValidationError,
  ErrorCode,
  getErrorSuggestion
} from '../types/errors';
import { config } from '../config/config';

// multer reports its own limits through MulterError codes
const MULTER_ERRORS: Record<string, { statusCode: number; code: ErrorCode }> = {
  LIMIT_FILE_SIZE: { statusCode: 413, code: ErrorCode.FILE_TOO_LARGE },
  LIMIT_FILE_COUNT: { statusCode: 400, code: ErrorCode.INVALID_REQUEST },
  LIMIT_UNEXPECTED_FILE: { statusCode: 400, code: ErrorCode.INVALID_REQUEST }
};

export const resolveRequestId = (req: Request): string => {
  const header = req.headers['x-request-id'] ?? req.headers['x-correlation-id'];
  if (typeof header === 'string' && header) {
    return header;
  }
  return req.requestId ?? `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
};

export const errorHandler = (
  error: Error,
  req: Request,
  res: Response,
  // Express recognises error middleware by its four parameters
  _next: NextFunction
): void => {
  const requestId = resolveRequestId(req);

  let statusCode: number;
  let errorCode: string;
  let message: string;
  let details: Record<string, unknown> | undefined;

  // ValidationAppError first: it is also an AppError
  if (isValidationError(error)) {
    statusCode = 400;
    errorCode = ErrorCode.INVALID_REQUEST;
    message = error.message;
    details = {
      validationErrors: error.validationDetails,
      totalErrors: error.validationDetails.length
    };

    logger.warn('Validation Error', {
      requestId: error.requestId || requestId,
      validationErrors: error.validationDetails,
      request: { method: req.method, url: req.url }
    });
  }
  // Handle AppError instances (our custom errors)
  else if (isAppError(error)) {
    statusCode = error.statusCode;
    errorCode = error.code;
    message = error.message;
    details = error.details;

    logger.error('Application Error', {
      requestId: error.requestId || requestId,
      errorCode: error.code,
      message: error.message,
      statusCode: error.statusCode,
      details: error.details,
      stack: error.stack,
      request: { method: req.method, url: req.url, ip: req.ip }
    });
  }
  else if (error instanceof multer.MulterError) {
    const mapped = MULTER_ERRORS[error.code] ?? { statusCode: 400, code: ErrorCode.INVALID_REQUEST };
    statusCode = mapped.statusCode;
    errorCode = mapped.code;
    message = `Upload rejected: ${error.message}`;
    details = { field: error.field, reason: error.code };

    logger.warn('Upload Error', { requestId, reason: error.code, field: error.field });
  }
  // body-parser reports malformed JSON as a SyntaxError carrying status 400
  else if (error instanceof SyntaxError && 'status' in error && error.status === 400) {
    statusCode = 400;
    errorCode = ErrorCode.INVALID_REQUEST;
    message = 'Malformed JSON body';
    details = undefined;

    logger.warn('Malformed JSON body', { requestId, request: { method: req.method, url: req.url } });
  }
  // Handle standard JavaScript errors
  else {
    statusCode = 500;
    errorCode = 'INTERNAL_ERROR';
    message = 'Internal server error';
    details = undefined;

    // Log full error details for debugging
    logger.error('Unhandled Error', {
      requestId,
      message: error.message,
      name: error.name,
      stack: error.stack,
      request: { method: req.method, url: req.url, ip: req.ip }
    });
  }

  // Don't expose internal error details in production
  if (config.nodeEnv === 'production' && statusCode === 500) {
    details = undefined;
  }

  const errorResponse = {
    success: false,
    requestId,
    error: {
      code: errorCode,
      message,
      ...(details && { details }),
      ...(isAppError(error) && { suggestion: getErrorSuggestion(error.code) })
    },
    timestamp: new Date().toISOString()
  };

  if (statusCode === 429 && typeof details?.retryAfter === 'number') {
    res.set('Retry-After', details.retryAfter.toString());
  }

  res.status(statusCode).json(errorResponse);
};

export const notFoundHandler = (req: Request, res: Response): void => {
  const requestId = resolveRequestId(req);

  logger.warn('Endpoint Not Found', {
    requestId,
    method: req.method,
    url: req.url,
    ip: req.ip
  });

  res.status(404).json({
    success: false,
    requestId,
    error: {
      code: ErrorCode.NOT_FOUND,
      message: 'Endpoint not found',
      details: {
        method: req.method,
        path: req.path,
        suggestion: getErrorSuggestion(ErrorCode.NOT_FOUND)
      }
    },
    timestamp: new Date().toISOString()
  });
};

// Async error handler wrapper
export const asyncErrorHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    fn(req, res, next).catch(next);
  };
};
