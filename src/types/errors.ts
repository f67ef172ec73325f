import { ErrorCode } from './index';

export { ErrorCode };

// Custom error classes
export class AppError extends Error {
  public readonly code: ErrorCode;
  public readonly statusCode: number;
  public readonly details?: Record<string, unknown>;
  public readonly timestamp: Date;
  public readonly requestId?: string;

  constructor(
    code: ErrorCode,
    message: string,
    statusCode: number,
    details?: Record<string, unknown>,
    requestId?: string
  ) {
    super(message);
    this.name = 'AppError';
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.timestamp = new Date();
    this.requestId = requestId;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    Error.captureStackTrace(this, new.target);
  }
}

export interface ValidationDetail {
  field: string;
  value: unknown;
  constraint: string;
}

export class ValidationAppError extends AppError {
  public readonly validationDetails: ValidationDetail[];

  constructor(
    message: string,
    validationDetails: ValidationDetail[],
    requestId?: string
  ) {
    super(ErrorCode.INVALID_REQUEST, message, 400, { validationErrors: validationDetails }, requestId);
    this.name = 'ValidationAppError';
    this.validationDetails = validationDetails;
  }
}

// Specialized error classes for different error categories
export class ProcessingError extends AppError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.PROCESSING_ERROR,
    details?: Record<string, unknown>,
    requestId?: string
  ) {
    super(code, message, getHttpStatusFromErrorCode(code), details, requestId);
    this.name = 'ProcessingError';
  }
}

export class FileValidationError extends AppError {
  constructor(
    message: string,
    code: ErrorCode = ErrorCode.INVALID_FORMAT,
    details?: Record<string, unknown>,
    requestId?: string
  ) {
    super(code, message, getHttpStatusFromErrorCode(code), details, requestId);
    this.name = 'FileValidationError';
  }
}

// Error factory functions
export const createInvalidFormatError = (mimeType: string, requestId?: string): AppError => {
  return new FileValidationError(
    `Unsupported document format: ${mimeType}. Only PDF documents are accepted`,
    ErrorCode.INVALID_FORMAT,
    { receivedMimeType: mimeType, supportedFormats: ['application/pdf'] },
    requestId
  );
};

export const createMissingDocumentError = (field: string, requestId?: string): ValidationAppError => {
  return new ValidationAppError(
    `Missing document: ${field}`,
    [{ field, value: undefined, constraint: 'required' }],
    requestId
  );
};

export const createProcessingError = (originalError: Error, requestId?: string): AppError => {
  return new ProcessingError(
    'Internal error while processing documents',
    ErrorCode.PROCESSING_ERROR,
    { originalError: originalError.message },
    requestId
  );
};

// Error type guards
export const isAppError = (error: unknown): error is AppError => {
  return error instanceof AppError;
};

export const isValidationError = (error: unknown): error is ValidationAppError => {
  return error instanceof ValidationAppError;
};

// HTTP status code mapping
export function getHttpStatusFromErrorCode(code: ErrorCode): number {
  const statusMap: Record<ErrorCode, number> = {
    [ErrorCode.INVALID_FORMAT]: 400,
    [ErrorCode.FILE_TOO_LARGE]: 413,
    [ErrorCode.INVALID_REQUEST]: 400,
    [ErrorCode.NOT_FOUND]: 404,
    [ErrorCode.RATE_LIMIT_EXCEEDED]: 429,
    [ErrorCode.PROCESSING_ERROR]: 500
  };

  return statusMap[code] || 500;
}

export const getErrorSuggestion = (code: ErrorCode): string => {
  const suggestions: Record<ErrorCode, string> = {
    [ErrorCode.INVALID_FORMAT]: 'Upload the offer and invoices as PDF documents',
    [ErrorCode.FILE_TOO_LARGE]: 'Split the document or reduce its size',
    [ErrorCode.INVALID_REQUEST]: 'Check the request body against the API documentation',
    [ErrorCode.NOT_FOUND]: 'Check the URL and HTTP method',
    [ErrorCode.RATE_LIMIT_EXCEEDED]: 'Wait before sending a new request',
    [ErrorCode.PROCESSING_ERROR]: 'Retry in a few minutes'
  };

  return suggestions[code] || 'See the API documentation';
};
