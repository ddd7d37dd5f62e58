import { Request, Response, NextFunction } from 'express';
import { CompletionError, ValidationError } from '../models/errors';
import type { CompletionErrorKind } from '../models/errors';

export class ApiError extends Error {
  statusCode: number;
  kind: string;
  retriable: boolean;
  details?: Record<string, unknown>;

  constructor(
    statusCode: number,
    message: string,
    options: { kind?: string; retriable?: boolean; details?: Record<string, unknown> } = {}
  ) {
    super(message);
    this.name = 'ApiError';
    this.statusCode = statusCode;
    this.kind = options.kind ?? 'ApiError';
    this.retriable = options.retriable ?? false;
    this.details = options.details;
  }
}

const COMPLETION_STATUS: Record<CompletionErrorKind, number> = {
  EmptyCredential: 401,
  AuthenticationFailed: 401,
  RateLimited: 429,
  ProviderError: 502,
};

/** Errors raised by express middleware (body parser) carry a 4xx `status` or `statusCode`. */
function isClientHttpError(error: unknown): boolean {
  if (typeof error !== 'object' || error === null) return false;
  const status = 'status' in error ? error.status : 'statusCode' in error ? error.statusCode : undefined;
  return typeof status === 'number' && status >= 400 && status < 500;
}

export function toApiError(error: unknown): ApiError {
  if (error instanceof ApiError) {
    return error;
  }
  if (error instanceof ValidationError) {
    return new ApiError(400, error.message, { kind: error.kind });
  }
  if (error instanceof CompletionError) {
    return new ApiError(COMPLETION_STATUS[error.kind], error.message, {
      kind: error.kind,
      retriable: error.retriable,
      details: error.details,
    });
  }
  if (isClientHttpError(error)) {
    return new ApiError(400, 'Malformed request body', { kind: 'ValidationError' });
  }
  return new ApiError(500, 'Internal server error');
}

// Express recognises error middleware by its four parameters.
export const errorHandler = (
  error: unknown,
  _req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const apiError = toApiError(error);

  if (apiError.statusCode >= 500) {
    console.error('[errorHandler]', error);
  }

  res.status(apiError.statusCode).json({
    success: false,
    error: {
      kind: apiError.kind,
      message: apiError.message,
      retriable: apiError.retriable,
      ...(apiError.details ? { details: apiError.details } : {}),
    },
  });
};
