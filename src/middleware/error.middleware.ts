import { Request, Response, NextFunction, RequestHandler } from 'express';
import { logger } from '../utils/logger';

/**
 * Custom error class with status code
 */
export class AppError extends Error {
  statusCode: number;

  constructor(message: string, statusCode: number = 500) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;

    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Common error types
 */
export class ValidationError extends AppError {
  constructor(message: string = 'Bad Request') {
    super(message, 400);
  }
}

/**
 * Password does not satisfy the password policy
 */
export class PolicyError extends AppError {
  constructor(message: string = 'Password does not satisfy the password policy') {
    super(message, 422);
  }
}

/**
 * Base class for credential and token failures
 */
export class AuthError extends AppError {
  constructor(message: string = 'Authentication failed') {
    super(message, 401);
  }
}

export class InvalidCredentialsError extends AuthError {
  constructor(message: string = 'Invalid username or password') {
    super(message);
  }
}

export class ExpiredError extends AuthError {
  constructor(message: string = 'Token expired') {
    super(message);
  }
}

export class InvalidSignatureError extends AuthError {
  constructor(message: string = 'Token signature is invalid') {
    super(message);
  }
}

export class MalformedError extends AuthError {
  constructor(message: string = 'Token is malformed') {
    super(message);
  }
}

/**
 * No usable identity on the request. Rendered as a redirect to the login
 * page, or a 401 for API clients.
 */
export class UnauthenticatedError extends AppError {
  constructor(message: string = 'Authentication required') {
    super(message, 401);
  }
}

export class ForbiddenError extends AppError {
  constructor(message: string = 'Forbidden') {
    super(message, 403);
  }
}

export class NotFoundError extends AppError {
  constructor(message: string = 'Not Found') {
    super(message, 404);
  }
}

export class ConflictError extends AppError {
  constructor(message: string = 'Conflict') {
    super(message, 409);
  }
}

export class InternalServerError extends AppError {
  constructor(message: string = 'Internal Server Error') {
    super(message, 500);
  }
}

export interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  stack?: string;
}

/**
 * Error response formatter
 */
function formatErrorResponse(error: AppError, includeStack: boolean = false): ErrorResponse {
  const response: ErrorResponse = {
    error: error.name,
    message: error.message,
    statusCode: error.statusCode,
  };

  if (includeStack && error.stack) {
    response.stack = error.stack;
  }

  return response;
}

function toAppError(err: Error): AppError {
  if (err instanceof AppError) {
    return err;
  }

  // body-parser rejects unparseable JSON before any route runs
  if ('type' in err && err.type === 'entity.parse.failed') {
    return new ValidationError('Malformed request body');
  }

  return new InternalServerError('Internal Server Error');
}

export interface ErrorHandlerOptions {
  loginPath: string;
  includeStack: boolean;
}

/**
 * Global error handling middleware
 * Must be registered after all routes
 */
export function createErrorHandler(options: ErrorHandlerOptions) {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const appError = toAppError(err);

    if (appError.statusCode >= 500) {
      logger.error('Error handling request:', {
        method: req.method,
        url: req.originalUrl,
        statusCode: appError.statusCode,
        message: err.message,
        stack: err.stack,
      });
    } else {
      logger.debug('Request rejected', {
        method: req.method,
        url: req.originalUrl,
        error: appError.name,
        statusCode: appError.statusCode,
      });
    }

    // Browsers go back to the login form; API clients get a 401.
    // The auth guard has already cleared the session cookie.
    if (appError instanceof UnauthenticatedError && req.accepts(['json', 'html']) === 'html') {
      res.redirect(303, options.loginPath);
      return;
    }

    res.status(appError.statusCode).json(formatErrorResponse(appError, options.includeStack));
  };
}

/**
 * Async error wrapper
 * Wraps async route handlers to catch errors
 *
 * Usage:
 *   router.get('/path', asyncHandler(async (req, res) => {
 *     // async code
 *   }));
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}

/**
 * 404 Not Found handler
 * Catches all unmatched routes
 */
export function notFoundHandler(req: Request, _res: Response, next: NextFunction): void {
  next(new NotFoundError(`Route not found: ${req.method} ${req.originalUrl}`));
}

/**
 * Database error handler
 * Converts database errors to appropriate HTTP errors
 */
export function handleDatabaseError(error: unknown, conflictMessage = 'Resource already exists'): never {
  const code = typeof error === 'object' && error !== null && 'code' in error ? error.code : undefined;

  if (code === '23505') {
    // Unique violation
    throw new ConflictError(conflictMessage);
  } else if (code === '23502') {
    // Not null violation
    throw new ValidationError('Required field is missing');
  }

  logger.error('Database error:', {
    error: error instanceof Error ? error.message : String(error),
  });
  throw new InternalServerError('Database operation failed');
}
