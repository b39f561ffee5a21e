/**
 * Error Handler Middleware
 *
 * Express middleware for catching and formatting API errors.
 * Converts all errors to the standardized ApiErrorResponse format.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ZodError } from 'zod';
import {
  ApiError,
  ConfigurationDefect,
  InternalError,
  NodeFault,
  NotFoundError,
  StorageFault,
  ValidationError,
  ErrorCodes,
} from './ApiError';
import { createLogger } from '../utils/logger';
import { requestContext } from '../utils/requestContext';

const log = createLogger('ErrorHandler');

/**
 * Format Zod issues as "path: message; path: message"
 */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
      return `${path}${issue.message}`;
    })
    .join('; ');
}

function isJsonSyntaxError(error: Error): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

/**
 * Main error handler middleware
 *
 * Should be registered last in the middleware chain.
 */
export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  _next: NextFunction
): void {
  const requestId = requestContext.getRequestId();

  if (error instanceof ZodError) {
    const apiError = new ValidationError(formatZodError(error), ErrorCodes.VALIDATION_ERROR, {
      issues: error.issues.map((issue) => ({
        field: issue.path.join('.'),
        message: issue.message,
        code: issue.code,
      })),
    });
    res.status(apiError.statusCode).json(apiError.toResponse(requestId));
    return;
  }

  if (isJsonSyntaxError(error)) {
    const apiError = new ValidationError('Malformed JSON body', ErrorCodes.INVALID_INPUT);
    res.status(apiError.statusCode).json(apiError.toResponse(requestId));
    return;
  }

  if (error instanceof StorageFault) {
    log.error('A database error occurred', {
      description: error.description,
      path: req.path,
    });
    res.status(error.statusCode).json(error.toResponse(requestId));
    return;
  }

  if (error instanceof NodeFault) {
    log.error('A peer node error occurred', {
      description: error.description,
      path: req.path,
    });
    res.status(error.statusCode).json(error.toResponse(requestId));
    return;
  }

  if (error instanceof ConfigurationDefect) {
    log.error(`Configuration defect: ${error.message}`, {
      path: req.path,
      stack: error.stack,
    });
    res.status(500).json(new InternalError().toResponse(requestId));
    return;
  }

  if (error instanceof ApiError) {
    // Operational errors at warn level, programming errors at error level
    if (error.isOperational) {
      log.warn(`API Error: ${error.code}`, {
        message: error.message,
        statusCode: error.statusCode,
        details: error.details,
      });
    } else {
      log.error(`Unexpected API Error: ${error.code}`, {
        message: error.message,
        stack: error.stack,
        details: error.details,
      });
    }

    res.status(error.statusCode).json(error.toResponse(requestId));
    return;
  }

  log.error('Unhandled error', {
    name: error.name,
    message: error.message,
    stack: error.stack,
  });

  res.status(500).json(new InternalError().toResponse(requestId));
}

/**
 * Async handler wrapper
 *
 * Forwards rejections of async route handlers to the error middleware.
 *
 * ```typescript
 * router.get('/accounts/:name', asyncHandler(async (req, res) => {
 *   res.json(await accounts.getAccount(session, req.params.name));
 * }));
 * ```
 */
export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
}

/**
 * Not found handler for undefined routes
 *
 * Should be registered after all routes.
 */
export function notFoundHandler(req: Request, res: Response): void {
  const requestId = requestContext.getRequestId();
  const error = new NotFoundError(`Route not found: ${req.method} ${req.path}`);
  res.status(404).json(error.toResponse(requestId));
}
