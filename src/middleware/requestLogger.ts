/**
 * Request Logger Middleware
 *
 * Provides request correlation IDs and request lifecycle logging.
 * - Assigns a request ID (or reuses X-Request-ID from the caller)
 * - Logs request start and completion with duration
 * - Runs the rest of the request inside the request context, so every
 *   handler log line carries the ID
 * - Echoes the ID in the X-Request-ID response header
 */

import { Request, Response, NextFunction } from 'express';
import { requestContext } from '../utils/requestContext';
import { createLogger } from '../utils/logger';
import { redactObject } from '../utils/redact';

const log = createLogger('HTTP');

/**
 * Set LOG_REQUEST_BODY=true to log request bodies (always redacted)
 */
const LOG_REQUEST_BODY = process.env.LOG_REQUEST_BODY === 'true';

/**
 * Paths to exclude from lifecycle logging
 */
const EXCLUDED_PATHS = ['/api/v1/health'];

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value;
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const requestId =
    headerValue(req.headers['x-request-id']) ||
    headerValue(req.headers['x-correlation-id']) ||
    requestContext.generateRequestId();

  const context = {
    requestId,
    startTime: Date.now(),
    path: req.path,
    method: req.method,
  };

  res.setHeader('X-Request-ID', requestId);

  const isExcluded = EXCLUDED_PATHS.some((p) => req.path.startsWith(p));

  requestContext.run(context, () => {
    if (!isExcluded) {
      const logData: Record<string, unknown> = {
        ip: req.socket.remoteAddress,
      };

      if (LOG_REQUEST_BODY && req.body && typeof req.body === 'object' && Object.keys(req.body).length > 0) {
        logData.body = redactObject(req.body);
      }

      log.info(`${req.method} ${req.path}`, logData);
    }

    res.on('finish', () => {
      if (isExcluded) return;

      const logData = {
        status: res.statusCode,
        duration: `${Date.now() - context.startTime}ms`,
      };

      if (res.statusCode >= 500) {
        log.error(`${req.method} ${req.path} completed`, logData);
      } else if (res.statusCode >= 400) {
        log.warn(`${req.method} ${req.path} completed`, logData);
      } else {
        log.info(`${req.method} ${req.path} completed`, logData);
      }
    });

    next();
  });
}

export default requestLogger;
