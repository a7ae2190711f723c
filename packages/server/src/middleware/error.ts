import type { Request, Response, NextFunction } from 'express';
import type { Logger } from 'pino';
import { ZodError } from 'zod';
import { ApiError } from '../errors/api-error.js';

interface HttpLikeError {
  status?: unknown;
  statusCode?: unknown;
  type?: unknown;
  expose?: unknown;
  message?: unknown;
}

function isHttpLikeError(err: unknown): err is HttpLikeError {
  return typeof err === 'object' && err !== null;
}

/**
 * Map anything thrown in a handler onto an ApiError.
 *
 * body-parser errors carry `status` and `type`; zod failures become the
 * same 400 "Invalid request" as malformed JSON.
 */
export function toApiError(err: unknown): ApiError {
  if (err instanceof ApiError) {
    return err;
  }
  if (err instanceof ZodError) {
    return new ApiError(400, 'Invalid request', {
      errors: err.issues.map((issue) => ({
        loc: issue.path,
        msg: issue.message,
        type: issue.code,
      })),
    });
  }
  if (isHttpLikeError(err)) {
    const status = typeof err.status === 'number' ? err.status : err.statusCode;
    if (err.type === 'entity.parse.failed') {
      return new ApiError(400, 'Invalid request', {
        errors: [{ loc: ['body'], msg: 'Invalid JSON in request body', type: 'json_invalid' }],
      });
    }
    if (typeof status === 'number' && status >= 400 && status < 500) {
      const message = err.expose === true && typeof err.message === 'string' ? err.message : 'Error';
      return new ApiError(status, message);
    }
  }
  return new ApiError(500, 'Internal server error');
}

export function errorHandler(log: Logger) {
  return (err: unknown, req: Request, res: Response, _next: NextFunction): void => {
    const apiError = toApiError(err);

    if (apiError.status >= 500) {
      log.error({ err, method: req.method, path: req.originalUrl }, 'Request error occurred');
    } else {
      log.debug({ status: apiError.status, message: apiError.message }, 'Request rejected');
    }

    res.status(apiError.status).json(apiError.toBody());
  };
}

export function notFoundHandler(_req: Request, _res: Response, next: NextFunction): void {
  next(new ApiError(404, 'Not Found'));
}
