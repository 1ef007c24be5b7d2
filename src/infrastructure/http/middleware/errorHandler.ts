import type { ErrorRequestHandler, RequestHandler } from 'express';
import { isAppError, NotFoundError } from '../../../application/errors/AppError.js';
import type { Logger } from '../../logging/Logger.js';

export interface ErrorResponseBody {
  error: string;
  code: string;
  message: string;
}

const isBodyParseError = (error: unknown): boolean =>
  error instanceof SyntaxError || (typeof error === 'object' && error !== null && 'type' in error && error.type === 'entity.parse.failed');

export const notFoundHandler: RequestHandler = (req, _res, next) => {
  next(new NotFoundError('ROUTE_NOT_FOUND', `Route ${req.method} ${req.path} not found`));
};

export const errorHandler =
  (logger: Logger): ErrorRequestHandler =>
  (error: unknown, _req, res, next) => {
    const log = res.locals.logger ?? logger;

    if (res.headersSent) {
      log.error({ err: error }, 'error after response started');
      next(error);
      return;
    }

    if (isAppError(error)) {
      if (error.status >= 500) {
        log.error({ err: error, cause: error.cause, details: error.details }, 'persistence failure');
      } else {
        log.warn({ code: error.code, reason: error.reason, message: error.message }, 'request rejected');
      }

      const body: ErrorResponseBody = { error: error.code, code: error.reason, message: error.message };
      res.status(error.status).json(body);
      return;
    }

    if (isBodyParseError(error)) {
      const body: ErrorResponseBody = {
        error: 'VALIDATION_ERROR',
        code: 'INVALID_REQUEST_BODY',
        message: 'Invalid request body',
      };
      res.status(400).json(body);
      return;
    }

    log.error({ err: error }, 'unhandled error');

    const body: ErrorResponseBody = { error: 'INTERNAL_ERROR', code: 'UNEXPECTED', message: 'Internal server error' };
    res.status(500).json(body);
  };
