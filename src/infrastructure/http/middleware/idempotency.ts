import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { ValidationError } from '../../../application/errors/AppError.js';
import type { IdempotencyCoordinator, StoredResponse } from '../../idempotency/IdempotencyCoordinator.js';

export const IDEMPOTENCY_HEADER = 'Idempotency-Key';
export const REPLAYED_HEADER = 'Idempotent-Replayed';

const SAFE_METHODS = new Set(['GET', 'HEAD', 'OPTIONS']);

export const readIdempotencyKey = (req: Request): string | undefined => {
  const header = req.get(IDEMPOTENCY_HEADER);
  const trimmed = typeof header === 'string' ? header.trim() : '';
  return trimmed.length > 0 ? trimmed : undefined;
};

const serializeBody = (body: unknown): string => {
  if (body === undefined || body === null) {
    return '';
  }

  if (typeof body === 'string') {
    return body;
  }

  if (Buffer.isBuffer(body)) {
    return body.toString('utf8');
  }

  return JSON.stringify(body);
};

/**
 * Lets the downstream chain write to the client as usual while recording the
 * status, body and content type that pass through `res.send`. Resolves when
 * the handler responds, even if the client has already gone away; a handler
 * that writes with `res.end` directly is recorded on `finish` without a body.
 */
const captureResponse = (res: Response, next: NextFunction): Promise<StoredResponse> =>
  new Promise((resolve) => {
    const send = res.send.bind(res);

    res.send = (body?: unknown) => {
      res.send = send;
      const result = send(body);
      resolve({
        status: res.statusCode,
        body: serializeBody(body),
        contentType: res.get('Content-Type'),
      });
      return result;
    };

    res.once('finish', () => resolve({ status: res.statusCode, body: '' }));

    next();
  });

const replay = (res: Response, stored: StoredResponse): void => {
  res.status(stored.status);
  res.set(REPLAYED_HEADER, 'true');
  if (stored.contentType) {
    res.set('Content-Type', stored.contentType);
  }
  res.send(stored.body);
};

/**
 * Deduplicates unsafe requests that carry an Idempotency-Key. Requests
 * without a key, and GET/HEAD/OPTIONS, pass straight through.
 */
export const idempotencyMiddleware =
  (coordinator: IdempotencyCoordinator): RequestHandler =>
  (req, res, next) => {
    const key = readIdempotencyKey(req);

    if (SAFE_METHODS.has(req.method) || key === undefined) {
      next();
      return;
    }

    coordinator
      .execute(key, () => captureResponse(res, next))
      .then(({ response, replayed }) => {
        if (replayed) {
          res.locals.logger?.debug({ status: response.status }, 'idempotent replay');
          replay(res, response);
        }
      })
      .catch(next);
  };

export const requireIdempotencyKey: RequestHandler = (req, _res, next) => {
  if (readIdempotencyKey(req) === undefined) {
    next(new ValidationError('MISSING_IDEMPOTENCY_KEY', `${IDEMPOTENCY_HEADER} header is required`));
    return;
  }

  next();
};
