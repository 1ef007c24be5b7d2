import { randomUUID } from 'node:crypto';
import type { RequestHandler } from 'express';
import type { Logger } from '../../logging/Logger.js';

export const REQUEST_ID_HEADER = 'X-Request-Id';

export const requestLogger =
  (logger: Logger): RequestHandler =>
  (req, res, next) => {
    const requestId = req.get(REQUEST_ID_HEADER)?.trim() || randomUUID();
    const startedAt = process.hrtime.bigint();
    const child = logger.child({ requestId });

    res.locals.requestId = requestId;
    res.locals.logger = child;
    res.set(REQUEST_ID_HEADER, requestId);

    res.once('finish', () => {
      const durationMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
      child.info({ req, status: res.statusCode, durationMs: Math.round(durationMs) }, 'request completed');
    });

    next();
  };
