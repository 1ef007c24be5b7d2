import pino, { type DestinationStream, type Logger, type LoggerOptions } from 'pino';
import type { AppConfig } from '../config/Config.js';

export type { Logger };

export const createLogger = (config: Pick<AppConfig, 'env' | 'logging'>, destination?: DestinationStream): Logger => {
  const options: LoggerOptions = {
    level: config.logging.level,
    base: { service: config.logging.serviceName, env: config.env },
    timestamp: pino.stdTimeFunctions.isoTime,
    formatters: {
      level(label) {
        return { level: label };
      },
    },
    serializers: {
      err: pino.stdSerializers.err,
      req: pino.stdSerializers.req,
    },
    redact: {
      paths: ['req.headers.authorization', 'req.headers.cookie', 'req.headers["idempotency-key"]'],
      censor: '[REDACTED]',
    },
  };

  if (destination) {
    return pino(options, destination);
  }

  return pino({
    ...options,
    transport: config.env === 'development' ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
  });
};
