import { z } from 'zod';

const optionalMs = z.coerce.number().int().positive().optional();

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  PORT: z.coerce.number().int().min(0).max(65535).default(8080),
  HOST: z.string().min(1).default('0.0.0.0'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  SERVICE_NAME: z.string().min(1).default('banking-api'),
  STORAGE_DRIVER: z.enum(['sqlite', 'memory']).default('sqlite'),
  DATABASE_PATH: z.string().min(1).default('./data/banking.db'),
  IDEMPOTENCY_TTL_MS: optionalMs,
  IDEMPOTENCY_WAIT_TIMEOUT_MS: optionalMs,
});

export type StorageDriver = z.infer<typeof EnvSchema>['STORAGE_DRIVER'];

export interface AppConfig {
  env: 'development' | 'test' | 'production';
  server: {
    port: number;
    host: string;
  };
  logging: {
    level: z.infer<typeof EnvSchema>['LOG_LEVEL'];
    serviceName: string;
  };
  storage: {
    driver: StorageDriver;
    databasePath: string;
  };
  idempotency: {
    ttlMs?: number;
    waitTimeoutMs?: number;
  };
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

// Blank variables count as unset so `FOO=` falls back to the default.
const withoutBlanks = (env: NodeJS.ProcessEnv): Record<string, string> => {
  const entries = Object.entries(env).filter(
    (entry): entry is [string, string] => typeof entry[1] === 'string' && entry[1].trim() !== '',
  );

  return Object.fromEntries(entries);
};

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));

  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }

  const vars = parsed.data;

  return {
    env: vars.NODE_ENV,
    server: {
      port: vars.PORT,
      host: vars.HOST,
    },
    logging: {
      level: vars.LOG_LEVEL,
      serviceName: vars.SERVICE_NAME,
    },
    storage: {
      driver: vars.STORAGE_DRIVER,
      databasePath: vars.DATABASE_PATH,
    },
    idempotency: {
      ttlMs: vars.IDEMPOTENCY_TTL_MS,
      waitTimeoutMs: vars.IDEMPOTENCY_WAIT_TIMEOUT_MS,
    },
  };
};
