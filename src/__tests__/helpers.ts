import { pino } from 'pino';
import { InMemoryStorageAdapter } from '../infrastructure/adapters/storage/InMemoryStorageAdapter.js';
import { AppContainer, type AppContainerOverrides } from '../infrastructure/bootstrap/AppContainer.js';
import { loadConfig, type AppConfig } from '../infrastructure/config/Config.js';

export const FIXED_NOW = '2026-01-01T00:00:00.000Z';

export const silentLogger = pino({ level: 'silent' });

export const testConfig = (): AppConfig =>
  loadConfig({ NODE_ENV: 'test', STORAGE_DRIVER: 'memory', LOG_LEVEL: 'silent' });

export const buildTestContainer = async (overrides: AppContainerOverrides = {}): Promise<AppContainer> => {
  const container = new AppContainer({
    config: testConfig(),
    logger: silentLogger,
    storage: new InMemoryStorageAdapter(),
    now: () => FIXED_NOW,
    ...overrides,
  });

  await container.initialize();
  return container;
};

export interface Deferred<T> {
  promise: Promise<T>;
  resolve: (value: T) => void;
}

export const deferred = <T>(): Deferred<T> => {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });

  return { promise, resolve };
};

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));
