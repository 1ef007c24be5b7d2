import type { StoragePort } from '../../application/ports/StoragePort.js';
import { AccountService } from '../../application/services/AccountService.js';
import { TransactionService } from '../../application/services/TransactionService.js';
import { InMemoryStorageAdapter } from '../adapters/storage/InMemoryStorageAdapter.js';
import { SqliteStorageAdapter } from '../adapters/storage/SqliteStorageAdapter.js';
import { loadConfig, type AppConfig } from '../config/Config.js';
import { IdempotencyCoordinator } from '../idempotency/IdempotencyCoordinator.js';
import { createLogger, type Logger } from '../logging/Logger.js';

export interface AppContainerOverrides {
  config?: AppConfig;
  logger?: Logger;
  storage?: StoragePort;
  idempotency?: IdempotencyCoordinator;
  now?: () => string;
}

export class AppContainer {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly storage: StoragePort;
  readonly idempotency: IdempotencyCoordinator;
  readonly accountService: AccountService;
  readonly transactionService: TransactionService;
  private purgeTimer?: NodeJS.Timeout;

  constructor(overrides: AppContainerOverrides = {}) {
    this.config = overrides.config ?? loadConfig();
    this.logger = overrides.logger ?? createLogger(this.config);
    this.storage = overrides.storage ?? this.createStorage();
    this.idempotency =
      overrides.idempotency ??
      new IdempotencyCoordinator({
        ttlMs: this.config.idempotency.ttlMs,
        waitTimeoutMs: this.config.idempotency.waitTimeoutMs,
      });

    this.accountService = new AccountService(this.storage);
    this.transactionService = new TransactionService(this.storage, { now: overrides.now });
  }

  async initialize(): Promise<void> {
    await this.storage.seedOperationTypes();
    this.logger.info('operation types seeded');

    const { ttlMs } = this.config.idempotency;
    if (ttlMs !== undefined && !this.purgeTimer) {
      this.purgeTimer = setInterval(() => {
        const removed = this.idempotency.purgeExpired();
        if (removed > 0) {
          this.logger.debug({ removed }, 'expired idempotency records purged');
        }
      }, ttlMs);
      this.purgeTimer.unref();
    }
  }

  async close(): Promise<void> {
    if (this.purgeTimer) {
      clearInterval(this.purgeTimer);
      this.purgeTimer = undefined;
    }

    await this.storage.close();
  }

  private createStorage(): StoragePort {
    const { driver, databasePath } = this.config.storage;

    if (driver === 'memory') {
      return new InMemoryStorageAdapter();
    }

    return new SqliteStorageAdapter({ databasePath, logger: this.logger });
  }
}
