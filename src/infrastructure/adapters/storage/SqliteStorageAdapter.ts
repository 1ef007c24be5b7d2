import Database from 'better-sqlite3';
import dayjs from 'dayjs';
import { mkdirSync } from 'node:fs';
import path from 'node:path';
import type { Account } from '../../../domain/entities/Account.js';
import { isOperationTypeId, OPERATION_TYPE_SEED, type OperationType, type OperationTypeId } from '../../../domain/entities/OperationType.js';
import type { NewTransaction, Transaction } from '../../../domain/entities/Transaction.js';
import type { PageRequest } from '../../../domain/services/Pagination.js';
import { duplicateDocumentNumber } from '../../../application/errors/AppError.js';
import type { StoragePort, TransactionPage } from '../../../application/ports/StoragePort.js';
import type { Logger } from '../../logging/Logger.js';
import { runMigrations } from './sqlite/migrations.js';
import {
  COUNT_TRANSACTIONS_BY_ACCOUNT_SQL,
  FIND_ACCOUNT_BY_DOCUMENT_SQL,
  FIND_ACCOUNT_BY_ID_SQL,
  FIND_OPERATION_TYPE_BY_ID_SQL,
  FIND_TRANSACTION_BY_ID_SQL,
  INSERT_ACCOUNT_SQL,
  INSERT_OPERATION_TYPE_SQL,
  INSERT_TRANSACTION_SQL,
  LIST_OPERATION_TYPES_SQL,
  PAGE_TRANSACTIONS_BY_ACCOUNT_SQL,
} from './sqlite/queries.js';

interface AccountRow {
  id: number;
  document_number: string;
  created_at: string;
}

interface OperationTypeRow {
  id: number;
  description: string;
  created_at: string;
}

interface TransactionRow {
  id: number;
  account_id: number;
  operation_type_id: number;
  amount: number;
  event_date: string;
}

export interface SqliteStorageOptions {
  databasePath: string;
  logger?: Logger;
}

const IN_MEMORY = ':memory:';

const isUniqueViolation = (error: unknown): boolean =>
  error instanceof Error && 'code' in error && error.code === 'SQLITE_CONSTRAINT_UNIQUE';

const toOperationTypeId = (id: number): OperationTypeId => {
  if (!isOperationTypeId(id)) {
    throw new Error(`Unknown operation type id ${id} in storage`);
  }

  return id;
};

const toAccount = (row: AccountRow): Account => ({
  id: row.id,
  documentNumber: row.document_number,
  createdAt: row.created_at,
});

const toOperationType = (row: OperationTypeRow): OperationType => ({
  id: toOperationTypeId(row.id),
  description: row.description,
  createdAt: row.created_at,
});

const toTransaction = (row: TransactionRow): Transaction => ({
  id: row.id,
  accountId: row.account_id,
  operationTypeId: toOperationTypeId(row.operation_type_id),
  amount: row.amount,
  eventDate: row.event_date,
});

/**
 * Embedded relational store. better-sqlite3 is synchronous and owns a single
 * connection, so writes are serialized by the driver itself.
 */
export class SqliteStorageAdapter implements StoragePort {
  private readonly db: Database.Database;

  constructor(options: SqliteStorageOptions) {
    if (options.databasePath !== IN_MEMORY) {
      mkdirSync(path.dirname(options.databasePath), { recursive: true });
    }

    this.db = new Database(options.databasePath);
    this.db.pragma('foreign_keys = ON');
    if (options.databasePath !== IN_MEMORY) {
      this.db.pragma('journal_mode = WAL');
    }
    this.db.pragma('busy_timeout = 5000');

    const applied = runMigrations(this.db);
    options.logger?.info({ applied, databasePath: options.databasePath }, 'sqlite migrations complete');
  }

  async createAccount(documentNumber: string): Promise<Account> {
    try {
      const row = this.db
        .prepare<[string, string], AccountRow>(INSERT_ACCOUNT_SQL)
        .get(documentNumber, dayjs().toISOString());

      if (!row) {
        throw new Error('Account insert returned no row');
      }

      return toAccount(row);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw duplicateDocumentNumber();
      }

      throw error;
    }
  }

  async findAccountById(id: number): Promise<Account | null> {
    const row = this.db.prepare<[number], AccountRow>(FIND_ACCOUNT_BY_ID_SQL).get(id);
    return row ? toAccount(row) : null;
  }

  async findAccountByDocumentNumber(documentNumber: string): Promise<Account | null> {
    const row = this.db.prepare<[string], AccountRow>(FIND_ACCOUNT_BY_DOCUMENT_SQL).get(documentNumber);
    return row ? toAccount(row) : null;
  }

  async seedOperationTypes(): Promise<void> {
    const insert = this.db.prepare<[number, string, string]>(INSERT_OPERATION_TYPE_SQL);
    const createdAt = dayjs().toISOString();

    this.db.transaction(() => {
      for (const seed of OPERATION_TYPE_SEED) {
        insert.run(seed.id, seed.description, createdAt);
      }
    })();
  }

  async findOperationTypeById(id: number): Promise<OperationType | null> {
    const row = this.db.prepare<[number], OperationTypeRow>(FIND_OPERATION_TYPE_BY_ID_SQL).get(id);
    return row ? toOperationType(row) : null;
  }

  async listOperationTypes(): Promise<OperationType[]> {
    return this.db.prepare<[], OperationTypeRow>(LIST_OPERATION_TYPES_SQL).all().map(toOperationType);
  }

  async createTransaction(transaction: NewTransaction): Promise<Transaction> {
    const row = this.db
      .prepare<[number, number, number, string], TransactionRow>(INSERT_TRANSACTION_SQL)
      .get(transaction.accountId, transaction.operationTypeId, transaction.amount, transaction.eventDate);

    if (!row) {
      throw new Error('Transaction insert returned no row');
    }

    return toTransaction(row);
  }

  async findTransactionById(id: number): Promise<Transaction | null> {
    const row = this.db.prepare<[number], TransactionRow>(FIND_TRANSACTION_BY_ID_SQL).get(id);
    return row ? toTransaction(row) : null;
  }

  async pageTransactionsByAccount(accountId: number, page: PageRequest): Promise<TransactionPage> {
    const rows = this.db
      .prepare<[number, number, number], TransactionRow>(PAGE_TRANSACTIONS_BY_ACCOUNT_SQL)
      .all(accountId, page.limit, page.offset);
    const count = this.db.prepare<[number], { total: number }>(COUNT_TRANSACTIONS_BY_ACCOUNT_SQL).get(accountId);

    return {
      transactions: rows.map(toTransaction),
      total: count?.total ?? 0,
    };
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
    }
  }
}
