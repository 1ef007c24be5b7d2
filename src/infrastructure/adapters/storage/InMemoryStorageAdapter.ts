import dayjs from 'dayjs';
import type { Account } from '../../../domain/entities/Account.js';
import { OPERATION_TYPE_SEED, type OperationType } from '../../../domain/entities/OperationType.js';
import type { NewTransaction, Transaction } from '../../../domain/entities/Transaction.js';
import type { PageRequest } from '../../../domain/services/Pagination.js';
import { duplicateDocumentNumber } from '../../../application/errors/AppError.js';
import type { StoragePort, TransactionPage } from '../../../application/ports/StoragePort.js';

export class InMemoryStorageAdapter implements StoragePort {
  private readonly accounts = new Map<number, Account>();
  private readonly accountsByDocument = new Map<string, number>();
  private readonly operationTypes = new Map<number, OperationType>();
  private readonly transactions = new Map<number, Transaction>();
  private nextAccountId = 1;
  private nextTransactionId = 1;

  async createAccount(documentNumber: string): Promise<Account> {
    if (this.accountsByDocument.has(documentNumber)) {
      throw duplicateDocumentNumber();
    }

    const account: Account = {
      id: this.nextAccountId++,
      documentNumber,
      createdAt: dayjs().toISOString(),
    };

    this.accounts.set(account.id, account);
    this.accountsByDocument.set(documentNumber, account.id);

    return { ...account };
  }

  async findAccountById(id: number): Promise<Account | null> {
    const account = this.accounts.get(id);
    return account ? { ...account } : null;
  }

  async findAccountByDocumentNumber(documentNumber: string): Promise<Account | null> {
    const id = this.accountsByDocument.get(documentNumber);
    return id === undefined ? null : this.findAccountById(id);
  }

  async seedOperationTypes(): Promise<void> {
    for (const seed of OPERATION_TYPE_SEED) {
      if (!this.operationTypes.has(seed.id)) {
        this.operationTypes.set(seed.id, { ...seed, createdAt: dayjs().toISOString() });
      }
    }
  }

  async findOperationTypeById(id: number): Promise<OperationType | null> {
    const operationType = this.operationTypes.get(id);
    return operationType ? { ...operationType } : null;
  }

  async listOperationTypes(): Promise<OperationType[]> {
    return Array.from(this.operationTypes.values())
      .sort((a, b) => a.id - b.id)
      .map((operationType) => ({ ...operationType }));
  }

  async createTransaction(transaction: NewTransaction): Promise<Transaction> {
    const stored: Transaction = { id: this.nextTransactionId++, ...transaction };
    this.transactions.set(stored.id, stored);

    return { ...stored };
  }

  async findTransactionById(id: number): Promise<Transaction | null> {
    const transaction = this.transactions.get(id);
    return transaction ? { ...transaction } : null;
  }

  async pageTransactionsByAccount(accountId: number, page: PageRequest): Promise<TransactionPage> {
    // Same order as the SQLite adapter: newest event first, then highest id.
    const forAccount = Array.from(this.transactions.values())
      .filter((txn) => txn.accountId === accountId)
      .sort((a, b) => b.eventDate.localeCompare(a.eventDate) || b.id - a.id);

    return {
      transactions: forAccount.slice(page.offset, page.offset + page.limit).map((txn) => ({ ...txn })),
      total: forAccount.length,
    };
  }

  async close(): Promise<void> {
    this.accounts.clear();
    this.accountsByDocument.clear();
    this.operationTypes.clear();
    this.transactions.clear();
  }
}
