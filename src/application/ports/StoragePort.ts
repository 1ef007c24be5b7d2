import type { Account } from '../../domain/entities/Account.js';
import type { OperationType } from '../../domain/entities/OperationType.js';
import type { NewTransaction, Transaction } from '../../domain/entities/Transaction.js';
import type { PageRequest } from '../../domain/services/Pagination.js';

export interface TransactionPage {
  transactions: Transaction[];
  total: number;
}

/**
 * Persistence collaborator. Adapters may raise `ConflictError` for a
 * duplicate document number; any other failure is treated as a storage fault.
 */
export interface StoragePort {
  createAccount(documentNumber: string): Promise<Account>;
  findAccountById(id: number): Promise<Account | null>;
  findAccountByDocumentNumber(documentNumber: string): Promise<Account | null>;
  seedOperationTypes(): Promise<void>;
  findOperationTypeById(id: number): Promise<OperationType | null>;
  listOperationTypes(): Promise<OperationType[]>;
  createTransaction(transaction: NewTransaction): Promise<Transaction>;
  findTransactionById(id: number): Promise<Transaction | null>;
  pageTransactionsByAccount(accountId: number, page: PageRequest): Promise<TransactionPage>;
  close(): Promise<void>;
}
