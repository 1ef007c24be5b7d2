import type { OperationTypeId } from './OperationType.js';

export type TransactionType = 'CREDIT' | 'DEBIT';

export interface Transaction {
  id: number;
  accountId: number;
  operationTypeId: OperationTypeId;
  amount: number; // signed; see AmountNormalizer
  eventDate: string; // ISO timestamp
}

export type NewTransaction = Omit<Transaction, 'id'>;
