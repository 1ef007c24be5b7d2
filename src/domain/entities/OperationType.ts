import type { TransactionType } from './Transaction.js';

export const OperationTypeId = {
  PURCHASE: 1,
  PURCHASE_WITH_INSTALLMENTS: 2,
  WITHDRAWAL: 3,
  CREDIT_VOUCHER: 4,
} as const;

export type OperationTypeId = (typeof OperationTypeId)[keyof typeof OperationTypeId];

export interface OperationType {
  id: OperationTypeId;
  description: string;
  createdAt: string;
}

export const OPERATION_TYPE_SEED: ReadonlyArray<{ id: OperationTypeId; description: string }> = [
  { id: OperationTypeId.PURCHASE, description: 'Normal Purchase' },
  { id: OperationTypeId.PURCHASE_WITH_INSTALLMENTS, description: 'Purchase with installments' },
  { id: OperationTypeId.WITHDRAWAL, description: 'Withdrawal' },
  { id: OperationTypeId.CREDIT_VOUCHER, description: 'Credit Voucher' },
];

const knownIds = new Set<number>(Object.values(OperationTypeId));

export const isOperationTypeId = (value: number): value is OperationTypeId => knownIds.has(value);

/**
 * Static debit/credit tag for each operation type. Debits are stored negative,
 * credits positive.
 */
export const classifyOperationType = (id: OperationTypeId): TransactionType => {
  switch (id) {
    case OperationTypeId.PURCHASE:
    case OperationTypeId.PURCHASE_WITH_INSTALLMENTS:
    case OperationTypeId.WITHDRAWAL:
      return 'DEBIT';
    case OperationTypeId.CREDIT_VOUCHER:
      return 'CREDIT';
  }
};
