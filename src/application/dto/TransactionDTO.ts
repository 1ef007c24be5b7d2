import { z } from 'zod';
import type { OperationType } from '../../domain/entities/OperationType.js';
import { classifyOperationType } from '../../domain/entities/OperationType.js';
import type { Transaction, TransactionType } from '../../domain/entities/Transaction.js';
import type { PageInfo } from '../../domain/services/Pagination.js';
import { integerParam } from './AccountDTO.js';

const numberField = (name: string) =>
  z
    .number({
      required_error: `${name} is required`,
      invalid_type_error: `${name} must be a number`,
    })
    .finite(`${name} must be a finite number`);

export const CreateTransactionRequestSchema = z.object({
  account_id: numberField('account_id'),
  operation_type_id: numberField('operation_type_id'),
  amount: numberField('amount'),
});

export type CreateTransactionRequestDTO = z.infer<typeof CreateTransactionRequestSchema>;

export const TransactionIdParamSchema = z.object({
  transactionId: integerParam('Invalid transaction ID'),
});

const optionalCount = (message: string) =>
  z.preprocess(
    (value) => (value === '' ? undefined : value),
    z
      .string({ invalid_type_error: message })
      .regex(/^\d+$/, message)
      .transform(Number)
      .optional(),
  );

export const PaginationQuerySchema = z.object({
  limit: optionalCount('Invalid limit'),
  offset: optionalCount('Invalid offset'),
});

export interface TransactionResponseDTO {
  transaction_id: number;
  account_id: number;
  operation_type_id: number;
  amount: number;
  event_date: string;
}

export interface TransactionListResponseDTO {
  transactions: TransactionResponseDTO[];
  pagination: PageInfo;
}

export interface OperationTypeResponseDTO {
  operation_type_id: number;
  description: string;
  classification: TransactionType;
}

export const toTransactionResponse = (transaction: Transaction): TransactionResponseDTO => ({
  transaction_id: transaction.id,
  account_id: transaction.accountId,
  operation_type_id: transaction.operationTypeId,
  amount: transaction.amount,
  event_date: transaction.eventDate,
});

export const toOperationTypeResponse = (operationType: OperationType): OperationTypeResponseDTO => ({
  operation_type_id: operationType.id,
  description: operationType.description,
  classification: classifyOperationType(operationType.id),
});
