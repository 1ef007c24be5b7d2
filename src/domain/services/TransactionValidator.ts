import { isOperationTypeId, type OperationTypeId } from '../entities/OperationType.js';
import type { ValidationResult } from './ValidationResult.js';

export interface TransactionRequest {
  accountId: number;
  operationTypeId: number;
  amount: number;
}

export interface ValidTransactionRequest {
  accountId: number;
  operationTypeId: OperationTypeId;
  amount: number;
}

export const INVALID_ACCOUNT_ID_MESSAGE = 'account_id must be greater than 0';
export const INVALID_OPERATION_TYPE_MESSAGE = 'operation_type_id must be between 1 and 4';
export const ZERO_AMOUNT_MESSAGE = 'amount cannot be zero';

export const isValidAccountId = (value: number): boolean => Number.isSafeInteger(value) && value > 0;

// First failing check wins; nothing here needs storage.
export const validateTransactionRequest = (
  request: TransactionRequest,
): ValidationResult<ValidTransactionRequest> => {
  if (!isValidAccountId(request.accountId)) {
    return { success: false, reason: 'INVALID_ACCOUNT_ID', message: INVALID_ACCOUNT_ID_MESSAGE };
  }

  if (!isOperationTypeId(request.operationTypeId)) {
    return { success: false, reason: 'INVALID_OPERATION_TYPE', message: INVALID_OPERATION_TYPE_MESSAGE };
  }

  if (!Number.isFinite(request.amount) || request.amount === 0) {
    return { success: false, reason: 'ZERO_AMOUNT', message: ZERO_AMOUNT_MESSAGE };
  }

  return {
    success: true,
    data: {
      accountId: request.accountId,
      operationTypeId: request.operationTypeId,
      amount: request.amount,
    },
  };
};
