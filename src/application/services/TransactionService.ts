import dayjs from 'dayjs';
import { classifyOperationType, type OperationType } from '../../domain/entities/OperationType.js';
import type { Transaction } from '../../domain/entities/Transaction.js';
import { normalizeAmount } from '../../domain/services/AmountNormalizer.js';
import {
  buildPageInfo,
  DEFAULT_PAGE_LIMIT,
  MAX_PAGE_LIMIT,
  type PageInfo,
  type PageRequest,
} from '../../domain/services/Pagination.js';
import {
  INVALID_ACCOUNT_ID_MESSAGE,
  INVALID_OPERATION_TYPE_MESSAGE,
  isValidAccountId,
  validateTransactionRequest,
  type TransactionRequest,
} from '../../domain/services/TransactionValidator.js';
import { NotFoundError, ValidationError } from '../errors/AppError.js';
import type { StoragePort } from '../ports/StoragePort.js';
import { withPersistence } from './withPersistence.js';

export interface TransactionServiceOptions {
  now?: () => string;
}

export interface TransactionListing {
  transactions: Transaction[];
  pagination: PageInfo;
}

export class TransactionService {
  private readonly now: () => string;

  constructor(
    private readonly storage: StoragePort,
    options: TransactionServiceOptions = {},
  ) {
    this.now = options.now ?? (() => dayjs().toISOString());
  }

  async createTransaction(request: TransactionRequest): Promise<Transaction> {
    const validation = validateTransactionRequest(request);
    if (!validation.success) {
      throw new ValidationError(validation.reason, validation.message);
    }

    const { accountId, operationTypeId, amount } = validation.data;

    await this.requireAccount(accountId);

    const operationType = await withPersistence('findOperationTypeById', () =>
      this.storage.findOperationTypeById(operationTypeId),
    );

    if (!operationType) {
      throw new ValidationError('INVALID_OPERATION_TYPE', INVALID_OPERATION_TYPE_MESSAGE);
    }

    return withPersistence('createTransaction', () =>
      this.storage.createTransaction({
        accountId,
        operationTypeId: operationType.id,
        amount: normalizeAmount(amount, classifyOperationType(operationType.id)),
        eventDate: this.now(),
      }),
    );
  }

  async getTransaction(transactionId: number): Promise<Transaction> {
    if (!Number.isSafeInteger(transactionId) || transactionId <= 0) {
      throw new ValidationError('INVALID_TRANSACTION_ID', 'transaction_id must be greater than 0');
    }

    const transaction = await withPersistence('findTransactionById', () =>
      this.storage.findTransactionById(transactionId),
    );

    if (!transaction) {
      throw new NotFoundError('TRANSACTION_NOT_FOUND', 'transaction not found');
    }

    return transaction;
  }

  async listAccountTransactions(accountId: number, page: Partial<PageRequest> = {}): Promise<TransactionListing> {
    const pageRequest = this.resolvePage(page);

    await this.requireAccount(accountId);

    const { transactions, total } = await withPersistence('pageTransactionsByAccount', () =>
      this.storage.pageTransactionsByAccount(accountId, pageRequest),
    );

    return { transactions, pagination: buildPageInfo(total, pageRequest) };
  }

  async listOperationTypes(): Promise<OperationType[]> {
    return withPersistence('listOperationTypes', () => this.storage.listOperationTypes());
  }

  private async requireAccount(accountId: number): Promise<void> {
    if (!isValidAccountId(accountId)) {
      throw new ValidationError('INVALID_ACCOUNT_ID', INVALID_ACCOUNT_ID_MESSAGE);
    }

    const account = await withPersistence('findAccountById', () => this.storage.findAccountById(accountId));

    if (!account) {
      throw new NotFoundError('ACCOUNT_NOT_FOUND', `account with id ${accountId} not found`);
    }
  }

  private resolvePage(page: Partial<PageRequest>): PageRequest {
    const limit = page.limit ?? DEFAULT_PAGE_LIMIT;
    const offset = page.offset ?? 0;

    if (!Number.isSafeInteger(limit) || limit < 1 || limit > MAX_PAGE_LIMIT) {
      throw new ValidationError('INVALID_PAGINATION', 'Invalid limit');
    }

    if (!Number.isSafeInteger(offset) || offset < 0) {
      throw new ValidationError('INVALID_PAGINATION', 'Invalid offset');
    }

    return { limit, offset };
  }
}
