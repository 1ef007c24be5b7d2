import type { Account } from '../../domain/entities/Account.js';
import { validateDocumentNumber } from '../../domain/services/DocumentNumberValidator.js';
import { INVALID_ACCOUNT_ID_MESSAGE, isValidAccountId } from '../../domain/services/TransactionValidator.js';
import { duplicateDocumentNumber, NotFoundError, ValidationError } from '../errors/AppError.js';
import type { StoragePort } from '../ports/StoragePort.js';
import { withPersistence } from './withPersistence.js';

export class AccountService {
  constructor(private readonly storage: StoragePort) {}

  async createAccount(documentNumber: string): Promise<Account> {
    const validation = validateDocumentNumber(documentNumber);
    if (!validation.success) {
      throw new ValidationError(validation.reason, validation.message);
    }

    const existing = await withPersistence('findAccountByDocumentNumber', () =>
      this.storage.findAccountByDocumentNumber(validation.data),
    );

    if (existing) {
      throw duplicateDocumentNumber();
    }

    return withPersistence('createAccount', () => this.storage.createAccount(validation.data));
  }

  async getAccount(accountId: number): Promise<Account> {
    if (!isValidAccountId(accountId)) {
      throw new ValidationError('INVALID_ACCOUNT_ID', INVALID_ACCOUNT_ID_MESSAGE);
    }

    const account = await withPersistence('findAccountById', () => this.storage.findAccountById(accountId));

    if (!account) {
      throw new NotFoundError('ACCOUNT_NOT_FOUND', 'account not found');
    }

    return account;
  }
}
