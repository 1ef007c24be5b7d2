import dayjs from 'dayjs';
import { beforeEach, describe, expect, it, vi } from 'vitest';
import { NotFoundError, PersistenceFailure, ValidationError } from '../../application/errors/AppError.js';
import { TransactionService } from '../../application/services/TransactionService.js';
import { InMemoryStorageAdapter } from '../../infrastructure/adapters/storage/InMemoryStorageAdapter.js';
import { FIXED_NOW } from '../helpers.js';

describe('TransactionService', () => {
  let storage: InMemoryStorageAdapter;
  let service: TransactionService;
  let accountId: number;

  beforeEach(async () => {
    storage = new InMemoryStorageAdapter();
    await storage.seedOperationTypes();
    accountId = (await storage.createAccount('12345678900')).id;
    service = new TransactionService(storage, { now: () => FIXED_NOW });
  });

  describe('createTransaction', () => {
    it('stores a purchase as a negative amount', async () => {
      const transaction = await service.createTransaction({ accountId, operationTypeId: 1, amount: 50 });

      expect(transaction).toEqual({
        id: 1,
        accountId,
        operationTypeId: 1,
        amount: -50,
        eventDate: FIXED_NOW,
      });
    });

    it('stores a credit voucher as a positive amount even when submitted negative', async () => {
      const transaction = await service.createTransaction({ accountId, operationTypeId: 4, amount: -100 });

      expect(transaction.amount).toBe(100);
    });

    it('writes exactly once per successful call', async () => {
      const write = vi.spyOn(storage, 'createTransaction');

      await service.createTransaction({ accountId, operationTypeId: 3, amount: 20 });

      expect(write).toHaveBeenCalledTimes(1);
      expect(write).toHaveBeenCalledWith({ accountId, operationTypeId: 3, amount: -20, eventDate: FIXED_NOW });
    });

    it('rejects invalid input before touching storage', async () => {
      const lookup = vi.spyOn(storage, 'findAccountById');

      await expect(service.createTransaction({ accountId, operationTypeId: 1, amount: 0 })).rejects.toMatchObject({
        reason: 'ZERO_AMOUNT',
        status: 400,
      });
      expect(lookup).not.toHaveBeenCalled();
    });

    it('reports an unknown account as not found', async () => {
      const attempt = service.createTransaction({ accountId: 9999, operationTypeId: 1, amount: 50 });

      await expect(attempt).rejects.toBeInstanceOf(NotFoundError);
      await expect(attempt).rejects.toMatchObject({ reason: 'ACCOUNT_NOT_FOUND', status: 404 });
    });

    it('reports an operation type missing from storage as invalid', async () => {
      const unseeded = new InMemoryStorageAdapter();
      const account = await unseeded.createAccount('98765432100');
      const unseededService = new TransactionService(unseeded, { now: () => FIXED_NOW });

      const attempt = unseededService.createTransaction({ accountId: account.id, operationTypeId: 2, amount: 10 });

      await expect(attempt).rejects.toBeInstanceOf(ValidationError);
      await expect(attempt).rejects.toMatchObject({ reason: 'INVALID_OPERATION_TYPE' });
    });

    it('wraps storage faults in a PersistenceFailure without leaking the driver message', async () => {
      const cause = new Error('disk I/O error');
      vi.spyOn(storage, 'createTransaction').mockRejectedValue(cause);

      const failure = await service
        .createTransaction({ accountId, operationTypeId: 1, amount: 50 })
        .catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(PersistenceFailure);
      expect(failure).toMatchObject({ status: 500, message: 'Internal server error', cause });
    });
  });

  describe('listAccountTransactions', () => {
    it('pages newest first with totals', async () => {
      let tick = 0;
      const ticking = new TransactionService(storage, {
        now: () => dayjs(FIXED_NOW).add(tick++, 'minute').toISOString(),
      });

      await ticking.createTransaction({ accountId, operationTypeId: 1, amount: 10 });
      await ticking.createTransaction({ accountId, operationTypeId: 4, amount: 20 });

      const listing = await ticking.listAccountTransactions(accountId, { limit: 10, offset: 0 });

      expect(listing.pagination).toEqual({ total: 2, limit: 10, offset: 0, pages: 1 });
      expect(listing.transactions.map((txn) => txn.amount)).toEqual([20, -10]);
    });

    it('defaults to limit 50 and offset 0', async () => {
      const listing = await service.listAccountTransactions(accountId);

      expect(listing).toEqual({ transactions: [], pagination: { total: 0, limit: 50, offset: 0, pages: 1 } });
    });

    it.each([
      [{ limit: 0 }, 'Invalid limit'],
      [{ limit: 101 }, 'Invalid limit'],
      [{ offset: -1 }, 'Invalid offset'],
    ])('rejects %j', async (page, message) => {
      await expect(service.listAccountTransactions(accountId, page)).rejects.toMatchObject({
        reason: 'INVALID_PAGINATION',
        message,
      });
    });

    it('requires the account to exist', async () => {
      await expect(service.listAccountTransactions(9999)).rejects.toMatchObject({ status: 404 });
    });
  });

  describe('getTransaction', () => {
    it('returns a stored transaction and rejects unknown ids', async () => {
      const created = await service.createTransaction({ accountId, operationTypeId: 2, amount: 30 });

      await expect(service.getTransaction(created.id)).resolves.toEqual(created);
      await expect(service.getTransaction(404)).rejects.toMatchObject({ reason: 'TRANSACTION_NOT_FOUND' });
      await expect(service.getTransaction(0)).rejects.toMatchObject({ reason: 'INVALID_TRANSACTION_ID' });
    });
  });
});
