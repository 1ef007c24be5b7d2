import { Router } from 'express';
import { AccountIdParamSchema, CreateAccountRequestSchema, toAccountResponse } from '../../../application/dto/AccountDTO.js';
import { PaginationQuerySchema, toTransactionResponse } from '../../../application/dto/TransactionDTO.js';
import type { AccountService } from '../../../application/services/AccountService.js';
import type { TransactionService } from '../../../application/services/TransactionService.js';
import { parseInput } from '../validation.js';

export const accountRoutes = (accounts: AccountService, transactions: TransactionService): Router => {
  const router = Router();

  router.post('/', async (req, res, next) => {
    try {
      const body = parseInput(CreateAccountRequestSchema, req.body, 'INVALID_DOCUMENT_NUMBER');
      const account = await accounts.createAccount(body.document_number);

      res.status(201).json(toAccountResponse(account));
    } catch (error) {
      next(error);
    }
  });

  router.get('/:accountId', async (req, res, next) => {
    try {
      const { accountId } = parseInput(AccountIdParamSchema, req.params, 'INVALID_ACCOUNT_ID');
      const account = await accounts.getAccount(accountId);

      res.json(toAccountResponse(account));
    } catch (error) {
      next(error);
    }
  });

  router.get('/:accountId/transactions', async (req, res, next) => {
    try {
      const { accountId } = parseInput(AccountIdParamSchema, req.params, 'INVALID_ACCOUNT_ID');
      const page = parseInput(PaginationQuerySchema, req.query, 'INVALID_PAGINATION');
      const listing = await transactions.listAccountTransactions(accountId, page);

      res.json({
        transactions: listing.transactions.map(toTransactionResponse),
        pagination: listing.pagination,
      });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
