import { Router } from 'express';
import {
  CreateTransactionRequestSchema,
  TransactionIdParamSchema,
  toOperationTypeResponse,
  toTransactionResponse,
} from '../../../application/dto/TransactionDTO.js';
import type { TransactionService } from '../../../application/services/TransactionService.js';
import { requireIdempotencyKey } from '../middleware/idempotency.js';
import { parseInput } from '../validation.js';

export const transactionRoutes = (transactions: TransactionService): Router => {
  const router = Router();

  router.post('/', requireIdempotencyKey, async (req, res, next) => {
    try {
      const body = parseInput(CreateTransactionRequestSchema, req.body, 'INVALID_REQUEST_BODY');
      const transaction = await transactions.createTransaction({
        accountId: body.account_id,
        operationTypeId: body.operation_type_id,
        amount: body.amount,
      });

      res.status(201).json(toTransactionResponse(transaction));
    } catch (error) {
      next(error);
    }
  });

  router.get('/:transactionId', async (req, res, next) => {
    try {
      const { transactionId } = parseInput(TransactionIdParamSchema, req.params, 'INVALID_TRANSACTION_ID');
      const transaction = await transactions.getTransaction(transactionId);

      res.json(toTransactionResponse(transaction));
    } catch (error) {
      next(error);
    }
  });

  return router;
};

export const operationTypeRoutes = (transactions: TransactionService): Router => {
  const router = Router();

  router.get('/', async (_req, res, next) => {
    try {
      const operationTypes = await transactions.listOperationTypes();
      res.json({ operation_types: operationTypes.map(toOperationTypeResponse) });
    } catch (error) {
      next(error);
    }
  });

  return router;
};
