import type { TransactionType } from '../entities/Transaction.js';

/**
 * Canonicalizes a transaction amount. The submitted sign is discarded: debits
 * always come back negative and credits positive, with the magnitude kept.
 */
export const normalizeAmount = (amount: number, classification: TransactionType): number => {
  const magnitude = Math.abs(amount);

  return classification === 'DEBIT' ? -magnitude : magnitude;
};
