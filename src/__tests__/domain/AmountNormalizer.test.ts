import { describe, expect, it } from 'vitest';
import { classifyOperationType, OperationTypeId } from '../../domain/entities/OperationType.js';
import { normalizeAmount } from '../../domain/services/AmountNormalizer.js';

describe('normalizeAmount', () => {
  it('forces debits negative and credits positive', () => {
    expect(normalizeAmount(50, 'DEBIT')).toBe(-50);
    expect(normalizeAmount(-100, 'CREDIT')).toBe(100);
  });

  it('leaves an already correctly signed amount unchanged', () => {
    expect(normalizeAmount(-50, 'DEBIT')).toBe(-50);
    expect(normalizeAmount(100, 'CREDIT')).toBe(100);
    expect(normalizeAmount(normalizeAmount(12.34, 'DEBIT'), 'DEBIT')).toBe(-12.34);
  });

  it('preserves magnitude whatever the input sign', () => {
    for (const amount of [0.01, -0.01, 7, -7, 1234.56, -1234.56]) {
      expect(Math.abs(normalizeAmount(amount, 'DEBIT'))).toBe(Math.abs(amount));
      expect(Math.abs(normalizeAmount(amount, 'CREDIT'))).toBe(Math.abs(amount));
    }
  });

  it('derives the sign from the operation type alone', () => {
    const expectedSign: Record<OperationTypeId, number> = {
      [OperationTypeId.PURCHASE]: -1,
      [OperationTypeId.PURCHASE_WITH_INSTALLMENTS]: -1,
      [OperationTypeId.WITHDRAWAL]: -1,
      [OperationTypeId.CREDIT_VOUCHER]: 1,
    };

    for (const id of Object.values(OperationTypeId)) {
      const classification = classifyOperationType(id);
      expect(Math.sign(normalizeAmount(25, classification))).toBe(expectedSign[id]);
      expect(Math.sign(normalizeAmount(-25, classification))).toBe(expectedSign[id]);
    }
  });
});

describe('classifyOperationType', () => {
  it('tags purchases and withdrawals as debits and vouchers as credits', () => {
    expect(classifyOperationType(OperationTypeId.PURCHASE)).toBe('DEBIT');
    expect(classifyOperationType(OperationTypeId.PURCHASE_WITH_INSTALLMENTS)).toBe('DEBIT');
    expect(classifyOperationType(OperationTypeId.WITHDRAWAL)).toBe('DEBIT');
    expect(classifyOperationType(OperationTypeId.CREDIT_VOUCHER)).toBe('CREDIT');
  });
});
