import { z } from 'zod';
import type { Account } from '../../domain/entities/Account.js';

export const CreateAccountRequestSchema = z.object({
  document_number: z.string({
    required_error: 'document_number is required',
    invalid_type_error: 'document_number must be a string',
  }),
});

export type CreateAccountRequestDTO = z.infer<typeof CreateAccountRequestSchema>;

export const integerParam = (message: string) =>
  z.string({ invalid_type_error: message }).trim().regex(/^-?\d+$/, message).transform(Number);

export const AccountIdParamSchema = z.object({
  accountId: integerParam('Invalid account ID'),
});

export interface AccountResponseDTO {
  account_id: number;
  document_number: string;
  created_at: string;
}

export const toAccountResponse = (account: Account): AccountResponseDTO => ({
  account_id: account.id,
  document_number: account.documentNumber,
  created_at: account.createdAt,
});
