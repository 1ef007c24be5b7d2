import type { ValidationResult } from './ValidationResult.js';

const digitsOnly = /^\d+$/;

export const validateDocumentNumber = (input: string): ValidationResult<string> => {
  if (input === '') {
    return { success: false, reason: 'INVALID_DOCUMENT_NUMBER', message: 'document_number is required' };
  }

  if (input.length < 11 || input.length > 14) {
    return {
      success: false,
      reason: 'INVALID_DOCUMENT_NUMBER',
      message: 'document_number must have between 11 and 14 characters',
    };
  }

  if (!digitsOnly.test(input)) {
    return { success: false, reason: 'INVALID_DOCUMENT_NUMBER', message: 'document_number must contain only digits' };
  }

  return { success: true, data: input };
};
