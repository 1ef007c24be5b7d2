export type ValidationReason =
  | 'INVALID_ACCOUNT_ID'
  | 'INVALID_OPERATION_TYPE'
  | 'ZERO_AMOUNT'
  | 'INVALID_DOCUMENT_NUMBER';

export type ValidationSuccess<T> = {
  success: true;
  data: T;
};

export type ValidationFailure = {
  success: false;
  reason: ValidationReason;
  message: string;
};

export type ValidationResult<T> = ValidationSuccess<T> | ValidationFailure;
