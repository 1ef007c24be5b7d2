export const INSERT_ACCOUNT_SQL = `
  INSERT INTO accounts (document_number, created_at)
  VALUES (?, ?)
  RETURNING id, document_number, created_at
`;

export const FIND_ACCOUNT_BY_ID_SQL = `
  SELECT id, document_number, created_at
  FROM accounts
  WHERE id = ?
`;

export const FIND_ACCOUNT_BY_DOCUMENT_SQL = `
  SELECT id, document_number, created_at
  FROM accounts
  WHERE document_number = ?
`;

export const INSERT_OPERATION_TYPE_SQL = `
  INSERT OR IGNORE INTO operation_types (id, description, created_at)
  VALUES (?, ?, ?)
`;

export const FIND_OPERATION_TYPE_BY_ID_SQL = `
  SELECT id, description, created_at
  FROM operation_types
  WHERE id = ?
`;

export const LIST_OPERATION_TYPES_SQL = `
  SELECT id, description, created_at
  FROM operation_types
  ORDER BY id
`;

export const INSERT_TRANSACTION_SQL = `
  INSERT INTO transactions (account_id, operation_type_id, amount, event_date)
  VALUES (?, ?, ?, ?)
  RETURNING id, account_id, operation_type_id, amount, event_date
`;

export const FIND_TRANSACTION_BY_ID_SQL = `
  SELECT id, account_id, operation_type_id, amount, event_date
  FROM transactions
  WHERE id = ?
`;

export const PAGE_TRANSACTIONS_BY_ACCOUNT_SQL = `
  SELECT id, account_id, operation_type_id, amount, event_date
  FROM transactions
  WHERE account_id = ?
  ORDER BY event_date DESC, id DESC
  LIMIT ? OFFSET ?
`;

export const COUNT_TRANSACTIONS_BY_ACCOUNT_SQL = `
  SELECT COUNT(*) AS total
  FROM transactions
  WHERE account_id = ?
`;
