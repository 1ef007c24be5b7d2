import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  description: string;
  sql: string;
}

// Append only. Applied versions are recorded in schema_migrations.
export const MIGRATIONS: readonly Migration[] = [
  {
    version: 1,
    description: 'Create initial schema',
    sql: `
      CREATE TABLE IF NOT EXISTS operation_types (
        id INTEGER PRIMARY KEY,
        description TEXT NOT NULL,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS accounts (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        document_number TEXT NOT NULL UNIQUE,
        created_at TEXT NOT NULL
      );

      CREATE TABLE IF NOT EXISTS transactions (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        account_id INTEGER NOT NULL,
        operation_type_id INTEGER NOT NULL,
        amount REAL NOT NULL,
        event_date TEXT NOT NULL,
        created_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP,
        FOREIGN KEY (account_id) REFERENCES accounts(id),
        FOREIGN KEY (operation_type_id) REFERENCES operation_types(id)
      );

      CREATE INDEX IF NOT EXISTS idx_transactions_account_id ON transactions(account_id);
      CREATE INDEX IF NOT EXISTS idx_transactions_operation_type_id ON transactions(operation_type_id);
      CREATE INDEX IF NOT EXISTS idx_accounts_document_number ON accounts(document_number);
    `,
  },
];

const CREATE_MIGRATIONS_TABLE_SQL = `
  CREATE TABLE IF NOT EXISTS schema_migrations (
    version INTEGER PRIMARY KEY,
    description TEXT NOT NULL,
    applied_at TEXT NOT NULL DEFAULT CURRENT_TIMESTAMP
  )
`;

/**
 * Applies every migration not yet recorded, each in its own transaction.
 * Returns the versions applied by this call.
 */
export const runMigrations = (
  db: Database.Database,
  migrations: readonly Migration[] = MIGRATIONS,
): number[] => {
  db.exec(CREATE_MIGRATIONS_TABLE_SQL);

  const isApplied = db.prepare<[number], { version: number }>('SELECT version FROM schema_migrations WHERE version = ?');
  const record = db.prepare<[number, string]>('INSERT INTO schema_migrations (version, description) VALUES (?, ?)');
  const applied: number[] = [];

  for (const migration of [...migrations].sort((a, b) => a.version - b.version)) {
    if (isApplied.get(migration.version)) {
      continue;
    }

    db.transaction(() => {
      db.exec(migration.sql);
      record.run(migration.version, migration.description);
    })();

    applied.push(migration.version);
  }

  return applied;
};
