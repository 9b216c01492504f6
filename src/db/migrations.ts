/**
 * SQLite schema migrations.
 *
 * Migrations are numbered and tracked in `schema_migrations`; each runs in its
 * own transaction and is applied once.
 */

import type Database from 'better-sqlite3';

export interface Migration {
  version: number;
  name: string;
  up: string;
}

/**
 * All migrations in order. Append new migrations to the end.
 */
export const migrations: Migration[] = [
  {
    version: 1,
    name: 'webhook_events',
    up: `
      CREATE TABLE clients (
        id TEXT PRIMARY KEY,
        webhook_enabled INTEGER NOT NULL DEFAULT 0,
        webhook_url TEXT,
        webhook_secret TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE TABLE webhook_events (
        id TEXT PRIMARY KEY,
        client_id TEXT NOT NULL,
        payment_id TEXT NOT NULL,
        event_type TEXT NOT NULL,
        status TEXT NOT NULL DEFAULT 'pending' CHECK (status IN ('pending', 'delivered', 'failed')),
        attempts INTEGER NOT NULL DEFAULT 0 CHECK (attempts >= 0),
        max_attempts INTEGER NOT NULL DEFAULT 5,
        next_attempt_at TEXT,
        payload TEXT NOT NULL,
        last_error TEXT,
        last_response_code INTEGER,
        delivered_at TEXT,
        created_at TEXT NOT NULL,
        updated_at TEXT NOT NULL
      );

      CREATE INDEX idx_webhook_events_client ON webhook_events(client_id);
      CREATE INDEX idx_webhook_events_payment ON webhook_events(payment_id);
      CREATE INDEX idx_webhook_events_event_type ON webhook_events(event_type);
      CREATE INDEX idx_webhook_events_due ON webhook_events(status, next_attempt_at);
    `,
  },
];

function ensureMigrationsTable(db: Database.Database): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);
}

/**
 * Highest applied migration version, 0 for a fresh database.
 */
export function getCurrentVersion(db: Database.Database): number {
  ensureMigrationsTable(db);
  const row = db
    .prepare<[], { version: number | null }>('SELECT MAX(version) AS version FROM schema_migrations')
    .get();
  return row?.version ?? 0;
}

/**
 * Run all pending migrations. Returns the number applied.
 */
export function migrate(db: Database.Database): number {
  const currentVersion = getCurrentVersion(db);
  const pending = migrations.filter((m) => m.version > currentVersion);

  if (pending.length === 0) return 0;

  const insertMigration = db.prepare<[number, string]>(
    'INSERT INTO schema_migrations (version, name) VALUES (?, ?)'
  );

  for (const migration of pending) {
    const run = db.transaction(() => {
      db.exec(migration.up);
      insertMigration.run(migration.version, migration.name);
    });
    run();
  }

  return pending.length;
}
