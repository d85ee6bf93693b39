import type { Database as SqliteDatabase } from 'better-sqlite3';
import { logger } from '../middleware/logging';

type Migration = {
  version: number;
  name: string;
  up: (db: SqliteDatabase) => void;
};

const migrations: Migration[] = [
  {
    version: 1,
    name: 'initial-schema',
    up: (db) => {
      db.exec(`
        CREATE TABLE IF NOT EXISTS brands (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          name TEXT NOT NULL UNIQUE CHECK (length(trim(name)) > 0),
          daily_budget_cents INTEGER NOT NULL DEFAULT 0 CHECK (daily_budget_cents >= 0),
          monthly_budget_cents INTEGER NOT NULL DEFAULT 0 CHECK (monthly_budget_cents >= 0),
          created_at TEXT NOT NULL DEFAULT (datetime('now')),
          updated_at TEXT NOT NULL DEFAULT (datetime('now'))
        );

        CREATE TABLE IF NOT EXISTS campaigns (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          brand_id INTEGER NOT NULL REFERENCES brands(id) ON DELETE CASCADE,
          name TEXT NOT NULL,
          daily_budget_cents INTEGER NOT NULL DEFAULT 0 CHECK (daily_budget_cents >= 0),
          monthly_budget_cents INTEGER NOT NULL DEFAULT 0 CHECK (monthly_budget_cents >= 0),
          active INTEGER NOT NULL DEFAULT 1,
          start_date TEXT,
          end_date TEXT,
          created_at TEXT NOT NULL DEFAULT (datetime('now')),
          updated_at TEXT NOT NULL DEFAULT (datetime('now'))
        );

        CREATE TABLE IF NOT EXISTS schedules (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          campaign_id INTEGER NOT NULL UNIQUE REFERENCES campaigns(id) ON DELETE CASCADE,
          start_hour INTEGER NOT NULL DEFAULT 0 CHECK (start_hour BETWEEN 0 AND 23),
          end_hour INTEGER NOT NULL DEFAULT 24 CHECK (end_hour BETWEEN 1 AND 24),
          CHECK (start_hour < end_hour)
        );

        CREATE TABLE IF NOT EXISTS expenses (
          id INTEGER PRIMARY KEY AUTOINCREMENT,
          campaign_id INTEGER NOT NULL REFERENCES campaigns(id) ON DELETE CASCADE,
          amount_cents INTEGER NOT NULL CHECK (amount_cents > 0),
          date TEXT NOT NULL,
          notes TEXT,
          created_at TEXT NOT NULL DEFAULT (datetime('now'))
        );

        CREATE INDEX IF NOT EXISTS idx_campaigns_brand ON campaigns(brand_id);
        CREATE INDEX IF NOT EXISTS idx_expenses_campaign_date ON expenses(campaign_id, date);
      `);
    },
  },
];

export function runMigrations(db: SqliteDatabase): void {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at TEXT NOT NULL DEFAULT (datetime('now'))
    );
  `);

  const applied = new Set(
    db
      .prepare<[], { version: number }>('SELECT version FROM schema_migrations')
      .all()
      .map((row) => row.version)
  );

  const record = db.prepare<[number, string]>(
    'INSERT INTO schema_migrations (version, name) VALUES (?, ?)'
  );

  for (const migration of migrations) {
    if (applied.has(migration.version)) {
      continue;
    }

    db.transaction(() => {
      migration.up(db);
      record.run(migration.version, migration.name);
    })();

    logger.info({ version: migration.version, name: migration.name }, 'Applied database migration');
  }
}
