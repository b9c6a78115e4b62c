/**
 * Database initialization
 *
 * Opens the local SQLite file through better-sqlite3 and wraps it with
 * Drizzle. The single pricing_plans table is created on first start.
 */

import Database from 'better-sqlite3';
import { sql } from 'drizzle-orm';
import {
  drizzle,
  type BetterSQLite3Database,
} from 'drizzle-orm/better-sqlite3';

import * as schema from './schema.js';

export type PricingDb = BetterSQLite3Database<typeof schema>;

export interface OpenDatabaseOptions {
  /** SQLite file path (default: './pricing.db'). Use ':memory:' for tests. */
  databasePath?: string;
}

export interface DatabaseHandle {
  db: PricingDb;
  close(): void;
}

/**
 * Create the pricing_plans table if it does not exist yet
 */
export function runMigrations(db: PricingDb): void {
  db.run(sql`
    CREATE TABLE IF NOT EXISTS pricing_plans (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      company_name TEXT,
      plan_name TEXT,
      input_tokens REAL,
      output_tokens REAL,
      currency TEXT,
      billing_period TEXT,
      features TEXT,
      limitations TEXT,
      source_query TEXT,
      created_at DATETIME DEFAULT CURRENT_TIMESTAMP
    )
  `);
}

/**
 * Open (and migrate) the pricing database
 */
export function openDatabase(options: OpenDatabaseOptions = {}): DatabaseHandle {
  const sqlite = new Database(options.databasePath ?? './pricing.db');

  // wait up to 5s on a locked file
  sqlite.pragma('busy_timeout = 5000');

  const db = drizzle(sqlite, { schema });
  runMigrations(db);

  return {
    db,
    close: () => sqlite.close(),
  };
}

/**
 * Open an in-memory database for testing
 */
export function openTestDatabase(): DatabaseHandle {
  return openDatabase({ databasePath: ':memory:' });
}
