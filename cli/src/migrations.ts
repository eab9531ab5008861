/**
 * Database migration utilities for crashdesk
 */

import type Database from "better-sqlite3";

export interface Migration {
  version: number;
  name: string;
  up: (db: Database.Database) => void;
}

interface ColumnInfo {
  name: string;
}

function hasColumn(
  db: Database.Database,
  table: string,
  column: string
): boolean {
  const columns = db
    .prepare<[], ColumnInfo>(`PRAGMA table_info(${table})`)
    .all();
  return columns.some((c) => c.name === column);
}

function addColumnIfMissing(
  db: Database.Database,
  table: string,
  column: string,
  definition: string
): void {
  if (!hasColumn(db, table, column)) {
    db.exec(`ALTER TABLE ${table} ADD COLUMN ${column} ${definition}`);
  }
}

/**
 * All migrations in order.
 * Each one must be safe against a database whose tables were created by the
 * current schema (the columns already exist).
 */
export const MIGRATIONS: Migration[] = [
  {
    version: 1,
    name: "feedback-mime-type",
    up: (db) => {
      addColumnIfMissing(db, "feedbacks", "mime_type", "TEXT");
    },
  },
  {
    version: 2,
    name: "device-family",
    up: (db) => {
      addColumnIfMissing(db, "crashes", "device_family", "TEXT");
      addColumnIfMissing(db, "feedbacks", "device_family", "TEXT");
    },
  },
];

/**
 * Get the current migration version from the database
 */
export function getCurrentMigrationVersion(db: Database.Database): number {
  db.exec(`
    CREATE TABLE IF NOT EXISTS migrations (
      version INTEGER PRIMARY KEY,
      name TEXT NOT NULL,
      applied_at DATETIME NOT NULL DEFAULT CURRENT_TIMESTAMP
    )
  `);

  const result = db
    .prepare<[], { version: number | null }>(
      "SELECT MAX(version) as version FROM migrations"
    )
    .get();
  return result?.version ?? 0;
}

/**
 * Record a migration as applied
 */
export function recordMigration(
  db: Database.Database,
  migration: Migration
): void {
  db.prepare(
    `INSERT OR REPLACE INTO migrations (version, name) VALUES (?, ?)`
  ).run(migration.version, migration.name);
}

/**
 * Run all pending migrations, each in its own transaction.
 * Returns how many were applied.
 */
export function runMigrations(
  db: Database.Database,
  migrations: Migration[] = MIGRATIONS
): number {
  const currentVersion = getCurrentMigrationVersion(db);

  const pendingMigrations = migrations.filter(
    (m) => m.version > currentVersion
  );

  if (pendingMigrations.length === 0) {
    return 0;
  }

  for (const migration of pendingMigrations) {
    try {
      db.transaction(() => {
        migration.up(db);
        recordMigration(db, migration);
      })();
    } catch (error) {
      console.error(`  ✗ Migration ${migration.version} failed:`, error);
      throw error;
    }
  }

  return pendingMigrations.length;
}
