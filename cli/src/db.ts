/**
 * Database initialization for crashdesk
 */

import Database from "better-sqlite3";
import * as fs from "fs";
import * as path from "path";
import { DB_CONFIG, ALL_TABLES, ALL_INDEXES } from "./schema.js";
import { runMigrations } from "./migrations.js";
import { StoreError } from "./errors.js";

export interface InitDatabaseOptions {
  path: string;
}

/**
 * Open (or create) the crash database and bring its schema up to date.
 * Safe to call repeatedly against an already-current database.
 */
export function initDatabase(options: InitDatabaseOptions): Database.Database {
  let db: Database.Database;
  try {
    if (options.path !== ":memory:") {
      fs.mkdirSync(path.dirname(options.path), { recursive: true });
    }
    db = new Database(options.path);
  } catch (error) {
    throw new StoreError(`Failed to open database at ${options.path}`, {
      cause: error,
    });
  }

  try {
    db.exec(DB_CONFIG);
    for (const table of ALL_TABLES) {
      db.exec(table);
    }
    runMigrations(db);
    for (const indexes of ALL_INDEXES) {
      db.exec(indexes);
    }
  } catch (error) {
    db.close();
    throw new StoreError(
      `Failed to initialize schema at ${options.path}`,
      { cause: error }
    );
  }

  return db;
}

/**
 * Run `fn` inside a transaction, translating SQLite I/O failures into
 * StoreError. Constraint violations are rethrown untouched so callers can
 * react to them.
 */
export function withTransaction<T>(db: Database.Database, fn: () => T): T {
  try {
    return db.transaction(fn)();
  } catch (error) {
    if (error instanceof Database.SqliteError) {
      if (error.code.startsWith("SQLITE_CONSTRAINT")) {
        throw error;
      }
      throw new StoreError(`Database error: ${error.message}`, {
        cause: error,
      });
    }
    throw error;
  }
}

export function isUniqueViolation(error: unknown): boolean {
  return (
    error instanceof Database.SqliteError &&
    (error.code === "SQLITE_CONSTRAINT_UNIQUE" ||
      error.code === "SQLITE_CONSTRAINT_PRIMARYKEY")
  );
}
