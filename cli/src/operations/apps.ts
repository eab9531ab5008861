/**
 * Operations for monitored apps
 */

import type Database from "better-sqlite3";
import type { App } from "../types.js";
import { withTransaction } from "../db.js";
import { StoreError } from "../errors.js";

export interface UpsertAppInput {
  bundle_id: string;
  asc_id?: string | null;
  name?: string | null;
}

/**
 * Insert an app, or fill in its remote id and name if it already exists.
 * Existing values are kept when the input omits them.
 */
export function upsertApp(db: Database.Database, input: UpsertAppInput): App {
  return withTransaction(db, () => {
    db.prepare(
      `
      INSERT INTO apps (bundle_id, asc_id, name) VALUES (@bundle_id, @asc_id, @name)
      ON CONFLICT(bundle_id) DO UPDATE SET
        asc_id = COALESCE(excluded.asc_id, asc_id),
        name = COALESCE(excluded.name, name)
    `
    ).run({
      bundle_id: input.bundle_id,
      asc_id: input.asc_id ?? null,
      name: input.name ?? null,
    });

    const app = getAppByBundleId(db, input.bundle_id);
    if (!app) {
      throw new StoreError(`App ${input.bundle_id} vanished after upsert`);
    }
    return app;
  });
}

export function getAppByBundleId(
  db: Database.Database,
  bundleId: string
): App | undefined {
  return db
    .prepare<[string], App>("SELECT * FROM apps WHERE bundle_id = ?")
    .get(bundleId);
}

export function listApps(db: Database.Database): App[] {
  return db.prepare<[], App>("SELECT * FROM apps ORDER BY bundle_id").all();
}
