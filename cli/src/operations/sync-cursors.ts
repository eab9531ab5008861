/**
 * Pagination progress per (app, kind)
 *
 * A cursor with a next_url and no completed_at marks a pull that was
 * interrupted. The next run still starts from the first page: the remote
 * list is newest-first, so a stored cursor can point past records that
 * arrived in the meantime.
 */

import type Database from "better-sqlite3";
import type { SubmissionKind } from "../types.js";
import { withTransaction } from "../db.js";

export interface SyncCursor {
  app_id: number;
  kind: SubmissionKind;
  next_url: string | null;
  pages_fetched: number;
  records_seen: number;
  started_at: string;
  updated_at: string;
  completed_at: string | null;
}

export function getSyncCursor(
  db: Database.Database,
  appId: number,
  kind: SubmissionKind
): SyncCursor | undefined {
  const row = db
    .prepare<[number, SubmissionKind], Omit<SyncCursor, "kind">>(
      `SELECT app_id, next_url, pages_fetched, records_seen, started_at, updated_at, completed_at
       FROM sync_cursors WHERE app_id = ? AND kind = ?`
    )
    .get(appId, kind);
  return row ? { ...row, kind } : undefined;
}

/**
 * True when the previous pull for this app and kind never finished
 */
export function isInterrupted(cursor: SyncCursor | undefined): boolean {
  return cursor !== undefined && cursor.completed_at === null;
}

export function beginSyncCursor(
  db: Database.Database,
  appId: number,
  kind: SubmissionKind,
  now: Date = new Date()
): void {
  const timestamp = now.toISOString();
  withTransaction(db, () => {
    db.prepare(
      `INSERT INTO sync_cursors (app_id, kind, next_url, pages_fetched, records_seen, started_at, updated_at, completed_at)
       VALUES (?, ?, NULL, 0, 0, ?, ?, NULL)
       ON CONFLICT(app_id, kind) DO UPDATE SET
         next_url = NULL,
         pages_fetched = 0,
         records_seen = 0,
         started_at = excluded.started_at,
         updated_at = excluded.updated_at,
         completed_at = NULL`
    ).run(appId, kind, timestamp, timestamp);
  });
}

/**
 * Record a page whose records have all been reconciled
 */
export function advanceSyncCursor(
  db: Database.Database,
  appId: number,
  kind: SubmissionKind,
  nextUrl: string | null,
  recordsOnPage: number,
  now: Date = new Date()
): void {
  withTransaction(db, () => {
    db.prepare(
      `UPDATE sync_cursors
       SET next_url = ?, pages_fetched = pages_fetched + 1,
           records_seen = records_seen + ?, updated_at = ?
       WHERE app_id = ? AND kind = ?`
    ).run(nextUrl, recordsOnPage, now.toISOString(), appId, kind);
  });
}

export function completeSyncCursor(
  db: Database.Database,
  appId: number,
  kind: SubmissionKind,
  now: Date = new Date()
): void {
  const timestamp = now.toISOString();
  withTransaction(db, () => {
    db.prepare(
      `UPDATE sync_cursors
       SET next_url = NULL, completed_at = ?, updated_at = ?
       WHERE app_id = ? AND kind = ?`
    ).run(timestamp, timestamp, appId, kind);
  });
}
