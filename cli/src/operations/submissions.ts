/**
 * Operations for crash and feedback submissions
 *
 * Both kinds share one code path; the kind selects the table and the
 * kind-specific columns.
 */

import type Database from "better-sqlite3";
import type {
  AttachmentState,
  Submission,
  SubmissionFilters,
  SubmissionKind,
  SubmissionStats,
  TriageStatus,
} from "../types.js";
import {
  SUBMISSION_TABLES,
  TRIAGE_STATUSES,
  UNFIXED_STATUSES,
  isAttachmentState,
  isTriageStatus,
} from "../types.js";
import { isUniqueViolation, withTransaction } from "../db.js";
import { StoreError } from "../errors.js";

/**
 * Remote fields copied into a new local record
 */
export interface NewSubmissionInput {
  remote_id: string;
  created_at?: string | null;
  device_model?: string | null;
  os_version?: string | null;
  app_platform?: string | null;
  device_family?: string | null;
  connection_type?: string | null;
  battery_pct?: number | null;
  tester_email?: string | null;
  tester_comment?: string | null;
  build_bundle_id?: string | null;
  build_id?: string | null;
  /** crash only */
  architecture?: string | null;
  /** crash only */
  app_uptime_ms?: number | null;
  /** feedback only */
  mime_type?: string | null;
}

export interface FindOrCreateResult {
  id: number;
  isNew: boolean;
}

interface SubmissionRow {
  id: number;
  app_id: number;
  remote_id: string;
  created_at: string;
  first_seen_at: string;
  updated_at: string;
  device_model: string | null;
  os_version: string | null;
  app_platform: string | null;
  device_family: string | null;
  connection_type: string | null;
  battery_pct: number | null;
  tester_email: string | null;
  tester_comment: string | null;
  build_bundle_id: string | null;
  build_id: string | null;
  architecture?: string | null;
  app_uptime_ms?: number | null;
  mime_type?: string | null;
  attachment_state: string;
  attachment_path: string | null;
  status: string;
  notes: string | null;
  fixed_at: string | null;
  duplicate_of: number | null;
  app_bundle_id: string;
  app_name: string | null;
}

const COMMON_COLUMNS = [
  "app_id",
  "remote_id",
  "created_at",
  "first_seen_at",
  "updated_at",
  "device_model",
  "os_version",
  "app_platform",
  "device_family",
  "connection_type",
  "battery_pct",
  "tester_email",
  "tester_comment",
  "build_bundle_id",
  "build_id",
];

const KIND_COLUMNS: Record<SubmissionKind, string[]> = {
  crash: ["architecture", "app_uptime_ms"],
  feedback: ["mime_type"],
};

function selectSql(kind: SubmissionKind): string {
  return `
    SELECT t.*, a.bundle_id AS app_bundle_id, a.name AS app_name
    FROM ${SUBMISSION_TABLES[kind]} t
    JOIN apps a ON a.id = t.app_id
  `;
}

/**
 * Narrow a raw row into a typed submission
 */
function toSubmission(kind: SubmissionKind, row: SubmissionRow): Submission {
  const { status, attachment_state } = row;
  if (!isTriageStatus(status) || !isAttachmentState(attachment_state)) {
    throw new StoreError(
      `Corrupt ${kind} #${row.id}: status=${status} attachment_state=${attachment_state}`
    );
  }

  const base = {
    id: row.id,
    app_id: row.app_id,
    remote_id: row.remote_id,
    created_at: row.created_at,
    first_seen_at: row.first_seen_at,
    updated_at: row.updated_at,
    device_model: row.device_model,
    os_version: row.os_version,
    app_platform: row.app_platform,
    device_family: row.device_family,
    connection_type: row.connection_type,
    battery_pct: row.battery_pct,
    tester_email: row.tester_email,
    tester_comment: row.tester_comment,
    build_bundle_id: row.build_bundle_id,
    build_id: row.build_id,
    attachment_state,
    attachment_path: row.attachment_path,
    status,
    notes: row.notes,
    fixed_at: row.fixed_at,
    duplicate_of: row.duplicate_of,
    app_bundle_id: row.app_bundle_id,
    app_name: row.app_name,
  };

  if (kind === "crash") {
    return {
      ...base,
      kind,
      architecture: row.architecture ?? null,
      app_uptime_ms: row.app_uptime_ms ?? null,
    };
  }
  return { ...base, kind, mime_type: row.mime_type ?? null };
}

/**
 * Reconcile one remote record against local state.
 *
 * Returns the existing local id when (app, remote id) is already known,
 * otherwise inserts a record with status 'new' and attachment 'pending'.
 * The UNIQUE(app_id, remote_id) constraint is the guard: a violation means
 * the record is already known and is resolved by lookup.
 */
export function findOrCreateSubmission(
  db: Database.Database,
  kind: SubmissionKind,
  appId: number,
  input: NewSubmissionInput,
  now: Date = new Date()
): FindOrCreateResult {
  const table = SUBMISSION_TABLES[kind];
  const columns = [...COMMON_COLUMNS, ...KIND_COLUMNS[kind]];
  const seenAt = now.toISOString();

  const params: Record<string, string | number | null> = {
    app_id: appId,
    remote_id: input.remote_id,
    created_at: input.created_at || seenAt,
    first_seen_at: seenAt,
    updated_at: seenAt,
    device_model: input.device_model ?? null,
    os_version: input.os_version ?? null,
    app_platform: input.app_platform ?? null,
    device_family: input.device_family ?? null,
    connection_type: input.connection_type ?? null,
    battery_pct: input.battery_pct ?? null,
    tester_email: input.tester_email ?? null,
    tester_comment: input.tester_comment ?? null,
    build_bundle_id: input.build_bundle_id ?? null,
    build_id: input.build_id ?? null,
  };
  if (kind === "crash") {
    params.architecture = input.architecture ?? null;
    params.app_uptime_ms = input.app_uptime_ms ?? null;
  } else {
    params.mime_type = input.mime_type ?? null;
  }

  return withTransaction(db, () => {
    try {
      const info = db
        .prepare(
          `INSERT INTO ${table} (${columns.join(", ")})
           VALUES (${columns.map((c) => `@${c}`).join(", ")})`
        )
        .run(params);
      return { id: Number(info.lastInsertRowid), isNew: true };
    } catch (error) {
      if (!isUniqueViolation(error)) {
        throw error;
      }
    }

    const existing = db
      .prepare<[number, string], { id: number; mime_type?: string | null }>(
        `SELECT * FROM ${table} WHERE app_id = ? AND remote_id = ?`
      )
      .get(appId, input.remote_id);
    if (!existing) {
      throw new StoreError(
        `${kind} ${input.remote_id} violated uniqueness but cannot be found`
      );
    }

    // A screenshot may only appear on a later pull
    if (kind === "feedback" && !existing.mime_type && input.mime_type) {
      db.prepare(
        `UPDATE feedbacks SET mime_type = ?, updated_at = ? WHERE id = ?`
      ).run(input.mime_type, seenAt, existing.id);
    }

    return { id: existing.id, isNew: false };
  });
}

export function getSubmission(
  db: Database.Database,
  kind: SubmissionKind,
  id: number
): Submission | undefined {
  const row = db
    .prepare<[number], SubmissionRow>(`${selectSql(kind)} WHERE t.id = ?`)
    .get(id);
  return row ? toSubmission(kind, row) : undefined;
}

export function listSubmissions(
  db: Database.Database,
  kind: SubmissionKind,
  filters: SubmissionFilters = {}
): Submission[] {
  let query = `${selectSql(kind)} WHERE 1=1`;
  const params: Array<string | number> = [];

  if (filters.status && filters.status.length > 0) {
    query += ` AND t.status IN (${filters.status.map(() => "?").join(", ")})`;
    params.push(...filters.status);
  }

  if (filters.since) {
    query += " AND t.created_at >= ?";
    params.push(filters.since);
  }

  if (filters.app_bundle_id) {
    query += " AND a.bundle_id = ?";
    params.push(filters.app_bundle_id);
  }

  if (filters.attachment_state) {
    query += " AND t.attachment_state = ?";
    params.push(filters.attachment_state);
  }

  query += " ORDER BY t.created_at DESC, t.id DESC LIMIT ?";
  params.push(filters.limit ?? 50);

  return db
    .prepare<Array<string | number>, SubmissionRow>(query)
    .all(...params)
    .map((row) => toSubmission(kind, row));
}

/**
 * Records of one app whose attachment has not been saved yet
 */
export function listPendingAttachments(
  db: Database.Database,
  kind: SubmissionKind,
  appId: number
): Submission[] {
  return db
    .prepare<[number], SubmissionRow>(
      `${selectSql(kind)} WHERE t.app_id = ? AND t.attachment_state != 'downloaded' ORDER BY t.id`
    )
    .all(appId)
    .map((row) => toSubmission(kind, row));
}

/**
 * Set a record's attachment state. A feedback without a MIME type takes
 * mimeType when one is given.
 */
export function updateAttachmentState(
  db: Database.Database,
  kind: SubmissionKind,
  id: number,
  state: AttachmentState,
  attachmentPath: string | null = null,
  now: Date = new Date(),
  mimeType: string | null = null
): boolean {
  return withTransaction(db, () => {
    if (kind === "feedback" && mimeType) {
      const info = db
        .prepare(
          `UPDATE feedbacks
           SET attachment_state = ?, attachment_path = ?, updated_at = ?,
               mime_type = COALESCE(mime_type, ?)
           WHERE id = ?`
        )
        .run(state, attachmentPath, now.toISOString(), mimeType, id);
      return info.changes > 0;
    }
    const info = db
      .prepare(
        `UPDATE ${SUBMISSION_TABLES[kind]}
         SET attachment_state = ?, attachment_path = ?, updated_at = ?
         WHERE id = ?`
      )
      .run(state, attachmentPath, now.toISOString(), id);
    return info.changes > 0;
  });
}

export interface SubmissionTotals {
  total: number;
  unfixed: number;
}

export function countTotals(
  db: Database.Database,
  kind: SubmissionKind
): SubmissionTotals {
  const row = db
    .prepare<[], { total: number; unfixed: number | null }>(
      `SELECT COUNT(*) AS total,
              SUM(CASE WHEN status IN (${UNFIXED_STATUSES.map((s) => `'${s}'`).join(", ")}) THEN 1 ELSE 0 END) AS unfixed
       FROM ${SUBMISSION_TABLES[kind]}`
    )
    .get();
  return { total: row?.total ?? 0, unfixed: row?.unfixed ?? 0 };
}

const TOP_N = 15;

/**
 * Counts by status, attachment state, device model and OS version
 */
export function getStats(
  db: Database.Database,
  kind: SubmissionKind,
  appBundleId?: string
): SubmissionStats {
  const from = `FROM ${SUBMISSION_TABLES[kind]} t JOIN apps a ON a.id = t.app_id`;
  const where = appBundleId ? "WHERE a.bundle_id = ?" : "WHERE 1=1";
  const params = appBundleId ? [appBundleId] : [];

  const group = (column: string) =>
    db
      .prepare<string[], { value: string | null; count: number }>(
        `SELECT t.${column} AS value, COUNT(*) AS count ${from} ${where} GROUP BY t.${column}`
      )
      .all(...params);

  const top = (column: string) =>
    db
      .prepare<string[], { value: string; count: number }>(
        `SELECT t.${column} AS value, COUNT(*) AS count ${from} ${where}
         AND t.${column} IS NOT NULL
         GROUP BY t.${column} ORDER BY count DESC, value ASC LIMIT ${TOP_N}`
      )
      .all(...params);

  const by_status: Record<TriageStatus, number> = {
    new: 0,
    investigating: 0,
    fixed: 0,
    wontfix: 0,
    duplicate: 0,
  };
  for (const { value, count } of group("status")) {
    if (isTriageStatus(value)) by_status[value] = count;
  }

  const by_attachment_state: Record<AttachmentState, number> = {
    pending: 0,
    downloaded: 0,
    unavailable: 0,
  };
  for (const { value, count } of group("attachment_state")) {
    if (isAttachmentState(value)) by_attachment_state[value] = count;
  }

  const total = TRIAGE_STATUSES.reduce((sum, s) => sum + by_status[s], 0);
  const unfixed = UNFIXED_STATUSES.reduce((sum, s) => sum + by_status[s], 0);

  return {
    kind,
    total,
    unfixed,
    by_status,
    by_attachment_state,
    by_device: top("device_model"),
    by_os: top("os_version"),
  };
}
