/**
 * Status workflow persistence: apply triage commands and keep their history
 */

import type Database from "better-sqlite3";
import type {
  StatusCommand,
  StatusEvent,
  Submission,
  SubmissionKind,
  TriageStatus,
} from "../types.js";
import { SUBMISSION_TABLES, isTriageStatus } from "../types.js";
import { withTransaction } from "../db.js";
import { StoreError, ValidationError, ValidationErrorCode } from "../errors.js";
import {
  transition,
  validateDuplicateTarget,
  type TriageState,
} from "../workflow/status-machine.js";
import { getSubmission } from "./submissions.js";

/**
 * Write a triage state and record the transition in status_events
 */
export function setStatus(
  db: Database.Database,
  kind: SubmissionKind,
  id: number,
  from: TriageStatus,
  next: TriageState,
  now: Date = new Date()
): void {
  const timestamp = now.toISOString();
  withTransaction(db, () => {
    const info = db
      .prepare(
        `UPDATE ${SUBMISSION_TABLES[kind]}
         SET status = ?, notes = ?, duplicate_of = ?, fixed_at = ?, updated_at = ?
         WHERE id = ?`
      )
      .run(next.status, next.notes, next.duplicate_of, next.fixed_at, timestamp, id);
    if (info.changes === 0) {
      throw new ValidationError(
        `${kind} #${id} not found`,
        ValidationErrorCode.NOT_FOUND
      );
    }

    db.prepare(
      `INSERT INTO status_events
         (entity_kind, entity_id, from_status, to_status, notes, duplicate_of, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?)`
    ).run(kind, id, from, next.status, next.notes, next.duplicate_of, timestamp);
  });
}

/**
 * Validate and apply a triage command, returning the updated record
 */
export function applyStatusCommand(
  db: Database.Database,
  kind: SubmissionKind,
  id: number,
  command: StatusCommand,
  now: Date = new Date()
): Submission {
  const table = SUBMISSION_TABLES[kind];
  const lookup = db.prepare<[number], { duplicate_of: number | null }>(
    `SELECT duplicate_of FROM ${table} WHERE id = ?`
  );

  withTransaction(db, () => {
    const current = getSubmission(db, kind, id);
    if (!current) {
      throw new ValidationError(
        `${kind} #${id} not found`,
        ValidationErrorCode.NOT_FOUND
      );
    }

    if (command.type === "duplicate") {
      validateDuplicateTarget(id, command.of, (target) => {
        const row = lookup.get(target);
        return row ? row.duplicate_of : undefined;
      });
    }

    const next = transition(
      {
        status: current.status,
        notes: current.notes,
        duplicate_of: current.duplicate_of,
        fixed_at: current.fixed_at,
      },
      command,
      now
    );
    setStatus(db, kind, id, current.status, next, now);
  });

  const updated = getSubmission(db, kind, id);
  if (!updated) {
    throw new StoreError(`${kind} #${id} vanished after status update`);
  }
  return updated;
}

interface StatusEventRow {
  id: number;
  entity_kind: string;
  entity_id: number;
  from_status: string;
  to_status: string;
  notes: string | null;
  duplicate_of: number | null;
  created_at: string;
}

export function getStatusHistory(
  db: Database.Database,
  kind: SubmissionKind,
  id: number
): StatusEvent[] {
  const rows = db
    .prepare<[SubmissionKind, number], StatusEventRow>(
      `SELECT * FROM status_events WHERE entity_kind = ? AND entity_id = ? ORDER BY id`
    )
    .all(kind, id);

  return rows.map((row) => {
    if (!isTriageStatus(row.from_status) || !isTriageStatus(row.to_status)) {
      throw new StoreError(`Corrupt status event #${row.id}`);
    }
    return {
      ...row,
      entity_kind: kind,
      from_status: row.from_status,
      to_status: row.to_status,
    };
  });
}
