/**
 * Triage status state machine
 *
 * Every command is legal from every status. A record is a duplicate exactly
 * when it carries a duplicate_of reference; any other outcome clears it.
 */

import type { StatusCommand, TriageStatus } from "../types.js";
import { ValidationError, ValidationErrorCode } from "../errors.js";

export interface TriageState {
  status: TriageStatus;
  notes: string | null;
  duplicate_of: number | null;
  fixed_at: string | null;
}

/**
 * Apply a command to a triage state. Pure apart from reading `now` for fixed_at.
 */
export function transition(
  state: TriageState,
  command: StatusCommand,
  now: Date = new Date()
): TriageState {
  switch (command.type) {
    case "investigate":
      return { ...state, status: "investigating", duplicate_of: null };

    case "fix": {
      const notes = command.notes.trim();
      if (notes.length === 0) {
        throw new ValidationError(
          "Notes are required when marking as fixed",
          ValidationErrorCode.MISSING_NOTES
        );
      }
      return {
        status: "fixed",
        notes: command.notes,
        duplicate_of: null,
        fixed_at: now.toISOString(),
      };
    }

    case "wontfix":
      return {
        ...state,
        status: "wontfix",
        notes: command.notes ?? state.notes,
        duplicate_of: null,
      };

    case "duplicate":
      return { ...state, status: "duplicate", duplicate_of: command.of };

    case "reopen":
      // Notes stay; the status_events history keeps the rest.
      return { ...state, status: "new", duplicate_of: null, fixed_at: null };
  }
}

/**
 * Looks up the duplicate_of reference of a record.
 * `undefined` means the record does not exist.
 */
export type DuplicateLookup = (id: number) => number | null | undefined;

/**
 * Check that `id` may be marked a duplicate of `of`.
 * Rejects an unknown target, a self reference, and any chain that leads
 * back to `id`.
 */
export function validateDuplicateTarget(
  id: number,
  of: number,
  lookup: DuplicateLookup
): void {
  if (of === id) {
    throw new ValidationError(
      `#${id} cannot be a duplicate of itself`,
      ValidationErrorCode.SELF_REFERENCE
    );
  }

  let next = lookup(of);
  if (next === undefined) {
    throw new ValidationError(
      `Target #${of} not found`,
      ValidationErrorCode.NOT_FOUND
    );
  }

  const visited = new Set<number>([of]);
  while (next !== null && next !== undefined) {
    if (next === id) {
      throw new ValidationError(
        `Marking #${id} as a duplicate of #${of} would create a cycle`,
        ValidationErrorCode.CYCLE
      );
    }
    if (visited.has(next)) {
      // Pre-existing loop that does not involve `id`
      break;
    }
    visited.add(next);
    next = lookup(next);
  }
}
