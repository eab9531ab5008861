/**
 * Unit tests for the triage state machine
 */

import { describe, it, expect } from "vitest";
import {
  transition,
  validateDuplicateTarget,
  type TriageState,
} from "../../../src/workflow/status-machine.js";
import { ValidationError, ValidationErrorCode } from "../../../src/errors.js";

const NOW = new Date("2026-10-18T09:30:00.000Z");

const fresh: TriageState = {
  status: "new",
  notes: null,
  duplicate_of: null,
  fixed_at: null,
};

function codeOf(fn: () => unknown): string | undefined {
  try {
    fn();
  } catch (error) {
    return error instanceof ValidationError ? error.code : "unexpected";
  }
  return undefined;
}

describe("transition", () => {
  it("should move to investigating and clear a duplicate reference", () => {
    const next = transition({ ...fresh, status: "duplicate", duplicate_of: 3 }, { type: "investigate" }, NOW);

    expect(next).toEqual({ status: "investigating", notes: null, duplicate_of: null, fixed_at: null });
  });

  it("should require notes to mark as fixed", () => {
    expect(codeOf(() => transition(fresh, { type: "fix", notes: "" }, NOW))).toBe(
      ValidationErrorCode.MISSING_NOTES
    );
    expect(codeOf(() => transition(fresh, { type: "fix", notes: "   " }, NOW))).toBe(
      ValidationErrorCode.MISSING_NOTES
    );
  });

  it("should stamp fixed_at and store the notes", () => {
    const next = transition(fresh, { type: "fix", notes: "patched in build 42" }, NOW);

    expect(next).toEqual({
      status: "fixed",
      notes: "patched in build 42",
      duplicate_of: null,
      fixed_at: "2026-10-18T09:30:00.000Z",
    });
  });

  it("should keep earlier notes when wontfix has none", () => {
    const next = transition({ ...fresh, notes: "seen before" }, { type: "wontfix" }, NOW);

    expect(next.status).toBe("wontfix");
    expect(next.notes).toBe("seen before");
  });

  it("should replace notes when wontfix has some", () => {
    const next = transition({ ...fresh, notes: "seen before" }, { type: "wontfix", notes: "jailbroken device" }, NOW);

    expect(next.notes).toBe("jailbroken device");
  });

  it("should set the duplicate reference", () => {
    const next = transition(fresh, { type: "duplicate", of: 3 }, NOW);

    expect(next).toEqual({ status: "duplicate", notes: null, duplicate_of: 3, fixed_at: null });
  });

  it("should reopen to new, clearing duplicate_of and fixed_at but keeping notes", () => {
    const fixed = transition(fresh, { type: "fix", notes: "patched" }, NOW);

    const next = transition(fixed, { type: "reopen" }, NOW);

    expect(next).toEqual({ status: "new", notes: "patched", duplicate_of: null, fixed_at: null });
  });

  it("should allow every command from every status", () => {
    const states: TriageState[] = [
      fresh,
      { ...fresh, status: "investigating" },
      { ...fresh, status: "fixed", notes: "patched", fixed_at: NOW.toISOString() },
      { ...fresh, status: "wontfix" },
      { ...fresh, status: "duplicate", duplicate_of: 9 },
    ];

    for (const state of states) {
      expect(transition(state, { type: "investigate" }, NOW).status).toBe("investigating");
      expect(transition(state, { type: "fix", notes: "n" }, NOW).status).toBe("fixed");
      expect(transition(state, { type: "wontfix" }, NOW).status).toBe("wontfix");
      expect(transition(state, { type: "duplicate", of: 7 }, NOW).duplicate_of).toBe(7);
      expect(transition(state, { type: "reopen" }, NOW).status).toBe("new");
    }
  });
});

describe("validateDuplicateTarget", () => {
  // id -> duplicate_of
  const records = new Map<number, number | null>([
    [1, null],
    [2, 1],
    [3, 2],
    [5, 6],
    [6, 5],
  ]);
  const lookup = (id: number) => (records.has(id) ? records.get(id) ?? null : undefined);

  it("should accept an existing target", () => {
    expect(() => validateDuplicateTarget(4, 1, lookup)).not.toThrow();
  });

  it("should follow a chain that does not return", () => {
    expect(() => validateDuplicateTarget(4, 3, lookup)).not.toThrow();
  });

  it("should reject a self reference", () => {
    expect(codeOf(() => validateDuplicateTarget(1, 1, lookup))).toBe(ValidationErrorCode.SELF_REFERENCE);
  });

  it("should reject an unknown target", () => {
    expect(codeOf(() => validateDuplicateTarget(1, 99, lookup))).toBe(ValidationErrorCode.NOT_FOUND);
  });

  it("should reject a chain that leads back", () => {
    expect(codeOf(() => validateDuplicateTarget(1, 3, lookup))).toBe(ValidationErrorCode.CYCLE);
  });

  it("should stop on a loop that does not involve the record", () => {
    expect(() => validateDuplicateTarget(4, 5, lookup)).not.toThrow();
  });
});
