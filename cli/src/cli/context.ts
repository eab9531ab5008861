/**
 * Shared state handed to every command handler
 */

import type Database from "better-sqlite3";
import { ValidationError, ValidationErrorCode } from "../errors.js";

export interface CommandContext {
  db: Database.Database;
  dataDir: string;
  jsonOutput: boolean;
}

/**
 * Parse a local record id from a command argument
 */
export function parseId(value: string, what = "id"): number {
  const id = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isSafeInteger(id) || id <= 0) {
    throw new ValidationError(
      `Invalid ${what}: ${value} (expected a positive integer)`,
      ValidationErrorCode.INVALID_VALUE
    );
  }
  return id;
}

export function parseLimit(value: string | undefined, fallback = 50): number {
  if (value === undefined) {
    return fallback;
  }
  return parseId(value, "limit");
}
