/**
 * CLI handlers for browsing and triaging crashes and feedback
 *
 * Every handler takes the submission kind, so `crashdesk list` and
 * `crashdesk feedback list` share one implementation.
 */

import * as path from "path";
import chalk from "chalk";
import Table from "cli-table3";
import type { CommandContext } from "./context.js";
import { parseId, parseLimit } from "./context.js";
import {
  getStats,
  getSubmission,
  listSubmissions,
} from "../operations/submissions.js";
import { applyStatusCommand, getStatusHistory } from "../operations/status.js";
import { ValidationError, ValidationErrorCode, errorMessage } from "../errors.js";
import type {
  StatusCommand,
  Submission,
  SubmissionFilters,
  SubmissionKind,
  TriageStatus,
} from "../types.js";
import { isAttachmentState, isTriageStatus } from "../types.js";

const KIND_LABELS: Record<SubmissionKind, string> = {
  crash: "crash",
  feedback: "feedback",
};

const ATTACHMENT_LABELS: Record<SubmissionKind, string> = {
  crash: "crash log",
  feedback: "screenshot",
};

const ATTACHMENT_HEADINGS: Record<SubmissionKind, string> = {
  crash: "Log",
  feedback: "Screenshot",
};

function statusColor(status: TriageStatus): (text: string) => string {
  switch (status) {
    case "new":
      return chalk.yellow;
    case "investigating":
      return chalk.blue;
    case "fixed":
      return chalk.green;
    case "wontfix":
    case "duplicate":
      return chalk.gray;
  }
}

function shortDate(value: string): string {
  return value.slice(0, 19).replace("T", " ");
}

function label(kind: SubmissionKind, id: number): string {
  return `${KIND_LABELS[kind]} #${id}`;
}

// ============================================================================
// List
// ============================================================================

export interface ListOptions {
  status?: string;
  since?: string;
  app?: string;
  attachment?: string;
  limit?: string;
}

export function parseListFilters(options: ListOptions): SubmissionFilters {
  const filters: SubmissionFilters = { limit: parseLimit(options.limit) };

  if (options.status) {
    const statuses: TriageStatus[] = [];
    for (const value of options.status.split(",").map((s) => s.trim())) {
      if (!isTriageStatus(value)) {
        throw new ValidationError(
          `Invalid status: ${value}`,
          ValidationErrorCode.INVALID_VALUE
        );
      }
      statuses.push(value);
    }
    filters.status = statuses;
  }

  if (options.since) {
    const time = Date.parse(options.since);
    if (Number.isNaN(time)) {
      throw new ValidationError(
        `Invalid date for --since: ${options.since}`,
        ValidationErrorCode.INVALID_VALUE
      );
    }
    filters.since = new Date(time).toISOString();
  }

  if (options.app) {
    filters.app_bundle_id = options.app;
  }

  if (options.attachment) {
    if (!isAttachmentState(options.attachment)) {
      throw new ValidationError(
        `Invalid attachment state: ${options.attachment}`,
        ValidationErrorCode.INVALID_VALUE
      );
    }
    filters.attachment_state = options.attachment;
  }

  return filters;
}

export async function handleList(
  ctx: CommandContext,
  kind: SubmissionKind,
  options: ListOptions
): Promise<void> {
  try {
    const submissions = listSubmissions(ctx.db, kind, parseListFilters(options));

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(submissions, null, 2));
      return;
    }

    if (submissions.length === 0) {
      console.log(chalk.yellow(`No ${KIND_LABELS[kind]} submissions found`));
      return;
    }

    const table = new Table({
      head: [
        chalk.cyan("ID"),
        chalk.cyan("Status"),
        chalk.cyan("App"),
        chalk.cyan("Device"),
        chalk.cyan("OS"),
        chalk.cyan("Created"),
        chalk.cyan(ATTACHMENT_HEADINGS[kind]),
      ],
    });

    for (const submission of submissions) {
      table.push([
        String(submission.id),
        statusColor(submission.status)(submission.status),
        submission.app_bundle_id,
        submission.device_model ?? "-",
        submission.os_version ?? "-",
        shortDate(submission.created_at),
        submission.attachment_state === "downloaded"
          ? chalk.green("yes")
          : chalk.gray(submission.attachment_state),
      ]);
    }

    console.log(table.toString());
    console.log(chalk.gray(`\n${submissions.length} ${KIND_LABELS[kind]} submission(s)`));
  } catch (error) {
    console.error(chalk.red(`✗ Failed to list ${KIND_LABELS[kind]} submissions`));
    console.error(errorMessage(error));
    process.exit(1);
  }
}

// ============================================================================
// Show
// ============================================================================

function printSubmission(ctx: CommandContext, submission: Submission): void {
  console.log(chalk.bold(`\n${label(submission.kind, submission.id)}`));
  console.log(chalk.gray("─".repeat(50)));
  console.log(chalk.cyan("Status:"), statusColor(submission.status)(submission.status));
  if (submission.duplicate_of !== null) {
    console.log(chalk.cyan("Duplicate of:"), `#${submission.duplicate_of}`);
  }
  if (submission.notes) {
    console.log(chalk.cyan("Notes:"), submission.notes);
  }
  if (submission.fixed_at) {
    console.log(chalk.cyan("Fixed:"), shortDate(submission.fixed_at));
  }
  console.log(
    chalk.cyan("App:"),
    submission.app_name
      ? `${submission.app_name} (${submission.app_bundle_id})`
      : submission.app_bundle_id
  );
  console.log(chalk.cyan("Submission:"), submission.remote_id);
  console.log(chalk.cyan("Created:"), shortDate(submission.created_at));
  console.log(chalk.cyan("Device:"), submission.device_model ?? "-");
  console.log(chalk.cyan("OS:"), submission.os_version ?? "-");

  if (submission.app_platform) {
    console.log(chalk.cyan("Platform:"), submission.app_platform);
  }
  if (submission.kind === "crash") {
    if (submission.architecture) {
      console.log(chalk.cyan("Architecture:"), submission.architecture);
    }
    if (submission.app_uptime_ms !== null) {
      console.log(chalk.cyan("Uptime:"), `${(submission.app_uptime_ms / 1000).toFixed(1)}s`);
    }
  }
  if (submission.battery_pct !== null) {
    console.log(chalk.cyan("Battery:"), `${submission.battery_pct}%`);
  }
  if (submission.connection_type) {
    console.log(chalk.cyan("Connection:"), submission.connection_type);
  }
  if (submission.build_bundle_id || submission.build_id) {
    console.log(
      chalk.cyan("Build:"),
      [submission.build_bundle_id, submission.build_id].filter(Boolean).join(" ")
    );
  }
  if (submission.tester_email) {
    console.log(chalk.cyan("Tester:"), submission.tester_email);
  }
  if (submission.tester_comment) {
    console.log(chalk.cyan("Comment:"), submission.tester_comment);
  }

  const heading = chalk.cyan(`${ATTACHMENT_HEADINGS[submission.kind]}:`);
  if (submission.attachment_path) {
    console.log(heading, path.resolve(ctx.dataDir, submission.attachment_path));
  } else {
    console.log(heading, chalk.gray(`(${submission.attachment_state})`));
  }
  console.log();
}

export async function handleShow(
  ctx: CommandContext,
  kind: SubmissionKind,
  idArg: string
): Promise<void> {
  try {
    const id = parseId(idArg);
    const submission = getSubmission(ctx.db, kind, id);
    if (!submission) {
      console.error(chalk.red(`✗ ${label(kind, id)} not found`));
      process.exit(1);
      return;
    }

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(submission, null, 2));
      return;
    }
    printSubmission(ctx, submission);
  } catch (error) {
    console.error(chalk.red(`✗ Failed to show ${KIND_LABELS[kind]}`));
    console.error(errorMessage(error));
    process.exit(1);
  }
}

// ============================================================================
// Attachment path (log / screenshot)
// ============================================================================

/**
 * Print the absolute path of a downloaded crash log or screenshot
 */
export async function handleAttachmentPath(
  ctx: CommandContext,
  kind: SubmissionKind,
  idArg: string
): Promise<void> {
  try {
    const id = parseId(idArg);
    const submission = getSubmission(ctx.db, kind, id);
    if (!submission) {
      console.error(chalk.red(`✗ ${label(kind, id)} not found`));
      process.exit(1);
      return;
    }

    if (submission.attachment_state !== "downloaded" || !submission.attachment_path) {
      console.error(
        chalk.red(
          `✗ No ${ATTACHMENT_LABELS[kind]} for ${label(kind, id)} (${submission.attachment_state})`
        )
      );
      console.error(chalk.gray("  Run 'crashdesk sync' to retry the download"));
      process.exit(1);
      return;
    }

    const absolute = path.resolve(ctx.dataDir, submission.attachment_path);
    if (ctx.jsonOutput) {
      console.log(JSON.stringify({ id, path: absolute }, null, 2));
    } else {
      console.log(absolute);
    }
  } catch (error) {
    console.error(chalk.red(`✗ Failed to locate ${ATTACHMENT_LABELS[kind]}`));
    console.error(errorMessage(error));
    process.exit(1);
  }
}

// ============================================================================
// Status commands
// ============================================================================

function describeCommand(command: StatusCommand): string {
  switch (command.type) {
    case "investigate":
      return "investigating";
    case "fix":
      return "fixed";
    case "wontfix":
      return "won't fix";
    case "duplicate":
      return `duplicate of #${command.of}`;
    case "reopen":
      return "new";
  }
}

export interface StatusOptions {
  notes?: string;
  of?: string;
}

/**
 * Build a status command from its name and flags
 */
export function buildStatusCommand(
  type: StatusCommand["type"],
  options: StatusOptions = {}
): StatusCommand {
  switch (type) {
    case "investigate":
    case "reopen":
      return { type };
    case "fix":
      return { type, notes: options.notes ?? "" };
    case "wontfix":
      return options.notes === undefined ? { type } : { type, notes: options.notes };
    case "duplicate":
      if (options.of === undefined) {
        throw new ValidationError(
          "duplicate requires --of <id>",
          ValidationErrorCode.INVALID_VALUE
        );
      }
      return { type, of: parseId(options.of, "--of id") };
  }
}

export async function handleStatusCommand(
  ctx: CommandContext,
  kind: SubmissionKind,
  idArg: string,
  type: StatusCommand["type"],
  options: StatusOptions = {}
): Promise<void> {
  try {
    const id = parseId(idArg);
    const command = buildStatusCommand(type, options);
    const updated = applyStatusCommand(ctx.db, kind, id, command);

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(updated, null, 2));
      return;
    }
    console.log(
      chalk.green(`✓ Marked ${label(kind, id)} as ${describeCommand(command)}`)
    );
    if (updated.notes) {
      console.log(chalk.gray(`  Notes: ${updated.notes}`));
    }
  } catch (error) {
    console.error(chalk.red(`✗ Failed to update ${KIND_LABELS[kind]} status`));
    console.error(errorMessage(error));
    process.exit(1);
  }
}

// ============================================================================
// History
// ============================================================================

export async function handleHistory(
  ctx: CommandContext,
  kind: SubmissionKind,
  idArg: string
): Promise<void> {
  try {
    const id = parseId(idArg);
    if (!getSubmission(ctx.db, kind, id)) {
      console.error(chalk.red(`✗ ${label(kind, id)} not found`));
      process.exit(1);
      return;
    }
    const events = getStatusHistory(ctx.db, kind, id);

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(events, null, 2));
      return;
    }

    if (events.length === 0) {
      console.log(chalk.gray(`No status changes for ${label(kind, id)}`));
      return;
    }

    const table = new Table({
      head: [
        chalk.cyan("When"),
        chalk.cyan("From"),
        chalk.cyan("To"),
        chalk.cyan("Duplicate of"),
        chalk.cyan("Notes"),
      ],
      wordWrap: true,
    });
    for (const event of events) {
      table.push([
        shortDate(event.created_at),
        event.from_status,
        statusColor(event.to_status)(event.to_status),
        event.duplicate_of === null ? "" : `#${event.duplicate_of}`,
        event.notes ?? "",
      ]);
    }
    console.log(table.toString());
  } catch (error) {
    console.error(chalk.red(`✗ Failed to load ${KIND_LABELS[kind]} history`));
    console.error(errorMessage(error));
    process.exit(1);
  }
}

// ============================================================================
// Stats
// ============================================================================

export interface StatsOptions {
  app?: string;
}

export async function handleStats(
  ctx: CommandContext,
  kind: SubmissionKind,
  options: StatsOptions
): Promise<void> {
  try {
    const stats = getStats(ctx.db, kind, options.app);

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(stats, null, 2));
      return;
    }

    const title = kind === "crash" ? "Crash Statistics" : "Feedback Statistics";
    console.log(chalk.bold(`\n${title}${options.app ? ` (${options.app})` : ""}`));
    console.log(chalk.gray("─".repeat(50)));
    console.log(chalk.cyan("Total:"), stats.total);
    console.log(chalk.cyan("Unfixed:"), stats.unfixed);

    console.log(chalk.bold("\nBy status"));
    for (const [status, count] of Object.entries(stats.by_status)) {
      console.log(`  ${status.padEnd(14)} ${count}`);
    }

    console.log(chalk.bold(`\nBy ${ATTACHMENT_LABELS[kind]}`));
    for (const [state, count] of Object.entries(stats.by_attachment_state)) {
      console.log(`  ${state.padEnd(14)} ${count}`);
    }

    if (stats.by_device.length > 0) {
      console.log(chalk.bold("\nTop devices"));
      for (const { value, count } of stats.by_device) {
        console.log(`  ${value.padEnd(24)} ${count}`);
      }
    }
    if (stats.by_os.length > 0) {
      console.log(chalk.bold("\nTop OS versions"));
      for (const { value, count } of stats.by_os) {
        console.log(`  ${value.padEnd(24)} ${count}`);
      }
    }
    console.log();
  } catch (error) {
    console.error(chalk.red(`✗ Failed to compute ${KIND_LABELS[kind]} statistics`));
    console.error(errorMessage(error));
    process.exit(1);
  }
}
