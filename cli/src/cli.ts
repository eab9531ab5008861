#!/usr/bin/env node

/**
 * crashdesk command-line entry point
 */

import * as fs from "fs";
import chalk from "chalk";
import { Command } from "commander";
import { z } from "zod";
import type { CommandContext } from "./cli/context.js";
import {
  handleAttachmentPath,
  handleHistory,
  handleList,
  handleShow,
  handleStats,
  handleStatusCommand,
  type ListOptions,
  type StatsOptions,
  type StatusOptions,
} from "./cli/submission-commands.js";
import {
  createApiServices,
  handleApps,
  handleInit,
  handleSync,
  type SyncCommandOptions,
} from "./cli/sync-commands.js";
import { dataPaths, loadConfig, resolveDataDir } from "./config.js";
import { initDatabase } from "./db.js";
import { ConfigError, errorMessage } from "./errors.js";
import { createConsoleLogger } from "./logger.js";
import type { SubmissionKind } from "./types.js";

interface GlobalOptions {
  json?: boolean;
  dataDir?: string;
  verbose?: boolean;
}

const packageJson = z
  .object({ version: z.string() })
  .parse(JSON.parse(fs.readFileSync(new URL("../package.json", import.meta.url), "utf8")));

const program = new Command();

program
  .name("crashdesk")
  .description("Sync and triage TestFlight crash and screenshot feedback")
  .version(packageJson.version)
  .option("--json", "Output JSON instead of text")
  .option("--data-dir <dir>", "Data directory (default: ./crashdesk or ~/.crashdesk)")
  .option("-v, --verbose", "Log request and pagination details to stderr");

function globalOptions(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

function openContext(): CommandContext {
  const opts = globalOptions();
  const dataDir = resolveDataDir({ dataDir: opts.dataDir });
  const paths = dataPaths(dataDir);
  if (!fs.existsSync(paths.config)) {
    throw new ConfigError(
      `No config found in ${dataDir}. Run 'crashdesk init' first.`,
      paths.config
    );
  }
  return {
    db: initDatabase({ path: paths.database }),
    dataDir,
    jsonOutput: Boolean(opts.json),
  };
}

async function withContext(fn: (ctx: CommandContext) => Promise<unknown>): Promise<void> {
  const ctx = openContext();
  try {
    await fn(ctx);
  } finally {
    ctx.db.close();
  }
}

// ============================================================================
// Setup and sync
// ============================================================================

program
  .command("init")
  .description("Create a data directory with a template config and database")
  .option("--global", "Create ~/.crashdesk instead of ./crashdesk")
  .action(async (options: { global?: boolean }) => {
    const opts = globalOptions();
    await handleInit({ global: options.global, dataDir: opts.dataDir }, Boolean(opts.json));
  });

program
  .command("apps")
  .description("Verify API credentials and list visible apps")
  .action(async () => {
    const opts = globalOptions();
    const dataDir = resolveDataDir({ dataDir: opts.dataDir });
    const logger = createConsoleLogger({ verbose: opts.verbose });
    const { client } = createApiServices(loadConfig(dataDir), dataDir, logger);
    await handleApps({ jsonOutput: Boolean(opts.json) }, client);
  });

program
  .command("sync")
  .description("Pull new crashes and feedback from App Store Connect")
  .option("--app <bundleId>", "Sync only this configured app")
  .option("--no-crashes", "Skip crash submissions")
  .option("--no-feedback", "Skip screenshot feedback")
  .action(async (options: SyncCommandOptions) => {
    await withContext(async (ctx) => {
      const opts = globalOptions();
      const logger = createConsoleLogger({ verbose: opts.verbose });
      const config = loadConfig(ctx.dataDir);
      const services = createApiServices(config, ctx.dataDir, logger);

      const controller = new AbortController();
      const onInterrupt = () => {
        logger.warn("Interrupted; stopping after the current request");
        controller.abort();
      };
      process.once("SIGINT", onInterrupt);
      try {
        await handleSync(
          ctx,
          { config, services, logger, signal: controller.signal },
          options
        );
      } finally {
        process.removeListener("SIGINT", onInterrupt);
      }
    });
  });

// ============================================================================
// Browsing and triage
// ============================================================================

function registerSubmissionCommands(parent: Command, kind: SubmissionKind): void {
  const noun = kind === "crash" ? "crash" : "feedback";

  parent
    .command("list")
    .description(`List ${noun} submissions, newest first`)
    .option("--status <list>", "Comma-separated statuses (new,investigating,fixed,wontfix,duplicate)")
    .option("--since <date>", "Only submissions created on or after this ISO 8601 date")
    .option("--app <bundleId>", "Filter by app bundle id")
    .option("--attachment <state>", "Filter by attachment state (pending,downloaded,unavailable)")
    .option("--limit <n>", "Maximum number of results", "50")
    .action(async (options: ListOptions) => {
      await withContext((ctx) => handleList(ctx, kind, options));
    });

  parent
    .command("show <id>")
    .description(`Show full details of a ${noun}`)
    .action(async (id: string) => {
      await withContext((ctx) => handleShow(ctx, kind, id));
    });

  parent
    .command(kind === "crash" ? "log <id>" : "screenshot <id>")
    .description(
      kind === "crash"
        ? "Print the absolute path of a crash log"
        : "Print the absolute path of a screenshot"
    )
    .action(async (id: string) => {
      await withContext((ctx) => handleAttachmentPath(ctx, kind, id));
    });

  parent
    .command("investigate <id>")
    .description(`Mark a ${noun} as under investigation`)
    .action(async (id: string) => {
      await withContext((ctx) => handleStatusCommand(ctx, kind, id, "investigate"));
    });

  parent
    .command("fix <id>")
    .description(`Mark a ${noun} as fixed`)
    .option("--notes <text>", "What fixed it (required)")
    .action(async (id: string, options: StatusOptions) => {
      await withContext((ctx) => handleStatusCommand(ctx, kind, id, "fix", options));
    });

  parent
    .command("wontfix <id>")
    .description(`Mark a ${noun} as won't fix`)
    .option("--notes <text>", "Reason")
    .action(async (id: string, options: StatusOptions) => {
      await withContext((ctx) => handleStatusCommand(ctx, kind, id, "wontfix", options));
    });

  parent
    .command("duplicate <id>")
    .description(`Mark a ${noun} as a duplicate of another`)
    .requiredOption("--of <id>", "The original submission")
    .action(async (id: string, options: StatusOptions) => {
      await withContext((ctx) => handleStatusCommand(ctx, kind, id, "duplicate", options));
    });

  parent
    .command("reopen <id>")
    .description(`Reset a ${noun} to new`)
    .action(async (id: string) => {
      await withContext((ctx) => handleStatusCommand(ctx, kind, id, "reopen"));
    });

  parent
    .command("history <id>")
    .description(`Show status changes of a ${noun}`)
    .action(async (id: string) => {
      await withContext((ctx) => handleHistory(ctx, kind, id));
    });

  parent
    .command("stats")
    .description(`Show ${noun} statistics`)
    .option("--app <bundleId>", "Only this app")
    .action(async (options: StatsOptions) => {
      await withContext((ctx) => handleStats(ctx, kind, options));
    });
}

registerSubmissionCommands(program, "crash");
registerSubmissionCommands(
  program.command("feedback").description("Manage screenshot feedback submissions"),
  "feedback"
);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`✗ ${errorMessage(error)}`));
  process.exit(1);
});
