/**
 * CLI handlers for setup and for talking to App Store Connect
 */

import * as os from "os";
import * as path from "path";
import chalk from "chalk";
import Table from "cli-table3";
import type { CommandContext } from "./context.js";
import { ApiClient } from "../api/client.js";
import { AttachmentFetcher } from "../attachments/fetcher.js";
import { TokenSigner } from "../auth/token-signer.js";
import {
  GLOBAL_DATA_DIR,
  LOCAL_DATA_DIR,
  initDataDir,
  resolvePrivateKey,
  type CrashdeskConfig,
} from "../config.js";
import { initDatabase } from "../db.js";
import { ConfigError, errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { runSync, type SyncAppTarget } from "../sync/orchestrator.js";
import type { SubmissionKind, SyncReport } from "../types.js";

export interface ApiServices {
  signer: TokenSigner;
  client: ApiClient;
  fetcher: AttachmentFetcher;
}

/**
 * Wire the signer, client and fetcher for a loaded config
 */
export function createApiServices(
  config: CrashdeskConfig,
  dataDir: string,
  logger: Logger = silentLogger
): ApiServices {
  const signer = new TokenSigner({
    issuerId: config.api.issuer_id,
    keyId: config.api.key_id,
    privateKey: resolvePrivateKey(config, dataDir),
  });
  const client = new ApiClient({ signer, baseUrl: config.api.base_url, logger });
  const fetcher = new AttachmentFetcher(client, logger);
  return { signer, client, fetcher };
}

// ============================================================================
// Init
// ============================================================================

export interface InitOptions {
  global?: boolean;
  dataDir?: string;
  cwd?: string;
  homeDir?: string;
}

export async function handleInit(
  options: InitOptions,
  jsonOutput = false
): Promise<void> {
  try {
    const cwd = options.cwd ?? process.cwd();
    const dataDir = options.dataDir
      ? path.resolve(cwd, options.dataDir)
      : options.global
        ? path.join(options.homeDir ?? os.homedir(), GLOBAL_DATA_DIR)
        : path.join(cwd, LOCAL_DATA_DIR);

    const { paths, configCreated } = initDataDir(dataDir);
    initDatabase({ path: paths.database }).close();

    if (jsonOutput) {
      console.log(
        JSON.stringify({ data_dir: dataDir, config_created: configCreated }, null, 2)
      );
      return;
    }

    console.log(chalk.green("✓ Initialized data directory"), chalk.cyan(dataDir));
    if (configCreated) {
      console.log(chalk.gray(`  Edit ${paths.config} with your API key details`));
    } else {
      console.log(chalk.gray(`  Kept existing ${paths.config}`));
    }
  } catch (error) {
    console.error(chalk.red("✗ Failed to initialize data directory"));
    console.error(errorMessage(error));
    process.exit(1);
  }
}

// ============================================================================
// Apps
// ============================================================================

export async function handleApps(
  ctx: Pick<CommandContext, "jsonOutput">,
  client: Pick<ApiClient, "listApps">
): Promise<void> {
  try {
    const apps: Array<{ id: string; bundle_id: string | null; name: string | null }> = [];
    for await (const app of client.listApps()) {
      apps.push({
        id: app.id,
        bundle_id: app.attributes?.bundleId ?? null,
        name: app.attributes?.name ?? null,
      });
    }

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(apps, null, 2));
      return;
    }

    if (apps.length === 0) {
      console.log(chalk.yellow("No apps found for this API key"));
      return;
    }

    const table = new Table({
      head: [chalk.cyan("App ID"), chalk.cyan("Bundle ID"), chalk.cyan("Name")],
    });
    for (const app of apps) {
      table.push([app.id, app.bundle_id ?? "-", app.name ?? "-"]);
    }
    console.log(table.toString());
  } catch (error) {
    console.error(chalk.red("✗ Failed to list apps"));
    console.error(errorMessage(error));
    process.exit(1);
  }
}

// ============================================================================
// Sync
// ============================================================================

export interface SyncCommandOptions {
  app?: string;
  /** false with --no-crashes */
  crashes?: boolean;
  /** false with --no-feedback */
  feedback?: boolean;
}

export interface SyncCommandDeps {
  config: CrashdeskConfig;
  services: Pick<ApiServices, "client" | "signer" | "fetcher">;
  logger?: Logger;
  signal?: AbortSignal;
  now?: () => Date;
}

export function selectSyncTargets(
  config: CrashdeskConfig,
  bundleId?: string
): SyncAppTarget[] {
  const apps = bundleId
    ? config.apps.filter((app) => app.bundle_id === bundleId)
    : config.apps;
  if (apps.length === 0) {
    throw new ConfigError(`No configured app matches ${bundleId ?? "(none)"}`);
  }
  return apps.map((app) => ({ bundle_id: app.bundle_id, name: app.name }));
}

export function selectSyncKinds(options: SyncCommandOptions): SubmissionKind[] {
  const kinds: SubmissionKind[] = [];
  if (options.crashes !== false) kinds.push("crash");
  if (options.feedback !== false) kinds.push("feedback");
  return kinds;
}

function printReport(ctx: CommandContext, report: SyncReport): void {
  for (const crash of report.new_crashes) {
    console.log(
      chalk.yellow(`  [CRASH] #${crash.id}`),
      `${crash.device_model ?? "?"} / ${crash.os_version ?? "?"}`,
      chalk.gray(crash.created_at.slice(0, 19))
    );
    console.log(
      chalk.gray(
        crash.attachment_path
          ? `          → ${path.resolve(ctx.dataDir, crash.attachment_path)}`
          : "          → (log not available yet)"
      )
    );
  }
  for (const log of report.recovered_logs) {
    console.log(chalk.blue(`  [LOG] #${log.id}`), `→ ${path.resolve(ctx.dataDir, log.path)}`);
  }
  for (const feedback of report.new_feedbacks) {
    console.log(
      chalk.yellow(`  [FEEDBACK] #${feedback.id}`),
      `${feedback.device_model ?? "?"} / ${feedback.os_version ?? "?"}`,
      chalk.gray(feedback.created_at.slice(0, 19))
    );
    if (feedback.tester_comment) {
      console.log(chalk.gray(`             "${feedback.tester_comment}"`));
    }
  }
  for (const shot of report.recovered_screenshots) {
    console.log(
      chalk.blue(`  [SCREENSHOT] #${shot.id}`),
      `→ ${path.resolve(ctx.dataDir, shot.path)}`
    );
  }

  if (report.pending_attachments.length > 0) {
    console.log(
      chalk.yellow(
        `⚠ ${report.pending_attachments.length} attachment(s) still pending; they will be retried on the next sync`
      )
    );
  }
  for (const error of report.errors) {
    const where = error.kind ? `${error.bundle_id} (${error.kind})` : error.bundle_id;
    console.log(chalk.red(`✗ ${where}: ${error.message}`));
  }

  console.log(
    chalk.bold(
      `Total: ${report.crash_total} crashes (${report.crash_unfixed} unfixed), ` +
        `${report.feedback_total} feedbacks (${report.feedback_unfixed} unfixed)`
    )
  );
}

/**
 * Pull new submissions and attachments. Per-app failures are listed in the
 * report and do not change the exit status.
 */
export async function handleSync(
  ctx: CommandContext,
  deps: SyncCommandDeps,
  options: SyncCommandOptions
): Promise<SyncReport | undefined> {
  try {
    const report = await runSync(
      {
        db: ctx.db,
        client: deps.services.client,
        signer: deps.services.signer,
        fetcher: deps.services.fetcher,
        dataDir: ctx.dataDir,
        logger: deps.logger,
        now: deps.now,
      },
      {
        apps: selectSyncTargets(deps.config, options.app),
        kinds: selectSyncKinds(options),
        signal: deps.signal,
      }
    );

    if (ctx.jsonOutput) {
      console.log(JSON.stringify(report, null, 2));
    } else {
      printReport(ctx, report);
    }
    return report;
  } catch (error) {
    console.error(chalk.red("✗ Sync failed"));
    console.error(errorMessage(error));
    process.exit(1);
  }
}
