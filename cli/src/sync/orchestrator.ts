/**
 * Sync orchestrator
 *
 * One run, per configured app and per kind:
 * 1. Pulls every page of remote submissions and reconciles them locally
 * 2. Fetches attachments for records that do not have one yet
 * 3. Reports what was new, what was recovered and what is still pending
 */

import * as path from "path";
import type Database from "better-sqlite3";
import type { ApiClient, Page } from "../api/client.js";
import {
  crashToSubmissionInput,
  screenshotToSubmissionInput,
  screenshotUrl,
} from "../api/resources.js";
import type { TokenSigner } from "../auth/token-signer.js";
import type { AttachmentFetcher, AttachmentRef } from "../attachments/fetcher.js";
import { hasCompleteFile } from "../attachments/fetcher.js";
import { attachmentRelativePath, mimeTypeFromContentType } from "../attachments/paths.js";
import { ApiError } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import { upsertApp } from "../operations/apps.js";
import {
  countTotals,
  findOrCreateSubmission,
  getSubmission,
  listPendingAttachments,
  updateAttachmentState,
  type NewSubmissionInput,
} from "../operations/submissions.js";
import {
  advanceSyncCursor,
  beginSyncCursor,
  completeSyncCursor,
  getSyncCursor,
  isInterrupted,
} from "../operations/sync-cursors.js";
import type {
  App,
  AppSyncSummary,
  KindSyncSummary,
  Submission,
  SubmissionKind,
  SyncReport,
} from "../types.js";
import { RETENTION_DAYS, SUBMISSION_KINDS } from "../types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export interface SyncDeps {
  db: Database.Database;
  client: Pick<ApiClient, "findApp" | "crashSubmissions" | "screenshotSubmissions">;
  signer: Pick<TokenSigner, "getToken">;
  fetcher: Pick<AttachmentFetcher, "fetch">;
  /** Root under which attachment paths are resolved */
  dataDir: string;
  logger?: Logger;
  now?: () => Date;
}

export interface SyncAppTarget {
  bundle_id: string;
  name?: string;
}

export interface SyncOptions {
  apps: SyncAppTarget[];
  kinds?: readonly SubmissionKind[];
  signal?: AbortSignal;
}

interface RemoteRecord {
  input: NewSubmissionInput;
  screenshotUrl: string | null;
}

interface RemotePage {
  records: RemoteRecord[];
  nextUrl: string | null;
}

interface RunContext {
  deps: SyncDeps;
  logger: Logger;
  now: () => Date;
  signal?: AbortSignal;
  report: SyncReport;
}

/**
 * Whether a remote attachment may still exist for a record this tool first
 * saw at firstSeenAt. Unparsable dates count as recent.
 */
export function isWithinRetention(firstSeenAt: string, now: Date): boolean {
  const firstSeen = Date.parse(firstSeenAt);
  if (Number.isNaN(firstSeen)) {
    return true;
  }
  return now.getTime() - firstSeen <= RETENTION_DAYS * DAY_MS;
}

export function emptyReport(): SyncReport {
  return {
    new_crashes: [],
    recovered_logs: [],
    new_feedbacks: [],
    recovered_screenshots: [],
    crash_total: 0,
    crash_unfixed: 0,
    feedback_total: 0,
    feedback_unfixed: 0,
    apps: [],
    pending_attachments: [],
    errors: [],
  };
}

export async function runSync(deps: SyncDeps, options: SyncOptions): Promise<SyncReport> {
  const ctx: RunContext = {
    deps,
    logger: deps.logger ?? silentLogger,
    now: deps.now ?? (() => new Date()),
    signal: options.signal,
    report: emptyReport(),
  };
  const kinds = options.kinds ?? SUBMISSION_KINDS;

  // A credential failure aborts before any network traffic
  await deps.signer.getToken();

  for (const target of options.apps) {
    options.signal?.throwIfAborted();
    const summary: AppSyncSummary = {
      bundle_id: target.bundle_id,
      name: target.name ?? null,
      kinds: {},
    };
    ctx.report.apps.push(summary);

    const resolved = await resolveApp(ctx, target);
    if (!resolved) {
      continue;
    }
    const { app, ascId } = resolved;
    summary.name = app.name;

    for (const kind of kinds) {
      try {
        summary.kinds[kind] = await syncKind(ctx, app, ascId, kind);
      } catch (error) {
        recordFailure(ctx, error, app.bundle_id, kind);
      }
    }
  }

  const crashes = countTotals(deps.db, "crash");
  const feedbacks = countTotals(deps.db, "feedback");
  ctx.report.crash_total = crashes.total;
  ctx.report.crash_unfixed = crashes.unfixed;
  ctx.report.feedback_total = feedbacks.total;
  ctx.report.feedback_unfixed = feedbacks.unfixed;

  return ctx.report;
}

async function resolveApp(
  ctx: RunContext,
  target: SyncAppTarget
): Promise<{ app: App; ascId: string } | null> {
  try {
    const remote = await ctx.deps.client.findApp(target.bundle_id, {
      signal: ctx.signal,
    });
    if (!remote) {
      ctx.report.errors.push({
        bundle_id: target.bundle_id,
        message: `App ${target.bundle_id} not found in App Store Connect`,
      });
      return null;
    }
    const app = upsertApp(ctx.deps.db, {
      bundle_id: target.bundle_id,
      asc_id: remote.id,
      name: remote.attributes?.name ?? target.name ?? null,
    });
    return { app, ascId: remote.id };
  } catch (error) {
    recordFailure(ctx, error, target.bundle_id);
    return null;
  }
}

/**
 * API failures are contained to the app; anything else ends the run
 */
function recordFailure(
  ctx: RunContext,
  error: unknown,
  bundleId: string,
  kind?: SubmissionKind
): void {
  if (ctx.signal?.aborted || !(error instanceof ApiError)) {
    throw error;
  }
  ctx.logger.warn(`${bundleId}${kind ? ` (${kind})` : ""}: ${error.message}`);
  ctx.report.errors.push({
    bundle_id: bundleId,
    kind,
    message: error.message,
    status: error.status,
  });
}

function remotePages(
  ctx: RunContext,
  ascAppId: string,
  kind: SubmissionKind
): AsyncIterable<RemotePage> {
  const { client } = ctx.deps;
  const options = { signal: ctx.signal };

  if (kind === "crash") {
    return mapPages(client.crashSubmissions(ascAppId, options), (resource) => ({
      input: crashToSubmissionInput(resource),
      screenshotUrl: null,
    }));
  }
  return mapPages(client.screenshotSubmissions(ascAppId, options), (resource) => ({
    input: screenshotToSubmissionInput(resource),
    screenshotUrl: screenshotUrl(resource),
  }));
}

async function* mapPages<T>(
  pages: AsyncIterable<Page<T>>,
  map: (resource: T) => RemoteRecord
): AsyncGenerator<RemotePage> {
  for await (const page of pages) {
    yield { records: page.records.map(map), nextUrl: page.nextUrl };
  }
}

async function syncKind(
  ctx: RunContext,
  app: App,
  ascId: string,
  kind: SubmissionKind
): Promise<KindSyncSummary> {
  const { db } = ctx.deps;
  const summary: KindSyncSummary = {
    pages: 0,
    records_seen: 0,
    new_records: 0,
    downloaded: 0,
  };

  // Step 1: full pull
  const previous = getSyncCursor(db, app.id, kind);
  if (previous && isInterrupted(previous)) {
    ctx.logger.warn(
      `Previous ${kind} pull for ${app.bundle_id} stopped after ${previous.pages_fetched} pages; starting again from the first page`
    );
  }
  beginSyncCursor(db, app.id, kind, ctx.now());

  const newIds: number[] = [];
  const screenshotUrls = new Map<number, string | null>();

  // A failed pull still reports and fetches what it reconciled so far
  try {
    for await (const page of remotePages(ctx, ascId, kind)) {
      for (const record of page.records) {
        ctx.signal?.throwIfAborted();
        const { id, isNew } = findOrCreateSubmission(
          db,
          kind,
          app.id,
          record.input,
          ctx.now()
        );
        if (isNew) {
          newIds.push(id);
        }
        if (kind === "feedback") {
          screenshotUrls.set(id, record.screenshotUrl);
        }
      }
      summary.pages++;
      summary.records_seen += page.records.length;
      advanceSyncCursor(db, app.id, kind, page.nextUrl, page.records.length, ctx.now());
      ctx.logger.debug(
        `${app.bundle_id} ${kind}: page ${summary.pages}, ${page.records.length} records`
      );
    }
    completeSyncCursor(db, app.id, kind, ctx.now());
  } catch (error) {
    recordFailure(ctx, error, app.bundle_id, kind);
  }
  summary.new_records = newIds.length;

  // Step 2: attachments
  const isNew = new Set(newIds);
  for (const record of listPendingAttachments(db, kind, app.id)) {
    ctx.signal?.throwIfAborted();
    const downloaded = await recoverAttachment(ctx, record, screenshotUrls);
    if (downloaded === null) {
      continue;
    }
    summary.downloaded++;
    if (!isNew.has(record.id)) {
      const recovered = { id: record.id, path: downloaded };
      if (kind === "crash") {
        ctx.report.recovered_logs.push(recovered);
      } else {
        ctx.report.recovered_screenshots.push(recovered);
      }
    }
  }

  // Step 3: report new records with their final attachment state
  for (const id of newIds) {
    const submission = getSubmission(db, kind, id);
    if (submission?.kind === "crash") {
      ctx.report.new_crashes.push(submission);
    } else if (submission?.kind === "feedback") {
      ctx.report.new_feedbacks.push(submission);
    }
  }

  ctx.logger.info(
    `${app.bundle_id} ${kind}: ${summary.records_seen} seen, ${summary.new_records} new, ${summary.downloaded} attachments saved`
  );
  return summary;
}

/**
 * Bring one record's attachment to disk. Returns the stored relative path
 * when the record is now downloaded, otherwise null.
 */
async function recoverAttachment(
  ctx: RunContext,
  record: Submission,
  screenshotUrls: Map<number, string | null>
): Promise<string | null> {
  const { db, dataDir, fetcher } = ctx.deps;
  const knownMimeType = record.kind === "feedback" ? record.mime_type : null;
  const relative = attachmentRelativePath(record.kind, record.id, knownMimeType);
  const destination = path.join(dataDir, relative);

  // Written by an earlier run that stopped before recording it
  if (hasCompleteFile(destination)) {
    updateAttachmentState(db, record.kind, record.id, "downloaded", relative, ctx.now());
    return relative;
  }

  if (!isWithinRetention(record.first_seen_at, ctx.now())) {
    ctx.logger.debug(`${record.kind} #${record.id}: outside retention, not fetching`);
    return null;
  }

  let ref: AttachmentRef;
  if (record.kind === "crash") {
    ref = { kind: "crash_log", submissionId: record.remote_id };
  } else {
    if (!screenshotUrls.has(record.id)) {
      ctx.report.pending_attachments.push({
        kind: record.kind,
        id: record.id,
        reason: "not listed in this pull",
      });
      return null;
    }
    ref = { kind: "screenshot", url: screenshotUrls.get(record.id) ?? null };
  }

  // Screenshot URLs without an extension are typed by the download itself
  const target =
    record.kind === "feedback" && !knownMimeType
      ? (contentType: string | null) =>
          path.join(
            dataDir,
            attachmentRelativePath(record.kind, record.id, mimeTypeFromContentType(contentType))
          )
      : destination;

  const outcome = await fetcher.fetch(ref, target, { signal: ctx.signal });
  switch (outcome.type) {
    case "downloaded": {
      const saved = path.relative(dataDir, outcome.path);
      updateAttachmentState(
        db,
        record.kind,
        record.id,
        "downloaded",
        saved,
        ctx.now(),
        knownMimeType ? null : mimeTypeFromContentType(outcome.contentType)
      );
      return saved;
    }
    case "unavailable":
      ctx.logger.debug(`${record.kind} #${record.id}: ${outcome.reason}`);
      if (record.attachment_state !== "unavailable") {
        updateAttachmentState(db, record.kind, record.id, "unavailable", null, ctx.now());
      }
      return null;
    case "transient_failure":
      ctx.logger.warn(`${record.kind} #${record.id}: ${outcome.reason}`);
      ctx.report.pending_attachments.push({
        kind: record.kind,
        id: record.id,
        reason: outcome.reason,
      });
      return null;
  }
}
