/**
 * crashdesk library entry point
 */

export * from "./types.js";
export * from "./errors.js";
export { initDatabase, withTransaction } from "./db.js";
export { runMigrations, MIGRATIONS } from "./migrations.js";
export { TokenSigner, type SignerCredentials } from "./auth/token-signer.js";
export {
  ApiClient,
  DEFAULT_BASE_URL,
  DEFAULT_RETRY_POLICY,
  type ApiClientOptions,
  type Page,
  type RetryPolicy,
} from "./api/client.js";
export {
  AttachmentFetcher,
  type AttachmentRef,
  type FetchOutcome,
} from "./attachments/fetcher.js";
export { attachmentRelativePath, mimeTypeFromUrl } from "./attachments/paths.js";
export {
  runSync,
  isWithinRetention,
  type SyncDeps,
  type SyncOptions,
} from "./sync/orchestrator.js";
export { transition, validateDuplicateTarget } from "./workflow/status-machine.js";
export * from "./operations/apps.js";
export * from "./operations/submissions.js";
export * from "./operations/status.js";
export * from "./operations/sync-cursors.js";
export {
  loadConfig,
  resolveDataDir,
  initDataDir,
  type CrashdeskConfig,
} from "./config.js";
export { createConsoleLogger, silentLogger, type Logger } from "./logger.js";
