/**
 * Core entity types for crashdesk
 */

export type SubmissionKind = "crash" | "feedback";

export type TriageStatus =
  | "new"
  | "investigating"
  | "fixed"
  | "wontfix"
  | "duplicate";

export type AttachmentState = "pending" | "downloaded" | "unavailable";

export interface App {
  id: number;
  bundle_id: string;
  asc_id: string | null;
  name: string | null;
}

/**
 * Fields shared by crash and feedback submissions
 */
interface SubmissionBase {
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
  attachment_state: AttachmentState;
  attachment_path: string | null;
  status: TriageStatus;
  notes: string | null;
  fixed_at: string | null;
  duplicate_of: number | null;
  // Joined from apps
  app_bundle_id: string;
  app_name: string | null;
}

export interface CrashSubmission extends SubmissionBase {
  kind: "crash";
  architecture: string | null;
  app_uptime_ms: number | null;
}

export interface FeedbackSubmission extends SubmissionBase {
  kind: "feedback";
  mime_type: string | null;
}

export type Submission = CrashSubmission | FeedbackSubmission;

export interface SubmissionFilters {
  status?: TriageStatus[];
  since?: string;
  app_bundle_id?: string;
  attachment_state?: AttachmentState;
  limit?: number;
}

export interface SubmissionStats {
  kind: SubmissionKind;
  total: number;
  unfixed: number;
  by_status: Record<TriageStatus, number>;
  by_attachment_state: Record<AttachmentState, number>;
  by_device: Array<{ value: string; count: number }>;
  by_os: Array<{ value: string; count: number }>;
}

export interface StatusEvent {
  id: number;
  entity_kind: SubmissionKind;
  entity_id: number;
  from_status: TriageStatus;
  to_status: TriageStatus;
  notes: string | null;
  duplicate_of: number | null;
  created_at: string;
}

export type StatusCommand =
  | { type: "investigate" }
  | { type: "fix"; notes: string }
  | { type: "wontfix"; notes?: string }
  | { type: "duplicate"; of: number }
  | { type: "reopen" };

/**
 * Sync report types
 */

export interface RecoveredAttachment {
  id: number;
  path: string;
}

export interface PendingAttachment {
  kind: SubmissionKind;
  id: number;
  reason: string;
}

export interface SyncError {
  bundle_id: string;
  kind?: SubmissionKind;
  message: string;
  status?: number;
}

export interface KindSyncSummary {
  pages: number;
  records_seen: number;
  new_records: number;
  downloaded: number;
}

export interface AppSyncSummary {
  bundle_id: string;
  name: string | null;
  kinds: Partial<Record<SubmissionKind, KindSyncSummary>>;
}

export interface SyncReport {
  new_crashes: CrashSubmission[];
  recovered_logs: RecoveredAttachment[];
  new_feedbacks: FeedbackSubmission[];
  recovered_screenshots: RecoveredAttachment[];
  crash_total: number;
  crash_unfixed: number;
  feedback_total: number;
  feedback_unfixed: number;
  apps: AppSyncSummary[];
  pending_attachments: PendingAttachment[];
  errors: SyncError[];
}
