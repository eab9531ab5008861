/**
 * Runtime constants and guards for the shared entity types
 */

import type {
  AttachmentState,
  SubmissionKind,
  TriageStatus,
} from "@crashdesk/types";

export type {
  App,
  AppSyncSummary,
  AttachmentState,
  CrashSubmission,
  FeedbackSubmission,
  KindSyncSummary,
  PendingAttachment,
  RecoveredAttachment,
  StatusCommand,
  StatusEvent,
  Submission,
  SubmissionFilters,
  SubmissionKind,
  SubmissionStats,
  SyncError,
  SyncReport,
  TriageStatus,
} from "@crashdesk/types";

export const SUBMISSION_KINDS: readonly SubmissionKind[] = ["crash", "feedback"];

export const TRIAGE_STATUSES: readonly TriageStatus[] = [
  "new",
  "investigating",
  "fixed",
  "wontfix",
  "duplicate",
];

/** Statuses that still need attention */
export const UNFIXED_STATUSES: readonly TriageStatus[] = ["new", "investigating"];

export const ATTACHMENT_STATES: readonly AttachmentState[] = [
  "pending",
  "downloaded",
  "unavailable",
];

export function isTriageStatus(value: unknown): value is TriageStatus {
  return TRIAGE_STATUSES.some((s) => s === value);
}

export function isAttachmentState(value: unknown): value is AttachmentState {
  return ATTACHMENT_STATES.some((s) => s === value);
}

/** Table holding each kind of submission */
export const SUBMISSION_TABLES: Record<SubmissionKind, string> = {
  crash: "crashes",
  feedback: "feedbacks",
};

/** Remote attachments are discarded this long after submission */
export const RETENTION_DAYS = 120;
