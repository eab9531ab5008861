/**
 * Error taxonomy for the sync engine and triage workflow.
 *
 * Only CredentialError and StoreError abort a sync run. ApiError is contained
 * per app, AttachmentError per record.
 */

export enum ApiErrorCode {
  /** Non-retryable HTTP response (4xx other than 429) */
  HTTP_ERROR = "HTTP_ERROR",
  /** Retryable failure that outlived the retry budget */
  RETRIES_EXHAUSTED = "RETRIES_EXHAUSTED",
  /** Response body did not match the expected resource shape */
  DECODE_FAILED = "DECODE_FAILED",
  /** Requested resource does not exist remotely */
  NOT_FOUND = "NOT_FOUND",
}

export enum ValidationErrorCode {
  NOT_FOUND = "NOT_FOUND",
  SELF_REFERENCE = "SELF_REFERENCE",
  CYCLE = "CYCLE",
  MISSING_NOTES = "MISSING_NOTES",
  INVALID_VALUE = "INVALID_VALUE",
}

/**
 * JSON:API error object as returned by App Store Connect
 */
export interface ApiErrorPayload {
  id?: string;
  status?: string;
  code?: string;
  title?: string;
  detail?: string;
}

export class CredentialError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "CredentialError";
  }
}

export class ApiError extends Error {
  constructor(
    message: string,
    public code: ApiErrorCode,
    public status?: number,
    public payload: ApiErrorPayload[] = [],
    public retryable = false,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "ApiError";
  }
}

export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "StoreError";
  }
}

export class ValidationError extends Error {
  constructor(
    message: string,
    public code: ValidationErrorCode
  ) {
    super(message);
    this.name = "ValidationError";
  }
}

export class AttachmentError extends Error {
  constructor(
    message: string,
    public destination: string,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "AttachmentError";
  }
}

export class ConfigError extends Error {
  constructor(
    message: string,
    public path?: string
  ) {
    super(message);
    this.name = "ConfigError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
