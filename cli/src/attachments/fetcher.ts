/**
 * Attachment fetcher
 *
 * Downloads one crash log or screenshot and commits it with a partial file
 * plus rename, so a destination path either holds the complete attachment
 * or does not exist.
 */

import * as fs from "fs";
import * as path from "path";
import { v4 as uuidv4 } from "uuid";
import type { ApiClient, RequestOptions } from "../api/client.js";
import {
  ApiError,
  AttachmentError,
  CredentialError,
  errorMessage,
} from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";

export type AttachmentRef =
  | { kind: "crash_log"; submissionId: string }
  | { kind: "screenshot"; url: string | null };

/** A fixed path, or one chosen from the response's Content-Type */
export type Destination = string | ((contentType: string | null) => string);

export type FetchOutcome =
  | { type: "downloaded"; path: string; bytes: number; contentType: string | null }
  | { type: "unavailable"; reason: string }
  | { type: "transient_failure"; reason: string; status?: number };

/** Expired or revoked pre-signed URLs */
const GONE_STATUSES = new Set([403, 404, 410]);

export class AttachmentFetcher {
  constructor(
    private client: Pick<ApiClient, "getCrashLog" | "download">,
    private logger: Logger = silentLogger
  ) {}

  /**
   * Fetch an attachment into destination. Per-record failures come back as
   * outcomes; only cancellation and credential failures throw.
   */
  async fetch(
    ref: AttachmentRef,
    destination: Destination,
    options: RequestOptions = {}
  ): Promise<FetchOutcome> {
    let data: Buffer;
    let contentType: string | null;
    try {
      const body = await this.load(ref, options);
      if (body.type === "unavailable") {
        return body;
      }
      data = body.data;
      contentType = body.contentType;
    } catch (error) {
      if (options.signal?.aborted || error instanceof CredentialError) {
        throw error;
      }
      return this.classify(error);
    }

    const target =
      typeof destination === "string" ? destination : destination(contentType);
    try {
      await writeAtomically(target, data);
    } catch (error) {
      this.logger.warn(errorMessage(error));
      return { type: "transient_failure", reason: errorMessage(error) };
    }

    return { type: "downloaded", path: target, bytes: data.length, contentType };
  }

  private async load(
    ref: AttachmentRef,
    options: RequestOptions
  ): Promise<
    | { type: "body"; data: Buffer; contentType: string | null }
    | { type: "unavailable"; reason: string }
  > {
    if (ref.kind === "crash_log") {
      const text = await this.client.getCrashLog(ref.submissionId, options);
      if (text === null || text.length === 0) {
        return { type: "unavailable", reason: "crash log not available" };
      }
      return { type: "body", data: Buffer.from(text, "utf8"), contentType: null };
    }

    if (!ref.url) {
      return { type: "unavailable", reason: "submission has no screenshot" };
    }
    const body = await this.client.download(ref.url, options);
    if (body.data.length === 0) {
      return { type: "unavailable", reason: "screenshot is empty" };
    }
    if (body.contentLength !== null && body.contentLength !== body.data.length) {
      throw new AttachmentError(
        `Truncated screenshot: received ${body.data.length} of ${body.contentLength} bytes`,
        ref.url
      );
    }
    return { type: "body", data: body.data, contentType: body.contentType };
  }

  private classify(error: unknown): FetchOutcome {
    if (error instanceof ApiError) {
      if (
        error.status !== undefined &&
        !error.retryable &&
        GONE_STATUSES.has(error.status)
      ) {
        return { type: "unavailable", reason: `HTTP ${error.status}` };
      }
      return {
        type: "transient_failure",
        reason: error.message,
        status: error.status,
      };
    }
    return { type: "transient_failure", reason: errorMessage(error) };
  }
}

/**
 * Write data to destination via `<destination>.<uuid>.partial`. The partial
 * file is removed on any failure.
 */
export async function writeAtomically(
  destination: string,
  data: Buffer
): Promise<void> {
  if (data.length === 0) {
    throw new AttachmentError(`Refusing to write empty ${destination}`, destination);
  }

  const partial = `${destination}.${uuidv4()}.partial`;
  try {
    await fs.promises.mkdir(path.dirname(destination), { recursive: true });
    await fs.promises.writeFile(partial, data);
    const { size } = await fs.promises.stat(partial);
    if (size !== data.length) {
      throw new AttachmentError(
        `Short write to ${partial}: ${size} of ${data.length} bytes`,
        destination
      );
    }
    await fs.promises.rename(partial, destination);
  } catch (error) {
    await fs.promises.rm(partial, { force: true });
    if (error instanceof AttachmentError) {
      throw error;
    }
    throw new AttachmentError(
      `Failed to write ${destination}: ${errorMessage(error)}`,
      destination,
      { cause: error }
    );
  }
}

/**
 * True when a non-empty file already sits at the path
 */
export function hasCompleteFile(filePath: string): boolean {
  try {
    return fs.statSync(filePath).size > 0;
  } catch {
    return false;
  }
}
