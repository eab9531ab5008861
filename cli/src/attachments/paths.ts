/**
 * Where attachments live inside the data directory
 */

import * as path from "path";
import type { SubmissionKind } from "../types.js";

export const LOGS_DIR = "logs";
export const SCREENSHOTS_DIR = "screenshots";

const MIME_BY_EXTENSION: Record<string, string> = {
  png: "image/png",
  jpg: "image/jpeg",
  jpeg: "image/jpeg",
  gif: "image/gif",
  heic: "image/heic",
  mov: "video/quicktime",
  mp4: "video/mp4",
};

const EXTENSION_BY_MIME: Record<string, string> = {
  "image/png": "png",
  "image/jpeg": "jpg",
  "image/gif": "gif",
  "image/heic": "heic",
  "video/quicktime": "mov",
  "video/mp4": "mp4",
};

/**
 * Guess a MIME type from the file extension of a URL's path
 */
export function mimeTypeFromUrl(url: string): string | null {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    return null;
  }
  const ext = path.posix.extname(pathname).slice(1).toLowerCase();
  return MIME_BY_EXTENSION[ext] ?? null;
}

/**
 * The MIME type named by a Content-Type header, when it is one attachments
 * are saved as
 */
export function mimeTypeFromContentType(contentType: string | null | undefined): string | null {
  const mimeType = contentType?.split(";")[0].trim().toLowerCase();
  return mimeType && mimeType in EXTENSION_BY_MIME ? mimeType : null;
}

export function extensionForMimeType(mimeType: string | null | undefined): string {
  if (!mimeType) {
    return "bin";
  }
  return EXTENSION_BY_MIME[mimeType.toLowerCase()] ?? "bin";
}

/**
 * Destination of a record's attachment, relative to the data directory
 */
export function attachmentRelativePath(
  kind: SubmissionKind,
  id: number,
  mimeType?: string | null
): string {
  if (kind === "crash") {
    return path.join(LOGS_DIR, `${id}.ips`);
  }
  return path.join(SCREENSHOTS_DIR, `${id}.${extensionForMimeType(mimeType)}`);
}
