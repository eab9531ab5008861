/**
 * App Store Connect resource documents (TestFlight feedback subset)
 *
 * Each endpoint decodes into its own tagged resource type. Unknown fields are
 * stripped; a missing id, type or data fails the whole document.
 */

import { z } from "zod";
import { ApiError, ApiErrorCode, type ApiErrorPayload } from "../errors.js";
import { mimeTypeFromUrl } from "../attachments/paths.js";
import type { NewSubmissionInput } from "../operations/submissions.js";

const optionalString = z.string().nullish();
const optionalNumber = z.number().nullish();

const relationship = z
  .object({
    data: z.object({ type: z.string(), id: z.string() }).nullish(),
  })
  .nullish();

const feedbackRelationships = z
  .object({
    build: relationship,
    tester: relationship,
  })
  .nullish();

// ============================================================================
// Apps
// ============================================================================

export const appResource = z.object({
  type: z.literal("apps"),
  id: z.string(),
  attributes: z
    .object({
      bundleId: optionalString,
      name: optionalString,
    })
    .nullish(),
});

export type AppResource = z.infer<typeof appResource>;

// ============================================================================
// Crash submissions
// ============================================================================

export const crashSubmissionResource = z.object({
  type: z.literal("betaFeedbackCrashSubmissions"),
  id: z.string(),
  attributes: z
    .object({
      createdDate: optionalString,
      comment: optionalString,
      email: optionalString,
      deviceModel: optionalString,
      osVersion: optionalString,
      locale: optionalString,
      timeZone: optionalString,
      architecture: optionalString,
      connectionType: optionalString,
      appUptimeInMilliseconds: optionalNumber,
      batteryPercentage: optionalNumber,
      appPlatform: optionalString,
      devicePlatform: optionalString,
      deviceFamily: optionalString,
      buildBundleId: optionalString,
    })
    .nullish(),
  relationships: feedbackRelationships,
});

export type CrashSubmissionResource = z.infer<typeof crashSubmissionResource>;

export const CRASH_SUBMISSION_FIELDS = [
  "createdDate",
  "comment",
  "email",
  "deviceModel",
  "osVersion",
  "locale",
  "timeZone",
  "architecture",
  "connectionType",
  "appUptimeInMilliseconds",
  "batteryPercentage",
  "appPlatform",
  "devicePlatform",
  "deviceFamily",
  "buildBundleId",
].join(",");

export const crashLogDocument = z.object({
  data: z.object({
    type: z.literal("betaCrashLogs"),
    id: z.string(),
    attributes: z.object({ logText: optionalString }).nullish(),
  }),
});

// ============================================================================
// Screenshot submissions
// ============================================================================

export const screenshotImage = z.object({
  url: z.string(),
  width: optionalNumber,
  height: optionalNumber,
  expirationDate: optionalString,
});

export const screenshotSubmissionResource = z.object({
  type: z.literal("betaFeedbackScreenshotSubmissions"),
  id: z.string(),
  attributes: z
    .object({
      createdDate: optionalString,
      comment: optionalString,
      email: optionalString,
      deviceModel: optionalString,
      osVersion: optionalString,
      locale: optionalString,
      timeZone: optionalString,
      connectionType: optionalString,
      batteryPercentage: optionalNumber,
      appPlatform: optionalString,
      devicePlatform: optionalString,
      deviceFamily: optionalString,
      buildBundleId: optionalString,
      screenshots: z.array(screenshotImage).nullish(),
    })
    .nullish(),
  relationships: feedbackRelationships,
});

export type ScreenshotSubmissionResource = z.infer<
  typeof screenshotSubmissionResource
>;

export const SCREENSHOT_SUBMISSION_FIELDS = [
  "createdDate",
  "comment",
  "email",
  "deviceModel",
  "osVersion",
  "locale",
  "timeZone",
  "connectionType",
  "batteryPercentage",
  "appPlatform",
  "devicePlatform",
  "deviceFamily",
  "buildBundleId",
  "screenshots",
].join(",");

// ============================================================================
// Documents
// ============================================================================

/**
 * Envelope of a collection page. `links.next` stays loosely typed: an
 * unusable link ends pagination rather than failing the page.
 */
const pageEnvelope = z.object({
  data: z.array(z.unknown()),
  links: z.object({ next: z.unknown().optional() }).nullish(),
});

export interface DecodedPage<T> {
  records: T[];
  next: unknown;
}

/**
 * Decode a whole page; any invalid record fails the page
 */
export function decodePage<T extends z.ZodTypeAny>(
  schema: T,
  body: unknown,
  url: string
): DecodedPage<z.output<T>> {
  const envelope = decodeDocument(pageEnvelope, body, url);
  const records = envelope.data.map((item, index) =>
    decodeDocument(schema, item, `${url} (data[${index}])`)
  );
  return { records, next: envelope.links?.next };
}

const errorDocument = z.object({
  errors: z.array(
    z.object({
      id: z.string().optional(),
      status: z.string().optional(),
      code: z.string().optional(),
      title: z.string().optional(),
      detail: z.string().optional(),
    })
  ),
});

/**
 * Decode a response body or fail with a typed error
 */
export function decodeDocument<T extends z.ZodTypeAny>(
  schema: T,
  body: unknown,
  url: string
): z.output<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? ` at ${issue.path.join(".")}` : "";
    throw new ApiError(
      `Unexpected response from ${url}${where}: ${issue?.message ?? "invalid document"}`,
      ApiErrorCode.DECODE_FAILED
    );
  }
  return result.data;
}

/**
 * Extract JSON:API error objects from an error response body, if any
 */
export function decodeErrorPayload(body: unknown): ApiErrorPayload[] {
  let value = body;
  if (Buffer.isBuffer(value)) {
    value = value.toString("utf8");
  }
  if (typeof value === "string") {
    try {
      value = JSON.parse(value);
    } catch {
      return [];
    }
  }
  const result = errorDocument.safeParse(value);
  return result.success ? result.data.errors : [];
}

// ============================================================================
// Mapping into local records
// ============================================================================

/**
 * Store timestamps as UTC ISO strings so they sort and compare as text
 */
export function normalizeTimestamp(value: string | null | undefined): string | null {
  if (!value) {
    return null;
  }
  const time = Date.parse(value);
  return Number.isNaN(time) ? value : new Date(time).toISOString();
}

export function crashToSubmissionInput(
  resource: CrashSubmissionResource
): NewSubmissionInput {
  const attrs = resource.attributes;
  return {
    remote_id: resource.id,
    created_at: normalizeTimestamp(attrs?.createdDate),
    device_model: attrs?.deviceModel,
    os_version: attrs?.osVersion,
    app_platform: attrs?.appPlatform,
    device_family: attrs?.deviceFamily,
    connection_type: attrs?.connectionType,
    battery_pct: attrs?.batteryPercentage,
    tester_email: attrs?.email,
    tester_comment: attrs?.comment,
    build_bundle_id: attrs?.buildBundleId,
    build_id: resource.relationships?.build?.data?.id,
    architecture: attrs?.architecture,
    app_uptime_ms: attrs?.appUptimeInMilliseconds,
  };
}

/**
 * URL of the first screenshot of a feedback submission, if it has one
 */
export function screenshotUrl(
  resource: ScreenshotSubmissionResource
): string | null {
  return resource.attributes?.screenshots?.[0]?.url ?? null;
}

export function screenshotToSubmissionInput(
  resource: ScreenshotSubmissionResource
): NewSubmissionInput {
  const attrs = resource.attributes;
  const url = screenshotUrl(resource);
  return {
    remote_id: resource.id,
    created_at: normalizeTimestamp(attrs?.createdDate),
    device_model: attrs?.deviceModel,
    os_version: attrs?.osVersion,
    app_platform: attrs?.appPlatform,
    device_family: attrs?.deviceFamily,
    connection_type: attrs?.connectionType,
    battery_pct: attrs?.batteryPercentage,
    tester_email: attrs?.email,
    tester_comment: attrs?.comment,
    build_bundle_id: attrs?.buildBundleId,
    build_id: resource.relationships?.build?.data?.id,
    mime_type: url ? mimeTypeFromUrl(url) : null,
  };
}
