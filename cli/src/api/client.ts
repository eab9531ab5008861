/**
 * App Store Connect API client
 *
 * Authenticated GETs with retry and backoff, JSON:API pagination, and the
 * handful of TestFlight feedback endpoints the sync engine consumes.
 */

import axios, { type AxiosInstance, type AxiosResponse } from "axios";
import type { z } from "zod";
import type { TokenSigner } from "../auth/token-signer.js";
import { ApiError, ApiErrorCode } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";
import {
  appResource,
  crashLogDocument,
  crashSubmissionResource,
  decodeDocument,
  decodeErrorPayload,
  decodePage,
  screenshotSubmissionResource,
  CRASH_SUBMISSION_FIELDS,
  SCREENSHOT_SUBMISSION_FIELDS,
  type AppResource,
  type CrashSubmissionResource,
  type ScreenshotSubmissionResource,
} from "./resources.js";

export const DEFAULT_BASE_URL = "https://api.appstoreconnect.apple.com";
export const DEFAULT_MAX_PAGES = 50;
export const PAGE_LIMIT = 200;

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 5,
  baseDelayMs: 500,
  maxDelayMs: 8000,
};

export interface ApiClientOptions {
  signer: TokenSigner;
  baseUrl?: string;
  http?: AxiosInstance;
  retry?: Partial<RetryPolicy>;
  maxPages?: number;
  timeoutMs?: number;
  logger?: Logger;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export interface RequestOptions {
  signal?: AbortSignal;
}

export interface Page<T> {
  url: string;
  records: T[];
  /** Validated absolute URL of the next page, or null when this is the last */
  nextUrl: string | null;
}

export interface DownloadedBody {
  data: Buffer;
  contentType: string | null;
  contentLength: number | null;
}

type Query = Record<string, string>;

interface GetOptions extends RequestOptions {
  authenticated: boolean;
  responseType?: "json" | "arraybuffer";
}

/**
 * Wait ms, rejecting with the signal's reason as soon as it aborts
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(signal.reason);
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });
}

export function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

/**
 * Delay before the next attempt: exponential from the base delay, or the
 * server's Retry-After when it sent one, capped at maxDelayMs either way
 */
export function backoffDelay(
  policy: RetryPolicy,
  attempt: number,
  retryAfterSeconds?: number
): number {
  if (
    retryAfterSeconds !== undefined &&
    Number.isFinite(retryAfterSeconds) &&
    retryAfterSeconds >= 0
  ) {
    return Math.min(policy.maxDelayMs, retryAfterSeconds * 1000);
  }
  return Math.min(policy.maxDelayMs, policy.baseDelayMs * 2 ** (attempt - 1));
}

function headerValue(response: AxiosResponse, name: string): string | undefined {
  const value: unknown = response.headers[name];
  return value === undefined || value === null ? undefined : String(value);
}

function numericHeader(response: AxiosResponse, name: string): number | undefined {
  const raw = headerValue(response, name);
  if (raw === undefined || raw.trim() === "") {
    return undefined;
  }
  const value = Number(raw);
  return Number.isFinite(value) ? value : undefined;
}

export class ApiClient {
  readonly baseUrl: string;
  private readonly origin: string;
  private readonly http: AxiosInstance;
  private readonly signer: TokenSigner;
  private readonly retry: RetryPolicy;
  private readonly maxPages: number;
  private readonly timeoutMs: number;
  private readonly logger: Logger;
  private readonly sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

  constructor(options: ApiClientOptions) {
    this.baseUrl = (options.baseUrl ?? DEFAULT_BASE_URL).replace(/\/+$/, "");
    this.origin = new URL(this.baseUrl).origin;
    this.http = options.http ?? axios.create();
    this.signer = options.signer;
    this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
    this.timeoutMs = options.timeoutMs ?? 30000;
    this.logger = options.logger ?? silentLogger;
    this.sleep = options.sleep ?? abortableSleep;
  }

  // ==========================================================================
  // Endpoints
  // ==========================================================================

  listApps(options: RequestOptions = {}): AsyncIterable<AppResource> {
    return this.fetchAll(
      "/v1/apps",
      { "fields[apps]": "name,bundleId", limit: String(PAGE_LIMIT) },
      appResource,
      options
    );
  }

  /**
   * Look up an app by exact bundle id; null when the account has no such app
   */
  async findApp(
    bundleId: string,
    options: RequestOptions = {}
  ): Promise<AppResource | null> {
    const url = this.buildUrl("/v1/apps", {
      "filter[bundleId]": bundleId,
      "fields[apps]": "name,bundleId",
    });
    const response = await this.get(url, { ...options, authenticated: true });
    const page = decodePage(appResource, response.data, url);
    // The filter also matches bundle ids with the same prefix
    return page.records.find((app) => app.attributes?.bundleId === bundleId) ?? null;
  }

  crashSubmissions(
    ascAppId: string,
    options: RequestOptions = {}
  ): AsyncIterable<Page<CrashSubmissionResource>> {
    return this.pages(
      `/v1/apps/${encodeURIComponent(ascAppId)}/betaFeedbackCrashSubmissions`,
      {
        "fields[betaFeedbackCrashSubmissions]": CRASH_SUBMISSION_FIELDS,
        sort: "-createdDate",
        limit: String(PAGE_LIMIT),
      },
      crashSubmissionResource,
      options
    );
  }

  screenshotSubmissions(
    ascAppId: string,
    options: RequestOptions = {}
  ): AsyncIterable<Page<ScreenshotSubmissionResource>> {
    return this.pages(
      `/v1/apps/${encodeURIComponent(ascAppId)}/betaFeedbackScreenshotSubmissions`,
      {
        "fields[betaFeedbackScreenshotSubmissions]": SCREENSHOT_SUBMISSION_FIELDS,
        sort: "-createdDate",
        limit: String(PAGE_LIMIT),
      },
      screenshotSubmissionResource,
      options
    );
  }

  /**
   * Crash log text of a crash submission; null when the log does not exist
   * or has no text
   */
  async getCrashLog(
    submissionId: string,
    options: RequestOptions = {}
  ): Promise<string | null> {
    const url = this.buildUrl(
      `/v1/betaFeedbackCrashSubmissions/${encodeURIComponent(submissionId)}/crashLog`,
      { "fields[betaCrashLogs]": "logText" }
    );

    let response: AxiosResponse<unknown>;
    try {
      response = await this.get(url, { ...options, authenticated: true });
    } catch (error) {
      if (error instanceof ApiError && error.code === ApiErrorCode.NOT_FOUND) {
        return null;
      }
      throw error;
    }

    const document = decodeDocument(crashLogDocument, response.data, url);
    return document.data.attributes?.logText ?? null;
  }

  /**
   * Fetch a pre-signed URL. No Authorization header is sent: the signature
   * is in the URL and the host is not the API host.
   */
  async download(url: string, options: RequestOptions = {}): Promise<DownloadedBody> {
    const response = await this.get(url, {
      ...options,
      authenticated: false,
      responseType: "arraybuffer",
    });

    const body: unknown = response.data;
    let data: Buffer;
    if (Buffer.isBuffer(body)) {
      data = body;
    } else if (body instanceof ArrayBuffer) {
      data = Buffer.from(body);
    } else if (typeof body === "string") {
      data = Buffer.from(body);
    } else {
      throw new ApiError(
        `Unexpected download body from ${url}`,
        ApiErrorCode.DECODE_FAILED,
        response.status
      );
    }

    return {
      data,
      contentType: headerValue(response, "content-type") ?? null,
      contentLength: numericHeader(response, "content-length") ?? null,
    };
  }

  // ==========================================================================
  // Pagination
  // ==========================================================================

  /**
   * Every record of a collection, following next links. Each iteration
   * starts again from the first page.
   */
  fetchAll<S extends z.ZodTypeAny>(
    path: string,
    query: Query,
    schema: S,
    options: RequestOptions = {}
  ): AsyncIterable<z.output<S>> {
    const pages = this.pages(path, query, schema, options);
    return {
      async *[Symbol.asyncIterator]() {
        for await (const page of pages) {
          yield* page.records;
        }
      },
    };
  }

  /**
   * The same walk as fetchAll, one decoded page at a time
   */
  pages<S extends z.ZodTypeAny>(
    path: string,
    query: Query,
    schema: S,
    options: RequestOptions = {}
  ): AsyncIterable<Page<z.output<S>>> {
    const firstUrl = this.buildUrl(path, query);
    return {
      [Symbol.asyncIterator]: () => this.walk(firstUrl, schema, options),
    };
  }

  private async *walk<S extends z.ZodTypeAny>(
    firstUrl: string,
    schema: S,
    options: RequestOptions
  ): AsyncGenerator<Page<z.output<S>>> {
    let url: string | null = firstUrl;
    let fetched = 0;

    while (url !== null) {
      if (fetched >= this.maxPages) {
        this.logger.warn(
          `Stopped paginating after ${this.maxPages} pages; more records remain at ${url}`
        );
        return;
      }

      const response = await this.get(url, { ...options, authenticated: true });
      const page = decodePage(schema, response.data, url);
      fetched++;

      const nextUrl = this.resolveNextLink(page.next, url);
      yield { url, records: page.records, nextUrl };
      url = nextUrl;
    }
  }

  /**
   * A usable next link is a string that parses as a URL on the API origin
   * and differs from the current page
   */
  private resolveNextLink(next: unknown, current: string): string | null {
    if (typeof next !== "string" || next.trim() === "") {
      return null;
    }

    let resolved: URL;
    try {
      resolved = new URL(next, current);
    } catch {
      this.logger.warn(`Ignoring unparsable next link: ${next}`);
      return null;
    }

    if (resolved.origin !== this.origin) {
      this.logger.warn(`Ignoring next link on foreign origin: ${resolved.origin}`);
      return null;
    }
    if (resolved.href === new URL(current).href) {
      this.logger.warn(`Ignoring next link that points at the current page`);
      return null;
    }
    return resolved.href;
  }

  // ==========================================================================
  // Transport
  // ==========================================================================

  buildUrl(path: string, query: Query = {}): string {
    const search = Object.entries(query)
      .map(([key, value]) => `${key}=${encodeURIComponent(value)}`)
      .join("&");
    return search ? `${this.baseUrl}${path}?${search}` : `${this.baseUrl}${path}`;
  }

  /**
   * GET with the retry policy applied. Resolves only with a 2xx response.
   */
  private async get(url: string, options: GetOptions): Promise<AxiosResponse<unknown>> {
    let resigned = false;
    for (let attempt = 1; ; attempt++) {
      options.signal?.throwIfAborted();

      const headers: Record<string, string> = { Accept: "application/json" };
      if (options.authenticated) {
        headers.Authorization = `Bearer ${await this.signer.getToken()}`;
      }

      let response: AxiosResponse<unknown> | undefined;
      let networkError: unknown;
      try {
        response = await this.http.request<unknown>({
          url,
          method: "GET",
          headers,
          responseType: options.responseType ?? "json",
          signal: options.signal,
          timeout: this.timeoutMs,
          validateStatus: () => true,
        });
      } catch (error) {
        if (axios.isCancel(error) || !axios.isAxiosError(error)) {
          throw error;
        }
        networkError = error;
      }

      if (response) {
        if (response.status >= 200 && response.status < 300) {
          return response;
        }
        if (response.status === 401 && options.authenticated && !resigned) {
          // A rejected token is replaced once before giving up
          resigned = true;
          this.signer.invalidate();
          this.logger.debug(`HTTP 401 from ${url}; signing a fresh token`);
          continue;
        }
        if (!isRetryableStatus(response.status)) {
          throw this.httpError(url, response);
        }
      }

      const reason = response
        ? `HTTP ${response.status}`
        : networkError instanceof Error
          ? networkError.message
          : "network error";

      if (attempt >= this.retry.maxAttempts) {
        throw new ApiError(
          `GET ${url} failed after ${attempt} attempts: ${reason}`,
          ApiErrorCode.RETRIES_EXHAUSTED,
          response?.status,
          response ? decodeErrorPayload(response.data) : [],
          true,
          { cause: networkError }
        );
      }

      const delay = backoffDelay(
        this.retry,
        attempt,
        response ? numericHeader(response, "retry-after") : undefined
      );
      this.logger.debug(
        `${reason} from ${url}; retrying in ${delay}ms (attempt ${attempt + 1}/${this.retry.maxAttempts})`
      );
      await this.sleep(delay, options.signal);
    }
  }

  private httpError(url: string, response: AxiosResponse<unknown>): ApiError {
    const payload = decodeErrorPayload(response.data);
    const first = payload[0];
    const detail = first?.detail ?? first?.title ?? response.statusText;
    return new ApiError(
      `GET ${url} returned HTTP ${response.status}${detail ? `: ${detail}` : ""}`,
      response.status === 404 ? ApiErrorCode.NOT_FOUND : ApiErrorCode.HTTP_ERROR,
      response.status,
      payload
    );
  }
}
