/**
 * Unit tests for attachment downloads
 */

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { ApiClient } from "../../../src/api/client.js";
import {
  AttachmentFetcher,
  hasCompleteFile,
  writeAtomically,
} from "../../../src/attachments/fetcher.js";
import { TokenSigner } from "../../../src/auth/token-signer.js";
import { AttachmentError, CredentialError } from "../../../src/errors.js";
import {
  BASE_URL,
  FakeApi,
  crashLogDocument,
  noSleep,
  testSigner,
} from "../../helpers/fake-api.js";

const SHOT_URL = `${BASE_URL}/shots/7.png`;
const LOG_PATH = "/v1/betaFeedbackCrashSubmissions/c-1/crashLog";

describe("AttachmentFetcher", () => {
  let tmpDir: string;
  let fake: FakeApi;
  let fetcher: AttachmentFetcher;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "crashdesk-fetch-"));
    fake = new FakeApi();
    fetcher = new AttachmentFetcher(
      new ApiClient({ signer: testSigner(), baseUrl: BASE_URL, http: fake.http, sleep: noSleep })
    );
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe("crash logs", () => {
    it("should write the log text and leave no partial file", async () => {
      fake.on(LOG_PATH, { status: 200, body: crashLogDocument("log-1", "Incident Identifier: TEST") });
      const destination = path.join(tmpDir, "logs", "1.ips");

      const outcome = await fetcher.fetch({ kind: "crash_log", submissionId: "c-1" }, destination);

      expect(outcome).toEqual({ type: "downloaded", path: destination, bytes: 25, contentType: null });
      expect(fs.readFileSync(destination, "utf8")).toBe("Incident Identifier: TEST");
      expect(fs.readdirSync(path.join(tmpDir, "logs"))).toEqual(["1.ips"]);
    });

    it("should report a log without text as unavailable", async () => {
      fake.on(LOG_PATH, { status: 200, body: crashLogDocument("log-1", null) });
      const destination = path.join(tmpDir, "logs", "1.ips");

      const outcome = await fetcher.fetch({ kind: "crash_log", submissionId: "c-1" }, destination);

      expect(outcome).toEqual({ type: "unavailable", reason: "crash log not available" });
      expect(fs.existsSync(destination)).toBe(false);
    });

    it("should report a missing log as unavailable", async () => {
      fake.on(LOG_PATH, { status: 404 });

      const outcome = await fetcher.fetch(
        { kind: "crash_log", submissionId: "c-1" },
        path.join(tmpDir, "logs", "1.ips")
      );

      expect(outcome.type).toBe("unavailable");
    });

    it("should report a server failure as transient", async () => {
      fake.on(LOG_PATH, { status: 500 });

      const outcome = await fetcher.fetch(
        { kind: "crash_log", submissionId: "c-1" },
        path.join(tmpDir, "logs", "1.ips")
      );

      expect(outcome).toMatchObject({ type: "transient_failure", status: 500 });
    });

    it("should rethrow credential failures", async () => {
      const broken = new AttachmentFetcher(
        new ApiClient({
          signer: new TokenSigner({ issuerId: "test-issuer", keyId: "TESTKEY123", privateKey: "not a key" }),
          baseUrl: BASE_URL,
          http: fake.http,
          sleep: noSleep,
        })
      );

      await expect(
        broken.fetch({ kind: "crash_log", submissionId: "c-1" }, path.join(tmpDir, "1.ips"))
      ).rejects.toBeInstanceOf(CredentialError);
      expect(fake.requests).toHaveLength(0);
    });

    it("should rethrow when cancelled", async () => {
      fake.on(LOG_PATH, { status: 200, body: crashLogDocument("log-1", "text") });
      const controller = new AbortController();
      controller.abort();

      await expect(
        fetcher.fetch(
          { kind: "crash_log", submissionId: "c-1" },
          path.join(tmpDir, "1.ips"),
          { signal: controller.signal }
        )
      ).rejects.toThrow();
      expect(fake.requests).toHaveLength(0);
    });
  });

  describe("screenshots", () => {
    it("should save the image bytes", async () => {
      fake.on("/shots/7.png", {
        status: 200,
        body: Buffer.from("PNGDATA"),
        headers: { "content-type": "image/png", "content-length": "7" },
      });
      const destination = path.join(tmpDir, "screenshots", "7.png");

      const outcome = await fetcher.fetch({ kind: "screenshot", url: SHOT_URL }, destination);

      expect(outcome).toEqual({
        type: "downloaded",
        path: destination,
        bytes: 7,
        contentType: "image/png",
      });
      expect(fs.readFileSync(destination).toString()).toBe("PNGDATA");
    });

    it("should pick the destination from the content type", async () => {
      fake.on("/shots/7.png", {
        status: 200,
        body: Buffer.from("JPEGDATA"),
        headers: { "content-type": "image/jpeg" },
      });
      const chooser = vi.fn((contentType: string | null) =>
        path.join(tmpDir, "screenshots", contentType === "image/jpeg" ? "7.jpg" : "7.bin")
      );

      const outcome = await fetcher.fetch({ kind: "screenshot", url: SHOT_URL }, chooser);

      expect(chooser).toHaveBeenCalledWith("image/jpeg");
      expect(outcome).toMatchObject({ type: "downloaded", path: path.join(tmpDir, "screenshots", "7.jpg") });
      expect(fs.readFileSync(path.join(tmpDir, "screenshots", "7.jpg")).toString()).toBe("JPEGDATA");
    });

    it("should report a submission without a screenshot as unavailable", async () => {
      const outcome = await fetcher.fetch(
        { kind: "screenshot", url: null },
        path.join(tmpDir, "screenshots", "7.png")
      );

      expect(outcome).toEqual({ type: "unavailable", reason: "submission has no screenshot" });
      expect(fake.requests).toHaveLength(0);
    });

    it("should report an expired URL as unavailable", async () => {
      fake.on("/shots/7.png", { status: 403 });

      const outcome = await fetcher.fetch(
        { kind: "screenshot", url: SHOT_URL },
        path.join(tmpDir, "screenshots", "7.png")
      );

      expect(outcome).toEqual({ type: "unavailable", reason: "HTTP 403" });
    });

    it("should report an empty body as unavailable", async () => {
      fake.on("/shots/7.png", { status: 200, body: Buffer.alloc(0) });

      const outcome = await fetcher.fetch(
        { kind: "screenshot", url: SHOT_URL },
        path.join(tmpDir, "screenshots", "7.png")
      );

      expect(outcome).toEqual({ type: "unavailable", reason: "screenshot is empty" });
    });

    it("should treat a truncated body as transient and write nothing", async () => {
      fake.on("/shots/7.png", {
        status: 200,
        body: Buffer.from("PNGDATA"),
        headers: { "content-length": "10" },
      });
      const destination = path.join(tmpDir, "screenshots", "7.png");

      const outcome = await fetcher.fetch({ kind: "screenshot", url: SHOT_URL }, destination);

      expect(outcome).toEqual({
        type: "transient_failure",
        reason: "Truncated screenshot: received 7 of 10 bytes",
      });
      expect(fs.existsSync(destination)).toBe(false);
    });

    it("should treat a failed write as transient", async () => {
      fake.on("/shots/7.png", { status: 200, body: Buffer.from("PNGDATA") });
      // A file where the directory should be
      fs.writeFileSync(path.join(tmpDir, "screenshots"), "");

      const outcome = await fetcher.fetch(
        { kind: "screenshot", url: SHOT_URL },
        path.join(tmpDir, "screenshots", "7.png")
      );

      expect(outcome.type).toBe("transient_failure");
    });
  });
});

describe("writeAtomically", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "crashdesk-write-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should replace an existing file", async () => {
    const destination = path.join(tmpDir, "1.ips");
    fs.writeFileSync(destination, "old");

    await writeAtomically(destination, Buffer.from("new contents"));

    expect(fs.readFileSync(destination, "utf8")).toBe("new contents");
    expect(fs.readdirSync(tmpDir)).toEqual(["1.ips"]);
  });

  it("should refuse to write an empty file", async () => {
    const destination = path.join(tmpDir, "1.ips");

    await expect(writeAtomically(destination, Buffer.alloc(0))).rejects.toBeInstanceOf(AttachmentError);
    expect(fs.readdirSync(tmpDir)).toEqual([]);
  });
});

describe("hasCompleteFile", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "crashdesk-file-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("should accept only a non-empty file", () => {
    fs.writeFileSync(path.join(tmpDir, "full.png"), "x");
    fs.writeFileSync(path.join(tmpDir, "empty.png"), "");

    expect(hasCompleteFile(path.join(tmpDir, "full.png"))).toBe(true);
    expect(hasCompleteFile(path.join(tmpDir, "empty.png"))).toBe(false);
    expect(hasCompleteFile(path.join(tmpDir, "missing.png"))).toBe(false);
  });
});
