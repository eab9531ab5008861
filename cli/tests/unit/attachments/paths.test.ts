/**
 * Unit tests for attachment paths and types
 */

import * as path from "path";
import { describe, it, expect } from "vitest";
import {
  attachmentRelativePath,
  extensionForMimeType,
  mimeTypeFromContentType,
  mimeTypeFromUrl,
} from "../../../src/attachments/paths.js";

describe("mimeTypeFromUrl", () => {
  it("should read the extension from the URL path, ignoring the query", () => {
    expect(mimeTypeFromUrl("https://cdn.test/a/b/shot.PNG?sig=x.jpg")).toBe("image/png");
    expect(mimeTypeFromUrl("https://cdn.test/shot.jpeg")).toBe("image/jpeg");
    expect(mimeTypeFromUrl("https://cdn.test/clip.mov")).toBe("video/quicktime");
  });

  it("should return null for unknown or missing extensions", () => {
    expect(mimeTypeFromUrl("https://cdn.test/shot")).toBeNull();
    expect(mimeTypeFromUrl("https://cdn.test/shot.webp")).toBeNull();
    expect(mimeTypeFromUrl("not a url")).toBeNull();
  });
});

describe("mimeTypeFromContentType", () => {
  it("should drop parameters and case", () => {
    expect(mimeTypeFromContentType("Image/PNG; charset=binary")).toBe("image/png");
    expect(mimeTypeFromContentType("video/mp4")).toBe("video/mp4");
  });

  it("should return null for types screenshots are not saved as", () => {
    expect(mimeTypeFromContentType("application/octet-stream")).toBeNull();
    expect(mimeTypeFromContentType("")).toBeNull();
    expect(mimeTypeFromContentType(null)).toBeNull();
  });
});

describe("attachmentRelativePath", () => {
  it("should put crash logs under logs/", () => {
    expect(attachmentRelativePath("crash", 12)).toBe(path.join("logs", "12.ips"));
  });

  it("should name screenshots by their type", () => {
    expect(attachmentRelativePath("feedback", 3, "image/jpeg")).toBe(path.join("screenshots", "3.jpg"));
    expect(attachmentRelativePath("feedback", 3, null)).toBe(path.join("screenshots", "3.bin"));
  });
});

describe("extensionForMimeType", () => {
  it("should fall back to bin", () => {
    expect(extensionForMimeType("IMAGE/HEIC")).toBe("heic");
    expect(extensionForMimeType("application/octet-stream")).toBe("bin");
    expect(extensionForMimeType(undefined)).toBe("bin");
  });
});
