import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { pathToFileURL } from "node:url";
import { afterEach, describe, expect, it } from "vitest";
import {
  classifyUpload,
  formatByteSize,
  imagePayloadFromUpload,
  loadUpload,
  loadUploadFromBase64,
  loadUploadFromPath,
  normalizeUploadInput,
  toDataUrl,
} from "./uploads.js";

const tempFiles: string[] = [];

afterEach(() => {
  for (const filePath of tempFiles.splice(0)) {
    fs.rmSync(filePath, { force: true });
  }
});

function writeTempFile(suffix: string, contents: string): string {
  const filePath = path.join(os.tmpdir(), `pitchdesk-upload-${process.pid}-${Date.now()}${suffix}`);
  tempFiles.push(filePath);
  fs.writeFileSync(filePath, contents);
  return filePath;
}

describe("classifyUpload", () => {
  it("routes by extension", () => {
    expect(classifyUpload("banner.PNG")).toBe("image");
    expect(classifyUpload("hero.jpeg")).toBe("image");
    expect(classifyUpload("memo.Ogg")).toBe("audio");
    expect(classifyUpload("brief.docx")).toBe("document");
    expect(classifyUpload("notes")).toBe("document");
  });

  it("builds image payloads with the matching mime type", () => {
    const payload = imagePayloadFromUpload({ name: "hero.JPG", data: Buffer.from("jpg") });
    expect(payload.mimeType).toBe("image/jpeg");
    expect(payload.name).toBe("hero.JPG");
    expect(toDataUrl(payload)).toBe("data:image/jpeg;base64,anBn");
  });
});

describe("normalizeUploadInput", () => {
  it("accepts path and inline shapes", () => {
    expect(normalizeUploadInput({ path: " ./deck.pptx " })).toEqual({ path: "./deck.pptx" });
    expect(normalizeUploadInput({ path: "a.sql", name: "b.sql" })).toEqual({ path: "a.sql", name: "b.sql" });
    expect(normalizeUploadInput({ name: "a.sql", dataBase64: "U0VMRUNU" })).toEqual({
      name: "a.sql",
      data_base64: "U0VMRUNU",
    });
  });

  it("rejects rows without a usable source", () => {
    expect(normalizeUploadInput({ data_base64: "U0VMRUNU" })).toBeNull();
    expect(normalizeUploadInput({ nope: true })).toBeNull();
    expect(normalizeUploadInput(["a.sql"])).toBeNull();
    expect(normalizeUploadInput("a.sql")).toBeNull();
  });
});

describe("loadUploadFromBase64", () => {
  it("decodes bare payloads and data urls", () => {
    const bare = loadUploadFromBase64("dir/hello.sql", "aGVsbG8=");
    expect(bare.ok).toBe(true);
    if (bare.ok) {
      expect(bare.file.name).toBe("hello.sql");
      expect(Buffer.from(bare.file.data).toString("utf8")).toBe("hello");
    }

    const dataUrl = loadUploadFromBase64("hello.png", "data:image/png;base64,aGVsbG8=");
    expect(dataUrl.ok).toBe(true);
  });

  it("reports bad payloads", () => {
    expect(loadUploadFromBase64("  ", "aGVsbG8=")).toEqual({ ok: false, error: "upload name is empty" });
    expect(loadUploadFromBase64("a.sql", "not base64!")).toEqual({
      ok: false,
      error: "invalid base64 upload payload",
    });
    expect(loadUploadFromBase64("a.sql", "aGVsbG8=", 3)).toEqual({
      ok: false,
      error: "file too large (5 b). max is 3 b",
    });
  });
});

describe("loadUploadFromPath", () => {
  it("loads local files and keeps a display name", () => {
    const filePath = writeTempFile(".sql", "SELECT 1;");

    const plain = loadUploadFromPath(filePath);
    expect(plain.ok).toBe(true);
    if (plain.ok) {
      expect(plain.file.name).toBe(path.basename(filePath));
    }

    const renamed = loadUpload({ path: `"${filePath}"`, name: "query.sql" });
    expect(renamed.ok).toBe(true);
    if (renamed.ok) {
      expect(renamed.file.name).toBe("query.sql");
      expect(Buffer.from(renamed.file.data).toString("utf8")).toBe("SELECT 1;");
    }
  });

  it("accepts file urls", () => {
    const filePath = writeTempFile(".sql", "SELECT 2;");

    const result = loadUploadFromPath(pathToFileURL(filePath).href);

    expect(result.ok).toBe(true);
    if (result.ok) {
      expect(result.file.name).toBe(path.basename(filePath));
    }
  });

  it("returns errors for missing or oversized files", () => {
    expect(loadUploadFromPath("/tmp/pitchdesk-does-not-exist.sql")).toEqual({
      ok: false,
      error: "file not found: /tmp/pitchdesk-does-not-exist.sql",
    });
    expect(loadUploadFromPath("")).toEqual({ ok: false, error: "no file path provided" });

    const filePath = writeTempFile(".sql", "SELECT 1;");
    expect(loadUploadFromPath(filePath, 4)).toEqual({
      ok: false,
      error: "file too large (9 b). max is 4 b",
    });
  });
});

describe("formatByteSize", () => {
  it("picks a readable unit", () => {
    expect(formatByteSize(30)).toBe("30 b");
    expect(formatByteSize(2048)).toBe("2.00 kb");
    expect(formatByteSize(20 * 1024 * 1024)).toBe("20.0 mb");
    expect(formatByteSize(-1)).toBe("0 b");
  });
});
