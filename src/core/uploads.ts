import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { ImagePayload, UploadedFile } from "../chat-types.js";
import { isRecord, trimmedString } from "./values.js";

export const DEFAULT_MAX_UPLOAD_BYTES = 20 * 1024 * 1024;

export type UploadKind = "image" | "audio" | "document";

const IMAGE_MIME_BY_EXT: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
};

const AUDIO_EXTENSIONS = new Set([".wav", ".mp3", ".ogg"]);

export type RuntimeUploadInput =
  | {
      path: string;
      name?: string;
    }
  | {
      name: string;
      data_base64: string;
    };

export type LoadUploadResult =
  | {
      ok: true;
      file: UploadedFile;
    }
  | {
      ok: false;
      error: string;
    };

export function classifyUpload(fileName: string): UploadKind {
  const extension = path.extname(fileName).toLowerCase();
  if (IMAGE_MIME_BY_EXT[extension]) {
    return "image";
  }
  if (AUDIO_EXTENSIONS.has(extension)) {
    return "audio";
  }
  return "document";
}

export function imagePayloadFromUpload(file: UploadedFile): ImagePayload {
  const extension = path.extname(file.name).toLowerCase();
  return {
    mimeType: IMAGE_MIME_BY_EXT[extension] ?? "application/octet-stream",
    data: file.data,
    name: file.name,
  };
}

export function normalizeUploadInput(value: unknown): RuntimeUploadInput | null {
  if (!isRecord(value)) {
    return null;
  }

  const pathValue = trimmedString(value.path);
  const name = trimmedString(value.name);
  const dataBase64 = trimmedString(value.data_base64 ?? value.dataBase64);

  if (dataBase64 && name) {
    return { name, data_base64: dataBase64 };
  }
  if (pathValue) {
    return name ? { path: pathValue, name } : { path: pathValue };
  }
  return null;
}

export function loadUpload(
  input: RuntimeUploadInput,
  maxBytes: number = DEFAULT_MAX_UPLOAD_BYTES,
): LoadUploadResult {
  if ("data_base64" in input) {
    return loadUploadFromBase64(input.name, input.data_base64, maxBytes);
  }
  return loadUploadFromPath(input.path, maxBytes, input.name);
}

export function loadUploadFromPath(
  rawPath: string,
  maxBytes: number = DEFAULT_MAX_UPLOAD_BYTES,
  displayName?: string,
): LoadUploadResult {
  const resolvedPath = resolveUploadPath(rawPath);
  if (!resolvedPath) {
    return { ok: false, error: "no file path provided" };
  }
  if (!fs.existsSync(resolvedPath)) {
    return { ok: false, error: `file not found: ${resolvedPath}` };
  }

  let stats: fs.Stats;
  try {
    stats = fs.statSync(resolvedPath);
  } catch {
    return { ok: false, error: `unable to stat file: ${resolvedPath}` };
  }
  if (!stats.isFile()) {
    return { ok: false, error: `not a file: ${resolvedPath}` };
  }
  if (stats.size > maxBytes) {
    return {
      ok: false,
      error: `file too large (${formatByteSize(stats.size)}). max is ${formatByteSize(maxBytes)}`,
    };
  }

  let bytes: Buffer;
  try {
    bytes = fs.readFileSync(resolvedPath);
  } catch {
    return { ok: false, error: `unable to read file: ${resolvedPath}` };
  }

  return {
    ok: true,
    file: {
      name: displayName?.trim() || path.basename(resolvedPath),
      data: bytes,
    },
  };
}

export function loadUploadFromBase64(
  rawName: string,
  rawPayload: string,
  maxBytes: number = DEFAULT_MAX_UPLOAD_BYTES,
): LoadUploadResult {
  const name = path.basename(rawName.trim());
  if (!name) {
    return { ok: false, error: "upload name is empty" };
  }

  // accept a bare payload or a full data url
  const payload = rawPayload.trim().replace(/^data:[^;,]*;base64,/i, "");
  if (!payload || !/^[A-Za-z0-9+/_-]+={0,2}$/.test(payload)) {
    return { ok: false, error: "invalid base64 upload payload" };
  }

  const bytes = Buffer.from(payload, "base64");
  if (bytes.length <= 0) {
    return { ok: false, error: "upload payload is empty" };
  }
  if (bytes.length > maxBytes) {
    return {
      ok: false,
      error: `file too large (${formatByteSize(bytes.length)}). max is ${formatByteSize(maxBytes)}`,
    };
  }

  return {
    ok: true,
    file: { name, data: bytes },
  };
}

export function toDataUrl(image: ImagePayload): string {
  return `data:${image.mimeType};base64,${Buffer.from(image.data).toString("base64")}`;
}

// Accepts pasted paths: surrounding quotes, file:// urls and a leading ~.
function resolveUploadPath(rawPath: string): string {
  let candidate = unquote(rawPath.trim());
  if (!candidate) {
    return "";
  }
  if (candidate.startsWith("file://")) {
    try {
      candidate = fileURLToPath(candidate);
    } catch {
      candidate = candidate.slice("file://".length);
    }
  }
  if (candidate === "~" || candidate.startsWith("~/")) {
    candidate = path.join(os.homedir(), candidate.slice(1));
  }
  return path.resolve(candidate);
}

function unquote(value: string): string {
  const first = value.at(0);
  if (value.length >= 2 && (first === '"' || first === "'") && value.endsWith(first)) {
    return value.slice(1, -1).trim();
  }
  return value;
}

const BYTE_UNITS = ["b", "kb", "mb", "gb"];

export function formatByteSize(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) {
    return "0 b";
  }
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < BYTE_UNITS.length - 1) {
    value /= 1024;
    unit += 1;
  }
  if (unit === 0) {
    return `${Math.floor(value)} b`;
  }
  const digits = value >= 100 ? 0 : value >= 10 ? 1 : 2;
  return `${value.toFixed(digits)} ${BYTE_UNITS[unit]}`;
}
