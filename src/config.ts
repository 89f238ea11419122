import fs from "node:fs";
import path from "node:path";
import { config as loadDotEnv } from "dotenv";
import { DEFAULT_PERSONA_NAME, getPersona } from "./core/personas.js";
import { DEFAULT_MAX_UPLOAD_BYTES } from "./core/uploads.js";

const localEnvPath = path.resolve(process.cwd(), ".env.local");
if (fs.existsSync(localEnvPath)) {
  loadDotEnv({ path: localEnvPath, quiet: true });
}
loadDotEnv({ quiet: true });

export const DEFAULT_TEXT_MODEL = "gemini-1.5-flash";
export const DEFAULT_IMAGE_MODEL = "imagen-3.0-generate-002";

export type AppConfig = {
  apiKey: string;
  textModel: string;
  imageModel: string;
  defaultPersona: string;
  maxUploadBytes: number;
};

type EnvSource = Record<string, string | undefined>;

export function resolveAppConfig(env: EnvSource = process.env): AppConfig {
  const apiKey = env.GOOGLE_API_KEY?.trim() || "";
  if (!apiKey) {
    throw new Error("GOOGLE_API_KEY not found. Please set it in your .env file.");
  }

  return {
    apiKey,
    textModel: env.PITCHDESK_TEXT_MODEL?.trim() || DEFAULT_TEXT_MODEL,
    imageModel: env.PITCHDESK_IMAGE_MODEL?.trim() || DEFAULT_IMAGE_MODEL,
    defaultPersona: parseDefaultPersona(env.PITCHDESK_DEFAULT_PERSONA),
    maxUploadBytes: parseMaxUploadBytes(env.PITCHDESK_MAX_UPLOAD_BYTES),
  };
}

function parseDefaultPersona(value: string | undefined): string {
  const normalized = (value ?? "").trim();
  if (!normalized) {
    return DEFAULT_PERSONA_NAME;
  }
  if (!getPersona(normalized)) {
    throw new Error(`Invalid PITCHDESK_DEFAULT_PERSONA "${value}". Run \`pitchdesk personas\` for the list.`);
  }
  return normalized;
}

function parseMaxUploadBytes(value: string | undefined): number {
  const normalized = (value ?? "").trim();
  if (!normalized) {
    return DEFAULT_MAX_UPLOAD_BYTES;
  }
  const parsed = Number(normalized);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new Error(`Invalid PITCHDESK_MAX_UPLOAD_BYTES "${value}". Use a positive integer.`);
  }
  return parsed;
}
