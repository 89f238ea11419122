export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Trimmed string, or "" for anything that is not a string. */
export function trimmedString(value: unknown): string {
  return typeof value === "string" ? value.trim() : "";
}
