import type { FieldError } from "./types.js";

export function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export function asString(v: unknown): string | undefined {
  return typeof v === "string" ? v : undefined;
}

export function asInt(v: unknown): number | undefined {
  return typeof v === "number" && Number.isSafeInteger(v) ? v : undefined;
}

export function asNonNegativeInt(v: unknown): number | undefined {
  const n = asInt(v);
  return n !== undefined && n >= 0 ? n : undefined;
}

/** Parses a canonical positive decimal id ("1", "42"; not "01" or "1.0"). */
export function parseDocId(key: string): number | undefined {
  if (!/^[1-9][0-9]*$/.test(key)) return undefined;
  const n = Number(key);
  return Number.isSafeInteger(n) ? n : undefined;
}

export function pushErr(errors: FieldError[], path: string, message: string): void {
  errors.push({ path, message });
}
