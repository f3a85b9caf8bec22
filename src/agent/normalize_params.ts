// src/agent/normalize_params.ts
import type { CandidateParams } from "./schemas.js";

// Lower-cased spellings that all mean the same country
const LOCATION_ALIASES: Record<string, string> = {
  us: "United States",
  "united states": "United States",
};

/** First character upper-cased, the rest left alone. */
export function sentenceCase(s: string): string {
  if (!s) return s;
  return s.charAt(0).toUpperCase() + s.slice(1);
}

/** Every word starts upper-case, the rest of each word lower-case ("new YORK" → "New York"). */
export function titleCase(s: string): string {
  return s.toLowerCase().replace(/(^|[^\p{L}])(\p{L})/gu, (_m, sep: string, ch: string) => sep + ch.toUpperCase());
}

export function normalizeLocation(raw: string): string | null {
  const trimmed = raw.trim();
  if (!trimmed) return null;
  return LOCATION_ALIASES[trimmed.toLowerCase()] ?? titleCase(trimmed);
}

/** Blank strings become null; non-strings pass through. */
export function normalizeValue(key: string, value: unknown): unknown {
  if (typeof value !== "string") return value;
  if (value.trim() === "") return null;
  if (key === "location") return normalizeLocation(value);
  return sentenceCase(value);
}

/** Cleans a candidate before it is merged. Unknown keys are cleaned the same way. */
export function normalizeCandidate(candidate: CandidateParams): CandidateParams {
  const out: CandidateParams = {};
  for (const [key, value] of Object.entries(candidate)) {
    out[key] = normalizeValue(key, value);
  }
  return out;
}
