// src/agent/extractor.ts
import { ExtractionParseError, TransportError, errorMessage } from "./errors.js";
import type { CandidateParams, ChatMessage } from "./schemas.js";
import { errResult, okResult, type ExtractorOracle, type OracleMessage, type Result } from "./types.js";

export type ExtractOpts = {
  systemPrompt: string;
  /** Most recent transcript entries to send; 0 sends everything. */
  window?: number;
};

/**
 * Trim the transcript to the last `window` entries, widened so the latest
 * user turn is always included.
 */
export function windowTranscript(transcript: readonly ChatMessage[], window = 0): ChatMessage[] {
  if (window <= 0 || transcript.length <= window) return [...transcript];
  let start = transcript.length - window;
  let lastUser = -1;
  for (let i = transcript.length - 1; i >= 0; i--) {
    if (transcript[i].role === "user") { lastUser = i; break; }
  }
  if (lastUser >= 0 && lastUser < start) start = lastUser;
  return transcript.slice(start);
}

export function parseCandidate(raw: string): Result<CandidateParams, ExtractionParseError> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (e) {
    return errResult(new ExtractionParseError(raw, errorMessage(e)));
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    const got = parsed === null ? "null" : Array.isArray(parsed) ? "array" : typeof parsed;
    return errResult(new ExtractionParseError(raw, `expected an object, got ${got}`));
  }
  const candidate: CandidateParams = {};
  for (const [k, v] of Object.entries(parsed)) candidate[k] = v;
  return okResult(candidate);
}

/** One oracle call per turn, no retry. Oracle and parse failures come back as results. */
export async function extractParameters(
  oracle: ExtractorOracle,
  transcript: readonly ChatMessage[],
  { systemPrompt, window = 0 }: ExtractOpts
): Promise<Result<CandidateParams, ExtractionParseError | TransportError>> {
  if (!transcript.some((m) => m.role === "user")) {
    throw new Error("extractParameters needs at least one user turn");
  }

  const messages: OracleMessage[] = [
    { role: "system", content: systemPrompt },
    ...windowTranscript(transcript, window).map((m) => ({ role: m.role, content: m.content })),
  ];

  let raw: string;
  try {
    raw = await oracle.complete(messages);
  } catch (e) {
    return errResult(new TransportError("oracle", errorMessage(e)));
  }
  return parseCandidate(raw.trim());
}
