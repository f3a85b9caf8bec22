// src/agent/types.ts

export type OracleMessage = {
  role: "system" | "user" | "assistant";
  content: string;
};

/** Text-in/text-out language model. No schema guarantee on what comes back. */
export type ExtractorOracle = {
  complete: (messages: OracleMessage[]) => Promise<string>;
};

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export type Logger = Pick<Console, "info" | "warn" | "error">;

export const silentLogger: Logger = {
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};

export type Result<T, E> = { ok: true; value: T } | { ok: false; error: E };

export function okResult<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function errResult<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}
