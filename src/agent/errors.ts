// src/agent/errors.ts

export type AgentErrorKind =
  | "config"
  | "extraction_parse"
  | "transport"
  | "api_status"
  | "session_not_found"
  | "session_busy"
  | "refinement_input"
  | "refinement_unavailable";

export class AgentError extends Error {
  constructor(readonly kind: AgentErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
  }
}

export class ConfigError extends AgentError {
  constructor(readonly variables: string[], detail: string) {
    super("config", `Invalid configuration: ${detail}`);
  }
}

/** Oracle answered, but not with a JSON object. */
export class ExtractionParseError extends AgentError {
  constructor(readonly raw: string, reason: string) {
    super("extraction_parse", `Oracle output is not a JSON object: ${reason}`);
  }
}

export class TransportError extends AgentError {
  constructor(readonly target: "oracle" | "search", message: string) {
    super("transport", message);
  }
}

export class ApiStatusError extends AgentError {
  constructor(readonly status: number, readonly body?: string) {
    super("api_status", `API Error: ${status}`);
  }
}

export class SessionNotFoundError extends AgentError {
  constructor(sessionId: string) {
    super("session_not_found", `Unknown session: ${sessionId}`);
  }
}

export class SessionBusyError extends AgentError {
  constructor(sessionId: string) {
    super("session_busy", `Session ${sessionId} is still handling a previous request`);
  }
}

export class RefinementInputError extends AgentError {
  constructor(message: string) {
    super("refinement_input", message);
  }
}

export class RefinementUnavailableError extends AgentError {
  constructor() {
    super("refinement_unavailable", "Ask a question before refining the search.");
  }
}

/** Errors that end one turn but leave the session usable. */
export type TurnError = ExtractionParseError | TransportError | ApiStatusError;

export function errorMessage(e: unknown): string {
  if (e instanceof Error) return e.message;
  if (typeof e === "string") return e;
  return "Unknown error";
}
