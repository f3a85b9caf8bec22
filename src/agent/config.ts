// src/agent/config.ts
import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { DefaultsProfile } from "./schemas.js";

const required = (name: string) => z.string({ required_error: `${name} is not set` }).trim().min(1, `${name} is not set`);

const EnvSchema = z.object({
  TRIALS_API_URL: required("TRIALS_API_URL").pipe(z.string().url("TRIALS_API_URL must be a URL")),
  TRIALS_API_KEY: required("TRIALS_API_KEY"),
  OPENAI_API_KEY: required("OPENAI_API_KEY"),
  OPENAI_MODEL: z.string().trim().min(1).default("gpt-4"),
  OPENAI_BASE_URL: z.string().url("OPENAI_BASE_URL must be a URL").optional(),
  PORT: z.coerce.number().int().min(0).max(65535).default(8788),
  DEFAULTS_PROFILE: z.enum(["classic", "broad"]).default("classic"),
  TRANSCRIPT_WINDOW: z.coerce.number().int().min(0).default(20),
  SEARCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  ORACLE_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
  SESSION_IDLE_MS: z.coerce.number().int().positive().default(30 * 60_000),
  MAX_SESSIONS: z.coerce.number().int().positive().default(1000),
});

export interface AgentConfig {
  trialsApiUrl: string;
  trialsApiKey: string;
  openaiApiKey: string;
  openaiModel: string;
  openaiBaseUrl?: string;
  port: number;
  defaultsProfile: DefaultsProfile;
  transcriptWindow: number;
  searchTimeoutMs: number;
  oracleTimeoutMs: number;
  sessionIdleMs: number;
  maxSessions: number;
}

/** Read once at startup. Throws ConfigError naming every bad variable. */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AgentConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const variables = Array.from(new Set(parsed.error.issues.map((i) => String(i.path[0]))));
    throw new ConfigError(variables, parsed.error.issues.map((i) => i.message).join("; "));
  }
  const e = parsed.data;
  return {
    trialsApiUrl: e.TRIALS_API_URL.replace(/\/+$/, ""),
    trialsApiKey: e.TRIALS_API_KEY,
    openaiApiKey: e.OPENAI_API_KEY,
    openaiModel: e.OPENAI_MODEL,
    openaiBaseUrl: e.OPENAI_BASE_URL,
    port: e.PORT,
    defaultsProfile: e.DEFAULTS_PROFILE,
    transcriptWindow: e.TRANSCRIPT_WINDOW,
    searchTimeoutMs: e.SEARCH_TIMEOUT_MS,
    oracleTimeoutMs: e.ORACLE_TIMEOUT_MS,
    sessionIdleMs: e.SESSION_IDLE_MS,
    maxSessions: e.MAX_SESSIONS,
  };
}
