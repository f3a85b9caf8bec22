// src/agent/clients/openai_oracle.ts
import OpenAI from "openai";
import type { ExtractorOracle, OracleMessage } from "../types.js";

export interface OpenAiOracleOpts {
  apiKey: string;
  model?: string;
  timeoutMs?: number;
  /** Alternative Chat Completions endpoint (proxy, gateway). */
  baseURL?: string;
}

export function toChatParam(m: OracleMessage): OpenAI.Chat.ChatCompletionMessageParam {
  switch (m.role) {
    case "system":
      return { role: "system", content: m.content };
    case "assistant":
      return { role: "assistant", content: m.content };
    case "user":
      return { role: "user", content: m.content };
  }
}

// Chat Completions backed oracle. Retries are off: a failed call fails the turn.
export function makeOpenAiOracle({ apiKey, model = "gpt-4", timeoutMs = 60_000, baseURL }: OpenAiOracleOpts): ExtractorOracle {
  const client = new OpenAI({ apiKey, baseURL, timeout: timeoutMs, maxRetries: 0 });
  return {
    async complete(messages: OracleMessage[]) {
      const response = await client.chat.completions.create({
        model,
        messages: messages.map(toChatParam),
      });
      return response.choices[0]?.message?.content ?? "";
    },
  };
}
