// src/agent/app.ts
import express, { type ErrorRequestHandler, type Express } from "express";
import bodyParser from "body-parser";
import cors from "cors";
import { z } from "zod";
import { registerGetWrapper } from "../../registerGetWrapper.js";
import { AgentError, errorMessage, type AgentErrorKind } from "./errors.js";
import type { SessionStore } from "./session_store.js";
import type { Tool } from "./tools.js";
import type { Logger } from "./types.js";

export const RPC_PATH = "/agent";

type RpcId = string | number | null;

// -------- JSON-RPC helpers --------
export function ok(id: RpcId, result: unknown) { return { jsonrpc: "2.0", id, result }; }
export function err(id: RpcId, code: number, message: string, data?: unknown) {
  return { jsonrpc: "2.0", id, error: { code, message, data } };
}

const KIND_CODES: Partial<Record<AgentErrorKind, number>> = {
  session_not_found: -32004,
  session_busy: -32009,
  refinement_unavailable: -32009,
  refinement_input: -32602,
};

/** JSON-RPC error for anything a tool handler threw. */
export function toolError(id: RpcId, e: unknown) {
  if (e instanceof z.ZodError) {
    return err(id, -32602, e.issues.map((issue) => issue.message).join("; "));
  }
  if (e instanceof AgentError) {
    return err(id, KIND_CODES[e.kind] ?? -32000, e.message, { kind: e.kind });
  }
  return err(id, -32000, errorMessage(e) || "Tool error");
}

function isRpcId(x: unknown): x is string | number {
  return typeof x === "string" || typeof x === "number";
}

export type AppDeps = {
  tools: Tool[];
  store: SessionStore;
  logger?: Logger;
};

// body-parser hands unreadable JSON to the error chain; answer it as JSON-RPC.
const parseErrors: ErrorRequestHandler = (e, _req, res, next) => {
  if (e instanceof SyntaxError) {
    res.status(400).json(err(null, -32700, "Parse error"));
  } else {
    next(e);
  }
};

export function createApp({ tools, store, logger = console }: AppDeps): Express {
  const app = express();
  app.use(cors());
  app.use(bodyParser.json({ limit: "2mb" }));
  app.use(parseErrors);

  app.get("/healthz", (_req, res) => {
    res.json({ ok: true, sessions: store.size });
  });

  app.post(RPC_PATH, async (req, res) => {
    try {
      const { id, method, params } = req.body ?? {};
      if (!isRpcId(id) || typeof method !== "string" || !method) {
        return res.status(400).json(err(null, -32600, "Invalid Request"));
      }

      if (method === "tools/list") {
        return res.json(ok(id, {
          tools: tools.map((t) => ({
            name: t.name,
            description: t.description,
            params: t.inputSchema instanceof z.ZodObject ? Object.keys(t.inputSchema.shape) : [],
            readOnly: t.readOnly ?? false,
          })),
        }));
      }

      if (method === "tools/call") {
        const name = params?.name;
        const args = params?.arguments ?? {};
        const tool = tools.find((t) => t.name === name);
        if (!tool) return res.json(err(id, -32601, `Unknown tool: ${String(name)}`));
        try {
          const result = await tool.handler(args);
          return res.json(ok(id, { content: result }));
        } catch (e) {
          if (!(e instanceof AgentError) && !(e instanceof z.ZodError)) {
            logger.error(`[agent] ${tool.name} failed:`, e);
          }
          return res.json(toolError(id, e));
        }
      }

      return res.json(err(id, -32601, `Method not found: ${method}`));
    } catch (e) {
      logger.error("[agent] request failed:", e);
      return res.status(500).json(err(null, -32603, "Internal error", { message: errorMessage(e) }));
    }
  });

  registerGetWrapper(app, tools, { basePath: RPC_PATH });

  return app;
}
