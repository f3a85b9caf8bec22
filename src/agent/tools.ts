// src/agent/tools.ts
import { z } from "zod";
import { GREETING, refinementControls } from "./render.js";
import { PHASE_OPTIONS } from "./schemas.js";
import type { SessionStore } from "./session_store.js";

export type Tool<S extends z.ZodTypeAny = z.ZodTypeAny> = {
  name: string;
  description: string;
  inputSchema: S;
  /** Safe to expose over GET. */
  readOnly?: boolean;
  handler: (args: z.infer<S>) => Promise<unknown>;
};

/** Erases the schema parameter; each tool parses its own arguments before the handler sees them. */
function defineTool<S extends z.ZodTypeAny>(tool: Tool<S>): Tool {
  return {
    ...tool,
    handler: async (args: unknown) => tool.handler(tool.inputSchema.parse(args)),
  };
}

// -------- Schemas --------
const SessionRef = z.object({ sessionId: z.string().min(1) });

const SendMessage = SessionRef.extend({
  message: z.string().trim().min(1, "message must not be empty"),
});

const RefinePhase = SessionRef.extend({
  phase: z.enum(PHASE_OPTIONS),
});

const RefineLocation = SessionRef.extend({
  location: z.string().trim().min(1, "location must not be empty"),
});

export function buildTools(store: SessionStore): Tool[] {
  const tools: Tool[] = [];

  tools.push(defineTool({
    name: "session.create",
    description: "Start a conversation; returns its id and the greeting",
    inputSchema: z.object({}),
    handler: async () => {
      const session = store.create();
      return { ...session.snapshot(), greeting: GREETING, refinement: refinementControls() };
    },
  }));

  tools.push(defineTool({
    name: "session.get",
    description: "Transcript and current search filters of a conversation",
    inputSchema: SessionRef,
    readOnly: true,
    handler: async ({ sessionId }) => store.get(sessionId).snapshot(),
  }));

  tools.push(defineTool({
    name: "session.send",
    description: "Ask a question; extracts filters, merges them and runs the trials search",
    inputSchema: SendMessage,
    handler: async ({ sessionId, message }) => store.get(sessionId).handleUserMessage(message),
  }));

  tools.push(defineTool({
    name: "refine.phase",
    description: "Restrict the current search to one trial phase and re-run it",
    inputSchema: RefinePhase,
    handler: async ({ sessionId, phase }) => store.get(sessionId).applyPhaseFilter(phase),
  }));

  tools.push(defineTool({
    name: "refine.more",
    description: "Advance the result offset by five and re-run the search",
    inputSchema: SessionRef,
    handler: async ({ sessionId }) => store.get(sessionId).viewMoreResults(),
  }));

  tools.push(defineTool({
    name: "refine.location",
    description: "Replace the location filter and re-run the search",
    inputSchema: RefineLocation,
    handler: async ({ sessionId, location }) => store.get(sessionId).applyLocationFilter(location),
  }));

  tools.push(defineTool({
    name: "session.end",
    description: "Forget a conversation",
    inputSchema: SessionRef,
    handler: async ({ sessionId }) => {
      store.delete(sessionId);
      return { sessionId, ended: true };
    },
  }));

  return tools;
}
