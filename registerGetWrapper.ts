/*
 * registerGetWrapper.ts
 *
 * Adds a REST-style GET route next to the JSON-RPC endpoint so read-only
 * tools can be called from a browser or curl:
 *
 *   GET /agent/session.get?sessionId=...
 *
 * Query parameters are coerced (numbers, booleans, comma-separated or `[]`
 * arrays), validated against the tool's Zod schema, and the result is
 * returned as JSON. Tools that change a session are POST-only.
 */

import type { Express, Request, Response } from 'express';
import { z } from 'zod';
import { AgentError } from './src/agent/errors.js';
import type { Tool } from './src/agent/tools.js';

type QueryValue = string | number | boolean | QueryValue[];

// Coerce query parameter values into numbers, booleans, arrays, or strings.
export function coerceValue(value: unknown): QueryValue | undefined {
  if (Array.isArray(value)) {
    return value.map(coerceValue).filter((v): v is QueryValue => v !== undefined);
  }
  if (typeof value !== 'string') {
    return undefined;
  }
  const trimmed = value.trim();
  if (trimmed.includes(',')) {
    return trimmed.split(',').map(v => coerceValue(v)).filter((v): v is QueryValue => v !== undefined);
  }
  if (/^-?\d+(\.\d+)?$/.test(trimmed)) {
    return Number(trimmed);
  }
  if (trimmed.toLowerCase() === 'true') return true;
  if (trimmed.toLowerCase() === 'false') return false;
  return trimmed;
}

// Parse Express req.query into an argument object; keys ending with [] are arrays
export function parseQuery(query: Request['query']): Record<string, QueryValue> {
  const result: Record<string, QueryValue> = {};
  for (const [key, value] of Object.entries(query)) {
    const coerced = coerceValue(value);
    if (coerced === undefined) continue;
    if (key.endsWith('[]')) {
      result[key.slice(0, -2)] = Array.isArray(coerced) ? coerced : [coerced];
    } else {
      result[key] = coerced;
    }
  }
  return result;
}

/**
 * Register `GET {basePath}/:toolName` for every read-only tool.
 */
export function registerGetWrapper(app: Express, tools: Tool[], { basePath = '/agent' } = {}): void {
  app.get(`${basePath}/:toolName`, async (req: Request, res: Response) => {
    const { toolName } = req.params;
    const tool = tools.find(t => t.name === toolName && t.readOnly);
    if (!tool) {
      return res.status(404).json({ error: `Unknown tool: ${toolName}` });
    }
    try {
      const args = tool.inputSchema.parse(parseQuery(req.query));
      const result = await tool.handler(args);
      return res.json(result);
    } catch (e: unknown) {
      let message: string;
      if (e instanceof z.ZodError) {
        message = e.issues.map(issue => issue.message).join('; ');
      } else if (e instanceof AgentError && e.kind === 'session_not_found') {
        return res.status(404).json({ error: e.message });
      } else if (e instanceof Error) {
        message = e.message;
      } else {
        message = 'Invalid input';
      }
      return res.status(400).json({ error: message });
    }
  });
}
