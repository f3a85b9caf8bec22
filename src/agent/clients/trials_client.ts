// src/agent/clients/trials_client.ts
// Trials search endpoint: POST {base}/listoftrialswithfilters with the full filter set as body.
// Node 20 has global fetch; tests pass their own.

import { ApiStatusError, TransportError, errorMessage } from "../errors.js";
import { TOP_RESULTS, type FilterParameterSet, type SearchPage, type TrialSummary } from "../schemas.js";
import { errResult, okResult, type FetchLike, type Result } from "../types.js";

export const SEARCH_PATH = "/listoftrialswithfilters";
const NA = "N/A";

export interface TrialsClientOpts {
  baseUrl: string;
  apiKey: string;
  timeoutMs?: number;
  fetchImpl?: FetchLike;
}

export type TrialsClient = {
  search: (params: FilterParameterSet) => Promise<Result<SearchPage, ApiStatusError | TransportError>>;
};

type JsonObject = Record<string, unknown>;

function isObj(x: unknown): x is JsonObject {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function obj(x: unknown): JsonObject | undefined {
  return isObj(x) ? x : undefined;
}

function text(x: unknown, fallback = NA): string {
  if (typeof x === "string" && x.trim()) return x;
  if (typeof x === "number") return String(x);
  return fallback;
}

/** One hit → summary. Anything missing reads as N/A instead of failing the page. */
export function toTrialSummary(hit: unknown): TrialSummary {
  const src = obj(obj(hit)?._source) ?? {};
  const cond = src.condition;
  const conditions = Array.isArray(cond)
    ? cond.filter((c): c is string => typeof c === "string" && c.length > 0)
    : typeof cond === "string" && cond ? [cond] : [];
  return {
    title: text(src.brief_title),
    status: text(src.overall_status),
    phase: text(src.phase),
    conditions,
    sponsor: text(obj(src.lead_sponsor)?.agency),
  };
}

/** Reads `hits.hits` and `hits.total.value`; keeps the first TOP_RESULTS hits. */
export function toSearchPage(body: unknown): SearchPage {
  const outer = obj(obj(body)?.hits);
  const rawHits = outer?.hits;
  const hits: unknown[] = Array.isArray(rawHits) ? rawHits : [];
  const totalRaw = obj(outer?.total)?.value;
  const total = typeof totalRaw === "number" ? totalRaw : Number(totalRaw ?? 0) || 0;
  return {
    total,
    hitCount: hits.length,
    trials: hits.slice(0, TOP_RESULTS).map(toTrialSummary),
  };
}

export function makeTrialsClient({ baseUrl, apiKey, timeoutMs = 30_000, fetchImpl = fetch }: TrialsClientOpts): TrialsClient {
  const url = baseUrl.replace(/\/+$/, "") + SEARCH_PATH;
  const headers = { apikey: apiKey, "Content-Type": "application/json" };

  return {
    async search(params) {
      let res: Response;
      try {
        res = await fetchImpl(url, {
          method: "POST",
          headers,
          body: JSON.stringify(params),
          signal: AbortSignal.timeout(timeoutMs),
        });
      } catch (e) {
        return errResult(new TransportError("search", errorMessage(e)));
      }

      if (res.status !== 200) {
        const body = await res.text().catch(() => "");
        return errResult(new ApiStatusError(res.status, body || undefined));
      }

      let json: unknown;
      try {
        json = await res.json();
      } catch (e) {
        return errResult(new TransportError("search", `Invalid JSON from trials API: ${errorMessage(e)}`));
      }
      return okResult(toSearchPage(json));
    },
  };
}
