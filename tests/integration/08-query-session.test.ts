import { describe, expect, it } from "vitest";
import { makeTrialsClient } from "../../src/agent/clients/trials_client.js";
import { RefinementInputError, RefinementUnavailableError, SessionBusyError } from "../../src/agent/errors.js";
import { defaultParams } from "../../src/agent/filter_params.js";
import {
  GREETING,
  NO_RESULTS_MESSAGE,
  PARSE_ERROR_MESSAGE,
  refinementControls,
} from "../../src/agent/render.js";
import { QuerySession, type SessionOpts } from "../../src/agent/session.js";
import { silentLogger } from "../../src/agent/types.js";
import { EMPTY_BODY, fakeFetch, fakeOracle, searchBody } from "../helpers/fakes.js";

type Reply = Parameters<typeof fakeFetch>[0][number];

function setup(oracleReplies: Array<string | Error>, searchReplies: Reply[], opts: SessionOpts = {}) {
  const oracle = fakeOracle(oracleReplies);
  const fetchImpl = fakeFetch(searchReplies);
  const trials = makeTrialsClient({ baseUrl: "https://trials.example.test", apiKey: "test-key", fetchImpl });
  const session = new QuerySession("s-1", { oracle, trials, logger: silentLogger }, opts);
  return { oracle, fetchImpl, session };
}

const ASTHMA = JSON.stringify({ search_query: "asthma", location: "us", sponsor: "" });

describe("QuerySession · user turns", () => {
  it("starts with the greeting and default filters", () => {
    const { session } = setup([], []);
    expect(session.transcript).toEqual([{ role: "assistant", content: GREETING }]);
    expect(session.filters).toEqual(defaultParams());
  });

  it("extracts, normalizes, merges and searches in that order", async () => {
    const { session, oracle, fetchImpl } = setup([ASTHMA], [{ status: 200, body: searchBody(7, 70) }]);
    const out = await session.handleUserMessage("asthma trials in the us");

    expect(out.kind).toBe("results");
    expect(out.total).toBe(70);
    expect(out.trials).toHaveLength(5);
    expect(out.message.split("\n")[0]).toBe("### I found 70 trials. Here are the top results:");
    expect(out.refinement).toEqual(refinementControls());

    expect(session.filters.search_query).toBe("Asthma");
    expect(session.filters.location).toBe("United States");
    expect(session.filters.sponsor).toBeNull();

    // greeting is not sent to the oracle
    expect(oracle.calls[0].map((m) => m.role)).toEqual(["system", "user"]);
    expect(fetchImpl.requests[0].body).toEqual(session.filters);

    expect(session.transcript.map((m) => m.role)).toEqual(["assistant", "user", "assistant"]);
    expect(session.transcript[2].content).toBe(out.message);
  });

  it("keeps earlier filters when a later turn omits them", async () => {
    const { session, oracle } = setup(
      [ASTHMA, JSON.stringify({ phase: "Phase 3" })],
      [{ status: 200, body: searchBody(1) }, { status: 200, body: searchBody(1) }]
    );
    await session.handleUserMessage("asthma trials in the us");
    await session.handleUserMessage("only phase 3");

    expect(session.filters.search_query).toBe("Asthma");
    expect(session.filters.location).toBe("United States");
    expect(session.filters.phase).toBe("Phase 3");
    // second call carries the whole conversation so far
    expect(oracle.calls[1].map((m) => m.role)).toEqual(["system", "user", "assistant", "user"]);
  });

  it("reports a parse error, leaves filters untouched and recovers next turn", async () => {
    const { session, fetchImpl } = setup(["not json", ASTHMA], [{ status: 200, body: searchBody(2) }]);
    const before = JSON.stringify(session.filters);

    const bad = await session.handleUserMessage("hello?");
    expect(bad.kind).toBe("error");
    expect(bad.message).toBe(PARSE_ERROR_MESSAGE);
    expect(bad.error?.kind).toBe("extraction_parse");
    expect(JSON.stringify(session.filters)).toBe(before);
    expect(fetchImpl.requests).toHaveLength(0);

    const good = await session.handleUserMessage("asthma trials in the us");
    expect(good.kind).toBe("results");
    expect(session.filters.search_query).toBe("Asthma");
  });

  it("reports an oracle failure as a transport error", async () => {
    const { session } = setup([new Error("timeout")], []);
    const out = await session.handleUserMessage("anything");
    expect(out.kind).toBe("error");
    expect(out.message).toBe("Error processing your request: timeout");
    expect(out.error).toEqual({ kind: "transport", message: "timeout" });
  });

  it("surfaces a 500 without rolling back the merge", async () => {
    const { session } = setup([ASTHMA], [{ status: 500, body: "" }]);
    const out = await session.handleUserMessage("asthma trials in the us");

    expect(out.kind).toBe("error");
    expect(out.message).toContain("500");
    expect(out.error).toEqual({ kind: "api_status", message: "API Error: 500", status: 500 });
    expect(out.refinement).toBeNull();
    expect(session.filters.search_query).toBe("Asthma");
    expect(session.transcript.at(-1)).toEqual({ role: "assistant", content: "API Error: 500" });
  });

  it("shows a no-results notice without refinement controls", async () => {
    const { session } = setup([ASTHMA], [{ status: 200, body: EMPTY_BODY }]);
    const out = await session.handleUserMessage("asthma trials in the us");
    expect(out.kind).toBe("no_results");
    expect(out.message).toBe(NO_RESULTS_MESSAGE);
    expect(out.refinement).toBeNull();
  });

  it("uses the broad profile defaults", () => {
    const { session } = setup([], [], { profile: "broad" });
    expect(session.filters.gender).toBe("All");
    expect(session.filters.show_only_results).toBeNull();
  });
});

describe("QuerySession · refinements", () => {
  async function searched(extraSearches: Reply[]) {
    const ctx = setup([ASTHMA], [{ status: 200, body: searchBody(6) }, ...extraSearches]);
    await ctx.session.handleUserMessage("asthma trials in the us");
    return ctx;
  }

  it("refuses to refine before the first question", async () => {
    const { session } = setup([], []);
    await expect(session.viewMoreResults()).rejects.toBeInstanceOf(RefinementUnavailableError);
  });

  it("applies a phase and re-runs only the search", async () => {
    const { session, oracle, fetchImpl } = await searched([{ status: 200, body: searchBody(3) }]);
    const out = await session.applyPhaseFilter("Phase 2");

    expect(out.kind).toBe("results");
    expect(session.filters.phase).toBe("Phase 2");
    expect(oracle.calls).toHaveLength(1);
    expect(fetchImpl.requests).toHaveLength(2);
    expect(fetchImpl.requests[1].body).toMatchObject({ phase: "Phase 2", search_query: "Asthma" });
    expect(session.transcript).toContainEqual({ role: "assistant", content: "Phase filter applied: Phase 2" });
  });

  it("rejects a phase outside the offered set", async () => {
    const { session } = await searched([]);
    await expect(session.applyPhaseFilter("Phase 5")).rejects.toBeInstanceOf(RefinementInputError);
    expect(session.filters.phase).toBeNull();
  });

  it("advances the offset by exactly five per click", async () => {
    const { session, fetchImpl } = await searched([
      { status: 200, body: searchBody(5) },
      { status: 200, body: searchBody(5) },
      { status: 200, body: searchBody(5) },
    ]);
    const offsets: unknown[] = [];
    for (let i = 0; i < 3; i++) {
      await session.viewMoreResults();
      offsets.push(session.filters.from);
    }
    expect(offsets).toEqual([5, 10, 15]);
    expect(fetchImpl.requests.map((r) => r.body)).toMatchObject([{ from: 0 }, { from: 5 }, { from: 10 }, { from: 15 }]);
    expect(session.transcript.filter((m) => m.content === "Loading more results...")).toHaveLength(3);
  });

  it("normalizes a typed location before applying it", async () => {
    const { session } = await searched([{ status: 200, body: searchBody(1) }, { status: 200, body: searchBody(1) }]);
    await session.applyLocationFilter("us");
    expect(session.filters.location).toBe("United States");
    await session.applyLocationFilter("san diego");
    expect(session.filters.location).toBe("San Diego");
    expect(session.transcript.at(-2)).toEqual({ role: "assistant", content: "Location filter applied: San Diego" });
  });

  it("rejects an empty location", async () => {
    const { session } = await searched([]);
    await expect(session.applyLocationFilter("   ")).rejects.toBeInstanceOf(RefinementInputError);
  });

  it("keeps refinement controls when a refinement finds nothing", async () => {
    const { session } = await searched([{ status: 200, body: EMPTY_BODY }]);
    const out = await session.viewMoreResults();
    expect(out.kind).toBe("no_results");
    expect(out.refinement).toEqual(refinementControls());
  });

  it("runs one operation at a time", async () => {
    const { session } = await searched([{ status: 200, body: searchBody(1) }]);
    const first = session.viewMoreResults();
    await expect(session.viewMoreResults()).rejects.toBeInstanceOf(SessionBusyError);
    await expect(first).resolves.toMatchObject({ kind: "results" });
    expect(session.filters.from).toBe(5);
  });
});
