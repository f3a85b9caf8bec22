// src/agent/session.ts
import type { TrialsClient } from "./clients/trials_client.js";
import {
  ApiStatusError,
  RefinementInputError,
  RefinementUnavailableError,
  SessionBusyError,
  type TurnError,
} from "./errors.js";
import { extractParameters } from "./extractor.js";
import { defaultParams, mergeParams, nextOffset } from "./filter_params.js";
import { normalizeCandidate, normalizeLocation } from "./normalize_params.js";
import { buildSystemPrompt } from "./prompts.js";
import {
  GREETING,
  MORE_RESULTS_MESSAGE,
  NO_RESULTS_MESSAGE,
  locationAppliedMessage,
  phaseAppliedMessage,
  refinementControls,
  renderResults,
  renderTurnError,
} from "./render.js";
import {
  MORE_RESULTS_STEP,
  PHASE_OPTIONS,
  type ChatMessage,
  type DefaultsProfile,
  type FilterParameterSet,
  type PhaseOption,
  type SessionSnapshot,
  type TurnOutcome,
} from "./schemas.js";
import type { ExtractorOracle, Logger } from "./types.js";

export type SessionDeps = {
  oracle: ExtractorOracle;
  trials: TrialsClient;
  logger?: Logger;
};

export type SessionOpts = {
  profile?: DefaultsProfile;
  /** Transcript entries sent to the oracle per turn; 0 = all. */
  transcriptWindow?: number;
};

type Origin = "turn" | "refinement";

export function isPhaseOption(x: string): x is PhaseOption {
  return PHASE_OPTIONS.some((p) => p === x);
}

/**
 * One conversation: its transcript and the filter set that every turn
 * merges into. Operations run one at a time.
 */
export class QuerySession {
  private readonly messages: ChatMessage[] = [{ role: "assistant", content: GREETING }];
  private params: FilterParameterSet;
  private hasMerged = false;
  private busy = false;
  private readonly systemPrompt: string;
  private readonly logger: Logger;

  constructor(readonly id: string, private readonly deps: SessionDeps, private readonly opts: SessionOpts = {}) {
    this.params = defaultParams(opts.profile);
    this.systemPrompt = buildSystemPrompt(opts.profile);
    this.logger = deps.logger ?? console;
  }

  get transcript(): readonly ChatMessage[] {
    return this.messages;
  }

  get filters(): Readonly<FilterParameterSet> {
    return this.params;
  }

  snapshot(): SessionSnapshot {
    return { sessionId: this.id, messages: this.messages.map((m) => ({ ...m })), params: { ...this.params } };
  }

  /** input → extract → normalize → merge → search → render */
  handleUserMessage(text: string): Promise<TurnOutcome> {
    return this.exclusive(async () => {
      this.messages.push({ role: "user", content: text });

      const extracted = await extractParameters(this.deps.oracle, this.oracleTranscript(), {
        systemPrompt: this.systemPrompt,
        window: this.opts.transcriptWindow ?? 0,
      });
      if (!extracted.ok) return this.fail(extracted.error);

      this.params = mergeParams(this.params, normalizeCandidate(extracted.value));
      this.hasMerged = true;
      return this.search("turn");
    });
  }

  applyPhaseFilter(phase: string): Promise<TurnOutcome> {
    return this.exclusive(async () => {
      if (!isPhaseOption(phase)) {
        throw new RefinementInputError(`Phase must be one of: ${PHASE_OPTIONS.join(", ")}`);
      }
      this.requireMerged();
      this.params = { ...this.params, phase };
      this.messages.push({ role: "assistant", content: phaseAppliedMessage(phase) });
      return this.search("refinement");
    });
  }

  viewMoreResults(): Promise<TurnOutcome> {
    return this.exclusive(async () => {
      this.requireMerged();
      this.params = { ...this.params, from: nextOffset(this.params.from, MORE_RESULTS_STEP) };
      this.messages.push({ role: "assistant", content: MORE_RESULTS_MESSAGE });
      return this.search("refinement");
    });
  }

  applyLocationFilter(location: string): Promise<TurnOutcome> {
    return this.exclusive(async () => {
      const normalized = normalizeLocation(location);
      if (!normalized) throw new RefinementInputError("Location must not be empty");
      this.requireMerged();
      this.params = { ...this.params, location: normalized };
      this.messages.push({ role: "assistant", content: locationAppliedMessage(normalized) });
      return this.search("refinement");
    });
  }

  // Greeting is for the user only; the oracle sees the conversation from the first question.
  private oracleTranscript(): ChatMessage[] {
    const firstUser = this.messages.findIndex((m) => m.role === "user");
    return firstUser < 0 ? [] : this.messages.slice(firstUser);
  }

  private requireMerged(): void {
    if (!this.hasMerged) throw new RefinementUnavailableError();
  }

  private async search(origin: Origin): Promise<TurnOutcome> {
    const result = await this.deps.trials.search(this.params);
    if (!result.ok) return this.fail(result.error);

    const page = result.value;
    if (page.hitCount === 0) {
      this.messages.push({ role: "assistant", content: NO_RESULTS_MESSAGE });
      return this.outcome({
        kind: "no_results",
        message: NO_RESULTS_MESSAGE,
        total: page.total,
        trials: [],
        refinement: origin === "refinement" ? refinementControls() : null,
      });
    }

    const message = renderResults(page);
    this.messages.push({ role: "assistant", content: message });
    return this.outcome({
      kind: "results",
      message,
      total: page.total,
      trials: page.trials,
      refinement: refinementControls(),
    });
  }

  private fail(error: TurnError): TurnOutcome {
    this.logger.warn(`[session ${this.id}] ${error.kind}: ${error.message}`);
    const message = renderTurnError(error);
    this.messages.push({ role: "assistant", content: message });
    return this.outcome({
      kind: "error",
      message,
      total: 0,
      trials: [],
      refinement: null,
      error: {
        kind: error.kind,
        message: error.message,
        ...(error instanceof ApiStatusError ? { status: error.status } : {}),
      },
    });
  }

  private outcome(o: Omit<TurnOutcome, "params">): TurnOutcome {
    return { ...o, params: { ...this.params } };
  }

  private async exclusive<T>(fn: () => Promise<T>): Promise<T> {
    if (this.busy) throw new SessionBusyError(this.id);
    this.busy = true;
    try {
      return await fn();
    } finally {
      this.busy = false;
    }
  }
}
