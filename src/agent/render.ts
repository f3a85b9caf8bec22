// src/agent/render.ts
import { ApiStatusError, ExtractionParseError, type TurnError } from "./errors.js";
import {
  MORE_RESULTS_STEP,
  PHASE_OPTIONS,
  type RefinementControls,
  type SearchPage,
  type TrialSummary,
} from "./schemas.js";

export const GREETING =
  'Hi! Ask me about clinical trials, for example "recruiting phase 3 breast cancer trials in Boston".';
export const NO_RESULTS_MESSAGE = "No trials found for the given query.";
export const PARSE_ERROR_MESSAGE =
  "Could not parse search parameters from the model response. Please rephrase your question.";
export const MORE_RESULTS_MESSAGE = "Loading more results...";

const ERROR_BODY_LIMIT = 300;

export function refinementControls(): RefinementControls {
  return {
    prompt: "Would you like to refine your search?",
    phases: PHASE_OPTIONS,
    moreResultsStep: MORE_RESULTS_STEP,
    location: true,
  };
}

function renderTrial(t: TrialSummary, idx: number): string {
  return [
    `**${idx}. ${t.title}**`,
    `- **Status:** ${t.status}`,
    `- **Phase:** ${t.phase}`,
    `- **Conditions:** ${t.conditions.length ? t.conditions.join(", ") : "N/A"}`,
    `- **Sponsor:** ${t.sponsor}`,
    "---",
  ].join("\n");
}

/** Markdown for a non-empty page. The count shown is the API's total, not the page length. */
export function renderResults(page: SearchPage): string {
  const header = `### I found ${page.total} trials. Here are the top results:`;
  return [header, ...page.trials.map((t, i) => renderTrial(t, i + 1))].join("\n");
}

export function renderTurnError(e: TurnError): string {
  if (e instanceof ExtractionParseError) return PARSE_ERROR_MESSAGE;
  if (e instanceof ApiStatusError) {
    const body = e.body?.slice(0, ERROR_BODY_LIMIT);
    return body ? `${e.message}\n${body}` : e.message;
  }
  return `Error processing your request: ${e.message}`;
}

export const phaseAppliedMessage = (phase: string) => `Phase filter applied: ${phase}`;
export const locationAppliedMessage = (location: string) => `Location filter applied: ${location}`;
