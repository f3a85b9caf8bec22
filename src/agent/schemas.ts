// src/agent/schemas.ts

/** Field names the trials search endpoint accepts, in the order the prompt lists them. */
export const FILTER_FIELDS = [
  "search_query",
  "size",
  "from",
  "paged_request",
  "age_from",
  "age_to",
  "gender",
  "race",
  "ethnicity",
  "intervention_type",
  "study",
  "location",
  "study_posted_from_year",
  "study_posted_to_year",
  "allocation",
  "sponsor_type",
  "sponsor",
  "show_only_results",
  "searched_for_condition_intervention",
  "intervention",
  "weight_scheme",
  "exclusion_crit_text",
  "phase",
  "status_of_study",
] as const;

export type FilterField = (typeof FILTER_FIELDS)[number];

export type FilterValue = string | number | boolean | null;

export type FilterParameterSet = { [K in FilterField]: FilterValue };

/** Whatever the oracle handed back after JSON parsing; any subset (or superset) of the fields. */
export type CandidateParams = Record<string, unknown>;

export type DefaultsProfile = "classic" | "broad";

export const PHASE_OPTIONS = ["Phase 1", "Phase 2", "Phase 3", "Phase 4"] as const;
export type PhaseOption = (typeof PHASE_OPTIONS)[number];

export const MORE_RESULTS_STEP = 5;
export const TOP_RESULTS = 5;

export type ChatRole = "user" | "assistant";

export interface ChatMessage {
  role: ChatRole;
  content: string;
}

/** Read-only projection of one search hit. Missing optional fields are "N/A". */
export interface TrialSummary {
  title: string;
  status: string;
  phase: string;
  conditions: string[];
  sponsor: string;
}

export interface SearchPage {
  total: number;
  hitCount: number;
  trials: TrialSummary[];
}

export interface RefinementControls {
  prompt: string;
  phases: readonly PhaseOption[];
  moreResultsStep: number;
  location: true;
}

export type TurnKind = "results" | "no_results" | "error";

export interface TurnOutcome {
  kind: TurnKind;
  message: string;
  total: number;
  trials: TrialSummary[];
  refinement: RefinementControls | null;
  params: FilterParameterSet;
  error?: { kind: string; message: string; status?: number };
}

export interface SessionSnapshot {
  sessionId: string;
  messages: ChatMessage[];
  params: FilterParameterSet;
}
