// src/agent/filter_params.ts
import {
  FILTER_FIELDS,
  type CandidateParams,
  type DefaultsProfile,
  type FilterField,
  type FilterParameterSet,
  type FilterValue,
} from "./schemas.js";

const FIELD_SET: ReadonlySet<string> = new Set(FILTER_FIELDS);

export function isFilterField(key: string): key is FilterField {
  return FIELD_SET.has(key);
}

export function isFilterValue(v: unknown): v is FilterValue {
  return v === null || typeof v === "string" || typeof v === "number" || typeof v === "boolean";
}

/** Fresh parameter set for a new session. `broad` widens gender/results the way the second front-end did. */
export function defaultParams(profile: DefaultsProfile = "classic"): FilterParameterSet {
  return {
    search_query: null,
    size: 10,
    from: 0,
    paged_request: true,
    age_from: "0",
    age_to: "100",
    gender: profile === "broad" ? "All" : null,
    race: null,
    ethnicity: null,
    intervention_type: null,
    study: null,
    location: null,
    study_posted_from_year: null,
    study_posted_to_year: null,
    allocation: null,
    sponsor_type: null,
    sponsor: null,
    show_only_results: profile === "broad" ? null : true,
    searched_for_condition_intervention: null,
    intervention: null,
    weight_scheme: "reference_citations",
    exclusion_crit_text: null,
    phase: null,
    status_of_study: null,
  };
}

/**
 * Shallow key-wise overwrite. Only declared fields present in the candidate
 * with a scalar value replace what is stored; everything else keeps its
 * previous value. Returns a new object, the input is untouched.
 *
 * A present `null` clears the field, typed defaults included: a candidate
 * carrying `"size": null` sends `size: null` to the search endpoint.
 */
export function mergeParams(current: FilterParameterSet, candidate: CandidateParams): FilterParameterSet {
  const next: FilterParameterSet = { ...current };
  for (const [key, value] of Object.entries(candidate)) {
    if (!isFilterField(key)) continue;
    if (!isFilterValue(value)) continue;
    next[key] = value;
  }
  return next;
}

/** Offset after one "View More Results" click. */
export function nextOffset(from: FilterValue, step: number): number {
  const n = typeof from === "number" ? from : Number(from);
  return (Number.isFinite(n) ? n : 0) + step;
}
