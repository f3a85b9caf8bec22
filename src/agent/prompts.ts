// src/agent/prompts.ts
import { defaultParams } from "./filter_params.js";
import { FILTER_FIELDS, type DefaultsProfile, type FilterField } from "./schemas.js";

// Short hints shown next to a field name; fields without one are listed bare
const FIELD_HINTS: Partial<Record<FilterField, string>> = {
  search_query: "disease name",
  age_from: "minimum participant age, as text",
  age_to: "maximum participant age, as text",
  location: "country, state or city",
  phase: "one of Phase 1, Phase 2, Phase 3, Phase 4",
  status_of_study: "e.g. Recruiting, Completed",
};

function describeField(field: FilterField, profile: DefaultsProfile): string {
  const def = defaultParams(profile)[field];
  const parts: string[] = [];
  const hint = FIELD_HINTS[field];
  if (hint) parts.push(hint);
  if (def !== null) parts.push(`default ${typeof def === "string" ? `'${def}'` : String(def)}`);
  return parts.length ? `${field} (${parts.join(", ")})` : field;
}

/** System instruction sent ahead of the transcript on every extraction. */
export function buildSystemPrompt(profile: DefaultsProfile = "classic"): string {
  const fields = FILTER_FIELDS.map((f) => describeField(f, profile)).join(", ");
  return (
    "You are a clinical trial assistant. The user is asking about clinical trials. " +
    "Extract a disease name from the conversation and generate a JSON payload for the clinical trials search API. " +
    "Ensure the JSON object includes all the following fields, even if set to null: \n" +
    `${fields}. ` +
    "Ensure weight_scheme is always included. " +
    "If the conversation does not specify a disease, generate a valid default value for search_query. " +
    "Respond with only the JSON object and no other text."
  );
}
