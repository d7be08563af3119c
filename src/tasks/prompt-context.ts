import { TaskError } from "../core/errors.js";
import type { PromptTemplateValues } from "../core/prompts.js";
import type { OutputKey, ProjectState } from "../pipeline/state.js";

const SECTION_KEYS = [
  "proposal_title",
  "refined_scope",
  "similar_products",
  "business_analysis",
  "technical_spec",
  "project_plan",
  "resource_plan",
] as const satisfies readonly OutputKey[];

export type SectionKey = (typeof SECTION_KEYS)[number];

const PLACEHOLDERS: Record<SectionKey, string> = {
  proposal_title: "Untitled proposal",
  refined_scope: "No scope provided.",
  similar_products: "No similar products listed.",
  business_analysis: "No business analysis provided.",
  technical_spec: "No technical specification provided.",
  project_plan: "No project plan provided.",
  resource_plan: "No resource plan provided.",
};

export function requireInitialIdea(snapshot: Readonly<ProjectState>, taskId: string): string {
  const idea = snapshot.initial_idea.trim();
  if (!idea) {
    throw new TaskError(`Task ${taskId} needs an initial idea but the project state has none.`);
  }
  return idea;
}

/**
 * Every value any prompt template may reference. Handlebars runs in strict mode, so
 * absent sections become placeholder text instead of missing fields.
 */
export function buildPromptValues(
  snapshot: Readonly<ProjectState>,
  previousKey?: SectionKey,
): PromptTemplateValues {
  const sections = Object.fromEntries(
    SECTION_KEYS.map((key) => [
      key,
      snapshot[key]?.trim() || PLACEHOLDERS[key],
    ]),
  );

  const previous = previousKey ? snapshot[previousKey]?.trim() : undefined;

  return {
    ...sections,
    initial_idea: snapshot.initial_idea.trim(),
    user_input: snapshot.user_input?.trim() || "None",
    previous_content: previous || "None",
    currency: snapshot.settings.currency,
    rates: formatRates(snapshot.settings.rates, snapshot.settings.currency),
    instructions: snapshot.settings.instructions.trim() || "None",
    budget: snapshot.constraints.budget?.trim() || "Not specified",
    timeline: snapshot.constraints.timeline?.trim() || "Not specified",
  };
}

export function formatRates(rates: Record<string, number>, currency: string): string {
  const entries = Object.entries(rates);
  if (entries.length === 0) return "No rates configured.";

  return entries
    .map(([role, rate]) => `- ${role.replace(/_/g, " ")}: ${formatAmount(rate)} ${currency}/hour`)
    .join("\n");
}

// Two decimals at least, up to four for small normalised rates (50/month is 0.3125/hour).
function formatAmount(value: number): string {
  if (Number.isInteger(value)) return String(value);
  return value.toFixed(4).replace(/(\.\d{2}\d*?)0+$/, "$1");
}
