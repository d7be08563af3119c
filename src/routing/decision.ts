import { z } from "zod";

import { formatIssues } from "../core/config-loader.js";
import { RoutingParseError } from "../core/errors.js";
import { stripCodeFences } from "../llm/client.js";

// =============================================================================
// TYPES
// =============================================================================

export type RoutingAction = "conversation" | "edit" | "generate";

export type DecisionSource = "fast_path" | "greeting" | "llm" | "keyword_fallback";

export type RateInput = number | string | { value: number | string; unit?: string };

export type ExtractedSettings = {
  rates?: Record<string, RateInput>;
  budget?: string;
  timeline?: string;
};

export type RoutingDecision = {
  action: RoutingAction;
  /** Raw ids, resolved against the registry when a pipeline is built. */
  taskIds: string[];
  relevantSections: string[];
  reasoning: string;
  confidence: number;
  needsFullGeneration: boolean;
  extractedSettings: ExtractedSettings;
  source: DecisionSource;
};

// =============================================================================
// WIRE SCHEMA
// =============================================================================

const RateInputSchema = z.union([
  z.number(),
  z.string(),
  z.object({
    value: z.union([z.number(), z.string()]),
    unit: z.string().nullish().transform((unit) => unit ?? undefined),
  }),
]);

// Models sometimes answer "2500" and sometimes 2500.
const OptionalTextSchema = z
  .union([z.string(), z.number()])
  .nullish()
  .transform((value) => {
    if (value === null || value === undefined) return undefined;
    const text = String(value).trim();
    return text.length > 0 ? text : undefined;
  });

const ExtractedSettingsSchema = z
  .object({
    rates: z
      .record(z.string(), RateInputSchema)
      .nullish()
      .transform((rates) => rates ?? undefined),
    budget: OptionalTextSchema,
    timeline: OptionalTextSchema,
  })
  .nullish()
  .transform((settings): ExtractedSettings => compactSettings(settings ?? {}));

export const RoutingDecisionWireSchema = z.object({
  action: z
    .enum(["conversation", "edit", "generate", "generate_proposal"])
    .transform((action): RoutingAction => (action === "generate_proposal" ? "generate" : action)),
  task_ids: z.array(z.string()).default([]),
  relevant_sections: z.array(z.string()).default([]),
  reasoning: z.string().default(""),
  confidence: z
    .number()
    .default(0.5)
    .transform((value) => Math.min(1, Math.max(0, value))),
  needs_full_generation: z.boolean().default(false),
  extracted_settings: ExtractedSettingsSchema,
});

export type RoutingDecisionWire = z.input<typeof RoutingDecisionWireSchema>;

// =============================================================================
// PARSING
// =============================================================================

/**
 * Parses a classifier reply. Markdown fences and prose around the JSON object are
 * tolerated; anything else raises RoutingParseError.
 */
export function parseRoutingDecision(rawOutput: string): RoutingDecision {
  const json = extractJsonObject(rawOutput);
  if (json === null) {
    throw new RoutingParseError("Routing reply contained no JSON object.", rawOutput);
  }

  let payload: unknown;
  try {
    payload = JSON.parse(json);
  } catch (err) {
    throw new RoutingParseError("Routing reply is not valid JSON.", rawOutput, err);
  }

  const parsed = RoutingDecisionWireSchema.safeParse(payload);
  if (!parsed.success) {
    const details = formatIssues(parsed.error.issues).replace(/\n/g, "; ");
    throw new RoutingParseError(`Routing reply failed validation: ${details}`, rawOutput, parsed.error);
  }

  const wire = parsed.data;
  return {
    action: wire.action,
    taskIds: uniqueTrimmed(wire.task_ids),
    relevantSections: uniqueTrimmed(wire.relevant_sections),
    reasoning: wire.reasoning,
    confidence: wire.confidence,
    needsFullGeneration: wire.action === "generate" || wire.needs_full_generation,
    extractedSettings: wire.extracted_settings,
    source: "llm",
  };
}

export function conversationDecision(
  reasoning: string,
  source: DecisionSource,
  confidence = 1,
): RoutingDecision {
  return {
    action: "conversation",
    taskIds: [],
    relevantSections: [],
    reasoning,
    confidence,
    needsFullGeneration: false,
    extractedSettings: {},
    source,
  };
}

export function generateDecision(reasoning: string, source: DecisionSource): RoutingDecision {
  return {
    action: "generate",
    taskIds: [],
    relevantSections: [],
    reasoning,
    confidence: 1,
    needsFullGeneration: true,
    extractedSettings: {},
    source,
  };
}

// =============================================================================
// INTERNALS
// =============================================================================

function extractJsonObject(rawOutput: string): string | null {
  const text = stripCodeFences(rawOutput);
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start < 0 || end <= start) return null;
  return text.slice(start, end + 1);
}

function uniqueTrimmed(values: readonly string[]): string[] {
  const result: string[] = [];
  for (const value of values) {
    const trimmed = value.trim();
    if (trimmed && !result.includes(trimmed)) result.push(trimmed);
  }
  return result;
}

function compactSettings(settings: ExtractedSettings): ExtractedSettings {
  const result: ExtractedSettings = {};
  if (settings.rates && Object.keys(settings.rates).length > 0) result.rates = settings.rates;
  if (settings.budget) result.budget = settings.budget;
  if (settings.timeline) result.timeline = settings.timeline;
  return result;
}
