/*
Purpose: fold rates, budget and timeline from the current turn into session memory and settings,
and add the tasks those constraints feed.
Assumptions: every rate stored anywhere is hourly; budget and timeline never reach the config defaults.
Usage: rememberSettings -> mergeSettings + resolveConstraints -> injectConstraintTasks, once per turn.
*/

import type { SettingsConfig } from "../core/config.js";
import type { Constraints, Settings } from "../pipeline/state.js";
import type { SessionScopedState } from "../session/session.js";
import type { TaskId } from "../tasks/registry.js";

import type { ExtractedSettings, RateInput, RoutingDecision } from "./decision.js";

// =============================================================================
// RATES
// =============================================================================

export const HOURS_PER_UNIT: Readonly<Record<string, number>> = {
  hour: 1,
  day: 8,
  week: 40,
  month: 160,
};

const NUMERIC_PATTERN = /^\d+(?:\.\d+)?$/;

/** Hourly value of a rate, or null when it carries no usable number. */
export function normalizeRate(rate: RateInput): number | null {
  if (typeof rate === "number" || typeof rate === "string") {
    return parseAmount(rate);
  }

  const amount = parseAmount(rate.value);
  if (amount === null) return null;

  return amount / hoursPerUnit(rate.unit);
}

export function normalizeRates(rates: Record<string, RateInput> | undefined): Record<string, number> {
  const result: Record<string, number> = {};
  for (const [role, rate] of Object.entries(rates ?? {})) {
    const hourly = normalizeRate(rate);
    if (hourly !== null) result[role] = hourly;
  }
  return result;
}

// =============================================================================
// MERGE
// =============================================================================

export function mergeSettings(
  defaults: SettingsConfig,
  remembered: SessionScopedState,
  extracted: ExtractedSettings,
): Settings {
  return {
    rates: { ...defaults.rates, ...remembered.rates, ...normalizeRates(extracted.rates) },
    currency: defaults.currency,
    instructions: defaults.instructions,
  };
}

export function resolveConstraints(
  remembered: SessionScopedState,
  extracted: ExtractedSettings,
): Constraints {
  const constraints: Constraints = {};
  const budget = pickText(extracted.budget) ?? pickText(remembered.budget);
  const timeline = pickText(extracted.timeline) ?? pickText(remembered.timeline);
  if (budget) constraints.budget = budget;
  if (timeline) constraints.timeline = timeline;
  return constraints;
}

/** The session memory after this turn; the input is left untouched. */
export function rememberSettings(
  sessionState: SessionScopedState,
  extracted: ExtractedSettings,
): SessionScopedState {
  const next: SessionScopedState = {
    ...sessionState,
    rates: { ...sessionState.rates, ...normalizeRates(extracted.rates) },
  };

  const budget = pickText(extracted.budget);
  const timeline = pickText(extracted.timeline);
  if (budget) next.budget = budget;
  if (timeline) next.timeline = timeline;

  return next;
}

// =============================================================================
// TASK INJECTION
// =============================================================================

/**
 * Costing and planning consume rates, budget and timeline even when they are not
 * graph dependents of what the user asked to change.
 */
export function constraintTasksFor(extracted: ExtractedSettings): TaskId[] {
  const tasks: TaskId[] = [];
  const add = (taskId: TaskId): void => {
    if (!tasks.includes(taskId)) tasks.push(taskId);
  };

  if (Object.keys(normalizeRates(extracted.rates)).length > 0) add("resource_allocation");
  if (pickText(extracted.budget) || pickText(extracted.timeline)) add("project_manager");
  if (pickText(extracted.budget)) add("resource_allocation");

  return tasks;
}

export function injectConstraintTasks(decision: RoutingDecision): RoutingDecision {
  const injected = constraintTasksFor(decision.extractedSettings);
  if (injected.length === 0) return decision;

  // Stated constraints always narrow the turn to an edit, a routed generate included.
  const taskIds = [...decision.taskIds];
  for (const taskId of injected) {
    if (!taskIds.includes(taskId)) taskIds.push(taskId);
  }

  return { ...decision, action: "edit", taskIds, needsFullGeneration: false };
}

// =============================================================================
// INTERNALS
// =============================================================================

function parseAmount(value: number | string): number | null {
  if (typeof value === "number") {
    return Number.isFinite(value) && value >= 0 ? value : null;
  }

  const cleaned = value.trim().replace(/^\$/, "").replace(/,/g, "");
  if (!NUMERIC_PATTERN.test(cleaned)) return null;
  return Number.parseFloat(cleaned);
}

// Plural forms and casing are accepted; an unknown unit counts as hourly.
function hoursPerUnit(unit: string | undefined): number {
  if (!unit) return 1;
  const key = unit.trim().toLowerCase().replace(/s$/, "");
  return Object.hasOwn(HOURS_PER_UNIT, key) ? HOURS_PER_UNIT[key] : 1;
}

function pickText(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
