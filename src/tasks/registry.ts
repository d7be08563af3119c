/*
Purpose: the closed set of proposal tasks, their dependencies, and the document sections they own.
Assumptions: TASK_IDS is declared in canonical order; every ordering in the pipeline derives from it.
Usage: resolveTaskIds(decision.taskIds) before building a pipeline; TASK_DEFINITIONS for metadata.
*/

import { UnknownTaskError } from "../core/errors.js";

// =============================================================================
// IDS
// =============================================================================

export const TASK_IDS = [
  "title",
  "scope_refinement",
  "business_analyst",
  "technical_architect",
  "project_manager",
  "resource_allocation",
  "final_compilation",
] as const;

export type TaskId = (typeof TASK_IDS)[number];

export type ContentTaskId = Exclude<TaskId, "final_compilation">;

export const SINK_TASK_ID: "final_compilation" = "final_compilation" satisfies TaskId;

export const CONTENT_TASK_IDS: readonly ContentTaskId[] = TASK_IDS.filter(
  (id): id is ContentTaskId => id !== SINK_TASK_ID,
);

// =============================================================================
// DEFINITIONS
// =============================================================================

export type TaskDefinition = {
  id: TaskId;
  displayName: string;
  description: string;
  sections: readonly string[];
  dependsOn: readonly TaskId[];
};

export const TASK_DEFINITIONS: { readonly [K in TaskId]: TaskDefinition & { id: K } } = {
  title: {
    id: "title",
    displayName: "Title",
    description: "Generates the proposal title",
    sections: ["Proposal title"],
    dependsOn: [],
  },
  scope_refinement: {
    id: "scope_refinement",
    displayName: "Scope refinement",
    description: "Refines project scope, features, and lists similar products",
    sections: ["Executive summary", "Project overview", "Features", "Similar products"],
    dependsOn: [],
  },
  business_analyst: {
    id: "business_analyst",
    displayName: "Business analysis",
    description: "Business analysis, requirements, and market fit",
    sections: ["Business objectives", "Requirements", "Market analysis"],
    dependsOn: ["scope_refinement"],
  },
  technical_architect: {
    id: "technical_architect",
    displayName: "Technical architecture",
    description: "Technical architecture, technology stack, and infrastructure",
    sections: ["Architecture", "Technology stack", "Infrastructure"],
    dependsOn: ["scope_refinement", "business_analyst"],
  },
  project_manager: {
    id: "project_manager",
    displayName: "Project plan",
    description: "Project plan, timeline, phases, and milestones",
    sections: ["Timeline", "Phases", "Milestones", "Deliverables"],
    dependsOn: ["scope_refinement", "business_analyst", "technical_architect"],
  },
  resource_allocation: {
    id: "resource_allocation",
    displayName: "Resource allocation",
    description: "Team composition, hourly rates, and cost estimates",
    sections: ["Team", "Rates", "Cost breakdown", "Budget"],
    dependsOn: ["scope_refinement", "business_analyst", "technical_architect", "project_manager"],
  },
  final_compilation: {
    id: "final_compilation",
    displayName: "Final compilation",
    description: "Assembles every section into the final proposal document",
    sections: ["Full document"],
    dependsOn: [
      "title",
      "scope_refinement",
      "business_analyst",
      "technical_architect",
      "project_manager",
      "resource_allocation",
    ],
  },
};

// =============================================================================
// LOOKUP
// =============================================================================

const TASK_ID_SET: ReadonlySet<string> = new Set(TASK_IDS);

export function isTaskId(value: string): value is TaskId {
  return TASK_ID_SET.has(value);
}

export function resolveTaskId(value: string): TaskId {
  const normalized = value.trim();
  if (!isTaskId(normalized)) {
    throw new UnknownTaskError(value);
  }
  return normalized;
}

// Unique ids in first-seen order.
export function resolveTaskIds(values: Iterable<string>): TaskId[] {
  const resolved: TaskId[] = [];
  for (const value of values) {
    const id = resolveTaskId(value);
    if (!resolved.includes(id)) resolved.push(id);
  }
  return resolved;
}

export function canonicalIndex(id: TaskId): number {
  return TASK_IDS.indexOf(id);
}

export function sortCanonical(ids: Iterable<TaskId>): TaskId[] {
  return [...new Set(ids)].sort((a, b) => canonicalIndex(a) - canonicalIndex(b));
}
