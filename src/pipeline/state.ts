import type { TaskId } from "../tasks/registry.js";

// =============================================================================
// TYPES
// =============================================================================

export type Settings = {
  rates: Record<string, number>;
  currency: string;
  instructions: string;
};

export type Constraints = {
  budget?: string;
  timeline?: string;
};

export type FinalProposal = {
  title: string;
  initial_idea: string;
  similar_products: string;
  refined_scope: string;
  business_analysis: string;
  technical_spec: string;
  project_plan: string;
  resource_plan: string;
};

export type RunStage = "completed" | "failed";

export type ProjectInputs = {
  initial_idea: string;
  user_input?: string;
  /** Set when the session already holds a generated proposal, so every run is a revision. */
  document_generated?: boolean;
  settings: Settings;
  constraints: Constraints;
};

// Each key has exactly one owning task.
export type TaskOutputs = {
  title: { proposal_title: string };
  scope_refinement: { refined_scope: string; similar_products: string };
  business_analyst: { business_analysis: string };
  technical_architect: { technical_spec: string };
  project_manager: { project_plan: string };
  resource_allocation: { resource_plan: string };
  final_compilation: {
    final_proposal: FinalProposal | null;
    current_stage: RunStage;
    error: string | null;
  };
};

export type TaskUpdate<T extends TaskId> = Partial<TaskOutputs[T]>;

export type AnyTaskUpdate = { [T in TaskId]: TaskUpdate<T> }[TaskId];

export type OutputKey = { [T in TaskId]: keyof TaskOutputs[T] }[TaskId];

type OutputValues = { [T in TaskId]: TaskOutputs[T] }[TaskId];
type UnionToIntersection<U> = (U extends unknown ? (arg: U) => void : never) extends (
  arg: infer I,
) => void
  ? I
  : never;

export type ProjectOutputs = Partial<UnionToIntersection<OutputValues>>;

export type ProjectState = ProjectInputs & ProjectOutputs;

// Compile-time guard: no output key may be owned by two tasks.
type SharedKeys<A extends TaskId> = {
  [B in Exclude<TaskId, A>]: [keyof TaskOutputs[A] & keyof TaskOutputs[B]] extends [never]
    ? false
    : true;
}[Exclude<TaskId, A>];
type AnyKeyShared = { [A in TaskId]: SharedKeys<A> }[TaskId];
type AssertDisjoint<T extends false> = T;
export type OutputOwnershipCheck = AssertDisjoint<AnyKeyShared>;

// =============================================================================
// OWNERSHIP
// =============================================================================

export const TASK_OUTPUT_KEYS: { readonly [T in TaskId]: readonly (keyof TaskOutputs[T])[] } = {
  title: ["proposal_title"],
  scope_refinement: ["refined_scope", "similar_products"],
  business_analyst: ["business_analysis"],
  technical_architect: ["technical_spec"],
  project_manager: ["project_plan"],
  resource_allocation: ["resource_plan"],
  final_compilation: ["final_proposal", "current_stage", "error"],
};

// =============================================================================
// REDUCERS
// =============================================================================

type Reducer<V> = (current: V | undefined, next: V) => V;

const overwrite = <V>(_current: V | undefined, next: V): V => next;

export const STATE_REDUCERS: {
  readonly [K in OutputKey]: Reducer<Exclude<ProjectOutputs[K], undefined>>;
} = {
  proposal_title: overwrite,
  refined_scope: overwrite,
  similar_products: overwrite,
  business_analysis: overwrite,
  technical_spec: overwrite,
  project_plan: overwrite,
  resource_plan: overwrite,
  final_proposal: overwrite,
  current_stage: overwrite,
  error: overwrite,
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createProjectState(
  inputs: Pick<ProjectInputs, "initial_idea"> & Partial<ProjectInputs>,
): ProjectState {
  return {
    initial_idea: inputs.initial_idea,
    user_input: inputs.user_input,
    document_generated: inputs.document_generated ?? false,
    settings: inputs.settings ?? { rates: {}, currency: "USD", instructions: "" },
    constraints: inputs.constraints ?? {},
  };
}

export function snapshotState(state: ProjectState): Readonly<ProjectState> {
  return deepFreeze(structuredClone(state));
}

// Writes only the keys the task owns; values left undefined are skipped.
export function applyTaskUpdate<T extends TaskId>(
  state: ProjectState,
  taskId: T,
  update: TaskUpdate<T>,
): void {
  const keys: readonly (keyof TaskOutputs[T])[] = TASK_OUTPUT_KEYS[taskId];
  for (const key of keys) {
    const value = update[key];
    if (value === undefined) continue;
    mergeOutputKey(state, key, value);
  }
}

function mergeOutputKey(state: ProjectOutputs, key: PropertyKey, value: unknown): void {
  switch (key) {
    case "proposal_title":
    case "refined_scope":
    case "similar_products":
    case "business_analysis":
    case "technical_spec":
    case "project_plan":
    case "resource_plan":
      if (typeof value === "string") state[key] = STATE_REDUCERS[key](state[key], value);
      return;
    case "final_proposal":
      if (value === null || isFinalProposal(value)) {
        state.final_proposal = STATE_REDUCERS.final_proposal(state.final_proposal, value);
      }
      return;
    case "current_stage":
      if (value === "completed" || value === "failed") {
        state.current_stage = STATE_REDUCERS.current_stage(state.current_stage, value);
      }
      return;
    case "error":
      if (value === null || typeof value === "string") {
        state.error = STATE_REDUCERS.error(state.error, value);
      }
      return;
    default:
      return;
  }
}

/** Reloads text outputs saved by an earlier turn; keys the task does not own are ignored. */
export function restoreTaskOutput(
  state: ProjectState,
  taskId: TaskId,
  content: Readonly<Record<string, string>>,
): void {
  for (const key of TASK_OUTPUT_KEYS[taskId]) {
    const value = content[String(key)];
    if (value !== undefined) mergeOutputKey(state, key, value);
  }
}

export function readOutput(state: Readonly<ProjectState>, key: OutputKey): string | undefined {
  const value = state[key];
  return typeof value === "string" ? value : undefined;
}

// =============================================================================
// INTERNALS
// =============================================================================

function isFinalProposal(value: unknown): value is FinalProposal {
  if (!value || typeof value !== "object") return false;
  const fields: (keyof FinalProposal)[] = [
    "title",
    "initial_idea",
    "similar_products",
    "refined_scope",
    "business_analysis",
    "technical_spec",
    "project_plan",
    "resource_plan",
  ];
  return fields.every((field) => field in value && typeof Reflect.get(value, field) === "string");
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object") {
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
    Object.freeze(value);
  }
  return value;
}
