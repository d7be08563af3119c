import type { ProjectState, TaskUpdate } from "../pipeline/state.js";

import type { TaskId } from "./registry.js";

// =============================================================================
// CONTRACT
// =============================================================================

/**
 * A content-generation unit. `run` reads only its snapshot and returns the keys it owns;
 * it throws only when it cannot produce anything at all.
 */
export interface ProposalTask<T extends TaskId> {
  readonly id: T;
  run(snapshot: Readonly<ProjectState>): Promise<TaskUpdate<T>>;
}

export type TaskRegistry = { readonly [K in TaskId]: ProposalTask<K> };

export type TaskRunner = <T extends TaskId>(
  taskId: T,
  snapshot: Readonly<ProjectState>,
) => Promise<TaskUpdate<T>>;

export function createTaskRunner(registry: TaskRegistry): TaskRunner {
  return (taskId, snapshot) => registry[taskId].run(snapshot);
}
