import { PipelineBuildError } from "../core/errors.js";
import {
  SINK_TASK_ID,
  TASK_DEFINITIONS,
  TASK_IDS,
  sortCanonical,
  type TaskDefinition,
  type TaskId,
} from "../tasks/registry.js";

// =============================================================================
// TYPES
// =============================================================================

export type ExpansionRequest = {
  kind: "edit" | "generate";
};

// =============================================================================
// GRAPH
// =============================================================================

export class DependencyGraph {
  private readonly dependencies = new Map<TaskId, readonly TaskId[]>();
  private readonly dependents = new Map<TaskId, TaskId[]>();

  constructor(
    definitions: readonly TaskDefinition[] = TASK_IDS.map((id) => TASK_DEFINITIONS[id]),
    private readonly sinks: ReadonlySet<TaskId> = new Set([SINK_TASK_ID]),
  ) {
    for (const definition of definitions) {
      this.dependencies.set(definition.id, definition.dependsOn);
      if (!this.dependents.has(definition.id)) this.dependents.set(definition.id, []);
    }

    for (const definition of definitions) {
      for (const dependency of definition.dependsOn) {
        const list = this.dependents.get(dependency) ?? [];
        list.push(definition.id);
        this.dependents.set(dependency, list);
      }
    }
  }

  dependenciesOf(taskId: TaskId): readonly TaskId[] {
    return this.dependencies.get(taskId) ?? [];
  }

  dependentsOf(taskId: TaskId): readonly TaskId[] {
    return sortCanonical(this.dependents.get(taskId) ?? []);
  }

  /**
   * Reports dependencies on tasks missing from the graph and any cycle.
   * Returns an empty list when the graph is valid.
   */
  validate(): string[] {
    const errors: string[] = [];

    for (const [taskId, deps] of this.dependencies) {
      for (const dep of deps) {
        if (!this.dependencies.has(dep)) {
          errors.push(`Task "${taskId}" depends on unknown task "${dep}"`);
        }
      }
    }

    const cycle = this.findCycle();
    if (cycle) {
      errors.push(`Dependency cycle: ${cycle.join(" -> ")}`);
    }

    return errors;
  }

  assertValid(): void {
    const errors = this.validate();
    if (errors.length > 0) {
      throw new PipelineBuildError(`Invalid task graph:\n${errors.join("\n")}`);
    }
  }

  /**
   * Adds every transitive dependent of the requested tasks, in canonical order.
   * A single task named by an edit is an explicit override and is returned as is.
   * Sink tasks never join an expansion.
   */
  expand(requested: Iterable<TaskId>, request: ExpansionRequest): TaskId[] {
    const initial = sortCanonical(requested);
    if (request.kind === "edit" && initial.length === 1) {
      return initial;
    }

    const selected = new Set<TaskId>(initial);
    const queue: TaskId[] = [...initial];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;

      for (const dependent of this.dependentsOf(current)) {
        if (this.sinks.has(dependent) || selected.has(dependent)) continue;
        selected.add(dependent);
        queue.push(dependent);
      }
    }

    return sortCanonical(selected);
  }

  // =============================================================================
  // INTERNALS
  // =============================================================================

  private findCycle(): TaskId[] | null {
    const visited = new Set<TaskId>();
    const visiting: TaskId[] = [];

    const visit = (taskId: TaskId): TaskId[] | null => {
      if (visited.has(taskId)) return null;
      const index = visiting.indexOf(taskId);
      if (index >= 0) return [...visiting.slice(index), taskId];

      visiting.push(taskId);
      for (const dep of this.dependenciesOf(taskId)) {
        if (!this.dependencies.has(dep)) continue;
        const cycle = visit(dep);
        if (cycle) return cycle;
      }
      visiting.pop();
      visited.add(taskId);
      return null;
    };

    for (const taskId of this.dependencies.keys()) {
      const cycle = visit(taskId);
      if (cycle) return cycle;
    }

    return null;
  }
}
