import { PipelineBuildError } from "../core/errors.js";
import { CONTENT_TASK_IDS, SINK_TASK_ID, sortCanonical, type TaskId } from "../tasks/registry.js";

import type { DependencyGraph } from "./graph.js";

export type LevelPlan = TaskId[][];

const LEADING_TASK_ID: TaskId = "title";

// =============================================================================
// STATIC PLAN (FULL GENERATION)
// =============================================================================

/**
 * title first, then every other content task together, then the sink.
 * Levels are filtered to the selected tasks; empty levels are dropped.
 */
export function planStaticLevels(selected: Iterable<TaskId>): LevelPlan {
  const included = new Set(selected);
  const middle = sortCanonical(included).filter(
    (id) => id !== LEADING_TASK_ID && id !== SINK_TASK_ID,
  );

  const levels: LevelPlan = [
    included.has(LEADING_TASK_ID) ? [LEADING_TASK_ID] : [],
    middle,
    included.has(SINK_TASK_ID) ? [SINK_TASK_ID] : [],
  ];

  return levels.filter((level) => level.length > 0);
}

/**
 * Ordering contract of a full generation: every content task reads only the idea and
 * the title, and the sink reads every content task.
 */
export function staticDependenciesOf(taskId: TaskId): readonly TaskId[] {
  if (taskId === LEADING_TASK_ID) return [];
  if (taskId === SINK_TASK_ID) return CONTENT_TASK_IDS;
  return [LEADING_TASK_ID];
}

// =============================================================================
// COMPUTED PLAN (EDITS)
// =============================================================================

/**
 * level(T) is 0 without in-subset dependencies, else one past the deepest of them.
 * Dependencies outside the subset count as already satisfied.
 */
export function planComputedLevels(selected: Iterable<TaskId>, graph: DependencyGraph): LevelPlan {
  const ordered = sortCanonical(selected);
  const included = new Set(ordered);
  const depth = new Map<TaskId, number>();

  const resolveDepth = (taskId: TaskId, trail: TaskId[]): number => {
    const known = depth.get(taskId);
    if (known !== undefined) return known;
    if (trail.includes(taskId)) {
      throw new PipelineBuildError(`Dependency cycle: ${[...trail, taskId].join(" -> ")}`);
    }

    const inSubset = graph.dependenciesOf(taskId).filter((dep) => included.has(dep));
    const level =
      inSubset.length === 0
        ? 0
        : 1 + Math.max(...inSubset.map((dep) => resolveDepth(dep, [...trail, taskId])));

    depth.set(taskId, level);
    return level;
  };

  const levels: LevelPlan = [];
  for (const taskId of ordered) {
    const level = resolveDepth(taskId, []);
    while (levels.length <= level) levels.push([]);
    levels[level].push(taskId);
  }

  return levels.filter((level) => level.length > 0);
}

// =============================================================================
// INVARIANTS
// =============================================================================

export type DependencyLookup = (taskId: TaskId) => readonly TaskId[];

export function assertLevelPlan(levels: LevelPlan, dependenciesOf: DependencyLookup): void {
  const levelOf = new Map<TaskId, number>();

  levels.forEach((level, index) => {
    if (level.length === 0) {
      throw new PipelineBuildError(`Level ${index + 1} is empty`);
    }
    for (const taskId of level) {
      if (levelOf.has(taskId)) {
        throw new PipelineBuildError(`Task ${taskId} is scheduled more than once`);
      }
      levelOf.set(taskId, index);
    }
  });

  for (const [taskId, index] of levelOf) {
    for (const dep of dependenciesOf(taskId)) {
      const depLevel = levelOf.get(dep);
      if (depLevel !== undefined && depLevel >= index) {
        throw new PipelineBuildError(
          `Task ${taskId} is scheduled in level ${index + 1} but depends on ${dep} in level ${depLevel + 1}`,
        );
      }
    }
  }
}
