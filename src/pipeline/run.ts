import { isoNow } from "../core/utils.js";
import type { TaskId } from "../tasks/registry.js";

import type { LevelPlan } from "./levels.js";

// =============================================================================
// TYPES
// =============================================================================

export type PipelineKind = "full" | "edit";

export type TaskRunStatus = "pending" | "running" | "done" | "failed";

export type PipelineRunStatus = "pending" | "running" | "completed" | "failed";

export type TaskRunRecord = {
  status: TaskRunStatus;
  startedAt?: string;
  completedAt?: string;
  error?: string;
};

export type PipelineRun = {
  runId: string;
  kind: PipelineKind;
  levels: LevelPlan;
  tasks: Partial<Record<TaskId, TaskRunRecord>>;
  status: PipelineRunStatus;
  startedAt: string;
  completedAt?: string;
  reason?: string;
};

// =============================================================================
// CONSTRUCTION
// =============================================================================

export function createPipelineRun(runId: string, kind: PipelineKind, levels: LevelPlan): PipelineRun {
  const tasks: Partial<Record<TaskId, TaskRunRecord>> = {};
  for (const level of levels) {
    for (const taskId of level) {
      tasks[taskId] = { status: "pending" };
    }
  }

  return { runId, kind, levels, tasks, status: "pending", startedAt: isoNow() };
}

// =============================================================================
// TRANSITIONS
// =============================================================================

export function markTaskRunning(run: PipelineRun, taskId: TaskId): void {
  run.tasks[taskId] = { status: "running", startedAt: isoNow() };
}

export function markTaskDone(run: PipelineRun, taskId: TaskId): void {
  const previous = run.tasks[taskId];
  run.tasks[taskId] = { ...previous, status: "done", completedAt: isoNow() };
}

export function markTaskFailed(run: PipelineRun, taskId: TaskId, error: string): void {
  const previous = run.tasks[taskId];
  run.tasks[taskId] = { ...previous, status: "failed", completedAt: isoNow(), error };
}

export function completeRun(run: PipelineRun): void {
  run.status = "completed";
  run.completedAt = isoNow();
}

export function failRun(run: PipelineRun, reason: string): void {
  run.status = "failed";
  run.reason = reason;
  run.completedAt = isoNow();
}

export function tasksWithStatus(run: PipelineRun, status: TaskRunStatus): TaskId[] {
  return run.levels.flat().filter((taskId) => run.tasks[taskId]?.status === status);
}
