/*
Purpose: run one level of tasks concurrently and fold their updates into the project state.
Assumptions: every task in a level receives the same frozen snapshot; merges happen on this
control flow in completion order; a failed task never cancels its siblings.
Usage: createLevelExecutor(deps).runLevel(level, state, run) for each planned level in turn.
*/

import { TaskExecutionError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import { logOrchestratorEvent, NOOP_EVENT_LOGGER, type EventLogger } from "../core/logger.js";
import type { SessionPort } from "../session/session.js";
import type { TaskId } from "../tasks/registry.js";
import type { TaskRunner } from "../tasks/task.js";

import { markTaskDone, markTaskFailed, markTaskRunning, type PipelineRun } from "./run.js";
import { applyTaskUpdate, snapshotState, type AnyTaskUpdate, type ProjectState } from "./state.js";
import type { WorkerPool } from "./worker-pool.js";

// =============================================================================
// TYPES
// =============================================================================

export type LevelExecutorDeps = {
  runTask: TaskRunner;
  pool: WorkerPool;
  session?: SessionPort;
  logger?: EventLogger;
};

export type LevelUpdates = Map<TaskId, AnyTaskUpdate>;

export interface LevelExecutor {
  runLevel(levelTasks: readonly TaskId[], state: ProjectState, run: PipelineRun): Promise<LevelUpdates>;
}

type TaskFailure = {
  taskId: TaskId;
  error: unknown;
};

const TITLE_TASK_ID: TaskId = "title";

// =============================================================================
// EXECUTOR
// =============================================================================

export function createLevelExecutor(deps: LevelExecutorDeps): LevelExecutor {
  const logger = deps.logger ?? NOOP_EVENT_LOGGER;

  const persistTitle = async (title: string | undefined, run: PipelineRun): Promise<void> => {
    const session = deps.session;
    if (!session || !title) return;

    session.documentTitle = title;
    try {
      await session.save();
      logOrchestratorEvent(logger, "title.persisted", { runId: run.runId, title });
    } catch (err) {
      logOrchestratorEvent(logger, "title.persist_failed", {
        runId: run.runId,
        message: formatErrorMessage(err),
      });
    }
  };

  const runLevel = async (
    levelTasks: readonly TaskId[],
    state: ProjectState,
    run: PipelineRun,
  ): Promise<LevelUpdates> => {
    const snapshot = snapshotState(state);
    const updates: LevelUpdates = new Map();
    const failures: TaskFailure[] = [];

    const settled = levelTasks.map((taskId) =>
      deps.pool
        .run(() => {
          markTaskRunning(run, taskId);
          logOrchestratorEvent(logger, "task.start", { runId: run.runId, taskId });
          return deps.runTask(taskId, snapshot);
        })
        .then(
          async (update) => {
            applyTaskUpdate(state, taskId, update);
            updates.set(taskId, update);
            markTaskDone(run, taskId);
            logOrchestratorEvent(logger, "task.complete", {
              runId: run.runId,
              taskId,
              keys: Object.keys(update),
            });

            if (taskId === TITLE_TASK_ID) {
              await persistTitle(state.proposal_title, run);
            }
          },
          (error: unknown) => {
            failures.push({ taskId, error });
            const message = formatErrorMessage(error);
            markTaskFailed(run, taskId, message);
            logOrchestratorEvent(logger, "task.failed", { runId: run.runId, taskId, message });
          },
        ),
    );

    await Promise.all(settled);

    const [firstFailure] = failures;
    if (firstFailure) {
      throw new TaskExecutionError(firstFailure.taskId, firstFailure.error);
    }

    return updates;
  };

  return { runLevel };
}
