/*
Purpose: the pipeline facade. Checks prerequisites, drives levels in order, reports progress,
and turns failures into a returned error instead of a thrown one.
Assumptions: the level plan is fixed when the pipeline is built; execute() mutates the state it is given.
Usage: const { state, run, error } = await createPipeline(spec, deps).execute(state);
*/

import { OrchestratorError, PrerequisiteError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import { logOrchestratorEvent, NOOP_EVENT_LOGGER, type EventLogger } from "../core/logger.js";
import { defaultRunId } from "../core/utils.js";
import type { SessionPort } from "../session/session.js";
import { SINK_TASK_ID, sortCanonical, type TaskId } from "../tasks/registry.js";
import type { TaskRunner } from "../tasks/task.js";

import { createLevelExecutor } from "./executor.js";
import { DependencyGraph } from "./graph.js";
import {
  assertLevelPlan,
  planComputedLevels,
  planStaticLevels,
  staticDependenciesOf,
  type LevelPlan,
} from "./levels.js";
import {
  completeRun,
  createPipelineRun,
  failRun,
  type PipelineKind,
  type PipelineRun,
} from "./run.js";
import type { ProjectState } from "./state.js";
import type { WorkerPool } from "./worker-pool.js";

// =============================================================================
// TYPES
// =============================================================================

export type PipelineSpec = {
  kind: PipelineKind;
  tasks: readonly TaskId[];
};

export type ProgressStage = "start" | "level" | "level_complete" | "complete" | "error";

export type ProgressObserver = (stage: ProgressStage, message: string) => void;

/** Returns a failure message, or null when the state is ready. */
export type PrerequisiteCheck = (state: Readonly<ProjectState>) => string | null;

export type PipelineDeps = {
  runTask: TaskRunner;
  pool: WorkerPool;
  graph?: DependencyGraph;
  session?: SessionPort;
  logger?: EventLogger;
  onProgress?: ProgressObserver;
  createRunId?: () => string;
};

export type PipelineOutcome = {
  state: ProjectState;
  run: PipelineRun;
  error: OrchestratorError | null;
};

export interface ProposalPipeline {
  readonly kind: PipelineKind;
  readonly tasks: readonly TaskId[];
  readonly levels: LevelPlan;
  execute(state: ProjectState, prerequisiteCheck?: PrerequisiteCheck): Promise<PipelineOutcome>;
}

export const initialIdeaPrerequisite: PrerequisiteCheck = (state) =>
  state.initial_idea.trim() ? null : "An initial idea is required before running the pipeline.";

// =============================================================================
// FACTORY
// =============================================================================

export function createPipeline(spec: PipelineSpec, deps: PipelineDeps): ProposalPipeline {
  const graph = deps.graph ?? new DependencyGraph();
  const logger = deps.logger ?? NOOP_EVENT_LOGGER;
  const tasks = sortCanonical(spec.tasks);

  const levels =
    spec.kind === "full" ? planStaticLevels(tasks) : planComputedLevels(tasks, graph);
  assertLevelPlan(
    levels,
    spec.kind === "full" ? staticDependenciesOf : (taskId) => graph.dependenciesOf(taskId),
  );

  const executor = createLevelExecutor({
    runTask: deps.runTask,
    pool: deps.pool,
    session: deps.session,
    logger,
  });

  const notify = (run: PipelineRun, stage: ProgressStage, message: string): void => {
    if (!deps.onProgress) return;
    try {
      deps.onProgress(stage, message);
    } catch (err) {
      logOrchestratorEvent(logger, "progress.observer_failed", {
        runId: run.runId,
        stage,
        message: formatErrorMessage(err),
      });
    }
  };

  const fail = (run: PipelineRun, state: ProjectState, error: OrchestratorError): PipelineOutcome => {
    failRun(run, error.message);
    logOrchestratorEvent(logger, "pipeline.failed", {
      runId: run.runId,
      error: error.name,
      message: error.message,
    });
    notify(run, "error", error.message);
    return { state, run, error };
  };

  const finalizeSession = async (run: PipelineRun): Promise<void> => {
    const session = deps.session;
    if (!session) return;

    session.isDocumentGenerated = true;
    session.currentStage = "completed";
    try {
      await session.save();
    } catch (err) {
      logOrchestratorEvent(logger, "session.save_failed", {
        runId: run.runId,
        message: formatErrorMessage(err),
      });
    }
  };

  const execute = async (
    state: ProjectState,
    prerequisiteCheck: PrerequisiteCheck = initialIdeaPrerequisite,
  ): Promise<PipelineOutcome> => {
    const run = createPipelineRun((deps.createRunId ?? defaultRunId)(), spec.kind, levels);

    const problem =
      prerequisiteCheck(state) ??
      (tasks.length === 0 ? "No tasks were selected for this pipeline." : null);
    if (problem) {
      return fail(run, state, new PrerequisiteError(problem));
    }

    run.status = "running";
    logOrchestratorEvent(logger, "pipeline.start", {
      runId: run.runId,
      kind: spec.kind,
      levels: levels.map((level) => level.join(",")),
    });
    notify(run, "start", `Running ${spec.kind} pipeline: ${tasks.join(", ")}`);

    for (const [index, level] of levels.entries()) {
      const label = `Level ${index + 1}/${levels.length}`;
      notify(run, "level", `${label}: ${level.join(", ")}`);
      logOrchestratorEvent(logger, "level.start", { runId: run.runId, level: index + 1, tasks: level });

      try {
        await executor.runLevel(level, state, run);
      } catch (err) {
        const error =
          err instanceof OrchestratorError ? err : new OrchestratorError(formatErrorMessage(err), err);
        return fail(run, state, error);
      }

      notify(run, "level_complete", `${label} complete`);
    }

    const compiled = run.tasks[SINK_TASK_ID] !== undefined;
    if (compiled && state.current_stage === "failed") {
      const reason = state.error ?? "Final compilation failed.";
      failRun(run, reason);
      logOrchestratorEvent(logger, "pipeline.incomplete", { runId: run.runId, reason });
      notify(run, "error", reason);
      return { state, run, error: null };
    }

    if (compiled && spec.kind === "full" && state.current_stage === "completed") {
      await finalizeSession(run);
    }

    completeRun(run);
    logOrchestratorEvent(logger, "pipeline.complete", { runId: run.runId, kind: spec.kind });
    notify(run, "complete", `Pipeline complete: ${tasks.length} task(s)`);

    return { state, run, error: null };
  };

  return { kind: spec.kind, tasks, levels, execute };
}
