import { PipelineBuildError } from "../core/errors.js";
import type { RoutingDecision } from "../routing/decision.js";
import { resolveTaskIds, TASK_IDS, type TaskId } from "../tasks/registry.js";

import { DependencyGraph } from "./graph.js";
import { createPipeline, type PipelineDeps, type ProposalPipeline } from "./pipeline.js";

export type PipelineFactoryOptions = {
  /** From config `pipeline.enabled_tasks`; limits full generation only. */
  enabledTasks?: readonly string[];
};

/**
 * Builds the pipeline a decision calls for. Task ids are resolved here, so an unknown
 * id fails before anything runs.
 */
export function createPipelineFromDecision(
  decision: RoutingDecision,
  deps: PipelineDeps,
  options: PipelineFactoryOptions = {},
): ProposalPipeline {
  const graph = deps.graph ?? new DependencyGraph();

  switch (decision.action) {
    case "generate": {
      const enabled = options.enabledTasks ? new Set(resolveTaskIds(options.enabledTasks)) : null;
      const tasks: TaskId[] = TASK_IDS.filter((id) => !enabled || enabled.has(id));
      return createPipeline({ kind: "full", tasks }, { ...deps, graph });
    }
    case "edit": {
      const requested = resolveTaskIds(decision.taskIds);
      const tasks = graph.expand(requested, { kind: "edit" });
      return createPipeline({ kind: "edit", tasks }, { ...deps, graph });
    }
    case "conversation":
      throw new PipelineBuildError("A conversation decision does not run a pipeline.");
  }
}
