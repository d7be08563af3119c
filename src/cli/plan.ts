import type { AppContext } from "../app/context.js";
import { createPipelineFromDecision } from "../pipeline/pipeline-factory.js";
import type { ProposalPipeline } from "../pipeline/pipeline.js";
import { generateDecision, type RoutingDecision } from "../routing/decision.js";

export type PlanCommandOptions = {
  tasks?: string[];
  json?: boolean;
};

/**
 * Prints the task set and levels a request would run, without running anything.
 * No --tasks means a full generation.
 */
export function planCommand(ctx: AppContext, opts: PlanCommandOptions): ProposalPipeline {
  const decision: RoutingDecision =
    opts.tasks && opts.tasks.length > 0
      ? {
          ...generateDecision("Plan requested from the command line", "fast_path"),
          action: "edit",
          taskIds: opts.tasks,
          needsFullGeneration: false,
        }
      : generateDecision("Plan requested from the command line", "fast_path");

  const pipeline = createPipelineFromDecision(
    decision,
    { runTask: ctx.runTask, pool: ctx.pool, graph: ctx.graph },
    { enabledTasks: ctx.config.pipeline.enabled_tasks },
  );

  if (opts.json) {
    console.log(
      JSON.stringify({ kind: pipeline.kind, tasks: pipeline.tasks, levels: pipeline.levels }, null, 2),
    );
    return pipeline;
  }

  console.log(`Pipeline: ${pipeline.kind}`);
  console.log(`Tasks: ${pipeline.tasks.join(", ") || "(none)"}`);
  pipeline.levels.forEach((level, index) => {
    console.log(`Level ${index + 1}: ${level.join(", ")}`);
  });
  return pipeline;
}
