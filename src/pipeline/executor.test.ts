import { describe, expect, it } from "vitest";

import { InMemorySession, MemoryEventLogger, createScriptedRunner } from "../__tests__/fakes.js";
import { TaskExecutionError } from "../core/errors.js";

import { createLevelExecutor } from "./executor.js";
import { createPipelineRun } from "./run.js";
import { createProjectState } from "./state.js";
import { BoundedWorkerPool } from "./worker-pool.js";

const MIDDLE_LEVEL = [
  "scope_refinement",
  "business_analyst",
  "technical_architect",
] as const;

function setup(behaviours: Parameters<typeof createScriptedRunner>[0] = {}) {
  const scripted = createScriptedRunner(behaviours);
  const session = new InMemorySession();
  const logger = new MemoryEventLogger();
  const executor = createLevelExecutor({
    runTask: scripted.runTask,
    pool: new BoundedWorkerPool(4),
    session,
    logger,
  });
  const state = createProjectState({ initial_idea: "A booking app for dog walkers" });
  const run = createPipelineRun("run-1", "edit", [[...MIDDLE_LEVEL]]);
  return { ...scripted, session, logger, executor, state, run };
}

describe("createLevelExecutor", () => {
  it("gives every task in a level the same snapshot taken before the level", async () => {
    const { executor, state, run, calls } = setup({
      scope_refinement: { delayMs: 1 },
      business_analyst: { delayMs: 5 },
    });

    await executor.runLevel(MIDDLE_LEVEL, state, run);

    expect(calls).toHaveLength(3);
    const [first] = calls;
    for (const call of calls) {
      expect(call.snapshot).toBe(first.snapshot);
      expect(call.snapshot.refined_scope).toBeUndefined();
    }
    expect(state.refined_scope).toBe("Scope text");
    expect(state.business_analysis).toBe("Business text");
  });

  it("merges updates in completion order", async () => {
    const { executor, state, run, logger } = setup({
      scope_refinement: { delayMs: 15 },
      business_analyst: { delayMs: 1 },
      technical_architect: { delayMs: 8 },
    });

    const updates = await executor.runLevel(MIDDLE_LEVEL, state, run);

    expect(logger.ofType("task.complete").map((event) => event.taskId)).toEqual([
      "business_analyst",
      "technical_architect",
      "scope_refinement",
    ]);
    expect([...updates.keys()]).toEqual(["business_analyst", "technical_architect", "scope_refinement"]);
    expect(run.tasks.scope_refinement?.status).toBe("done");
  });

  it("lets siblings finish and surfaces the first failure afterwards", async () => {
    const { executor, state, run, completed } = setup({
      scope_refinement: { delayMs: 1, error: new Error("scope exploded") },
      business_analyst: { delayMs: 10, error: new Error("analysis exploded") },
      technical_architect: { delayMs: 20 },
    });

    const error = await executor.runLevel(MIDDLE_LEVEL, state, run).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TaskExecutionError);
    expect(error).toMatchObject({ taskId: "scope_refinement" });
    expect(completed).toEqual(["technical_architect"]);
    expect(state.technical_spec).toBe("Tech text");
    expect(run.tasks.scope_refinement).toMatchObject({ status: "failed", error: "scope exploded" });
    expect(run.tasks.business_analyst?.status).toBe("failed");
    expect(run.tasks.technical_architect?.status).toBe("done");
  });

  it("persists the title before the rest of the level settles", async () => {
    const { executor, state, session, logger } = setup({
      title: { delayMs: 1 },
      scope_refinement: { delayMs: 15 },
    });
    const run = createPipelineRun("run-2", "full", [["title", "scope_refinement"]]);

    await executor.runLevel(["title", "scope_refinement"], state, run);

    expect(session.documentTitle).toBe("Walkies");
    expect(session.savedTitles).toEqual(["Walkies"]);
    expect(logger.types()).toEqual([
      "task.start",
      "task.start",
      "task.complete",
      "title.persisted",
      "task.complete",
    ]);
  });

  it("logs a failed title save without failing the level", async () => {
    const { executor, state, session, logger } = setup();
    session.failSaves = true;
    const run = createPipelineRun("run-3", "edit", [["title"]]);

    await expect(executor.runLevel(["title"], state, run)).resolves.toBeInstanceOf(Map);

    expect(state.proposal_title).toBe("Walkies");
    expect(logger.ofType("title.persist_failed")).toEqual([
      { type: "title.persist_failed", runId: "run-3", message: "disk unavailable" },
    ]);
  });
});
