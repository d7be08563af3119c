import { describe, expect, it } from "vitest";

import {
  applyTaskUpdate,
  createProjectState,
  readOutput,
  restoreTaskOutput,
  snapshotState,
  type TaskUpdate,
} from "./state.js";

describe("project state", () => {
  it("writes only the keys a task owns", () => {
    const state = createProjectState({ initial_idea: "Idea" });
    // A misbehaving task that returns someone else's key.
    const rogue: TaskUpdate<"business_analyst"> = Object.assign(
      { business_analysis: "Analysis" },
      { technical_spec: "Stolen" },
    );

    applyTaskUpdate(state, "business_analyst", rogue);

    expect(state.business_analysis).toBe("Analysis");
    expect(state.technical_spec).toBeUndefined();
  });

  it("overwrites previous values and skips undefined ones", () => {
    const state = createProjectState({ initial_idea: "Idea" });
    applyTaskUpdate(state, "scope_refinement", { refined_scope: "v1", similar_products: "A" });
    applyTaskUpdate(state, "scope_refinement", { refined_scope: "v2" });

    expect(state.refined_scope).toBe("v2");
    expect(state.similar_products).toBe("A");
  });

  it("merges the sink's null document and error", () => {
    const state = createProjectState({ initial_idea: "Idea" });
    applyTaskUpdate(state, "final_compilation", {
      final_proposal: null,
      current_stage: "failed",
      error: "Missing required components: project plan",
    });

    expect(state.final_proposal).toBeNull();
    expect(state.current_stage).toBe("failed");
    expect(state.error).toBe("Missing required components: project plan");
  });

  it("snapshots are deep copies that cannot be mutated", () => {
    const state = createProjectState({
      initial_idea: "Idea",
      settings: { rates: { senior_engineer: 40 }, currency: "USD", instructions: "" },
    });
    const snapshot = snapshotState(state);

    state.settings.rates.senior_engineer = 90;

    expect(snapshot.settings.rates.senior_engineer).toBe(40);
    expect(Object.isFrozen(snapshot)).toBe(true);
    expect(Object.isFrozen(snapshot.settings.rates)).toBe(true);
  });

  it("restores stored outputs and ignores foreign keys", () => {
    const state = createProjectState({ initial_idea: "Idea" });
    restoreTaskOutput(state, "project_manager", { project_plan: "Plan", resource_plan: "Nope" });

    expect(readOutput(state, "project_plan")).toBe("Plan");
    expect(readOutput(state, "resource_plan")).toBeUndefined();
  });
});
