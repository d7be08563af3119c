import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createAppContext, type AppContext } from "../app/context.js";
import { planCommand } from "../cli/plan.js";
import { showCommand } from "../cli/show.js";
import { runTurnCommand } from "../cli/turn.js";
import { defaultProjectConfig } from "../core/config.js";
import type { LlmCompletionOptions } from "../llm/client.js";
import { MockLlmClient } from "../llm/mock.js";

// =============================================================================
// HELPERS
// =============================================================================

const tempDirs: string[] = [];

function makeContext(routeReply: unknown = { action: "conversation" }): AppContext {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), "app-context-"));
  tempDirs.push(dir);

  const config = {
    ...defaultProjectConfig(),
    sessions_dir: path.join(dir, "sessions"),
    logs_dir: path.join(dir, "logs"),
  };

  // Structured calls come from scope refinement; the title prompt is the only one naming proposals.
  const writer = (prompt: string, options: LlmCompletionOptions): unknown => {
    if (options.schema) return { refined_scope: "Booking and payments", similar_products: "Rover" };
    if (prompt.startsWith("You name software project proposals")) return "Walkies";
    return "Section body";
  };

  return createAppContext({
    config,
    llm: new MockLlmClient(writer),
    routingLlm: new MockLlmClient(routeReply),
  });
}

function printedLines(spy: { mock: { calls: unknown[][] } }): string[] {
  return spy.mock.calls.map((call) => String(call[0]));
}

beforeEach(() => {
  process.exitCode = undefined;
});

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
  for (const dir of tempDirs) {
    fs.rmSync(dir, { recursive: true, force: true });
  }
  tempDirs.length = 0;
});

// =============================================================================
// TESTS
// =============================================================================

describe("CLI commands over an app context", () => {
  it("generates a proposal, persists the session and writes the event log", async () => {
    const ctx = makeContext();
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    const result = await runTurnCommand(ctx, { sessionId: "demo", quiet: true }, (agent) =>
      agent.generate("A booking app for dog walkers"),
    );

    expect(result.reply).toBe('Generated the proposal "Walkies".');
    const lines = printedLines(logSpy);
    expect(lines[0]).toBe('Generated the proposal "Walkies".');
    expect(lines[1]).toBe("");
    expect(lines[2]?.startsWith("# Walkies\n\n## Initial Idea\n\nA booking app for dog walkers")).toBe(true);
    expect(process.exitCode).toBeUndefined();

    const saved: unknown = JSON.parse(
      fs.readFileSync(path.join(ctx.config.sessions_dir, "demo.json"), "utf8"),
    );
    expect(saved).toMatchObject({
      id: "demo",
      initial_idea: "A booking app for dog walkers",
      document_title: "Walkies",
      document_generated: true,
      current_stage: "completed",
    });

    const events = fs
      .readFileSync(path.join(ctx.config.logs_dir, "demo.jsonl"), "utf8")
      .trim()
      .split("\n")
      .map((line): unknown => JSON.parse(line));
    expect(events).toContainEqual(expect.objectContaining({ type: "pipeline.complete", kind: "full" }));
  });

  it("prints progress unless quiet and edits a stored proposal on a later turn", async () => {
    const ctx = makeContext({ action: "edit", task_ids: ["project_manager"], reasoning: "Timeline change" });
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);
    await runTurnCommand(ctx, { sessionId: "demo", quiet: true }, (agent) => agent.generate("Dog walking"));
    logSpy.mockClear();

    const result = await runTurnCommand(ctx, { sessionId: "demo" }, (agent) =>
      agent.handleTurn("Shorten the timeline to six weeks"),
    );

    expect(result.reply).toBe("Updated Project plan.");
    const lines = printedLines(logSpy);
    expect(lines[0]).toContain("Running edit pipeline: project_manager");
    expect(lines.at(-1)).toBe("Updated Project plan.");
  });

  it("sets a failing exit code when the pipeline cannot run", async () => {
    const ctx = makeContext({ action: "edit", task_ids: ["title"] });
    vi.spyOn(console, "log").mockImplementation(() => undefined);

    const result = await runTurnCommand(ctx, { sessionId: "empty", quiet: true }, (agent) =>
      agent.handleTurn("Name it"),
    );

    expect(result.reply).toBe("An initial idea is required before running the pipeline.");
    expect(process.exitCode).toBe(1);
  });

  it("plans an edit without running it", () => {
    const ctx = makeContext();
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    planCommand(ctx, { tasks: ["scope_refinement", "business_analyst"] });

    expect(printedLines(logSpy)).toEqual([
      "Pipeline: edit",
      "Tasks: scope_refinement, business_analyst, technical_architect, project_manager, resource_allocation",
      "Level 1: scope_refinement",
      "Level 2: business_analyst",
      "Level 3: technical_architect",
      "Level 4: project_manager",
      "Level 5: resource_allocation",
    ]);
  });

  it("shows a session that has not been generated yet", async () => {
    const ctx = makeContext();
    const logSpy = vi.spyOn(console, "log").mockImplementation(() => undefined);

    await showCommand(ctx, { sessionId: "fresh" });

    const lines = printedLines(logSpy);
    expect(lines.slice(0, 5)).toEqual([
      "Session: fresh",
      "Title: (none)",
      "Idea: (none)",
      "Generated: no",
      "Stage: (none)",
    ]);
    expect(lines).toContain("Title: not generated");
    expect(lines.at(-1)).toBe("Messages: 0");
  });
});
