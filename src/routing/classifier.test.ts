import { describe, expect, it } from "vitest";

import { MemoryEventLogger } from "../__tests__/fakes.js";
import { defaultProjectConfig } from "../core/config.js";
import { LlmError, type LlmCompletionOptions } from "../llm/client.js";
import { MockLlmClient } from "../llm/mock.js";
import type { ConversationMessage } from "../session/session.js";

import { FALLBACK_CONFIDENCE, RoutingClassifier } from "./classifier.js";

const NEW_DOCUMENT = { documentExists: false, currentStage: null, history: [] };

function setup(reply: (prompt: string, options: LlmCompletionOptions) => unknown) {
  const llm = new MockLlmClient(reply);
  const logger = new MemoryEventLogger();
  const classifier = new RoutingClassifier({ llm, config: defaultProjectConfig(), logger });
  return { llm, logger, classifier };
}

describe("RoutingClassifier", () => {
  it("short-circuits explicit generation requests without calling the model", async () => {
    const { llm, classifier, logger } = setup(() => "{}");

    const decision = await classifier.classify("OK, generate the proposal", NEW_DOCUMENT);

    expect(decision).toMatchObject({ action: "generate", source: "fast_path", needsFullGeneration: true });
    expect(llm.prompts).toHaveLength(0);
    expect(logger.ofType("routing.decision")).toEqual([
      { type: "routing.decision", action: "generate", source: "fast_path", taskIds: [], confidence: 1 },
    ]);
  });

  it("answers bare greetings as conversation", async () => {
    const { llm, classifier } = setup(() => "{}");

    const decision = await classifier.classify("Hey!", NEW_DOCUMENT);

    expect(decision).toMatchObject({ action: "conversation", reasoning: "Greeting detected", source: "greeting" });
    expect(llm.prompts).toHaveLength(0);
  });

  it("asks the model with the routing context and parses its reply", async () => {
    const temperatures: (number | undefined)[] = [];
    const { llm, classifier } = setup((_prompt, options) => {
      temperatures.push(options.temperature);
      return {
        action: "edit",
        task_ids: ["technical_architect"],
        reasoning: "Stack change",
        confidence: 0.9,
      };
    });
    const history: ConversationMessage[] = [1, 2, 3, 4, 5, 6].map(
      (index): ConversationMessage => ({
        role: index % 2 === 0 ? "assistant" : "user",
        content: `message ${index}`,
        ts: "2024-01-01T00:00:00.000Z",
      }),
    );

    const decision = await classifier.classify("Swap Postgres for SQLite", {
      documentExists: true,
      currentStage: null,
      history,
    });

    expect(decision).toMatchObject({
      action: "edit",
      taskIds: ["technical_architect"],
      confidence: 0.9,
      source: "llm",
    });
    expect(temperatures).toEqual([0]);

    const [prompt] = llm.prompts;
    expect(prompt).toContain("Swap Postgres for SQLite");
    expect(prompt).toContain("- Proposal exists: yes");
    expect(prompt).toContain("- Current stage: unknown");
    expect(prompt).toContain("assistant: message 6");
    expect(prompt).not.toContain("message 1");
    expect(prompt).toContain(
      "senior_engineer, mid_engineer, junior_engineer, devops_engineer, ai_engineer",
    );
  });

  it("falls back to keyword matching when the model fails", async () => {
    const { classifier, logger } = setup(() => new LlmError("provider down"));

    const decision = await classifier.classify("Can you rework the budget?", NEW_DOCUMENT);

    expect(decision).toEqual({
      action: "edit",
      taskIds: ["resource_allocation"],
      relevantSections: [],
      reasoning: "Matched keywords for resource_allocation",
      confidence: FALLBACK_CONFIDENCE,
      needsFullGeneration: false,
      extractedSettings: {},
      source: "keyword_fallback",
    });
    expect(logger.ofType("routing.fallback")).toEqual([
      { type: "routing.fallback", error: "LlmError", message: "provider down" },
    ]);
  });

  it("falls back to conversation when an unparseable reply matches no keywords", async () => {
    const { classifier, logger } = setup(() => "I think you want an edit");

    const decision = await classifier.classify("Tell me more", NEW_DOCUMENT);

    expect(decision).toMatchObject({
      action: "conversation",
      reasoning: "No task keywords matched",
      confidence: 0.7,
      source: "keyword_fallback",
    });
    expect(logger.ofType("routing.fallback")[0]).toMatchObject({ error: "RoutingParseError" });
  });
});
