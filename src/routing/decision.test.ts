import { describe, expect, it } from "vitest";

import { RoutingParseError } from "../core/errors.js";

import { conversationDecision, generateDecision, parseRoutingDecision } from "./decision.js";

describe("parseRoutingDecision", () => {
  it("reads a fenced reply and normalizes its fields", () => {
    const raw = [
      "```json",
      '{"action":"edit","task_ids":[" business_analyst ","business_analyst"],"confidence":1.4}',
      "```",
    ].join("\n");

    expect(parseRoutingDecision(raw)).toEqual({
      action: "edit",
      taskIds: ["business_analyst"],
      relevantSections: [],
      reasoning: "",
      confidence: 1,
      needsFullGeneration: false,
      extractedSettings: {},
      source: "llm",
    });
  });

  it("maps generate_proposal to generate and finds JSON inside prose", () => {
    const decision = parseRoutingDecision('Sure! {"action":"generate_proposal"} Hope that helps.');

    expect(decision.action).toBe("generate");
    expect(decision.needsFullGeneration).toBe(true);
    expect(decision.confidence).toBe(0.5);
  });

  it("keeps extracted settings and drops blank ones", () => {
    const decision = parseRoutingDecision(
      JSON.stringify({
        action: "edit",
        task_ids: ["resource_allocation"],
        extracted_settings: {
          rates: { senior_engineer: { value: "400", unit: "day" } },
          budget: 25000,
          timeline: "  ",
        },
      }),
    );

    expect(decision.extractedSettings).toEqual({
      rates: { senior_engineer: { value: "400", unit: "day" } },
      budget: "25000",
    });
  });

  it("raises RoutingParseError for unusable replies", () => {
    expect(() => parseRoutingDecision("no json here")).toThrow(
      "Routing reply contained no JSON object.",
    );
    expect(() => parseRoutingDecision("{not json}")).toThrow("Routing reply is not valid JSON.");
    expect(() => parseRoutingDecision('{"action":"delete"}')).toThrow(
      /^Routing reply failed validation: /,
    );

    const error = (() => {
      try {
        parseRoutingDecision("nothing");
        return null;
      } catch (err) {
        return err;
      }
    })();
    expect(error).toBeInstanceOf(RoutingParseError);
    expect(error).toMatchObject({ rawOutput: "nothing" });
  });
});

describe("decision builders", () => {
  it("builds conversation and generate decisions", () => {
    expect(conversationDecision("Greeting detected", "greeting")).toMatchObject({
      action: "conversation",
      confidence: 1,
      needsFullGeneration: false,
      source: "greeting",
    });
    expect(generateDecision("Requested", "fast_path")).toMatchObject({
      action: "generate",
      taskIds: [],
      needsFullGeneration: true,
    });
  });
});
