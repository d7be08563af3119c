import { describe, expect, it } from "vitest";

import { TaskError } from "../core/errors.js";
import { MockLlmClient } from "../llm/mock.js";
import { createProjectState } from "../pipeline/state.js";

import { FALLBACK_TITLE, TitleTask, cleanTitle, wantsNewTitle } from "./title-task.js";

describe("cleanTitle", () => {
  it("strips labels, markdown and quotes from the first line", () => {
    expect(cleanTitle('Title: "Walkies"')).toBe("Walkies");
    expect(cleanTitle("## **Dog Days**\nA subtitle")).toBe("Dog Days");
  });

  it("falls back when the reply is blank", () => {
    expect(cleanTitle("\n  \n")).toBe(FALLBACK_TITLE);
    expect(cleanTitle('""')).toBe(FALLBACK_TITLE);
  });

  it("caps very long titles", () => {
    expect(cleanTitle("x".repeat(130))).toHaveLength(120);
  });
});

describe("wantsNewTitle", () => {
  it("recognizes requests that mention the title", () => {
    expect(wantsNewTitle("Please change the title")).toBe(true);
    expect(wantsNewTitle("I don't like the title")).toBe(true);
    expect(wantsNewTitle("update the budget")).toBe(false);
    expect(wantsNewTitle(undefined)).toBe(false);
  });
});

describe("TitleTask", () => {
  it("keeps an existing title unless a new one is requested", async () => {
    const llm = new MockLlmClient("Something else");
    const snapshot = {
      ...createProjectState({ initial_idea: "Dog walking", user_input: "add a chat feature" }),
      proposal_title: "Walkies",
    };

    await expect(new TitleTask(llm).run(snapshot)).resolves.toEqual({ proposal_title: "Walkies" });
    expect(llm.prompts).toHaveLength(0);
  });

  it("asks the model for a title when none exists", async () => {
    const llm = new MockLlmClient('"Paws & Go"');

    const update = await new TitleTask(llm).run(createProjectState({ initial_idea: "Dog walking" }));

    expect(update).toEqual({ proposal_title: "Paws & Go" });
    expect(llm.prompts[0]).toContain("Current title: Untitled proposal");
    expect(llm.prompts[0]).toContain("Latest user request: None");
  });

  it("regenerates when the user asks for a different title", async () => {
    const llm = new MockLlmClient("Walk Club");
    const snapshot = {
      ...createProjectState({ initial_idea: "Dog walking", user_input: "Rename the title please" }),
      proposal_title: "Walkies",
    };

    await expect(new TitleTask(llm).run(snapshot)).resolves.toEqual({ proposal_title: "Walk Club" });
    expect(llm.prompts[0]).toContain("Current title: Walkies");
  });

  it("regenerates on any edit of a generated proposal", async () => {
    const llm = new MockLlmClient("Fresh Catchy Name");
    const snapshot = {
      ...createProjectState({
        initial_idea: "Dog walking",
        user_input: "make it catchier",
        document_generated: true,
      }),
      proposal_title: "Old Title",
    };

    await expect(new TitleTask(llm).run(snapshot)).resolves.toEqual({ proposal_title: "Fresh Catchy Name" });
    expect(llm.prompts).toHaveLength(1);
    expect(llm.prompts[0]).toContain("Current title: Old Title");
    expect(llm.prompts[0]).toContain("Latest user request: make it catchier");
  });

  it("refuses to run without an idea", async () => {
    const task = new TitleTask(new MockLlmClient("x"));

    await expect(task.run(createProjectState({ initial_idea: "  " }))).rejects.toThrow(TaskError);
  });
});
