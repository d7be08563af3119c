import { z } from "zod";

import { renderPromptTemplate } from "../core/prompts.js";
import type { LlmClient } from "../llm/client.js";
import type { ProjectState, TaskUpdate } from "../pipeline/state.js";

import { buildPromptValues, requireInitialIdea } from "./prompt-context.js";
import type { ProposalTask } from "./task.js";

const ScopeOutputSchema = z.object({
  refined_scope: z.string(),
  similar_products: z.string(),
});

const SCOPE_JSON_SCHEMA = {
  type: "object",
  properties: {
    refined_scope: { type: "string" },
    similar_products: { type: "string" },
  },
  required: ["refined_scope", "similar_products"],
  additionalProperties: false,
};

export class ScopeRefinementTask implements ProposalTask<"scope_refinement"> {
  readonly id = "scope_refinement";

  constructor(private readonly llm: LlmClient) {}

  async run(snapshot: Readonly<ProjectState>): Promise<TaskUpdate<"scope_refinement">> {
    requireInitialIdea(snapshot, this.id);

    const prompt = await renderPromptTemplate(
      "scope-refinement",
      buildPromptValues(snapshot, "refined_scope"),
    );
    const result = await this.llm.complete(prompt, { schema: SCOPE_JSON_SCHEMA });

    const parsed = ScopeOutputSchema.safeParse(result.parsed);
    if (parsed.success) {
      return parsed.data;
    }

    // Unstructured reply: keep it as the scope and leave the product list untouched.
    return { refined_scope: result.text.trim() };
  }
}
