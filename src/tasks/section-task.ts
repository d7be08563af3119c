import { renderPromptTemplate, type PromptTemplateName } from "../core/prompts.js";
import type { LlmClient } from "../llm/client.js";
import type { ProjectState, TaskUpdate } from "../pipeline/state.js";

import { buildPromptValues, requireInitialIdea, type SectionKey } from "./prompt-context.js";
import type { ProposalTask } from "./task.js";

export type SectionTaskId =
  | "business_analyst"
  | "technical_architect"
  | "project_manager"
  | "resource_allocation";

type SectionTaskSpec<T extends SectionTaskId> = {
  template: PromptTemplateName;
  sectionKey: SectionKey;
  temperature?: number;
  toUpdate: (content: string) => TaskUpdate<T>;
};

const SECTION_TASK_SPECS: { readonly [T in SectionTaskId]: SectionTaskSpec<T> } = {
  business_analyst: {
    template: "business-analyst",
    sectionKey: "business_analysis",
    toUpdate: (content) => ({ business_analysis: content }),
  },
  technical_architect: {
    template: "technical-architect",
    sectionKey: "technical_spec",
    toUpdate: (content) => ({ technical_spec: content }),
  },
  project_manager: {
    template: "project-manager",
    sectionKey: "project_plan",
    toUpdate: (content) => ({ project_plan: content }),
  },
  // Cost tables should come out the same on reruns.
  resource_allocation: {
    template: "resource-allocation",
    sectionKey: "resource_plan",
    temperature: 0,
    toUpdate: (content) => ({ resource_plan: content }),
  },
};

/**
 * One prompt, one owned markdown section. The previous version of the section is part
 * of the prompt so edits keep what the user did not ask to change.
 */
export class SectionTask<T extends SectionTaskId> implements ProposalTask<T> {
  private readonly spec: SectionTaskSpec<T>;

  constructor(
    readonly id: T,
    private readonly llm: LlmClient,
  ) {
    this.spec = SECTION_TASK_SPECS[id];
  }

  async run(snapshot: Readonly<ProjectState>): Promise<TaskUpdate<T>> {
    requireInitialIdea(snapshot, this.id);

    const values = buildPromptValues(snapshot, this.spec.sectionKey);
    const prompt = await renderPromptTemplate(this.spec.template, values);
    const result = await this.llm.complete(prompt, { temperature: this.spec.temperature });

    return this.spec.toUpdate(result.text.trim());
  }
}
