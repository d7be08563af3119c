import type { LlmClient } from "../llm/client.js";

import { CompileTask } from "./compile-task.js";
import { ScopeRefinementTask } from "./scope-task.js";
import { SectionTask } from "./section-task.js";
import type { TaskRegistry } from "./task.js";
import { TitleTask } from "./title-task.js";

export function createTaskRegistry(llm: LlmClient): TaskRegistry {
  return {
    title: new TitleTask(llm),
    scope_refinement: new ScopeRefinementTask(llm),
    business_analyst: new SectionTask("business_analyst", llm),
    technical_architect: new SectionTask("technical_architect", llm),
    project_manager: new SectionTask("project_manager", llm),
    resource_allocation: new SectionTask("resource_allocation", llm),
    final_compilation: new CompileTask(),
  };
}
