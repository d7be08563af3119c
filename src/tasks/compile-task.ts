import type { FinalProposal, ProjectState, TaskUpdate } from "../pipeline/state.js";

import type { ProposalTask } from "./task.js";

const DEFAULT_TITLE = "Project Proposal";

type RequiredSection = {
  key: "refined_scope" | "business_analysis" | "technical_spec" | "project_plan" | "resource_plan";
  label: string;
};

const REQUIRED_SECTIONS: readonly RequiredSection[] = [
  { key: "refined_scope", label: "refined scope" },
  { key: "business_analysis", label: "business analysis" },
  { key: "technical_spec", label: "technical specification" },
  { key: "project_plan", label: "project plan" },
  { key: "resource_plan", label: "resource plan" },
];

export type CompileResult =
  | { ok: true; proposal: FinalProposal }
  | { ok: false; missing: string[]; message: string };

/** Assembles the document, or names every required section that is missing or blank. */
export function assembleProposal(state: Readonly<ProjectState>): CompileResult {
  const missing = REQUIRED_SECTIONS.filter(({ key }) => !state[key]?.trim()).map(
    ({ label }) => label,
  );

  if (missing.length > 0) {
    return { ok: false, missing, message: `Missing required components: ${missing.join(", ")}` };
  }

  return {
    ok: true,
    proposal: {
      title: state.proposal_title?.trim() || DEFAULT_TITLE,
      initial_idea: state.initial_idea,
      similar_products: state.similar_products ?? "",
      refined_scope: state.refined_scope ?? "",
      business_analysis: state.business_analysis ?? "",
      technical_spec: state.technical_spec ?? "",
      project_plan: state.project_plan ?? "",
      resource_plan: state.resource_plan ?? "",
    },
  };
}

export class CompileTask implements ProposalTask<"final_compilation"> {
  readonly id = "final_compilation";

  async run(snapshot: Readonly<ProjectState>): Promise<TaskUpdate<"final_compilation">> {
    const result = assembleProposal(snapshot);
    if (!result.ok) {
      return { final_proposal: null, current_stage: "failed", error: result.message };
    }

    return { final_proposal: result.proposal, current_stage: "completed", error: null };
  }
}

const MARKDOWN_SECTIONS: readonly { key: Exclude<keyof FinalProposal, "title">; heading: string }[] = [
  { key: "initial_idea", heading: "Initial Idea" },
  { key: "refined_scope", heading: "Scope" },
  { key: "similar_products", heading: "Similar Products" },
  { key: "business_analysis", heading: "Business Analysis" },
  { key: "technical_spec", heading: "Technical Specification" },
  { key: "project_plan", heading: "Project Plan" },
  { key: "resource_plan", heading: "Resources and Budget" },
];

// Blank sections are left out.
export function renderProposalMarkdown(proposal: FinalProposal): string {
  const blocks = [`# ${proposal.title}`];
  for (const { key, heading } of MARKDOWN_SECTIONS) {
    const body = proposal[key].trim();
    if (body) blocks.push(`## ${heading}\n\n${body}`);
  }
  return `${blocks.join("\n\n")}\n`;
}
