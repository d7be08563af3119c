import { renderPromptTemplate } from "../core/prompts.js";
import type { LlmClient } from "../llm/client.js";
import type { ProjectState, TaskUpdate } from "../pipeline/state.js";

import { buildPromptValues, requireInitialIdea } from "./prompt-context.js";
import type { ProposalTask } from "./task.js";

export const FALLBACK_TITLE = "Project Proposal";
const MAX_TITLE_LENGTH = 120;

const TITLE_CHANGE_PATTERNS = [
  /\b(change|update|modify|improve|rename|new|different|better)\b.*\btitle\b/i,
  /\btitle\b.*\b(is|should|could)\b/i,
  /\bdon'?t like\b.*\btitle\b/i,
];

/**
 * Keeps an existing title on a first generation unless the latest user input asks
 * for a new one. Once the proposal exists, running this task is itself the request
 * for a new title.
 */
export class TitleTask implements ProposalTask<"title"> {
  readonly id = "title";

  constructor(private readonly llm: LlmClient) {}

  async run(snapshot: Readonly<ProjectState>): Promise<TaskUpdate<"title">> {
    requireInitialIdea(snapshot, this.id);

    const current = snapshot.proposal_title?.trim();
    if (current && !snapshot.document_generated && !wantsNewTitle(snapshot.user_input)) {
      return { proposal_title: current };
    }

    const prompt = await renderPromptTemplate("title", buildPromptValues(snapshot, "proposal_title"));
    const result = await this.llm.complete(prompt);
    return { proposal_title: cleanTitle(result.text) };
  }
}

export function wantsNewTitle(userInput: string | undefined): boolean {
  if (!userInput) return false;
  return TITLE_CHANGE_PATTERNS.some((pattern) => pattern.test(userInput));
}

export function cleanTitle(raw: string): string {
  const firstLine = raw
    .split("\n")
    .map((line) => line.trim())
    .find((line) => line.length > 0);
  if (!firstLine) return FALLBACK_TITLE;

  const cleaned = firstLine
    .replace(/^#+\s*/, "")
    .replace(/^title\s*:\s*/i, "")
    .replace(/^["'*`]+|["'*`]+$/g, "")
    .trim();

  if (!cleaned) return FALLBACK_TITLE;
  return cleaned.length > MAX_TITLE_LENGTH ? cleaned.slice(0, MAX_TITLE_LENGTH).trim() : cleaned;
}
