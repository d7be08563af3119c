/*
Purpose: one conversational turn. Routes the utterance, then either answers it or runs the
pipeline the decision calls for, and records everything in the session.
Assumptions: callers serialize turns per session; task outputs from earlier turns live in the session.
Usage: await new ProposalAgent(deps).handleTurn("make the budget 2500");
*/

import type { ProjectConfig } from "../core/config.js";
import { OrchestratorError, PrerequisiteError } from "../core/errors.js";
import { formatErrorMessage } from "../core/error-format.js";
import { logOrchestratorEvent, NOOP_EVENT_LOGGER, type EventLogger } from "../core/logger.js";
import { renderPromptTemplate } from "../core/prompts.js";
import type { LlmClient } from "../llm/client.js";
import type { DependencyGraph } from "../pipeline/graph.js";
import type { PipelineOutcome, ProgressObserver } from "../pipeline/pipeline.js";
import { createPipelineFromDecision } from "../pipeline/pipeline-factory.js";
import { tasksWithStatus } from "../pipeline/run.js";
import {
  createProjectState,
  restoreTaskOutput,
  TASK_OUTPUT_KEYS,
  type ProjectState,
} from "../pipeline/state.js";
import type { WorkerPool } from "../pipeline/worker-pool.js";
import type { RoutingClassifier } from "../routing/classifier.js";
import { generateDecision, type RoutingDecision } from "../routing/decision.js";
import {
  injectConstraintTasks,
  mergeSettings,
  rememberSettings,
  resolveConstraints,
} from "../routing/settings.js";
import type { SessionPort } from "../session/session.js";
import { assembleProposal } from "../tasks/compile-task.js";
import {
  CONTENT_TASK_IDS,
  isTaskId,
  SINK_TASK_ID,
  TASK_DEFINITIONS,
  type TaskId,
} from "../tasks/registry.js";
import type { TaskRunner } from "../tasks/task.js";

// =============================================================================
// TYPES
// =============================================================================

export type ProposalAgentDeps = {
  session: SessionPort;
  classifier: RoutingClassifier;
  /** Answers conversational turns. */
  llm: LlmClient;
  runTask: TaskRunner;
  pool: WorkerPool;
  config: ProjectConfig;
  graph?: DependencyGraph;
  logger?: EventLogger;
  onProgress?: ProgressObserver;
};

export type TurnResult = {
  reply: string;
  decision: RoutingDecision;
  outcome: PipelineOutcome | null;
};

export const UPDATE_FAILED_REPLY = "I could not complete this update.";
export const CONVERSATION_FALLBACK_REPLY =
  "I'm here to help with your proposal. Tell me what you would like to add or change.";

// Section names the router may use, mapped to the state key holding the text.
const SECTION_ALIASES: Readonly<Record<string, keyof ProjectState>> = {
  initial_idea: "initial_idea",
  title: "proposal_title",
  proposal_title: "proposal_title",
  scope: "refined_scope",
  refined_scope: "refined_scope",
  similar_products: "similar_products",
  business_analysis: "business_analysis",
  technical_spec: "technical_spec",
  project_plan: "project_plan",
  resource_plan: "resource_plan",
  resource_allocation: "resource_plan",
};

// =============================================================================
// AGENT
// =============================================================================

export class ProposalAgent {
  private readonly logger: EventLogger;

  constructor(private readonly deps: ProposalAgentDeps) {
    this.logger = deps.logger ?? NOOP_EVENT_LOGGER;
  }

  async handleTurn(utterance: string): Promise<TurnResult> {
    const { session } = this.deps;
    const history = session.getConversationHistory();
    session.appendMessage("user", utterance);

    const routed = await this.deps.classifier.classify(utterance, {
      documentExists: session.isDocumentGenerated,
      currentStage: session.currentStage,
      history,
    });

    return this.finishTurn(utterance, routed);
  }

  /** Full generation without routing; sets the idea first when one is given. */
  async generate(initialIdea?: string): Promise<TurnResult> {
    const { session } = this.deps;
    const idea = initialIdea?.trim();
    if (idea) session.initialIdea = idea;

    const request = idea ? `Generate a proposal for: ${idea}` : "Generate the proposal.";
    session.appendMessage("user", request);

    return this.finishTurn(request, generateDecision("Generation requested directly", "fast_path"));
  }

  // =============================================================================
  // INTERNALS
  // =============================================================================

  private async finishTurn(utterance: string, routed: RoutingDecision): Promise<TurnResult> {
    const { session } = this.deps;
    const decision = injectConstraintTasks(routed);

    let result: TurnResult;
    if (decision.action === "conversation") {
      result = { reply: await this.converse(utterance, decision), decision, outcome: null };
    } else {
      result = await this.runPipeline(utterance, decision);
    }

    session.appendMessage("assistant", result.reply);
    await session.save();
    return result;
  }

  private async runPipeline(utterance: string, decision: RoutingDecision): Promise<TurnResult> {
    const { session, config } = this.deps;

    session.sessionScopedState = rememberSettings(session.sessionScopedState, decision.extractedSettings);
    const state = createProjectState({
      initial_idea: session.initialIdea ?? "",
      user_input: utterance,
      document_generated: session.isDocumentGenerated,
      settings: mergeSettings(config.settings, session.sessionScopedState, decision.extractedSettings),
      constraints: resolveConstraints(session.sessionScopedState, decision.extractedSettings),
    });
    this.restorePriorOutputs(state);

    let outcome: PipelineOutcome;
    try {
      const pipeline = createPipelineFromDecision(
        decision,
        {
          runTask: this.deps.runTask,
          pool: this.deps.pool,
          graph: this.deps.graph,
          session,
          logger: this.logger,
          onProgress: this.deps.onProgress,
        },
        { enabledTasks: config.pipeline.enabled_tasks },
      );
      outcome = await pipeline.execute(state);
    } catch (err) {
      // Unknown task ids and invalid plans fail before anything runs.
      if (!(err instanceof OrchestratorError)) throw err;
      logOrchestratorEvent(this.logger, "turn.pipeline_rejected", {
        error: err.name,
        message: err.message,
      });
      return { reply: `${UPDATE_FAILED_REPLY} ${err.message}`, decision, outcome: null };
    }

    return { reply: this.report(decision, outcome), decision, outcome };
  }

  private report(decision: RoutingDecision, outcome: PipelineOutcome): string {
    const { state, run, error } = outcome;

    if (error instanceof PrerequisiteError) {
      return error.message;
    }
    if (error) {
      return `${UPDATE_FAILED_REPLY} ${error.message}`;
    }

    this.persistOutputs(decision, outcome);

    if (run.status === "failed") {
      return `The proposal could not be assembled. ${run.reason ?? ""}`.trim();
    }

    if (run.kind === "full") {
      const title = state.final_proposal?.title ?? state.proposal_title ?? "Project Proposal";
      return `Generated the proposal "${title}".`;
    }

    const updated = tasksWithStatus(run, "done").map((id) => TASK_DEFINITIONS[id].displayName);
    return `Updated ${updated.join(", ")}.`;
  }

  private persistOutputs(decision: RoutingDecision, outcome: PipelineOutcome): void {
    const { session } = this.deps;
    const { state, run } = outcome;
    const reason = decision.reasoning || `${decision.action} requested`;

    for (const taskId of tasksWithStatus(run, "done")) {
      const content = outputContent(state, taskId);
      if (content) session.saveTaskOutput(taskId, content, reason);
    }

    // An edit leaves the compiled document stale; rebuild it from the merged sections.
    if (run.kind === "edit" && session.isDocumentGenerated) {
      const compiled = assembleProposal(state);
      if (compiled.ok) {
        state.final_proposal = compiled.proposal;
        session.saveTaskOutput(SINK_TASK_ID, { ...compiled.proposal }, reason);
      }
    }
  }

  private restorePriorOutputs(state: ProjectState): void {
    const { session } = this.deps;
    for (const taskId of CONTENT_TASK_IDS) {
      const prior = session.getPriorTaskOutput(taskId);
      if (prior) restoreTaskOutput(state, taskId, prior.content);
    }
    if (!state.proposal_title && session.documentTitle) {
      state.proposal_title = session.documentTitle;
    }
  }

  private async converse(utterance: string, decision: RoutingDecision): Promise<string> {
    const { session } = this.deps;
    const state = createProjectState({ initial_idea: session.initialIdea ?? "" });
    this.restorePriorOutputs(state);

    try {
      const prompt = await renderPromptTemplate("conversation", {
        utterance: utterance.trim(),
        document_exists: session.isDocumentGenerated ? "yes" : "no",
        title: state.proposal_title ?? "Untitled proposal",
        context: describeSections(state, decision.relevantSections),
        history:
          session
            .getConversationHistory(this.deps.config.routing.history_window)
            .map((message) => `${message.role}: ${message.content}`)
            .join("\n") || "No previous messages.",
      });
      const result = await this.deps.llm.complete(prompt);
      return result.text.trim() || CONVERSATION_FALLBACK_REPLY;
    } catch (err) {
      logOrchestratorEvent(this.logger, "conversation.failed", { message: formatErrorMessage(err) });
      return CONVERSATION_FALLBACK_REPLY;
    }
  }
}

// =============================================================================
// HELPERS
// =============================================================================

function outputContent(state: ProjectState, taskId: TaskId): Record<string, string> | null {
  if (taskId === SINK_TASK_ID) {
    return state.final_proposal ? { ...state.final_proposal } : null;
  }

  const content: Record<string, string> = {};
  for (const key of TASK_OUTPUT_KEYS[taskId]) {
    const value = state[key];
    if (typeof value === "string") content[key] = value;
  }
  return Object.keys(content).length > 0 ? content : null;
}

export function describeSections(state: ProjectState, sections: readonly string[]): string {
  const blocks: string[] = [];
  for (const section of sections) {
    const key = SECTION_ALIASES[section] ?? (isTaskId(section) ? ownedTextKey(section) : undefined);
    if (!key) continue;
    const value = state[key];
    if (typeof value === "string" && value.trim()) {
      blocks.push(`## ${section}\n${value.trim()}`);
    }
  }
  return blocks.length > 0 ? blocks.join("\n\n") : "No proposal sections selected.";
}

function ownedTextKey(taskId: TaskId): keyof ProjectState | undefined {
  if (taskId === SINK_TASK_ID) return undefined;
  return TASK_OUTPUT_KEYS[taskId][0];
}
