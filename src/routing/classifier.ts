/*
Purpose: turn one user utterance into a routing decision.
Assumptions: the LLM is consulted only when neither a generation trigger nor a bare greeting matched;
any LLM or parse failure degrades to keyword matching and is logged, never raised.
Usage: await new RoutingClassifier({ llm, config }).classify(utterance, context)
*/

import type { ProjectConfig } from "../core/config.js";
import { formatErrorMessage } from "../core/error-format.js";
import { logOrchestratorEvent, NOOP_EVENT_LOGGER, type EventLogger } from "../core/logger.js";
import { renderPromptTemplate } from "../core/prompts.js";
import type { LlmClient } from "../llm/client.js";
import type { ConversationMessage } from "../session/session.js";
import { TASK_DEFINITIONS, TASK_IDS } from "../tasks/registry.js";

import {
  conversationDecision,
  generateDecision,
  parseRoutingDecision,
  type RoutingDecision,
} from "./decision.js";
import {
  isBareGreeting,
  isGenerationRequest,
  loadRoutingKeywords,
  matchTaskKeywords,
  type RoutingKeywords,
} from "./keywords.js";

// =============================================================================
// TYPES
// =============================================================================

export type RoutingContext = {
  documentExists: boolean;
  currentStage: string | null;
  history: readonly ConversationMessage[];
};

export type RoutingClassifierDeps = {
  llm: LlmClient;
  config: ProjectConfig;
  logger?: EventLogger;
  loadKeywords?: () => Promise<RoutingKeywords>;
};

export const FALLBACK_CONFIDENCE = 0.7;

// =============================================================================
// CLASSIFIER
// =============================================================================

export class RoutingClassifier {
  private readonly logger: EventLogger;
  private readonly loadKeywords: () => Promise<RoutingKeywords>;

  constructor(private readonly deps: RoutingClassifierDeps) {
    this.logger = deps.logger ?? NOOP_EVENT_LOGGER;
    this.loadKeywords = deps.loadKeywords ?? (() => loadRoutingKeywords());
  }

  async classify(utterance: string, context: RoutingContext): Promise<RoutingDecision> {
    const keywords = await this.loadKeywords();

    const decision = await this.decide(utterance, context, keywords);
    logOrchestratorEvent(this.logger, "routing.decision", {
      action: decision.action,
      source: decision.source,
      taskIds: decision.taskIds,
      confidence: decision.confidence,
    });
    return decision;
  }

  private async decide(
    utterance: string,
    context: RoutingContext,
    keywords: RoutingKeywords,
  ): Promise<RoutingDecision> {
    if (isGenerationRequest(utterance, keywords)) {
      return generateDecision("User explicitly requested proposal generation", "fast_path");
    }

    if (isBareGreeting(utterance, keywords)) {
      return conversationDecision("Greeting detected", "greeting");
    }

    try {
      const prompt = await renderPromptTemplate("routing", this.buildPromptValues(utterance, context));
      const result = await this.deps.llm.complete(prompt, {
        temperature: this.deps.config.routing.temperature,
      });
      return parseRoutingDecision(result.text);
    } catch (err) {
      logOrchestratorEvent(this.logger, "routing.fallback", {
        error: err instanceof Error ? err.name : "Error",
        message: formatErrorMessage(err),
      });
      return this.fallback(utterance, keywords);
    }
  }

  private fallback(utterance: string, keywords: RoutingKeywords): RoutingDecision {
    const matched = matchTaskKeywords(utterance, keywords);
    if (matched.length === 0) {
      return conversationDecision("No task keywords matched", "keyword_fallback", FALLBACK_CONFIDENCE);
    }

    return {
      action: "edit",
      taskIds: matched,
      relevantSections: [],
      reasoning: `Matched keywords for ${matched.join(", ")}`,
      confidence: FALLBACK_CONFIDENCE,
      needsFullGeneration: false,
      extractedSettings: {},
      source: "keyword_fallback",
    };
  }

  private buildPromptValues(utterance: string, context: RoutingContext): Record<string, string> {
    const window = this.deps.config.routing.history_window;
    const history = context.history.slice(-window);
    const roles = Object.keys(this.deps.config.settings.rates);

    return {
      utterance: utterance.trim(),
      document_exists: context.documentExists ? "yes" : "no",
      current_stage: context.currentStage ?? "unknown",
      history:
        history.length > 0
          ? history.map((message) => `${message.role}: ${message.content}`).join("\n")
          : "No previous messages.",
      tasks: TASK_IDS.map((id) => {
        const definition = TASK_DEFINITIONS[id];
        return `- ${id}: ${definition.description} (sections: ${definition.sections.join(", ")})`;
      }).join("\n"),
      rate_roles: roles.length > 0 ? roles.join(", ") : "none",
      engineer_roles: roles.filter((role) => role.includes("engineer")).join(", ") || "none",
    };
  }
}
