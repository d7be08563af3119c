import { OrchestratorError } from "../core/errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type LlmCompletionOptions = {
  /** JSON schema the reply must satisfy; its presence asks for structured output. */
  schema?: Record<string, unknown>;
  temperature?: number;
  timeoutMs?: number;
};

export type LlmCompletionResult<TParsed = unknown> = {
  text: string;
  parsed?: TParsed;
  finishReason: string | null;
};

/** The one seam every task, the router and the conversation reply talk to. */
export interface LlmClient {
  complete<TParsed = unknown>(
    prompt: string,
    options?: LlmCompletionOptions,
  ): Promise<LlmCompletionResult<TParsed>>;
}

export class LlmError extends OrchestratorError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "LlmError";
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function isJsonObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

// Providers often wrap JSON replies in markdown fences.
export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const fenced = /^```[a-zA-Z0-9_-]*\s*\n?([\s\S]*?)\n?```$/.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
}
