import fs from "node:fs/promises";
import path from "node:path";

import {
  isJsonObject,
  LlmError,
  stripCodeFences,
  type LlmClient,
  type LlmCompletionOptions,
  type LlmCompletionResult,
} from "./client.js";

export type MockResponder = (prompt: string, options: LlmCompletionOptions) => unknown;

const ENABLED_FLAGS = ["1", "true", "yes", "on"];
const DEFAULT_TEXT_REPLY = "Mock response.";

export function isMockLlmEnabled(env: NodeJS.ProcessEnv = process.env): boolean {
  return ENABLED_FLAGS.includes((env.MOCK_LLM ?? "").trim().toLowerCase());
}

/**
 * Offline client used by tests and `MOCK_LLM=1` runs.
 *
 * Reply precedence: the constructor argument (a fixed payload, or a responder
 * called with the prompt), then the JSON file at `MOCK_LLM_OUTPUT_PATH`, then
 * `MOCK_LLM_OUTPUT`, then an empty object or a placeholder sentence.
 * A payload that is an Error is thrown instead of returned.
 */
export class MockLlmClient implements LlmClient {
  readonly prompts: string[] = [];

  constructor(private readonly reply?: unknown) {}

  async complete<TParsed = unknown>(
    prompt: string,
    options: LlmCompletionOptions = {},
  ): Promise<LlmCompletionResult<TParsed>> {
    this.prompts.push(prompt);

    const payload = await this.nextPayload(prompt, options);
    if (payload instanceof Error) throw payload;

    return {
      text: typeof payload === "string" ? payload : JSON.stringify(payload),
      parsed: options.schema ? toStructured<TParsed>(payload) : undefined,
      finishReason: "mock",
    };
  }

  private async nextPayload(prompt: string, options: LlmCompletionOptions): Promise<unknown> {
    if (isResponder(this.reply)) return this.reply(prompt, options);
    if (this.reply !== undefined) return this.reply;

    const fixturePath = process.env.MOCK_LLM_OUTPUT_PATH;
    if (fixturePath) {
      return parseLoose(await fs.readFile(path.resolve(fixturePath), "utf8"));
    }

    const inline = process.env.MOCK_LLM_OUTPUT;
    if (inline) return parseLoose(inline);

    return options.schema ? {} : DEFAULT_TEXT_REPLY;
  }
}

function isResponder(value: unknown): value is MockResponder {
  return typeof value === "function";
}

function toStructured<TParsed>(payload: unknown): TParsed {
  const value = typeof payload === "string" ? parseLoose(payload) : payload;
  if (!isJsonObject(value)) {
    throw new LlmError("Mock LLM requires an object payload when a schema is provided.");
  }
  // Callers validate the shape against their own zod schema.
  return value as TParsed;
}

/** JSON when it parses, the trimmed text otherwise. */
function parseLoose(raw: string): unknown {
  const trimmed = stripCodeFences(raw);
  if (!trimmed) return {};

  try {
    return JSON.parse(trimmed);
  } catch {
    return trimmed;
  }
}
