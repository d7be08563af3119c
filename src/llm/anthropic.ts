import Anthropic, { APIError, AnthropicError } from "@anthropic-ai/sdk";
import type {
  Message,
  MessageCreateParamsNonStreaming,
  Tool,
} from "@anthropic-ai/sdk/resources/messages/messages";

import { isJsonObject, type LlmCompletionResult } from "./client.js";
import {
  ProviderClient,
  resolveApiKey,
  type ProviderClientOptions,
  type ProviderFailure,
  type ProviderRequest,
} from "./provider-client.js";

export type AnthropicRequestOptions = {
  timeout?: number;
};

export type AnthropicTransport = {
  create: (
    body: MessageCreateParamsNonStreaming,
    options?: AnthropicRequestOptions,
  ) => Promise<Message>;
};

export type AnthropicClientOptions = ProviderClientOptions & {
  defaultMaxTokens?: number;
  transport?: AnthropicTransport;
};

const DEFAULT_MAX_TOKENS = 4096;
const STRUCTURED_OUTPUT_TOOL = "structured_output";

/**
 * Messages API client. Structured output forces a single tool call whose input
 * schema is the requested schema; the tool input is the parsed reply.
 */
export class AnthropicClient extends ProviderClient<MessageCreateParamsNonStreaming, Message> {
  private readonly transport: AnthropicTransport;
  private readonly maxTokens: number;

  constructor(options: AnthropicClientOptions) {
    super("anthropic", options);
    this.maxTokens = options.defaultMaxTokens ?? DEFAULT_MAX_TOKENS;
    this.transport =
      options.transport ??
      createTransport({ apiKey: resolveApiKey("anthropic", options.apiKey), baseURL: options.baseURL });
  }

  protected buildBody(request: ProviderRequest): MessageCreateParamsNonStreaming {
    const body: MessageCreateParamsNonStreaming = {
      model: this.model,
      messages: [{ role: "user", content: request.prompt }],
      max_tokens: this.maxTokens,
      temperature: request.temperature,
      stream: false,
    };

    if (request.schema) {
      body.tools = [structuredOutputTool(request.schema)];
      body.tool_choice = { type: "tool", name: STRUCTURED_OUTPUT_TOOL };
    }
    return body;
  }

  protected send(body: MessageCreateParamsNonStreaming, timeoutMs: number | undefined): Promise<Message> {
    return this.transport.create(body, timeoutMs ? { timeout: timeoutMs } : undefined);
  }

  protected readResponse<TParsed>(response: Message, structured: boolean): LlmCompletionResult<TParsed> {
    const finishReason = response.stop_reason ?? null;

    if (structured) {
      const parsed = this.readToolInput<TParsed>(response);
      return { text: JSON.stringify(parsed), parsed, finishReason };
    }

    const text = response.content
      .map((block) => (block.type === "text" ? block.text : ""))
      .join("")
      .trim();
    if (!text) {
      throw this.emptyResponseError(response);
    }
    return { text, finishReason };
  }

  protected describeFailure(error: unknown): ProviderFailure | null {
    if (error instanceof APIError) {
      return { status: error.status, detail: error.message };
    }
    if (error instanceof AnthropicError) {
      return { detail: error.message };
    }
    return null;
  }

  private readToolInput<T>(message: Message): T {
    const block = message.content.find((candidate) => candidate.type === "tool_use");
    if (!block || block.type !== "tool_use") {
      throw this.structuredOutputError(
        "Anthropic response did not include a tool_use block for structured output.",
        message,
      );
    }

    const input: unknown = block.input;
    if (!isJsonObject(input)) {
      throw this.structuredOutputError("Anthropic structured output was not a JSON object.", message);
    }
    // The tool schema constrains the shape; callers validate it with zod.
    return input as T;
  }
}

function structuredOutputTool(schema: Record<string, unknown>): Tool {
  return {
    name: STRUCTURED_OUTPUT_TOOL,
    description: "Return JSON that matches the provided schema.",
    input_schema: { ...schema, type: "object" },
  };
}

function createTransport(args: { apiKey: string; baseURL?: string }): AnthropicTransport {
  const client = new Anthropic({ apiKey: args.apiKey, baseURL: args.baseURL, maxRetries: 0 });
  return {
    create: (body, options) => client.messages.create(body, options),
  };
}
