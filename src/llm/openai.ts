import OpenAI from "openai";
import { APIError, OpenAIError } from "openai/error";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";

import { stripCodeFences, type LlmCompletionResult } from "./client.js";
import {
  ProviderClient,
  resolveApiKey,
  type ProviderClientOptions,
  type ProviderFailure,
  type ProviderRequest,
} from "./provider-client.js";

export type OpenAiTransport = {
  create: (
    body: ChatCompletionCreateParamsNonStreaming,
    options?: OpenAI.RequestOptions,
  ) => Promise<ChatCompletion>;
};

export type OpenAiClientOptions = ProviderClientOptions & {
  transport?: OpenAiTransport;
};

/** Chat Completions client; structured output goes through a strict `json_schema` response format. */
export class OpenAiClient extends ProviderClient<ChatCompletionCreateParamsNonStreaming, ChatCompletion> {
  private readonly transport: OpenAiTransport;

  constructor(options: OpenAiClientOptions) {
    super("openai", options);
    this.transport =
      options.transport ??
      createTransport({ apiKey: resolveApiKey("openai", options.apiKey), baseURL: options.baseURL });
  }

  protected buildBody(request: ProviderRequest): ChatCompletionCreateParamsNonStreaming {
    const body: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: [{ role: "user", content: request.prompt }],
      temperature: request.temperature,
    };

    if (request.schema) {
      body.response_format = {
        type: "json_schema",
        json_schema: { name: "structured_output", schema: request.schema, strict: true },
      };
    }
    return body;
  }

  protected send(
    body: ChatCompletionCreateParamsNonStreaming,
    timeoutMs: number | undefined,
  ): Promise<ChatCompletion> {
    return this.transport.create(body, timeoutMs ? { timeout: timeoutMs } : undefined);
  }

  protected readResponse<TParsed>(
    response: ChatCompletion,
    structured: boolean,
  ): LlmCompletionResult<TParsed> {
    const choice = response.choices[0];
    const content = choice?.message.content;
    const text = typeof content === "string" ? content : "";
    if (!text) {
      throw this.emptyResponseError(response);
    }

    return {
      text,
      parsed: structured ? this.parseJson<TParsed>(text) : undefined,
      finishReason: choice?.finish_reason ?? null,
    };
  }

  protected describeFailure(error: unknown): ProviderFailure | null {
    if (error instanceof APIError) {
      return { status: error.status, detail: readApiErrorMessage(error.error) ?? error.message };
    }
    if (error instanceof OpenAIError) {
      return { detail: error.message };
    }
    return null;
  }

  private parseJson<T>(text: string): T {
    try {
      return JSON.parse(stripCodeFences(text));
    } catch (err) {
      throw this.structuredOutputError("OpenAI returned invalid JSON for structured output.", err);
    }
  }
}

function createTransport(args: { apiKey: string; baseURL?: string }): OpenAiTransport {
  // Retries happen in ProviderClient.
  const client = new OpenAI({ apiKey: args.apiKey, baseURL: args.baseURL, maxRetries: 0 });
  return {
    create: (body, options) => client.chat.completions.create(body, options),
  };
}

function readApiErrorMessage(payload: unknown): string | undefined {
  if (payload && typeof payload === "object" && "message" in payload) {
    return String(payload.message);
  }
  return undefined;
}
