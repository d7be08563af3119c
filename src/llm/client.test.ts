import { APIError as AnthropicApiError } from "@anthropic-ai/sdk";
import type {
  Message as AnthropicMessage,
  MessageCreateParamsNonStreaming as AnthropicMessageParams,
} from "@anthropic-ai/sdk/resources/messages/messages";
import type OpenAI from "openai";
import { APIError as OpenAiApiError } from "openai/error";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
} from "openai/resources/chat/completions";
import { describe, expect, it } from "vitest";

import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

import { AnthropicClient, type AnthropicRequestOptions } from "./anthropic.js";
import { LlmError, stripCodeFences } from "./client.js";
import { OpenAiClient } from "./openai.js";

// =============================================================================
// FAKES
// =============================================================================

const SCOPE_SCHEMA = {
  type: "object",
  properties: { refined_scope: { type: "string" }, similar_products: { type: "string" } },
  required: ["refined_scope", "similar_products"],
  additionalProperties: false,
};

/** Replays outcomes in order; the last one repeats. */
class ScriptedTransport<TBody, TOptions, TResponse> {
  readonly bodies: TBody[] = [];
  readonly options: (TOptions | undefined)[] = [];

  constructor(private readonly outcomes: (TResponse | Error)[]) {}

  async create(body: TBody, options?: TOptions): Promise<TResponse> {
    this.bodies.push(body);
    this.options.push(options);
    const outcome = this.outcomes[Math.min(this.bodies.length, this.outcomes.length) - 1];
    if (outcome instanceof Error) throw outcome;
    return outcome;
  }
}

type OpenAiFake = ScriptedTransport<ChatCompletionCreateParamsNonStreaming, OpenAI.RequestOptions, ChatCompletion>;
type AnthropicFake = ScriptedTransport<AnthropicMessageParams, AnthropicRequestOptions, AnthropicMessage>;

function makeOpenAiResponse(content: string): ChatCompletion {
  return {
    id: "chatcmpl-1",
    choices: [
      {
        index: 0,
        finish_reason: "stop",
        logprobs: null,
        message: { role: "assistant", content, refusal: null },
      },
    ],
    created: 1,
    model: "gpt-4o-mini",
    object: "chat.completion",
  } as ChatCompletion;
}

function makeAnthropicResponse(args: {
  text?: string;
  toolInput?: Record<string, unknown>;
  stopReason?: AnthropicMessage["stop_reason"];
}): AnthropicMessage {
  const content = [
    ...(args.text ? [{ type: "text" as const, text: args.text, citations: null }] : []),
    ...(args.toolInput
      ? [{ type: "tool_use" as const, id: "toolu_1", name: "structured_output", input: args.toolInput }]
      : []),
  ];

  return {
    id: "msg_1",
    content,
    model: "claude-test",
    role: "assistant",
    stop_reason: args.stopReason ?? "end_turn",
    stop_sequence: null,
    type: "message",
    usage: { input_tokens: 10, output_tokens: 5 },
  } as AnthropicMessage;
}

// =============================================================================
// OPENAI
// =============================================================================

describe("OpenAiClient", () => {
  it("sends the schema, temperature and timeout overrides", async () => {
    const transport: OpenAiFake = new ScriptedTransport([
      makeOpenAiResponse('```json\n{"refined_scope":"Booking","similar_products":"Rover"}\n```'),
    ]);
    const client = new OpenAiClient({
      model: "gpt-4o-mini",
      transport,
      defaultTemperature: 0.7,
      defaultTimeoutMs: 30_000,
    });

    const result = await client.complete("Refine the scope", {
      schema: SCOPE_SCHEMA,
      temperature: 0,
      timeoutMs: 1_500,
    });

    const [body] = transport.bodies;
    expect(body?.response_format).toEqual({
      type: "json_schema",
      json_schema: { name: "structured_output", schema: SCOPE_SCHEMA, strict: true },
    });
    expect(body?.temperature).toBe(0);
    expect(body?.messages).toEqual([{ role: "user", content: "Refine the scope" }]);
    expect(transport.options).toEqual([{ timeout: 1_500 }]);
    expect(result.parsed).toEqual({ refined_scope: "Booking", similar_products: "Rover" });
    expect(result.finishReason).toBe("stop");
  });

  it("falls back to the default temperature", async () => {
    const transport: OpenAiFake = new ScriptedTransport([makeOpenAiResponse("Walkies")]);
    const client = new OpenAiClient({ model: "gpt-4o-mini", transport, defaultTemperature: 0.7 });

    const result = await client.complete("Name it");

    expect(result).toEqual({ text: "Walkies", parsed: undefined, finishReason: "stop" });
    expect(transport.bodies[0]?.temperature).toBe(0.7);
    expect(transport.bodies[0]?.response_format).toBeUndefined();
  });

  it("retries retriable statuses before succeeding", async () => {
    const overloaded = new OpenAiApiError(503, { message: "overloaded" }, "Service Unavailable", undefined);
    const transport: OpenAiFake = new ScriptedTransport<ChatCompletionCreateParamsNonStreaming, OpenAI.RequestOptions, ChatCompletion>([overloaded, makeOpenAiResponse("ok")]);
    const client = new OpenAiClient({ model: "gpt-4o-mini", transport, maxRetries: 2 });

    await expect(client.complete("Hi")).resolves.toMatchObject({ text: "ok" });
    expect(transport.bodies).toHaveLength(2);
  });

  it("reports rate limiting once retries run out", async () => {
    const limited = new OpenAiApiError(429, { message: "slow down" }, "Too Many Requests", undefined);
    const transport: OpenAiFake = new ScriptedTransport<ChatCompletionCreateParamsNonStreaming, OpenAI.RequestOptions, ChatCompletion>([limited]);
    const client = new OpenAiClient({ model: "gpt-4o-mini", transport, maxRetries: 1 });

    const error = await client.complete("Hi").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(LlmError);
    expect(error).toMatchObject({
      message: "OpenAI request failed (status 429): slow down Rate limited by OpenAI.",
    });
  });

  it("turns invalid structured output into a user-facing error", async () => {
    const transport: OpenAiFake = new ScriptedTransport([makeOpenAiResponse("not json")]);
    const client = new OpenAiClient({ model: "gpt-4o-mini", transport });

    const error = await client.complete("Refine", { schema: SCOPE_SCHEMA }).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    expect(error).toMatchObject({
      title: "OpenAI structured output invalid.",
      message: "OpenAI returned invalid JSON for structured output.",
      hint: "Retry the request or simplify the schema.",
    });
  });

  it("rejects empty replies", async () => {
    const transport: OpenAiFake = new ScriptedTransport([makeOpenAiResponse("")]);
    const client = new OpenAiClient({ model: "gpt-4o-mini", transport });

    await expect(client.complete("Hi")).rejects.toThrow(
      "OpenAI response did not include assistant content.",
    );
  });

  it("maps authentication failures to a missing key error", async () => {
    const unauthorized = new OpenAiApiError(401, { message: "bad key" }, "Unauthorized", undefined);
    const transport: OpenAiFake = new ScriptedTransport<ChatCompletionCreateParamsNonStreaming, OpenAI.RequestOptions, ChatCompletion>([unauthorized]);
    const client = new OpenAiClient({ model: "gpt-4o-mini", transport });

    const error = await client.complete("Hi").catch((err: unknown) => err);

    expect(error).toMatchObject({
      code: USER_FACING_ERROR_CODES.config,
      message: "OpenAI API key is missing or invalid.",
      hint: "Set OPENAI_API_KEY or pass apiKey to OpenAiClient.",
    });
  });
});

// =============================================================================
// ANTHROPIC
// =============================================================================

describe("AnthropicClient", () => {
  it("forces the structured output tool when a schema is given", async () => {
    const transport: AnthropicFake = new ScriptedTransport([
      makeAnthropicResponse({
        toolInput: { refined_scope: "Booking", similar_products: "Rover" },
        stopReason: "tool_use",
      }),
    ]);
    const client = new AnthropicClient({
      model: "claude-test",
      transport,
      defaultTemperature: 0.6,
      defaultMaxTokens: 2_000,
    });

    const result = await client.complete("Refine the scope", { schema: SCOPE_SCHEMA, timeoutMs: 750 });

    const [body] = transport.bodies;
    expect(body?.tools?.[0]).toMatchObject({
      name: "structured_output",
      input_schema: { type: "object", properties: SCOPE_SCHEMA.properties },
    });
    expect(body?.tool_choice).toEqual({ type: "tool", name: "structured_output" });
    expect(body?.temperature).toBe(0.6);
    expect(body?.max_tokens).toBe(2_000);
    expect(transport.options).toEqual([{ timeout: 750 }]);
    expect(result).toEqual({
      text: '{"refined_scope":"Booking","similar_products":"Rover"}',
      parsed: { refined_scope: "Booking", similar_products: "Rover" },
      finishReason: "tool_use",
    });
  });

  it("returns the joined text blocks without a schema", async () => {
    const transport: AnthropicFake = new ScriptedTransport([makeAnthropicResponse({ text: "  Walkies \n" })]);
    const client = new AnthropicClient({ model: "claude-test", transport });

    await expect(client.complete("Name it")).resolves.toEqual({ text: "Walkies", finishReason: "end_turn" });
  });

  it("reports a missing tool block as invalid structured output", async () => {
    const transport: AnthropicFake = new ScriptedTransport([makeAnthropicResponse({ text: "Sorry" })]);
    const client = new AnthropicClient({ model: "claude-test", transport });

    await expect(client.complete("Refine", { schema: SCOPE_SCHEMA })).rejects.toThrow(
      "Anthropic response did not include a tool_use block for structured output.",
    );
  });

  it("maps authentication failures to a missing key error", async () => {
    const unauthorized = new AnthropicApiError(401, { message: "bad key" }, "Unauthorized", undefined);
    const transport: AnthropicFake = new ScriptedTransport<AnthropicMessageParams, AnthropicRequestOptions, AnthropicMessage>([unauthorized]);
    const client = new AnthropicClient({ model: "claude-test", transport });

    const error = await client.complete("Hi").catch((err: unknown) => err);

    expect(error).toBeInstanceOf(UserFacingError);
    expect(error).toMatchObject({ hint: "Set ANTHROPIC_API_KEY or pass apiKey to AnthropicClient." });
  });
});

// =============================================================================
// HELPERS
// =============================================================================

describe("stripCodeFences", () => {
  it("unwraps fenced replies and leaves plain text alone", () => {
    expect(stripCodeFences('```json\n{"a":1}\n```')).toBe('{"a":1}');
    expect(stripCodeFences("  plain  ")).toBe("plain");
  });
});
