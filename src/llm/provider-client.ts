import { UserFacingError, USER_FACING_ERROR_CODES } from "../core/errors.js";

import {
  isJsonObject,
  LlmError,
  type LlmClient,
  type LlmCompletionOptions,
  type LlmCompletionResult,
} from "./client.js";

// =============================================================================
// TYPES
// =============================================================================

export type HostedProvider = "openai" | "anthropic";

export type ProviderClientOptions = {
  model: string;
  apiKey?: string;
  baseURL?: string;
  defaultTemperature?: number;
  defaultTimeoutMs?: number;
  maxRetries?: number;
};

export type ProviderRequest = {
  prompt: string;
  temperature: number;
  schema?: Record<string, unknown>;
};

/** What a provider SDK error says, once recognised. `status` is absent for non-HTTP SDK errors. */
export type ProviderFailure = {
  status?: number;
  detail: string;
};

type ProviderInfo = {
  label: string;
  envVar: string;
  clientName: string;
};

const PROVIDERS: Record<HostedProvider, ProviderInfo> = {
  openai: { label: "OpenAI", envVar: "OPENAI_API_KEY", clientName: "OpenAiClient" },
  anthropic: { label: "Anthropic", envVar: "ANTHROPIC_API_KEY", clientName: "AnthropicClient" },
};

// =============================================================================
// CONSTANTS
// =============================================================================

const DEFAULT_TEMPERATURE = 0.2;
const DEFAULT_TIMEOUT_MS = 60_000;
const DEFAULT_MAX_RETRIES = 3;

const RETRIABLE_STATUS_CODES: ReadonlySet<number> = new Set([
  408, 409, 425, 429, 500, 502, 503, 504,
]);

// =============================================================================
// BASE CLIENT
// =============================================================================

/**
 * Shared request loop for hosted providers: temperature and timeout defaults,
 * retries with exponential backoff on transient failures, and error mapping.
 * Subclasses only translate between the prompt and their SDK's request and reply.
 */
export abstract class ProviderClient<TBody, TResponse> implements LlmClient {
  protected readonly model: string;
  private readonly defaultTemperature: number;
  private readonly defaultTimeoutMs: number;
  private readonly maxRetries: number;

  protected constructor(
    protected readonly provider: HostedProvider,
    options: ProviderClientOptions,
  ) {
    this.model = options.model;
    this.defaultTemperature = options.defaultTemperature ?? DEFAULT_TEMPERATURE;
    this.defaultTimeoutMs = options.defaultTimeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.maxRetries = Math.max(1, options.maxRetries ?? DEFAULT_MAX_RETRIES);
  }

  async complete<TParsed = unknown>(
    prompt: string,
    options: LlmCompletionOptions = {},
  ): Promise<LlmCompletionResult<TParsed>> {
    if (options.schema !== undefined && !isJsonObject(options.schema)) {
      throw new LlmError("Structured output schema must be a plain JSON object.");
    }

    const body = this.buildBody({
      prompt,
      temperature: options.temperature ?? this.defaultTemperature,
      schema: options.schema,
    });
    const timeoutMs = options.timeoutMs ?? this.defaultTimeoutMs;

    const response = await this.withRetries(() => this.send(body, timeoutMs || undefined));
    return this.readResponse<TParsed>(response, options.schema !== undefined);
  }

  protected abstract buildBody(request: ProviderRequest): TBody;

  protected abstract send(body: TBody, timeoutMs: number | undefined): Promise<TResponse>;

  protected abstract readResponse<TParsed>(
    response: TResponse,
    structured: boolean,
  ): LlmCompletionResult<TParsed>;

  /** Recognises the SDK's own error classes; anything else is treated as a plain Error. */
  protected abstract describeFailure(error: unknown): ProviderFailure | null;

  // =============================================================================
  // ERROR FACTORIES
  // =============================================================================

  protected get label(): string {
    return PROVIDERS[this.provider].label;
  }

  protected emptyResponseError(response: TResponse): UserFacingError {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.task,
      title: `${this.label} response invalid.`,
      message: `${this.label} response did not include assistant content.`,
      hint: "Retry the request or check the provider status.",
      cause: response,
    });
  }

  protected structuredOutputError(message: string, cause?: unknown): UserFacingError {
    return new UserFacingError({
      code: USER_FACING_ERROR_CODES.task,
      title: `${this.label} structured output invalid.`,
      message,
      hint: "Retry the request or simplify the schema.",
      cause,
    });
  }

  // =============================================================================
  // INTERNALS
  // =============================================================================

  private async withRetries<T>(send: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await send();
      } catch (err) {
        if (attempt >= this.maxRetries || !this.isRetryable(err)) {
          throw this.wrapError(err);
        }
        await delay(retryDelayMs(attempt));
      }
    }
  }

  private isRetryable(error: unknown): boolean {
    const failure = this.describeFailure(error);
    if (failure) {
      return failure.status !== undefined && RETRIABLE_STATUS_CODES.has(failure.status);
    }
    if (error instanceof Error) {
      return error.message.toLowerCase().includes("timeout") || error.message.includes("ETIMEDOUT");
    }
    return false;
  }

  private wrapError(error: unknown): Error {
    const failure = this.describeFailure(error);

    if (failure?.status === 401 || failure?.status === 403) {
      return createMissingApiKeyError(this.provider, error);
    }
    if (failure && failure.status !== undefined) {
      const suffix = failure.status === 429 ? ` Rate limited by ${this.label}.` : "";
      return new LlmError(
        `${this.label} request failed (status ${failure.status}): ${failure.detail}${suffix}`,
        error,
      );
    }
    if (failure) {
      return new LlmError(`${this.label} request failed: ${failure.detail}`, error);
    }
    if (error instanceof Error) {
      return new LlmError(error.message, error);
    }
    return new LlmError(`${this.label} request failed due to an unknown error.`, error);
  }
}

// =============================================================================
// HELPERS
// =============================================================================

export function createMissingApiKeyError(provider: HostedProvider, cause?: unknown): UserFacingError {
  const info = PROVIDERS[provider];
  return new UserFacingError({
    code: USER_FACING_ERROR_CODES.config,
    title: `${info.label} API key missing.`,
    message: `${info.label} API key is missing or invalid.`,
    hint: `Set ${info.envVar} or pass apiKey to ${info.clientName}.`,
    cause,
  });
}

export function resolveApiKey(provider: HostedProvider, explicit: string | undefined): string {
  const apiKey = explicit ?? process.env[PROVIDERS[provider].envVar];
  if (!apiKey) {
    throw createMissingApiKeyError(provider);
  }
  return apiKey;
}

function retryDelayMs(attempt: number): number {
  return 250 * 2 ** (Math.min(attempt, 5) - 1);
}

function delay(durationMs: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, durationMs));
}
