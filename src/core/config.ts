import { z } from "zod";

// =============================================================================
// SCHEMA
// =============================================================================

export const LLM_PROVIDERS = ["openai", "anthropic", "mock"] as const;

export const DEFAULT_RATES: Record<string, number> = {
  senior_engineer: 35,
  mid_engineer: 25,
  junior_engineer: 18,
  ui_ux_designer: 25,
  project_manager: 25,
  devops_engineer: 30,
  ai_engineer: 30,
};

const LlmSchema = z
  .object({
    provider: z.enum(LLM_PROVIDERS).default("openai"),
    model: z.string().min(1).default("gpt-4o-mini"),
    temperature: z.number().min(0).max(2).optional(),
    timeout_ms: z.number().int().positive().optional(),
    max_retries: z.number().int().positive().optional(),
  })
  .strict();

// Routing inherits the llm block; only overridden fields need to be set.
const RoutingSchema = z
  .object({
    provider: z.enum(LLM_PROVIDERS).optional(),
    model: z.string().min(1).optional(),
    temperature: z.number().min(0).max(2).default(0),
    history_window: z.number().int().positive().default(5),
  })
  .strict();

const PipelineSchema = z
  .object({
    max_parallel: z.number().int().positive().default(4),
    // Task ids stay strings here; unknown ids fail when a pipeline is built.
    enabled_tasks: z.array(z.string().min(1)).optional(),
  })
  .strict();

const SettingsSchema = z
  .object({
    currency: z.string().min(1).default("USD"),
    rates: z.record(z.string(), z.number().nonnegative()).default(DEFAULT_RATES),
    instructions: z.string().default(""),
  })
  .strict();

export const ProjectConfigSchema = z
  .object({
    llm: LlmSchema.default({}),
    routing: RoutingSchema.default({}),
    pipeline: PipelineSchema.default({}),
    settings: SettingsSchema.default({}),
    sessions_dir: z.string().min(1).default(".proposal-forge/sessions"),
    logs_dir: z.string().min(1).default(".proposal-forge/logs"),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
export type LlmConfig = ProjectConfig["llm"];
export type LlmProviderName = LlmConfig["provider"];
export type SettingsConfig = ProjectConfig["settings"];

export function defaultProjectConfig(): ProjectConfig {
  return ProjectConfigSchema.parse({});
}

export function resolveRoutingLlmConfig(config: ProjectConfig): LlmConfig {
  return {
    ...config.llm,
    provider: config.routing.provider ?? config.llm.provider,
    model: config.routing.model ?? config.llm.model,
    temperature: config.routing.temperature,
  };
}
