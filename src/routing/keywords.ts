import path from "node:path";

import fse from "fs-extra";
import { z } from "zod";

import { formatIssues } from "../core/config-loader.js";
import { ConfigError } from "../core/errors.js";
import { resolveTemplatesDir } from "../core/prompts.js";
import { CONTENT_TASK_IDS, type ContentTaskId } from "../tasks/registry.js";

// =============================================================================
// SCHEMA
// =============================================================================

const PhraseListSchema = z.array(z.string().trim().min(1));

const TaskKeywordsSchema = z
  .object({
    generate_triggers: PhraseListSchema,
    exact_generate_triggers: PhraseListSchema.default([]),
    greetings: PhraseListSchema,
    tasks: z.record(z.string(), PhraseListSchema),
  })
  .strict();

export type RoutingKeywords = {
  generateTriggers: readonly string[];
  exactGenerateTriggers: readonly string[];
  greetings: readonly string[];
  tasks: ReadonlyMap<ContentTaskId, readonly string[]>;
};

// =============================================================================
// LOADING
// =============================================================================

let cached: Promise<RoutingKeywords> | null = null;

export function resolveKeywordsPath(): string {
  return path.join(resolveTemplatesDir(), "routing", "task-keywords.json");
}

export function loadRoutingKeywords(filePath = resolveKeywordsPath()): Promise<RoutingKeywords> {
  if (filePath !== resolveKeywordsPath()) {
    return readRoutingKeywords(filePath);
  }

  if (!cached) {
    cached = readRoutingKeywords(filePath).catch((err: unknown) => {
      cached = null;
      throw err;
    });
  }
  return cached;
}

async function readRoutingKeywords(filePath: string): Promise<RoutingKeywords> {
  const raw: unknown = await fse.readJson(filePath);
  return parseRoutingKeywords(raw, filePath);
}

export function parseRoutingKeywords(raw: unknown, sourceLabel: string): RoutingKeywords {
  const parsed = TaskKeywordsSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError(
      `Invalid routing keywords at ${sourceLabel}:\n${formatIssues(parsed.error.issues)}`,
      parsed.error,
    );
  }

  const tasks = new Map<ContentTaskId, readonly string[]>();
  for (const [taskId, phrases] of Object.entries(parsed.data.tasks)) {
    const contentId = CONTENT_TASK_IDS.find((id) => id === taskId);
    if (!contentId) {
      throw new ConfigError(`Routing keywords at ${sourceLabel} name unknown task "${taskId}".`);
    }
    tasks.set(contentId, phrases.map(normalizePhrase));
  }

  return {
    generateTriggers: parsed.data.generate_triggers.map(normalizePhrase),
    exactGenerateTriggers: parsed.data.exact_generate_triggers.map(normalizePhrase),
    greetings: parsed.data.greetings.map(normalizePhrase),
    tasks,
  };
}

// =============================================================================
// MATCHING
// =============================================================================

export function normalizeUtterance(text: string): string {
  return text.toLowerCase().replace(/[’‘]/g, "'").replace(/\s+/g, " ").trim();
}

/** Word-bounded match; a trailing plural "s" or "es" on the last word still counts. */
export function containsPhrase(utterance: string, phrase: string): boolean {
  const pattern = new RegExp(`(^|[^a-z0-9])${escapeRegExp(phrase)}(?:s|es)?(?=$|[^a-z0-9])`);
  return pattern.test(normalizeUtterance(utterance));
}

export function isGenerationRequest(utterance: string, keywords: RoutingKeywords): boolean {
  const stripped = stripPunctuation(normalizeUtterance(utterance));
  if (keywords.exactGenerateTriggers.includes(stripped)) return true;

  return keywords.generateTriggers.some((trigger) => containsPhrase(utterance, trigger));
}

/** True only when the utterance is nothing but greeting words and punctuation. */
export function isBareGreeting(utterance: string, keywords: RoutingKeywords): boolean {
  const stripped = stripPunctuation(normalizeUtterance(utterance));
  if (!stripped) return false;

  const words = stripped.split(" ");
  const greetings = keywords.greetings.map((greeting) => greeting.split(" "));

  let index = 0;
  while (index < words.length) {
    const match = greetings.find((parts) =>
      parts.every((part, offset) => words[index + offset] === part),
    );
    if (!match) return false;
    index += match.length;
  }
  return true;
}

export function matchTaskKeywords(utterance: string, keywords: RoutingKeywords): ContentTaskId[] {
  const matched: ContentTaskId[] = [];
  for (const taskId of CONTENT_TASK_IDS) {
    const phrases = keywords.tasks.get(taskId) ?? [];
    if (phrases.some((phrase) => containsPhrase(utterance, phrase))) {
      matched.push(taskId);
    }
  }
  return matched;
}

// =============================================================================
// INTERNALS
// =============================================================================

function normalizePhrase(phrase: string): string {
  return normalizeUtterance(phrase);
}

function stripPunctuation(text: string): string {
  return text
    .replace(/[^a-z0-9' ]+/g, " ")
    .replace(/\s+/g, " ")
    .trim();
}

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
