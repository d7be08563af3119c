/**
 * AppContext builds the process-wide services from a validated config.
 * Purpose: one worker pool, one task graph, and the LLM clients, shared by every turn.
 * Assumptions: config has already been validated by the loader.
 * Usage: const ctx = createAppContext({ config }); const agent = createSessionAgent(ctx, { session });
 */

import path from "node:path";

import { ProposalAgent } from "../agent/proposal-agent.js";
import { resolveRoutingLlmConfig, type ProjectConfig } from "../core/config.js";
import { JsonlLogger, NOOP_EVENT_LOGGER, type EventLogger } from "../core/logger.js";
import { slugify } from "../core/utils.js";
import type { LlmClient } from "../llm/client.js";
import { createLlmClient } from "../llm/factory.js";
import { DependencyGraph } from "../pipeline/graph.js";
import type { ProgressObserver } from "../pipeline/pipeline.js";
import { BoundedWorkerPool, type WorkerPool } from "../pipeline/worker-pool.js";
import { RoutingClassifier } from "../routing/classifier.js";
import { FileSession } from "../session/file-session.js";
import type { SessionPort } from "../session/session.js";
import { createTaskRegistry } from "../tasks/index.js";
import { createTaskRunner, type TaskRunner } from "../tasks/task.js";

// =============================================================================
// TYPES
// =============================================================================

export type AppContext = {
  config: ProjectConfig;
  configPath: string | null;
  graph: DependencyGraph;
  pool: WorkerPool;
  llm: LlmClient;
  routingLlm: LlmClient;
  runTask: TaskRunner;
};

export type CreateAppContextInput = {
  config: ProjectConfig;
  configPath?: string | null;
  llm?: LlmClient;
  routingLlm?: LlmClient;
};

export type SessionAgentOptions = {
  session: SessionPort;
  logger?: EventLogger;
  onProgress?: ProgressObserver;
};

// =============================================================================
// PUBLIC API
// =============================================================================

export function createAppContext(input: CreateAppContextInput): AppContext {
  const { config } = input;

  const graph = new DependencyGraph();
  graph.assertValid();

  const llm = input.llm ?? createLlmClient(config.llm);
  const routingLlm = input.routingLlm ?? createLlmClient(resolveRoutingLlmConfig(config));

  return {
    config,
    configPath: input.configPath ?? null,
    graph,
    pool: new BoundedWorkerPool(config.pipeline.max_parallel),
    llm,
    routingLlm,
    runTask: createTaskRunner(createTaskRegistry(llm)),
  };
}

export function createSessionAgent(ctx: AppContext, options: SessionAgentOptions): ProposalAgent {
  const logger = options.logger ?? NOOP_EVENT_LOGGER;

  return new ProposalAgent({
    session: options.session,
    classifier: new RoutingClassifier({ llm: ctx.routingLlm, config: ctx.config, logger }),
    llm: ctx.llm,
    runTask: ctx.runTask,
    pool: ctx.pool,
    graph: ctx.graph,
    config: ctx.config,
    logger,
    onProgress: options.onProgress,
  });
}

export function openSession(ctx: AppContext, sessionId: string): Promise<FileSession> {
  return FileSession.open(ctx.config.sessions_dir, sessionId);
}

export function createSessionLogger(ctx: AppContext, sessionId: string, debug = false): JsonlLogger {
  const filePath = path.join(ctx.config.logs_dir, `${slugify(sessionId)}.jsonl`);
  return new JsonlLogger(filePath, { sessionId }, { debug });
}
