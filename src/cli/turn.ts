import type { ProposalAgent, TurnResult } from "../agent/proposal-agent.js";
import {
  createSessionAgent,
  createSessionLogger,
  openSession,
  type AppContext,
} from "../app/context.js";
import type { ProgressStage } from "../pipeline/pipeline.js";
import { renderProposalMarkdown } from "../tasks/compile-task.js";

import { renderProgressLine } from "./output.js";

export type TurnCommandOptions = {
  sessionId: string;
  debug?: boolean;
  quiet?: boolean;
};

/**
 * Opens the session and its log, runs one turn, prints the reply, and closes the log.
 * A failed pipeline sets a non-zero exit code; the reply is still printed.
 */
export async function runTurnCommand(
  ctx: AppContext,
  opts: TurnCommandOptions,
  turn: (agent: ProposalAgent) => Promise<TurnResult>,
): Promise<TurnResult> {
  const session = await openSession(ctx, opts.sessionId);
  const logger = createSessionLogger(ctx, session.id, opts.debug);

  try {
    const agent = createSessionAgent(ctx, {
      session,
      logger,
      onProgress: opts.quiet ? undefined : printProgress,
    });
    const result = await turn(agent);

    console.log(result.reply);
    const proposal = result.outcome?.run.kind === "full" ? result.outcome.state.final_proposal : null;
    if (proposal) {
      console.log("");
      console.log(renderProposalMarkdown(proposal));
    }

    if (result.outcome && (result.outcome.error || result.outcome.run.status === "failed")) {
      process.exitCode = 1;
    }
    return result;
  } finally {
    logger.close();
  }
}

function printProgress(stage: ProgressStage, message: string): void {
  console.log(renderProgressLine(stage, message));
}
