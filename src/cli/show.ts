import { openSession, type AppContext } from "../app/context.js";
import { CONTENT_TASK_IDS, SINK_TASK_ID, TASK_DEFINITIONS } from "../tasks/registry.js";

export type ShowCommandOptions = {
  sessionId: string;
  json?: boolean;
};

export async function showCommand(ctx: AppContext, opts: ShowCommandOptions): Promise<void> {
  const session = await openSession(ctx, opts.sessionId);

  if (opts.json) {
    console.log(JSON.stringify(session.toJSON(), null, 2));
    return;
  }

  console.log(`Session: ${session.id}`);
  console.log(`Title: ${session.documentTitle ?? "(none)"}`);
  console.log(`Idea: ${session.initialIdea ?? "(none)"}`);
  console.log(`Generated: ${session.isDocumentGenerated ? "yes" : "no"}`);
  console.log(`Stage: ${session.currentStage ?? "(none)"}`);

  const scoped = session.sessionScopedState;
  if (scoped.budget) console.log(`Budget: ${scoped.budget}`);
  if (scoped.timeline) console.log(`Timeline: ${scoped.timeline}`);
  for (const [role, rate] of Object.entries(scoped.rates)) {
    console.log(`Rate override: ${role} = ${rate}/hour`);
  }

  console.log("");
  for (const taskId of [...CONTENT_TASK_IDS, SINK_TASK_ID]) {
    const stored = session.getPriorTaskOutput(taskId);
    const status = stored ? `updated ${stored.updatedAt} (${stored.reason})` : "not generated";
    console.log(`${TASK_DEFINITIONS[taskId].displayName}: ${status}`);
  }

  console.log("");
  console.log(`Messages: ${session.getConversationHistory().length}`);
}
