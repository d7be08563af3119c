import { Command } from "commander";

import { createAppContext, type AppContext } from "../app/context.js";

import { loadConfigForCli } from "./config.js";
import { planCommand } from "./plan.js";
import { showCommand } from "./show.js";
import { runTurnCommand } from "./turn.js";

const DEFAULT_SESSION_ID = "default";

export function buildCli(): Command {
  const program = new Command();

  const resolveContext = (): AppContext => {
    const globals = program.opts<{ config?: string }>();
    const { config, configPath } = loadConfigForCli({ explicitConfigPath: globals.config });
    return createAppContext({ config, configPath });
  };

  const isDebug = (): boolean => Boolean(program.opts<{ debug?: boolean }>().debug);

  program
    .name("proposal-forge")
    .description("Build software project proposals from a conversation")
    .version("0.1.0")
    .option("--config <path>", "Project config path (default: ./proposal-forge.yaml or built-in defaults)")
    .option("--debug", "Show stack traces and write debug details to the event log", false);

  program
    .command("generate")
    .description("Generate every section of the proposal")
    .option("--session <id>", "Session id", DEFAULT_SESSION_ID)
    .option("--idea <text>", "Project idea (stored on the session)")
    .option("--quiet", "Hide progress output", false)
    .action(async (opts: { session: string; idea?: string; quiet: boolean }) => {
      await runTurnCommand(
        resolveContext(),
        { sessionId: opts.session, debug: isDebug(), quiet: opts.quiet },
        (agent) => agent.generate(opts.idea),
      );
    });

  program
    .command("chat")
    .description("Send one message; the proposal is updated when the message asks for changes")
    .argument("<message...>", "Message text")
    .option("--session <id>", "Session id", DEFAULT_SESSION_ID)
    .option("--quiet", "Hide progress output", false)
    .action(async (message: string[], opts: { session: string; quiet: boolean }) => {
      await runTurnCommand(
        resolveContext(),
        { sessionId: opts.session, debug: isDebug(), quiet: opts.quiet },
        (agent) => agent.handleTurn(message.join(" ")),
      );
    });

  program
    .command("plan")
    .description("Print the tasks and levels a request would run")
    .option("--tasks <ids>", "Comma-separated task ids to edit (default: full generation)", (v: string) =>
      v
        .split(",")
        .map((s) => s.trim())
        .filter(Boolean),
    )
    .option("--json", "Print JSON", false)
    .action((opts: { tasks?: string[]; json: boolean }) => {
      planCommand(resolveContext(), { tasks: opts.tasks, json: opts.json });
    });

  program
    .command("show")
    .description("Show a session's state and stored sections")
    .option("--session <id>", "Session id", DEFAULT_SESSION_ID)
    .option("--json", "Print the raw session document", false)
    .action(async (opts: { session: string; json: boolean }) => {
      await showCommand(resolveContext(), { sessionId: opts.session, json: opts.json });
    });

  return program;
}
