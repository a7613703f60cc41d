#!/usr/bin/env node
import { Command } from "commander";
import { registerDecideCommand } from "./command/decide";
import { registerRunCommand } from "./command/run";
import { registerStatusCommand } from "./command/status";
import { getErrorMessage } from "./core/errors";
import { logger } from "./core/logger";

const program = new Command();

program
  .name("integrator")
  .description("Drive analysis, implementation, research and diff agents over a repository.")
  .configureHelp({
    sortSubcommands: true,
    subcommandTerm: (cmd) => cmd.name(),
  });

registerDecideCommand(program);
registerRunCommand(program);
registerStatusCommand(program);

program.parseAsync().catch((error: unknown) => {
  logger.error(getErrorMessage(error), { data: error });
  process.exitCode = 1;
});
