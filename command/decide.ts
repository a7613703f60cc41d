import type { Command } from "commander";
import { decideNextAction, isPipelineStage } from "../orchestrator/decide";

interface DecideOptions {
  retryCount?: string;
}

interface CommandIO {
  out: (line: string) => void;
  err: (line: string) => void;
}

const consoleIO: CommandIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const parseRetryCount = (raw: string | undefined): number | null => {
  if (raw === undefined) {
    return 0;
  }
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed)) {
    return null;
  }
  return Number.parseInt(trimmed, 10);
};

/** Returns the process exit code. */
const runDecideCommand = (
  stage: string,
  retryRaw: string | undefined,
  io: CommandIO = consoleIO
): number => {
  if (!isPipelineStage(stage)) {
    io.err(`Unrecognized stage: ${stage}`);
    return 1;
  }

  const retryCount = parseRetryCount(retryRaw);
  if (retryCount === null) {
    io.err(
      `Invalid --retry-count value "${retryRaw ?? ""}". Expected a non-negative integer.`
    );
    return 1;
  }

  io.out(decideNextAction({ current_stage: stage, retry_count: retryCount }));
  return 0;
};

export const registerDecideCommand = (program: Command) => {
  program
    .command("decide <stage>")
    .description("Print the next action for a stage and retry count.")
    .option("-r, --retry-count <n>", "Retry count of the run.", "0")
    .action((stage: string, options: DecideOptions) => {
      process.exitCode = runDecideCommand(stage, options.retryCount);
    });
};

export { consoleIO, parseRetryCount, runDecideCommand };
export type { CommandIO };
