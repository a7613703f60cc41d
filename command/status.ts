import type { Command } from "commander";
import { loadConfig } from "../core/config";
import { getErrorMessage } from "../core/errors";
import { logger } from "../core/logger";
import { readStateFile } from "../orchestrator/artifacts";
import { summarizeState } from "../orchestrator/pipeline-state";
import { resolveRunDir } from "./shared";

export const registerStatusCommand = (program: Command) => {
  program
    .command("status [runId]")
    .description("Show the checkpointed state of the latest run or of a run id.")
    .action(async (runId: string | undefined) => {
      const config = loadConfig();
      const runDir = await resolveRunDir(config.runsRoot, runId);

      try {
        const state = await readStateFile(runDir);
        console.log(
          JSON.stringify(
            { ...summarizeState(state), run_dir: runDir, history: state.history },
            null,
            2
          )
        );
      } catch (error) {
        logger.warn(`No readable state for ${runDir}: ${getErrorMessage(error)}`);
        process.exitCode = 1;
      }
    });
};
