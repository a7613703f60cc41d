import { randomUUID } from "node:crypto";
import { resolve } from "node:path";
import type { Command } from "commander";
import { loadConfig } from "../core/config";
import { logger } from "../core/logger";
import { resolveInstructionsInput } from "../core/instructions-input";
import { createAgentSuite } from "../orchestrator/agents";
import {
  createCheckpointWriter,
  createRunContext,
  writeDiffPatch,
} from "../orchestrator/artifacts";
import { runPipeline } from "../orchestrator/driver";
import { cleanupWorkspace, cloneRepo } from "../orchestrator/git";
import type { PipelineOutcome } from "../orchestrator/pipeline.types";
import { applyModifiedFiles, loadRepoSnapshot } from "../orchestrator/workspace";
import { parsePositiveInt } from "./shared";

interface RunOptions {
  path: string;
  repo?: string;
  timeout?: string;
  apply?: boolean;
}

const summarizeOutcome = (result: PipelineOutcome) => ({
  run_id: result.state.run_id,
  outcome: result.outcome,
  current_stage: result.state.current_stage,
  retry_count: result.state.retry_count,
  last_error_message: result.state.last_error_message,
});

/**
 * One controller for both the timeout and Ctrl+C. `dispose` must run once the
 * pipeline settles so the process can exit.
 */
const createRunSignal = (timeoutMs?: number) => {
  const controller = new AbortController();
  const onInterrupt = () => {
    controller.abort(new Error("interrupted by user."));
  };
  const timer =
    timeoutMs === undefined
      ? undefined
      : setTimeout(() => {
          controller.abort(new Error(`timed out after ${timeoutMs}ms.`));
        }, timeoutMs);

  process.once("SIGINT", onInterrupt);

  return {
    signal: controller.signal,
    dispose: () => {
      if (timer) {
        clearTimeout(timer);
      }
      process.off("SIGINT", onInterrupt);
    },
  };
};

export const registerRunCommand = (program: Command) => {
  program
    .command("run <instructions>")
    .description(
      "Run analysis, implementation and diff against a repository, researching fixes on failure."
    )
    .option("-p, --path <dir>", "Local repository to work on.", ".")
    .option("--repo <url>", "Git repository URL to clone shallowly instead.")
    .option("-t, --timeout <ms>", "Cancel the run after this many milliseconds.")
    .option("--apply", "Write the modified files into the repository on success.")
    .action(async (input: string, options: RunOptions) => {
      const config = loadConfig();
      const timeoutMs = parsePositiveInt(options.timeout, "--timeout");
      const resolved = await resolveInstructionsInput(input);
      if (resolved.source === "file" && resolved.filePath) {
        logger.info(`Loaded instructions from ${resolved.filePath}`);
      }

      const agents = createAgentSuite(config);
      const runId = randomUUID();
      const context = await createRunContext(config.runsRoot, {
        run_id: runId,
        instructions: resolved.instructions,
        created_at: new Date().toISOString(),
      });

      const clonedDir = options.repo
        ? await cloneRepo(options.repo, runId)
        : undefined;
      const repoRoot = clonedDir ?? resolve(options.path);
      const runSignal = createRunSignal(timeoutMs);

      try {
        logger.info(`Step: run - loading repository ${repoRoot}`);
        const repoSnapshot = await loadRepoSnapshot(repoRoot, {
          maxBytes: config.maxSnapshotBytes,
        });

        const result = await runPipeline({
          agents,
          repoSnapshot,
          instructions: resolved.instructions,
          runId,
          signal: runSignal.signal,
          logTailLines: config.logTailLines,
          onCheckpoint: createCheckpointWriter(context.run_dir),
        });

        const diff = result.state.results.diff;
        if (diff) {
          await writeDiffPatch(context.run_dir, diff.diff);
        }

        const implementation = result.state.results.implementation;
        if (options.apply && result.outcome === "done" && implementation) {
          await applyModifiedFiles(repoRoot, implementation.modified_files);
          logger.success(
            `Applied ${implementation.modified_files.length} file(s) to ${repoRoot}`
          );
        }

        console.log(JSON.stringify(summarizeOutcome(result), null, 2));
        process.exitCode = result.outcome === "done" ? 0 : 1;
      } finally {
        runSignal.dispose();
        if (clonedDir) {
          await cleanupWorkspace(clonedDir);
        }
      }
    });
};
