import type { RepoSnapshot } from "../agents/shared/agent.types";
import type { ImplementationResult } from "../agents/implementation/implementation.types";
import { selectBestSolution } from "../agents/research/research.validators";
import {
  CancelledError,
  toPipelineFailure,
} from "../core/errors";
import type { AgentName, PipelineFailure } from "../core/errors";
import { logger } from "../core/logger";
import {
  RETRY_CEILING,
  decideNextAction,
  isTerminalAction,
} from "./decide";
import {
  appendRecoveryNote,
  createPipelineState,
  tailLogs,
} from "./pipeline-state";
import type {
  AgentAction,
  AgentSuite,
  PipelineAction,
  PipelineOutcome,
  PipelineStage,
  PipelineState,
  TerminalAction,
} from "./pipeline.types";

const DEFAULT_LOG_TAIL_LINES = 10;
const SCOPE = "driver";

interface RunPipelineOptions {
  agents: AgentSuite;
  repoSnapshot: RepoSnapshot;
  instructions: string;
  runId?: string;
  /** Resume from a checkpoint instead of starting at `start`. */
  state?: PipelineState;
  signal?: AbortSignal;
  logTailLines?: number;
  onCheckpoint?: (state: PipelineState) => Promise<void> | void;
}

type AgentOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; failure: PipelineFailure };

/**
 * Settles with the agent's answer or rejects as soon as the signal aborts,
 * whichever comes first. An agent that ignores the signal is abandoned.
 */
const raceWithSignal = <T>(promise: Promise<T>, signal?: AbortSignal) => {
  if (!signal) {
    return promise;
  }
  return new Promise<T>((resolveRace, rejectRace) => {
    const onAbort = () => rejectRace(new CancelledError(signal.reason));
    if (signal.aborted) {
      onAbort();
    }
    signal.addEventListener("abort", onAbort, { once: true });
    void promise.then(resolveRace, rejectRace).finally(() => {
      signal.removeEventListener("abort", onAbort);
    });
  });
};

const invokeAgent = async <T>(
  agent: AgentName,
  call: (signal?: AbortSignal) => Promise<T>,
  signal?: AbortSignal
): Promise<AgentOutcome<T>> => {
  try {
    const value = await raceWithSignal(call(signal), signal);
    return { ok: true, value };
  } catch (error) {
    if (signal?.aborted) {
      return {
        ok: false,
        failure: {
          kind: "cancelled",
          message: new CancelledError(signal.reason).message,
          agent,
        },
      };
    }
    return { ok: false, failure: toPipelineFailure(error, agent) };
  }
};

const overlayModifiedFiles = (
  snapshot: RepoSnapshot,
  result: ImplementationResult
): RepoSnapshot => {
  const modified: RepoSnapshot = { ...snapshot };
  result.modified_files.forEach((file) => {
    modified[file.path] = file.content;
  });
  return modified;
};

/**
 * Runs the pipeline until the decision function answers `done` or
 * `report_failure`. The driver is the only writer of the state; agent failures
 * end up in the returned outcome, never as a rejection.
 */
const runPipeline = async (
  options: RunPipelineOptions
): Promise<PipelineOutcome> => {
  const { agents, repoSnapshot, signal } = options;
  const logTailLines = options.logTailLines ?? DEFAULT_LOG_TAIL_LINES;
  const state: PipelineState = options.state
    ? structuredClone(options.state)
    : createPipelineState({
        instructions: options.instructions,
        runId: options.runId,
      });

  const transition = async (action: PipelineAction, to: PipelineStage) => {
    const at = new Date().toISOString();
    state.history.push({
      action,
      from: state.current_stage,
      to,
      retry_count: state.retry_count,
      at,
    });
    state.current_stage = to;
    state.updated_at = at;
    await options.onCheckpoint?.(state);
  };

  const fail = async (
    action: PipelineAction,
    failure: PipelineFailure
  ): Promise<PipelineOutcome> => {
    state.last_error_message = failure.message;
    logger.error(`Step: ${action} - ${failure.message}`, { scope: SCOPE });
    await transition(action, "report_failure");
    return { outcome: "report_failure", state, error: failure };
  };

  const finish = async (action: TerminalAction): Promise<PipelineOutcome> => {
    const stage = state.current_stage;
    if (stage !== action) {
      await transition(action, action);
    }
    if (action === "done") {
      logger.success(`Run ${state.run_id} completed.`, { scope: SCOPE });
      return { outcome: "done", state };
    }

    let error: PipelineFailure;
    if (stage === "implementation_failed") {
      error = {
        kind: "retry_exhausted",
        message: `Retry ceiling of ${RETRY_CEILING} reached. Last error: ${
          state.last_error_message ?? "none recorded."
        }`,
      };
    } else if (stage === "report_failure") {
      error = {
        kind: "agent_call",
        message: state.last_error_message ?? "Run already reported as failed.",
      };
    } else {
      error = { kind: "unexpected_stage", message: `Unrecognized stage: ${stage}` };
      state.last_error_message = error.message;
    }
    logger.error(`Run ${state.run_id} failed: ${error.message}`, {
      scope: SCOPE,
    });
    return { outcome: "report_failure", state, error };
  };

  const recordImplementationFailure = async (
    result: ImplementationResult,
    failure: PipelineFailure
  ) => {
    state.results.implementation = result;
    state.last_error_message = failure.message;
    state.execution_logs.push(...result.execution_logs);
    logger.warn(`Step: implementation - failed: ${failure.message}`, {
      scope: SCOPE,
    });
    await transition("implementation", "implementation_failed");
  };

  const runAnalysis = async (): Promise<PipelineOutcome | undefined> => {
    const outcome = await invokeAgent(
      "analysis",
      (callSignal) =>
        agents.analysis.analyze(
          {
            repo_snapshot: repoSnapshot,
            instructions: state.original_instructions,
          },
          callSignal
        ),
      signal
    );
    if (!outcome.ok) {
      return fail("analysis", outcome.failure);
    }

    state.results.analysis = outcome.value;
    logger.info(
      `Step: analysis - planned ${outcome.value.files.length} file(s)`,
      { scope: SCOPE }
    );
    await transition("analysis", "analysis_complete");
    return undefined;
  };

  const runImplementation = async (): Promise<PipelineOutcome | undefined> => {
    const analysis = state.results.analysis;
    if (!analysis) {
      return fail("implementation", {
        kind: "unexpected_stage",
        message: "Implementation requested before analysis completed.",
      });
    }

    const outcome = await invokeAgent(
      "implementation",
      (callSignal) =>
        agents.implementation.implement(
          {
            analysis,
            repo_snapshot: repoSnapshot,
            instructions: state.accumulated_instructions,
          },
          callSignal
        ),
      signal
    );

    if (!outcome.ok) {
      if (outcome.failure.kind === "cancelled") {
        return fail("implementation", outcome.failure);
      }
      await recordImplementationFailure(
        {
          modified_files: [],
          success: false,
          error_message: outcome.failure.message,
          execution_logs: [],
        },
        outcome.failure
      );
      return undefined;
    }

    const result = outcome.value;
    if (!result.success) {
      await recordImplementationFailure(result, {
        kind: "semantic_failure",
        message:
          result.error_message ?? "Implementation reported failure without a message.",
        agent: "implementation",
      });
      return undefined;
    }

    state.results.implementation = result;
    state.execution_logs.push(...result.execution_logs);
    logger.info(
      `Step: implementation - changed ${result.modified_files.length} file(s)`,
      { scope: SCOPE }
    );
    await transition("implementation", "implementation_complete");
    return undefined;
  };

  const runResearch = async (): Promise<PipelineOutcome | undefined> => {
    const retryIndex = state.retry_count + 1;
    const outcome = await invokeAgent(
      "research",
      (callSignal) =>
        agents.research.research(
          {
            error_message: state.last_error_message ?? "No error message recorded.",
            execution_logs_tail: tailLogs(state.execution_logs, logTailLines),
            original_context: {
              instructions: state.original_instructions,
              planned_files:
                state.results.analysis?.files.map((file) => file.path) ?? [],
              retry_index: retryIndex,
            },
          },
          callSignal
        ),
      signal
    );
    if (!outcome.ok) {
      return fail("research", outcome.failure);
    }

    state.results.research = outcome.value;
    const best = selectBestSolution(outcome.value);
    if (best) {
      appendRecoveryNote(state, {
        retry_index: retryIndex,
        description: best.description,
        code_snippet: best.code_snippet,
      });
      logger.info(`Step: research - recovery note added for retry ${retryIndex}`, {
        scope: SCOPE,
      });
    } else {
      logger.warn(
        `Step: research - no usable recommendation; retry ${retryIndex} keeps the current instructions`,
        { scope: SCOPE }
      );
    }

    state.retry_count = retryIndex;
    await transition("research", "implementation_retry");
    return undefined;
  };

  const runDiff = async (): Promise<PipelineOutcome | undefined> => {
    const implementation = state.results.implementation;
    if (!implementation || !implementation.success) {
      return fail("diff", {
        kind: "unexpected_stage",
        message: "Diff requested without a successful implementation.",
      });
    }

    const outcome = await invokeAgent(
      "diff",
      (callSignal) =>
        agents.diff.diff(
          {
            original_files: repoSnapshot,
            modified_files: overlayModifiedFiles(repoSnapshot, implementation),
          },
          callSignal
        ),
      signal
    );
    if (!outcome.ok) {
      return fail("diff", outcome.failure);
    }

    state.results.diff = outcome.value;
    logger.info(
      `Step: diff - ${outcome.value.stats.filesChanged.length} file(s), +${outcome.value.stats.addedLines}/-${outcome.value.stats.removedLines}`,
      { scope: SCOPE }
    );
    await transition("diff", "diff_complete");
    return undefined;
  };

  const steps: Record<AgentAction, () => Promise<PipelineOutcome | undefined>> = {
    analysis: runAnalysis,
    implementation: runImplementation,
    research: runResearch,
    diff: runDiff,
  };

  for (;;) {
    const action = decideNextAction(state);
    if (isTerminalAction(action)) {
      return finish(action);
    }

    if (signal?.aborted) {
      return fail(action, {
        kind: "cancelled",
        message: new CancelledError(signal.reason).message,
      });
    }

    logger.info(`Step: ${action} - started (stage=${state.current_stage}, retry=${state.retry_count})`, {
      scope: SCOPE,
    });
    const terminal = await steps[action]();
    if (terminal) {
      return terminal;
    }
  }
};

export { overlayModifiedFiles, raceWithSignal, runPipeline };
export type { RunPipelineOptions };
