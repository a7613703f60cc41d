import { after, before, describe, it } from "node:test";
import assert from "node:assert/strict";
import { createImplementationAgent } from "../../agents/implementation/implementation.agent";
import type { StructuredResponder } from "../../agents/shared/structured-response";
import type { AnalysisRequest, AnalysisResult } from "../../agents/analysis/analysis.types";
import type { DiffRequest, DiffResult } from "../../agents/diff/diff.types";
import type {
  ImplementationRequest,
  ImplementationResult,
} from "../../agents/implementation/implementation.types";
import type { ResearchRequest, ResearchResult } from "../../agents/research/research.types";
import { AgentCallError, MalformedResponseError } from "../../core/errors";
import { setLogSink } from "../../core/logger";
import { runPipeline } from "../driver";
import { createPipelineState } from "../pipeline-state";
import type { AgentSuite, PipelineState } from "../pipeline.types";

const SNAPSHOT = {
  "src/app.ts": "export const app = 1;\n",
  "README.md": "# Demo\n",
};

const ANALYSIS: AnalysisResult = {
  files: [
    { path: "src/app.ts", reason: "add route", change_type: "modify", confidence: 90 },
  ],
  dependencies: [],
  risks: [],
  steps: ["Edit src/app.ts"],
};

const SUCCESS: ImplementationResult = {
  modified_files: [{ path: "src/app.ts", content: "export const app = 2;\n" }],
  success: true,
  execution_logs: ["File 'src/app.ts' modified."],
};

const FAILURE: ImplementationResult = {
  modified_files: [],
  success: false,
  error_message: "TypeError: app is not a function",
  execution_logs: ["attempt failed"],
};

const RECOMMENDATION: ResearchResult = {
  solutions: [
    { description: "Fallback idea", code_snippet: "", rank: 2 },
    { description: "Export a function", code_snippet: "export const app = () => 2;", rank: 1 },
  ],
  search_queries: ["app is not a function"],
};

const DIFF: DiffResult = {
  diff: "diff --git a/src/app.ts b/src/app.ts\n",
  stats: {
    filesChanged: ["src/app.ts"],
    addedLines: 1,
    removedLines: 1,
    totalChangedLines: 2,
    totalBytes: 38,
  },
};

interface Calls {
  analysis: AnalysisRequest[];
  implementation: ImplementationRequest[];
  research: ResearchRequest[];
  diff: DiffRequest[];
}

interface FakeBehaviour {
  analysis?: (request: AnalysisRequest) => Promise<AnalysisResult>;
  implementation?: (request: ImplementationRequest, attempt: number) => Promise<ImplementationResult>;
  research?: (request: ResearchRequest) => Promise<ResearchResult>;
  diff?: (request: DiffRequest) => Promise<DiffResult>;
}

const createFakeAgents = (behaviour: FakeBehaviour = {}) => {
  const calls: Calls = { analysis: [], implementation: [], research: [], diff: [] };
  const agents: AgentSuite = {
    analysis: {
      analyze: async (request) => {
        calls.analysis.push(request);
        return behaviour.analysis ? behaviour.analysis(request) : ANALYSIS;
      },
    },
    implementation: {
      implement: async (request) => {
        calls.implementation.push(request);
        return behaviour.implementation
          ? behaviour.implementation(request, calls.implementation.length)
          : SUCCESS;
      },
    },
    research: {
      research: async (request) => {
        calls.research.push(request);
        return behaviour.research ? behaviour.research(request) : RECOMMENDATION;
      },
    },
    diff: {
      diff: async (request) => {
        calls.diff.push(request);
        return behaviour.diff ? behaviour.diff(request) : DIFF;
      },
    },
  };
  return { agents, calls };
};

const stagesOf = (state: PipelineState) => state.history.map((entry) => entry.to);

describe("runPipeline", () => {
  before(() => {
    setLogSink(() => undefined);
  });

  after(() => {
    setLogSink();
  });

  it("finishes with done when every agent succeeds", async () => {
    const { agents, calls } = createFakeAgents();

    const result = await runPipeline({
      agents,
      repoSnapshot: SNAPSHOT,
      instructions: "Make app return 2",
      runId: "run-a",
    });

    assert.equal(result.outcome, "done");
    assert.equal(result.error, undefined);
    assert.equal(result.state.current_stage, "done");
    assert.equal(result.state.retry_count, 0);
    assert.equal(result.state.last_error_message, null);
    assert.deepEqual(stagesOf(result.state), [
      "analysis_complete",
      "implementation_complete",
      "diff_complete",
      "done",
    ]);
    assert.deepEqual(result.state.results.analysis, ANALYSIS);
    assert.deepEqual(result.state.results.implementation, SUCCESS);
    assert.deepEqual(result.state.results.diff, DIFF);
    assert.deepEqual(result.state.execution_logs, ["File 'src/app.ts' modified."]);

    assert.deepEqual(calls.analysis, [
      { repo_snapshot: SNAPSHOT, instructions: "Make app return 2" },
    ]);
    assert.equal(calls.implementation[0]?.instructions, "Make app return 2");
    assert.deepEqual(calls.diff, [
      {
        original_files: SNAPSHOT,
        modified_files: {
          "src/app.ts": "export const app = 2;\n",
          "README.md": "# Demo\n",
        },
      },
    ]);
    assert.equal(calls.research.length, 0);
  });

  it("reports failure after three research cycles when implementation keeps failing", async () => {
    const { agents, calls } = createFakeAgents({
      implementation: async () => FAILURE,
    });
    const researchStoredAtRetry: number[] = [];

    const result = await runPipeline({
      agents,
      repoSnapshot: SNAPSHOT,
      instructions: "Make app return 2",
      onCheckpoint: (state) => {
        if (state.current_stage === "implementation_retry" && state.results.research) {
          researchStoredAtRetry.push(state.retry_count);
        }
      },
    });

    assert.equal(result.outcome, "report_failure");
    assert.equal(result.state.current_stage, "report_failure");
    assert.equal(result.state.retry_count, 3);
    assert.equal(calls.implementation.length, 4);
    assert.equal(calls.research.length, 3);
    assert.equal(calls.diff.length, 0);
    assert.deepEqual(researchStoredAtRetry, [1, 2, 3]);
    assert.deepEqual(result.error, {
      kind: "retry_exhausted",
      message: "Retry ceiling of 3 reached. Last error: TypeError: app is not a function",
    });
    assert.equal(result.state.last_error_message, "TypeError: app is not a function");
    assert.deepEqual(result.state.results.implementation, FAILURE);
    assert.deepEqual(
      calls.research.map((request) => request.original_context.retry_index),
      [1, 2, 3]
    );
    assert.deepEqual(
      result.state.recovery_notes.map((note) => note.description),
      ["Export a function", "Export a function", "Export a function"]
    );
    assert.equal(result.state.execution_logs.length, 4);
  });

  it("grows the implementation instructions with each recovery note", async () => {
    const { agents, calls } = createFakeAgents({
      implementation: async () => FAILURE,
    });

    await runPipeline({ agents, repoSnapshot: SNAPSHOT, instructions: "Base" });

    const sent = calls.implementation.map((request) => request.instructions);
    assert.equal(sent[0], "Base");
    for (let index = 1; index < sent.length; index += 1) {
      const previous = sent[index - 1] ?? "";
      const current = sent[index] ?? "";
      assert.ok(current.startsWith(previous));
      assert.ok(current.length > previous.length);
    }
    assert.equal(
      sent[1],
      "Base\n\n--- Recovery note (retry 1) ---\nExport a function\n```\nexport const app = () => 2;\n```"
    );
  });

  it("sends the error, the log tail and the planned files to research", async () => {
    const { agents, calls } = createFakeAgents({
      implementation: async (_request, attempt) =>
        attempt === 1
          ? { ...FAILURE, execution_logs: ["l1", "l2", "l3"] }
          : SUCCESS,
    });

    const result = await runPipeline({
      agents,
      repoSnapshot: SNAPSHOT,
      instructions: "Base",
      logTailLines: 2,
    });

    assert.equal(result.outcome, "done");
    assert.equal(result.state.retry_count, 1);
    assert.deepEqual(calls.research, [
      {
        error_message: "TypeError: app is not a function",
        execution_logs_tail: ["l2", "l3"],
        original_context: {
          instructions: "Base",
          planned_files: ["src/app.ts"],
          retry_index: 1,
        },
      },
    ]);
    assert.deepEqual(stagesOf(result.state), [
      "analysis_complete",
      "implementation_failed",
      "implementation_retry",
      "implementation_complete",
      "diff_complete",
      "done",
    ]);
  });

  it("retries with unchanged instructions when research has nothing usable", async () => {
    const { agents, calls } = createFakeAgents({
      implementation: async (_request, attempt) => (attempt === 1 ? FAILURE : SUCCESS),
      research: async () => ({
        solutions: [{ description: "   ", code_snippet: "x", rank: 1 }],
        search_queries: [],
      }),
    });

    const result = await runPipeline({ agents, repoSnapshot: SNAPSHOT, instructions: "Base" });

    assert.equal(result.outcome, "done");
    assert.equal(result.state.retry_count, 1);
    assert.deepEqual(result.state.recovery_notes, []);
    assert.equal(result.state.accumulated_instructions, "Base");
    assert.equal(calls.implementation[1]?.instructions, "Base");
  });

  it("stores a transport error from implementation verbatim and retries", async () => {
    const { agents, calls } = createFakeAgents({
      implementation: async (_request, attempt) => {
        if (attempt === 1) {
          throw new Error("socket hang up");
        }
        return SUCCESS;
      },
    });
    const failedSnapshots: PipelineState[] = [];

    const result = await runPipeline({
      agents,
      repoSnapshot: SNAPSHOT,
      instructions: "Base",
      onCheckpoint: (state) => {
        if (state.current_stage === "implementation_failed") {
          failedSnapshots.push(structuredClone(state));
        }
      },
    });

    assert.equal(result.outcome, "done");
    assert.equal(failedSnapshots.length, 1);
    assert.equal(failedSnapshots[0]?.last_error_message, "socket hang up");
    assert.deepEqual(failedSnapshots[0]?.results.implementation, {
      modified_files: [],
      success: false,
      error_message: "socket hang up",
      execution_logs: [],
    });
    assert.equal(calls.research[0]?.error_message, "socket hang up");
  });

  it("treats a malformed implementation response as a failed attempt", async () => {
    const { agents, calls } = createFakeAgents({
      implementation: async () => {
        throw new MalformedResponseError("implementation", ["success: Required"]);
      },
    });

    const result = await runPipeline({ agents, repoSnapshot: SNAPSHOT, instructions: "Base" });

    assert.equal(result.outcome, "report_failure");
    assert.equal(result.error?.kind, "retry_exhausted");
    assert.equal(
      result.state.last_error_message,
      "Malformed implementation response: success: Required"
    );
    assert.equal(calls.implementation.length, 4);
  });

  it("reports an analysis failure without calling the other agents", async () => {
    const { agents, calls } = createFakeAgents({
      analysis: async () => {
        throw new AgentCallError("analysis", "429 quota exceeded");
      },
    });

    const result = await runPipeline({ agents, repoSnapshot: SNAPSHOT, instructions: "Base" });

    assert.equal(result.outcome, "report_failure");
    assert.deepEqual(result.error, {
      kind: "agent_call",
      message: "429 quota exceeded",
      agent: "analysis",
    });
    assert.equal(result.state.last_error_message, "429 quota exceeded");
    assert.deepEqual(stagesOf(result.state), ["report_failure"]);
    assert.equal(calls.implementation.length, 0);
  });

  it("reports a research failure directly", async () => {
    const { agents } = createFakeAgents({
      implementation: async () => FAILURE,
      research: async () => {
        throw new Error("search backend down");
      },
    });

    const result = await runPipeline({ agents, repoSnapshot: SNAPSHOT, instructions: "Base" });

    assert.equal(result.outcome, "report_failure");
    assert.equal(result.error?.kind, "agent_call");
    assert.equal(result.error?.agent, "research");
    assert.equal(result.state.retry_count, 0);
    assert.deepEqual(result.state.results.implementation, FAILURE);
  });

  it("cancels an in-flight call and keeps earlier results", async () => {
    const controller = new AbortController();
    const { agents } = createFakeAgents({
      implementation: () => {
        controller.abort(new Error("user stop"));
        return new Promise<ImplementationResult>(() => undefined);
      },
    });

    const result = await runPipeline({
      agents,
      repoSnapshot: SNAPSHOT,
      instructions: "Base",
      signal: controller.signal,
    });

    assert.equal(result.outcome, "report_failure");
    assert.equal(result.state.current_stage, "report_failure");
    assert.equal(result.state.last_error_message, "Cancelled: user stop");
    assert.equal(result.error?.kind, "cancelled");
    assert.deepEqual(result.state.results.analysis, ANALYSIS);
    assert.equal(result.state.results.implementation, undefined);
  });

  it("does not start when the signal is already aborted", async () => {
    const controller = new AbortController();
    controller.abort("shutting down");
    const { agents, calls } = createFakeAgents();

    const result = await runPipeline({
      agents,
      repoSnapshot: SNAPSHOT,
      instructions: "Base",
      signal: controller.signal,
    });

    assert.equal(result.outcome, "report_failure");
    assert.equal(result.state.last_error_message, "Cancelled: shutting down");
    assert.equal(calls.analysis.length, 0);
  });

  it("reports an unknown stage without calling any agent", async () => {
    const { agents, calls } = createFakeAgents();
    const state = createPipelineState({ instructions: "Base", runId: "run-c" });
    state.current_stage = "bogus_stage";

    const result = await runPipeline({
      agents,
      repoSnapshot: SNAPSHOT,
      instructions: "Base",
      state,
    });

    assert.equal(result.outcome, "report_failure");
    assert.equal(result.state.current_stage, "report_failure");
    assert.deepEqual(result.error, {
      kind: "unexpected_stage",
      message: "Unrecognized stage: bogus_stage",
    });
    assert.equal(result.state.history[0]?.from, "bogus_stage");
    assert.equal(calls.analysis.length + calls.implementation.length, 0);
    assert.equal(state.current_stage, "bogus_stage");
  });

  it("returns a finished state unchanged when resumed", async () => {
    const { agents, calls } = createFakeAgents();
    const first = await runPipeline({ agents, repoSnapshot: SNAPSHOT, instructions: "Base" });
    const historyLength = first.state.history.length;

    const resumed = await runPipeline({
      agents,
      repoSnapshot: SNAPSHOT,
      instructions: "Base",
      state: first.state,
    });

    assert.equal(resumed.outcome, "done");
    assert.equal(resumed.state.history.length, historyLength);
    assert.equal(calls.analysis.length, 1);
  });

  it("writes a checkpoint after every transition", async () => {
    const { agents } = createFakeAgents();
    const checkpoints: string[] = [];

    await runPipeline({
      agents,
      repoSnapshot: SNAPSHOT,
      instructions: "Base",
      onCheckpoint: async (state) => {
        checkpoints.push(state.current_stage);
      },
    });

    assert.deepEqual(checkpoints, [
      "analysis_complete",
      "implementation_complete",
      "diff_complete",
      "done",
    ]);
  });

  it("never drops a stored result except by overwriting the same stage", async () => {
    const { agents } = createFakeAgents({
      implementation: async (_request, attempt) => (attempt < 3 ? FAILURE : SUCCESS),
    });
    const seen: string[][] = [];

    await runPipeline({
      agents,
      repoSnapshot: SNAPSHOT,
      instructions: "Base",
      onCheckpoint: (state) => {
        seen.push(Object.keys(state.results).sort());
      },
    });

    for (let index = 1; index < seen.length; index += 1) {
      const previous = seen[index - 1] ?? [];
      const current = seen[index] ?? [];
      previous.forEach((stage) => assert.ok(current.includes(stage)));
    }
    assert.deepEqual(seen[seen.length - 1], ["analysis", "diff", "implementation", "research"]);
  });
});

describe("runPipeline with the implementation agent", () => {
  before(() => {
    setLogSink(() => undefined);
  });

  after(() => {
    setLogSink();
  });

  const scriptedResponder = (answers: unknown[]): StructuredResponder => {
    let index = 0;
    return async () => {
      const answer = answers[Math.min(index, answers.length - 1)];
      index += 1;
      return JSON.stringify(answer);
    };
  };

  const SUCCESS_ANSWER = {
    modified_files: [{ path: "src/app.ts", content: "export const app = 2;\n" }],
    success: true,
    error_message: "",
    execution_logs: [],
  };

  it("hands a failed attempt's message and logs to research", async () => {
    const { agents, calls } = createFakeAgents();
    agents.implementation = createImplementationAgent({
      model: "test-model",
      responder: scriptedResponder([
        {
          modified_files: [{ path: "src/app.ts", content: "export const app = 3;\n" }],
          success: false,
          error_message: "TypeError in src/b.ts",
          execution_logs: ["src/app.ts ok", "src/b.ts failed"],
        },
        SUCCESS_ANSWER,
      ]),
    });
    const failed: PipelineState[] = [];

    const result = await runPipeline({
      agents,
      repoSnapshot: SNAPSHOT,
      instructions: "Base",
      onCheckpoint: (state) => {
        if (state.current_stage === "implementation_failed") {
          failed.push(structuredClone(state));
        }
      },
    });

    assert.equal(result.outcome, "done");
    assert.deepEqual(calls.research.map((request) => request.error_message), [
      "TypeError in src/b.ts",
    ]);
    assert.deepEqual(calls.research[0]?.execution_logs_tail, [
      "src/app.ts ok",
      "src/b.ts failed",
    ]);
    assert.deepEqual(failed[0]?.results.implementation, {
      modified_files: [{ path: "src/app.ts", content: "export const app = 3;\n" }],
      success: false,
      error_message: "TypeError in src/b.ts",
      execution_logs: ["src/app.ts ok", "src/b.ts failed"],
    });
    assert.deepEqual(result.state.execution_logs, [
      "src/app.ts ok",
      "src/b.ts failed",
      "File 'src/app.ts' modified.",
    ]);
    assert.deepEqual(calls.diff[0]?.modified_files, {
      "src/app.ts": "export const app = 2;\n",
      "README.md": "# Demo\n",
    });
  });

  it("uses the default message when a failed attempt gives none", async () => {
    const { agents, calls } = createFakeAgents();
    agents.implementation = createImplementationAgent({
      model: "test-model",
      responder: scriptedResponder([
        {
          modified_files: [],
          success: false,
          error_message: "",
          execution_logs: ["gave up"],
        },
        SUCCESS_ANSWER,
      ]),
    });

    const result = await runPipeline({ agents, repoSnapshot: SNAPSHOT, instructions: "Base" });

    assert.equal(result.outcome, "done");
    assert.equal(
      calls.research[0]?.error_message,
      "Implementation reported failure without a message."
    );
    assert.deepEqual(calls.research[0]?.execution_logs_tail, ["gave up"]);
  });
});
