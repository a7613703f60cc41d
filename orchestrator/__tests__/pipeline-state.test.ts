import { describe, it } from "node:test";
import assert from "node:assert/strict";
import {
  appendRecoveryNote,
  createPipelineState,
  parsePipelineState,
  recoveryMarker,
  renderInstructions,
  renderRecoveryNote,
  summarizeState,
  tailLogs,
} from "../pipeline-state";

const CREATED_AT = "2026-01-02T03:04:05.000Z";

describe("createPipelineState", () => {
  it("starts at start with empty results", () => {
    const state = createPipelineState({
      instructions: "Add a health endpoint",
      runId: "run-1",
      createdAt: CREATED_AT,
    });

    assert.deepEqual(state, {
      run_id: "run-1",
      current_stage: "start",
      retry_count: 0,
      last_error_message: null,
      execution_logs: [],
      original_instructions: "Add a health endpoint",
      recovery_notes: [],
      accumulated_instructions: "Add a health endpoint",
      results: {},
      history: [],
      created_at: CREATED_AT,
      updated_at: CREATED_AT,
    });
  });

  it("generates a run id when none is given", () => {
    const state = createPipelineState({ instructions: "x" });
    assert.match(state.run_id, /^[0-9a-f-]{36}$/);
  });
});

describe("recovery notes", () => {
  it("renders the marker, the description and a fenced snippet", () => {
    assert.equal(recoveryMarker(2), "--- Recovery note (retry 2) ---");
    assert.equal(
      renderRecoveryNote({
        retry_index: 1,
        description: "  Import the router first. ",
        code_snippet: "import { Router } from 'express';\n\n",
      }),
      "--- Recovery note (retry 1) ---\nImport the router first.\n```\nimport { Router } from 'express';\n```"
    );
  });

  it("omits the fence when the snippet is blank", () => {
    assert.equal(
      renderRecoveryNote({ retry_index: 3, description: "Retry", code_snippet: "  \n" }),
      "--- Recovery note (retry 3) ---\nRetry"
    );
  });

  it("appends notes so the previous instructions stay a prefix", () => {
    const state = createPipelineState({ instructions: "Base task", runId: "r" });
    appendRecoveryNote(state, { retry_index: 1, description: "First", code_snippet: "" });
    const afterFirst = state.accumulated_instructions;
    appendRecoveryNote(state, { retry_index: 2, description: "Second", code_snippet: "x()" });

    assert.equal(afterFirst, "Base task\n\n--- Recovery note (retry 1) ---\nFirst");
    assert.ok(state.accumulated_instructions.startsWith(afterFirst));
    assert.ok(state.accumulated_instructions.length > afterFirst.length);
    assert.equal(
      state.accumulated_instructions,
      "Base task\n\n--- Recovery note (retry 1) ---\nFirst\n\n--- Recovery note (retry 2) ---\nSecond\n```\nx()\n```"
    );
    assert.equal(state.original_instructions, "Base task");
  });

  it("renders only the original text without notes", () => {
    assert.equal(renderInstructions("Only this", []), "Only this");
  });
});

describe("tailLogs", () => {
  it("keeps the last lines", () => {
    assert.deepEqual(tailLogs(["a", "b", "c", "d"], 2), ["c", "d"]);
    assert.deepEqual(tailLogs(["a"], 10), ["a"]);
    assert.deepEqual(tailLogs(["a", "b"], 0), []);
  });
});

describe("parsePipelineState", () => {
  it("accepts a state it produced", () => {
    const state = createPipelineState({ instructions: "Task", runId: "r", createdAt: CREATED_AT });
    appendRecoveryNote(state, { retry_index: 1, description: "Hint", code_snippet: "" });
    state.current_stage = "implementation_retry";
    state.retry_count = 1;

    const parsed = parsePipelineState(JSON.parse(JSON.stringify(state)));
    assert.equal(parsed.ok, true);
    assert.deepEqual(parsed.value, state);
  });

  it("keeps unknown stage names so the decision function can answer them", () => {
    const state = createPipelineState({ instructions: "Task", runId: "r" });
    state.current_stage = "bogus_stage";
    const parsed = parsePipelineState(state);
    assert.equal(parsed.ok, true);
    assert.equal(parsed.value?.current_stage, "bogus_stage");
  });

  it("rejects instructions that do not match the notes", () => {
    const state = createPipelineState({ instructions: "Task", runId: "r" });
    state.accumulated_instructions = "Task\n\nedited by hand";
    assert.deepEqual(parsePipelineState(state), {
      ok: false,
      errors: [
        "accumulated_instructions does not match original_instructions and recovery_notes.",
      ],
    });
  });

  it("reports schema issues with their path", () => {
    const state = createPipelineState({ instructions: "Task", runId: "r" });
    const parsed = parsePipelineState({ ...state, retry_count: -1 });
    assert.equal(parsed.ok, false);
    assert.equal(parsed.errors.length, 1);
    assert.match(parsed.errors[0] ?? "", /^retry_count: /);
  });
});

describe("summarizeState", () => {
  it("lists counts and the stages that produced results", () => {
    const state = createPipelineState({ instructions: "Task", runId: "r", createdAt: CREATED_AT });
    state.execution_logs.push("one", "two");
    state.results.analysis = { files: [], dependencies: [], risks: [], steps: [] };

    assert.deepEqual(summarizeState(state), {
      run_id: "r",
      current_stage: "start",
      retry_count: 0,
      last_error_message: null,
      recovery_notes: 0,
      execution_log_lines: 2,
      stages_with_results: ["analysis"],
      updated_at: CREATED_AT,
    });
  });
});
