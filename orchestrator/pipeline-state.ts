import { randomUUID } from "node:crypto";
import { z } from "zod";
import { analysisResultSchema } from "../agents/analysis/analysis.validators";
import { researchResultSchema } from "../agents/research/research.validators";
import type { ValidationResult } from "../agents/shared/agent.types";
import {
  buildErrorResult,
  buildOkResult,
  formatIssues,
} from "../agents/shared/validation";
import type { PipelineState, RecoveryNote } from "./pipeline.types";

const recoveryMarker = (retryIndex: number) =>
  `--- Recovery note (retry ${retryIndex}) ---`;

const renderRecoveryNote = (note: RecoveryNote) => {
  const lines = [recoveryMarker(note.retry_index), note.description.trim()];
  const snippet = note.code_snippet.trimEnd();
  if (snippet.trim().length > 0) {
    lines.push("```", snippet, "```");
  }
  return lines.join("\n");
};

const renderInstructions = (original: string, notes: RecoveryNote[]) =>
  [original, ...notes.map(renderRecoveryNote)].join("\n\n");

const createPipelineState = (params: {
  instructions: string;
  runId?: string;
  createdAt?: string;
}): PipelineState => {
  const createdAt = params.createdAt ?? new Date().toISOString();
  return {
    run_id: params.runId ?? randomUUID(),
    current_stage: "start",
    retry_count: 0,
    last_error_message: null,
    execution_logs: [],
    original_instructions: params.instructions,
    recovery_notes: [],
    accumulated_instructions: params.instructions,
    results: {},
    history: [],
    created_at: createdAt,
    updated_at: createdAt,
  };
};

/**
 * Appends the note and re-renders the instructions. Notes are only ever
 * appended, so the rendered text keeps every earlier note as a prefix.
 */
const appendRecoveryNote = (state: PipelineState, note: RecoveryNote) => {
  state.recovery_notes.push(note);
  state.accumulated_instructions = renderInstructions(
    state.original_instructions,
    state.recovery_notes
  );
};

const tailLogs = (logs: string[], lines: number) =>
  lines > 0 ? logs.slice(-lines) : [];

const stageSchema = z.enum([
  "start",
  "analysis_complete",
  "implementation_complete",
  "implementation_failed",
  "implementation_retry",
  "diff_complete",
  "report_failure",
  "done",
]);

const actionSchema = z.enum([
  "analysis",
  "implementation",
  "research",
  "diff",
  "report_failure",
  "done",
]);

const pipelineStateSchema = z.object({
  run_id: z.string().min(1),
  current_stage: z.string().min(1),
  retry_count: z.number().int().nonnegative(),
  last_error_message: z.string().nullable(),
  execution_logs: z.array(z.string()),
  original_instructions: z.string(),
  recovery_notes: z.array(
    z.object({
      retry_index: z.number().int().positive(),
      description: z.string(),
      code_snippet: z.string(),
    })
  ),
  accumulated_instructions: z.string(),
  results: z.object({
    analysis: analysisResultSchema.optional(),
    implementation: z
      .object({
        modified_files: z.array(
          z.object({ path: z.string(), content: z.string() })
        ),
        success: z.boolean(),
        error_message: z.string().optional(),
        execution_logs: z.array(z.string()),
      })
      .optional(),
    research: researchResultSchema.optional(),
    diff: z
      .object({
        diff: z.string(),
        stats: z.object({
          filesChanged: z.array(z.string()),
          addedLines: z.number().int().nonnegative(),
          removedLines: z.number().int().nonnegative(),
          totalChangedLines: z.number().int().nonnegative(),
          totalBytes: z.number().int().nonnegative(),
        }),
      })
      .optional(),
  }),
  history: z.array(
    z.object({
      action: actionSchema,
      from: z.string(),
      to: stageSchema,
      retry_count: z.number().int().nonnegative(),
      at: z.string(),
    })
  ),
  created_at: z.string(),
  updated_at: z.string(),
});

/** Validates a checkpoint read back from disk. */
const parsePipelineState = (input: unknown): ValidationResult<PipelineState> => {
  const parsed = pipelineStateSchema.safeParse(input);
  if (!parsed.success) {
    return buildErrorResult(formatIssues(parsed.error));
  }

  const state = parsed.data;
  const expected = renderInstructions(
    state.original_instructions,
    state.recovery_notes
  );
  if (state.accumulated_instructions !== expected) {
    return buildErrorResult([
      "accumulated_instructions does not match original_instructions and recovery_notes.",
    ]);
  }

  return buildOkResult(state);
};

const summarizeState = (state: PipelineState) => ({
  run_id: state.run_id,
  current_stage: state.current_stage,
  retry_count: state.retry_count,
  last_error_message: state.last_error_message,
  recovery_notes: state.recovery_notes.length,
  execution_log_lines: state.execution_logs.length,
  stages_with_results: Object.keys(state.results),
  updated_at: state.updated_at,
});

export {
  appendRecoveryNote,
  createPipelineState,
  parsePipelineState,
  recoveryMarker,
  renderInstructions,
  renderRecoveryNote,
  summarizeState,
  tailLogs,
};
