import type { AnalysisAgent, AnalysisResult } from "../agents/analysis/analysis.types";
import type { DiffAgent, DiffResult } from "../agents/diff/diff.types";
import type {
  ImplementationAgent,
  ImplementationResult,
} from "../agents/implementation/implementation.types";
import type { ResearchAgent, ResearchResult } from "../agents/research/research.types";
import type { PipelineFailure } from "../core/errors";

type PipelineStage =
  | "start"
  | "analysis_complete"
  | "implementation_complete"
  | "implementation_failed"
  | "implementation_retry"
  | "diff_complete"
  | "report_failure"
  | "done";

type PipelineAction =
  | "analysis"
  | "implementation"
  | "research"
  | "diff"
  | "report_failure"
  | "done";

type AgentAction = Exclude<PipelineAction, "report_failure" | "done">;

type TerminalAction = Extract<PipelineAction, "report_failure" | "done">;

interface RecoveryNote {
  retry_index: number;
  description: string;
  code_snippet: string;
}

interface StageResults {
  analysis?: AnalysisResult;
  implementation?: ImplementationResult;
  research?: ResearchResult;
  diff?: DiffResult;
}

interface StageTransition {
  action: PipelineAction;
  from: string;
  to: PipelineStage;
  retry_count: number;
  at: string;
}

interface PipelineState {
  run_id: string;
  // `string`, not PipelineStage: checkpoints and the CLI can carry stages this
  // build does not know, and the decision function must still answer.
  current_stage: string;
  retry_count: number;
  last_error_message: string | null;
  execution_logs: string[];
  original_instructions: string;
  recovery_notes: RecoveryNote[];
  accumulated_instructions: string;
  results: StageResults;
  history: StageTransition[];
  created_at: string;
  updated_at: string;
}

/** All the decision function is allowed to see. */
interface PipelineStateView {
  readonly current_stage: string;
  readonly retry_count: number;
}

interface AgentSuite {
  analysis: AnalysisAgent;
  implementation: ImplementationAgent;
  research: ResearchAgent;
  diff: DiffAgent;
}

interface PipelineOutcome {
  outcome: TerminalAction;
  state: PipelineState;
  error?: PipelineFailure;
}

export type {
  AgentAction,
  AgentSuite,
  PipelineAction,
  PipelineOutcome,
  PipelineStage,
  PipelineState,
  PipelineStateView,
  RecoveryNote,
  StageResults,
  StageTransition,
  TerminalAction,
};
