import type {
  PipelineAction,
  PipelineStage,
  PipelineStateView,
  TerminalAction,
} from "./pipeline.types";

/** Research→implementation cycles allowed before the run is reported failed. */
const RETRY_CEILING = 3;

const PIPELINE_STAGES: readonly PipelineStage[] = [
  "start",
  "analysis_complete",
  "implementation_complete",
  "implementation_failed",
  "implementation_retry",
  "diff_complete",
  "report_failure",
  "done",
];

const PIPELINE_ACTIONS: readonly PipelineAction[] = [
  "analysis",
  "implementation",
  "research",
  "diff",
  "report_failure",
  "done",
];

const isPipelineStage = (value: string): value is PipelineStage =>
  PIPELINE_STAGES.some((stage) => stage === value);

const isPipelineAction = (value: string): value is PipelineAction =>
  PIPELINE_ACTIONS.some((action) => action === value);

const isTerminalAction = (action: PipelineAction): action is TerminalAction =>
  action === "report_failure" || action === "done";

/**
 * Picks the next action from the stage and the retry count alone. Pure and
 * total: unknown stages answer `report_failure` instead of throwing.
 */
const decideNextAction = (view: PipelineStateView): PipelineAction => {
  const stage = view.current_stage;
  if (!isPipelineStage(stage)) {
    return "report_failure";
  }

  switch (stage) {
    case "start":
      return "analysis";
    case "analysis_complete":
      return "implementation";
    case "implementation_complete":
      return "diff";
    case "implementation_failed":
      return view.retry_count < RETRY_CEILING ? "research" : "report_failure";
    case "implementation_retry":
      return "implementation";
    case "diff_complete":
      return "done";
    case "done":
      return "done";
    case "report_failure":
      return "report_failure";
  }
};

export {
  PIPELINE_ACTIONS,
  PIPELINE_STAGES,
  RETRY_CEILING,
  decideNextAction,
  isPipelineAction,
  isPipelineStage,
  isTerminalAction,
};
