import type { AnalysisResult } from "../analysis/analysis.types";
import type { RepoSnapshot } from "../shared/agent.types";
import type { StructuredResponder } from "../shared/structured-response";

interface ModifiedFile {
  path: string;
  content: string;
}

interface ImplementationRequest {
  analysis: AnalysisResult;
  repo_snapshot: RepoSnapshot;
  /** Original instructions plus every recovery note appended so far. */
  instructions: string;
}

interface ImplementationResult {
  modified_files: ModifiedFile[];
  success: boolean;
  error_message?: string;
  execution_logs: string[];
}

interface ImplementationAgentOptions {
  model: string;
  responder: StructuredResponder;
  systemPromptPath?: string;
}

interface ImplementationAgent {
  implement: (
    request: ImplementationRequest,
    signal?: AbortSignal
  ) => Promise<ImplementationResult>;
}

export type {
  ImplementationAgent,
  ImplementationAgentOptions,
  ImplementationRequest,
  ImplementationResult,
  ModifiedFile,
};
