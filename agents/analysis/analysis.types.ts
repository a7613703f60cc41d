import type { RepoSnapshot } from "../shared/agent.types";
import type { StructuredResponder } from "../shared/structured-response";

type ChangeType = "modify" | "create" | "delete";

interface AffectedFile {
  path: string;
  reason: string;
  change_type: ChangeType;
  /** 0-100 */
  confidence: number;
}

interface AnalysisRequest {
  repo_snapshot: RepoSnapshot;
  instructions: string;
}

interface AnalysisResult {
  files: AffectedFile[];
  dependencies: string[];
  risks: string[];
  steps: string[];
}

interface AnalysisAgentOptions {
  model: string;
  responder: StructuredResponder;
  systemPromptPath?: string;
}

interface AnalysisAgent {
  analyze: (
    request: AnalysisRequest,
    signal?: AbortSignal
  ) => Promise<AnalysisResult>;
}

export type {
  AffectedFile,
  AnalysisAgent,
  AnalysisAgentOptions,
  AnalysisRequest,
  AnalysisResult,
  ChangeType,
};
