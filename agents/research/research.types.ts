import type { StructuredResponder } from "../shared/structured-response";

interface ResearchContext {
  instructions: string;
  /** Paths the analysis planned to change. */
  planned_files: string[];
  /** Retry index the recommendation will be applied to. */
  retry_index: number;
}

interface ResearchRequest {
  error_message: string;
  execution_logs_tail: string[];
  original_context: ResearchContext;
}

interface Solution {
  description: string;
  code_snippet: string;
  /** 1 is the strongest recommendation. */
  rank: number;
}

interface ResearchResult {
  solutions: Solution[];
  search_queries: string[];
}

interface ResearchAgentOptions {
  model: string;
  responder: StructuredResponder;
  systemPromptPath?: string;
}

interface ResearchAgent {
  research: (
    request: ResearchRequest,
    signal?: AbortSignal
  ) => Promise<ResearchResult>;
}

export type {
  ResearchAgent,
  ResearchAgentOptions,
  ResearchContext,
  ResearchRequest,
  ResearchResult,
  Solution,
};
