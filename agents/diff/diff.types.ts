import type { RepoSnapshot } from "../shared/agent.types";

interface DiffRequest {
  original_files: RepoSnapshot;
  /** Full file set after the change; a path missing here was deleted. */
  modified_files: RepoSnapshot;
}

interface DiffStats {
  filesChanged: string[];
  addedLines: number;
  removedLines: number;
  totalChangedLines: number;
  totalBytes: number;
}

interface DiffResult {
  diff: string;
  stats: DiffStats;
}

interface DiffAgent {
  diff: (request: DiffRequest, signal?: AbortSignal) => Promise<DiffResult>;
}

export type { DiffAgent, DiffRequest, DiffResult, DiffStats };
