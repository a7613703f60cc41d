import { z } from "zod";
import type { ValidationResult } from "../shared/agent.types";
import { buildErrorResult, buildOkResult, formatIssues } from "../shared/validation";
import type { ResearchResult, Solution } from "./research.types";

const researchResultSchema = z.object({
  solutions: z.array(
    z.object({
      description: z.string(),
      code_snippet: z.string(),
      rank: z.number().int().positive(),
    })
  ),
  search_queries: z.array(z.string()),
});

const validateResearchResult = (
  input: unknown
): ValidationResult<ResearchResult> => {
  const parsed = researchResultSchema.safeParse(input);
  if (!parsed.success) {
    return buildErrorResult(formatIssues(parsed.error));
  }
  return buildOkResult(parsed.data);
};

const isUsableSolution = (solution: Solution) =>
  solution.description.trim().length > 0;

/**
 * Lowest rank wins; equal ranks keep the order the agent returned them in.
 * Solutions without a description are never selected.
 */
const selectBestSolution = (result: ResearchResult): Solution | null => {
  let best: Solution | null = null;
  for (const solution of result.solutions) {
    if (!isUsableSolution(solution)) {
      continue;
    }
    if (!best || solution.rank < best.rank) {
      best = solution;
    }
  }
  return best;
};

export {
  isUsableSolution,
  researchResultSchema,
  selectBestSolution,
  validateResearchResult,
};
