import { z } from "zod";
import type { ValidationResult } from "../shared/agent.types";
import {
  buildErrorResult,
  buildOkResult,
  findDuplicates,
  formatIssues,
  isSafeRepoPath,
} from "../shared/validation";
import type { AnalysisResult } from "./analysis.types";

const analysisResultSchema = z.object({
  files: z.array(
    z.object({
      path: z.string().min(1),
      reason: z.string(),
      change_type: z.enum(["modify", "create", "delete"]),
      confidence: z.number().int().min(0).max(100),
    })
  ),
  dependencies: z.array(z.string()),
  risks: z.array(z.string()),
  steps: z.array(z.string()),
});

const validateAnalysisResult = (
  input: unknown
): ValidationResult<AnalysisResult> => {
  const parsed = analysisResultSchema.safeParse(input);
  if (!parsed.success) {
    return buildErrorResult(formatIssues(parsed.error));
  }

  const result = parsed.data;
  const errors: string[] = [];

  result.files.forEach((file) => {
    if (!isSafeRepoPath(file.path)) {
      errors.push(`File path must be repo-relative: ${file.path}`);
    }
  });

  findDuplicates(result.files.map((file) => file.path)).forEach((path) => {
    errors.push(`File listed more than once: ${path}`);
  });

  if (errors.length > 0) {
    return buildErrorResult(errors);
  }

  return buildOkResult(result);
};

export { analysisResultSchema, validateAnalysisResult };
