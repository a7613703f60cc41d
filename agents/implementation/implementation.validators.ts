import { z } from "zod";
import type { RepoSnapshot, ValidationResult } from "../shared/agent.types";
import {
  buildErrorResult,
  buildOkResult,
  findDuplicates,
  formatIssues,
  isSafeRepoPath,
} from "../shared/validation";
import type { ImplementationResult } from "./implementation.types";

const implementationResultSchema = z.object({
  modified_files: z.array(
    z.object({
      path: z.string().min(1),
      content: z.string(),
    })
  ),
  success: z.boolean(),
  error_message: z.string(),
  execution_logs: z.array(z.string()),
});

const validateImplementationResult = (
  input: unknown
): ValidationResult<ImplementationResult> => {
  const parsed = implementationResultSchema.safeParse(input);
  if (!parsed.success) {
    return buildErrorResult(formatIssues(parsed.error));
  }

  // A failed attempt may still list the files it got through, and may leave
  // error_message blank; the driver supplies a default message for that.
  const { error_message: errorMessage, ...result } = parsed.data;
  const errors: string[] = [];

  findDuplicates(result.modified_files.map((file) => file.path)).forEach(
    (path) => {
      errors.push(`File modified more than once: ${path}`);
    }
  );

  if (errors.length > 0) {
    return buildErrorResult(errors);
  }

  const trimmedError = errorMessage.trim();
  return buildOkResult(
    trimmedError.length > 0 ? { ...result, error_message: trimmedError } : result
  );
};

/**
 * Turns out-of-repo writes into a semantic failure, drops files whose content
 * did not change and records one log line per file.
 */
const enforceImplementationConstraints = (
  result: ImplementationResult,
  snapshot: RepoSnapshot
): ImplementationResult => {
  if (!result.success) {
    return result;
  }

  const unsafe = result.modified_files
    .map((file) => file.path)
    .filter((path) => !isSafeRepoPath(path));
  if (unsafe.length > 0) {
    const message = `Modified paths escape the repository: ${unsafe.join(", ")}`;
    return {
      modified_files: [],
      success: false,
      error_message: message,
      execution_logs: [...result.execution_logs, message],
    };
  }

  const logs = [...result.execution_logs];
  const changed = result.modified_files.filter((file) => {
    const original = Object.hasOwn(snapshot, file.path)
      ? snapshot[file.path]
      : undefined;
    if (original === file.content) {
      logs.push(`No changes needed for file '${file.path}'.`);
      return false;
    }
    logs.push(
      original === undefined
        ? `File '${file.path}' created.`
        : `File '${file.path}' modified.`
    );
    return true;
  });

  return { ...result, modified_files: changed, execution_logs: logs };
};

export {
  enforceImplementationConstraints,
  implementationResultSchema,
  validateImplementationResult,
};
