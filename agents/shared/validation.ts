import type { z } from "zod";
import type { ValidationResult } from "./agent.types";

const buildErrorResult = <T>(errors: string[]): ValidationResult<T> => ({
  ok: false,
  errors,
});

const buildOkResult = <T>(value: T): ValidationResult<T> => ({
  ok: true,
  errors: [],
  value,
});

const formatIssues = (error: z.ZodError): string[] =>
  error.issues.map((issue) =>
    issue.path.length > 0
      ? `${issue.path.join(".")}: ${issue.message}`
      : issue.message
  );

/** Rejects absolute paths, drive letters and any `..` segment. */
const isSafeRepoPath = (path: string): boolean => {
  const trimmed = path.trim();
  if (trimmed.length === 0 || trimmed !== path) {
    return false;
  }
  if (trimmed.startsWith("/") || trimmed.startsWith("\\")) {
    return false;
  }
  if (/^[a-zA-Z]:/.test(trimmed)) {
    return false;
  }
  return !trimmed.split(/[\\/]/).some((segment) => segment === "..");
};

const findDuplicates = (values: string[]): string[] => {
  const seen = new Set<string>();
  const duplicates = new Set<string>();
  values.forEach((value) => {
    if (seen.has(value)) {
      duplicates.add(value);
    }
    seen.add(value);
  });
  return Array.from(duplicates);
};

export {
  buildErrorResult,
  buildOkResult,
  findDuplicates,
  formatIssues,
  isSafeRepoPath,
};
