/** Repo-relative path → file content. */
type RepoSnapshot = Record<string, string>;

interface ValidationResult<T> {
  ok: boolean;
  errors: string[];
  value?: T;
}

export type { RepoSnapshot, ValidationResult };
