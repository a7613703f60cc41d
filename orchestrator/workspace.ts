import { mkdir, readFile, readdir, stat, writeFile } from "node:fs/promises";
import { dirname, isAbsolute, join, resolve, sep } from "node:path";
import type { RepoSnapshot } from "../agents/shared/agent.types";
import type { ModifiedFile } from "../agents/implementation/implementation.types";
import { logger } from "../core/logger";

const IGNORED_DIRECTORIES = new Set([
  ".git",
  ".integrator",
  "node_modules",
  "dist",
  "coverage",
]);

const BINARY_SNIFF_BYTES = 8000;

interface SnapshotOptions {
  maxBytes: number;
}

const resolveRepoPath = (repoRoot: string, filePath: string) => {
  if (filePath.trim().length === 0) {
    throw new Error("Path must not be empty.");
  }
  if (isAbsolute(filePath)) {
    throw new Error(`Path must be repo-relative: ${filePath}`);
  }

  const resolvedRoot = resolve(repoRoot);
  const resolvedPath = resolve(resolvedRoot, filePath);
  const rootPrefix = resolvedRoot.endsWith(sep)
    ? resolvedRoot
    : resolvedRoot + sep;

  if (resolvedPath !== resolvedRoot && !resolvedPath.startsWith(rootPrefix)) {
    throw new Error(`Path escapes repo root: ${filePath}`);
  }

  return resolvedPath;
};

const looksBinary = (content: Buffer) =>
  content.subarray(0, BINARY_SNIFF_BYTES).includes(0);

const collectFiles = async (
  root: string,
  relativeDir: string,
  found: string[]
) => {
  const entries = await readdir(join(root, relativeDir), {
    withFileTypes: true,
  });
  for (const entry of entries) {
    const relativePath = relativeDir
      ? `${relativeDir}/${entry.name}`
      : entry.name;
    if (entry.isDirectory()) {
      if (!IGNORED_DIRECTORIES.has(entry.name)) {
        await collectFiles(root, relativePath, found);
      }
      continue;
    }
    if (entry.isFile()) {
      found.push(relativePath);
    }
  }
};

/**
 * Reads every text file under `root` into a snapshot keyed by its
 * forward-slash relative path. Binary files and files above `maxBytes` are
 * skipped.
 */
const loadRepoSnapshot = async (
  root: string,
  options: SnapshotOptions
): Promise<RepoSnapshot> => {
  const paths: string[] = [];
  await collectFiles(root, "", paths);
  paths.sort();

  const snapshot: RepoSnapshot = {};
  for (const path of paths) {
    const absolutePath = join(root, path);
    const { size } = await stat(absolutePath);
    if (size > options.maxBytes) {
      logger.debug(`Skipping ${path} (${size} bytes)`, { scope: "workspace" });
      continue;
    }
    const content = await readFile(absolutePath);
    if (looksBinary(content)) {
      logger.debug(`Skipping binary file ${path}`, { scope: "workspace" });
      continue;
    }
    snapshot[path] = content.toString("utf-8");
  }

  return snapshot;
};

const applyModifiedFiles = async (repoRoot: string, files: ModifiedFile[]) => {
  for (const file of files) {
    const targetPath = resolveRepoPath(repoRoot, file.path);
    await mkdir(dirname(targetPath), { recursive: true });
    await writeFile(targetPath, file.content, "utf-8");
  }
};

export { applyModifiedFiles, loadRepoSnapshot, resolveRepoPath };
export type { SnapshotOptions };
