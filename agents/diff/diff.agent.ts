import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import type { DiffAgent, DiffRequest, DiffResult } from "./diff.types";
import { parseUnifiedDiff, stripCompareRoots } from "./diff.stats";
import { runGitCommand } from "../../orchestrator/git";
import type { RepoSnapshot } from "../shared/agent.types";
import {
  AgentCallError,
  CancelledError,
  getErrorMessage,
} from "../../core/errors";

const BASE_ROOT = "base";
const MODIFIED_ROOT = "mod";
const NULL_DEVICE = "/dev/null";

const readEntry = (files: RepoSnapshot, path: string) =>
  Object.hasOwn(files, path) ? files[path] : undefined;

const writeSide = async (
  workDir: string,
  root: string,
  path: string,
  content: string | undefined
) => {
  if (content === undefined) {
    return NULL_DEVICE;
  }
  const relative = join(root, path);
  const target = join(workDir, relative);
  await mkdir(dirname(target), { recursive: true });
  await writeFile(target, content, "utf-8");
  return relative;
};

const diffFile = async (
  workDir: string,
  path: string,
  request: DiffRequest,
  signal?: AbortSignal
) => {
  const original = readEntry(request.original_files, path);
  const modified = readEntry(request.modified_files, path);
  if (original === modified) {
    return "";
  }

  const left = await writeSide(workDir, BASE_ROOT, path, original);
  const right = await writeSide(workDir, MODIFIED_ROOT, path, modified);
  const result = await runGitCommand(
    ["diff", "--no-index", "--no-color", "--", left, right],
    workDir,
    { signal, okExitCodes: [0, 1] }
  );
  if (!result.ok) {
    throw new Error(result.stderr || `git diff failed for ${path}.`);
  }
  return stripCompareRoots(result.stdout, [BASE_ROOT, MODIFIED_ROOT]);
};

/** Computes a unified diff by letting git compare two temporary trees. */
const createDiffAgent = (): DiffAgent => {
  const diff = async (
    request: DiffRequest,
    signal?: AbortSignal
  ): Promise<DiffResult> => {
    const paths = Array.from(
      new Set([
        ...Object.keys(request.original_files),
        ...Object.keys(request.modified_files),
      ])
    ).sort();

    const workDir = await mkdtemp(join(tmpdir(), "integrator-diff-"));
    try {
      const chunks: string[] = [];
      for (const path of paths) {
        const chunk = await diffFile(workDir, path, request, signal);
        if (chunk.length > 0) {
          chunks.push(chunk.endsWith("\n") ? chunk : `${chunk}\n`);
        }
      }
      const text = chunks.join("");
      return { diff: text, stats: parseUnifiedDiff(text) };
    } catch (error) {
      if (signal?.aborted) {
        throw new CancelledError(signal.reason);
      }
      throw new AgentCallError("diff", getErrorMessage(error), { cause: error });
    } finally {
      await rm(workDir, { recursive: true, force: true });
    }
  };

  return { diff };
};

export { createDiffAgent };
