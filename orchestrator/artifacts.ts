import { mkdir, readFile, readdir, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { parsePipelineState } from "./pipeline-state";
import type { PipelineState } from "./pipeline.types";

const STATE_FILE = "state.json";
const TASK_FILE = "task.json";
const DIFF_FILE = "diff.patch";

interface RunTask {
  run_id: string;
  instructions: string;
  created_at: string;
}

interface RunContext {
  run_id: string;
  run_dir: string;
  task: RunTask;
}

const ensureDir = async (path: string) => {
  await mkdir(path, { recursive: true });
};

const writeJson = async (path: string, data: unknown) => {
  const payload = JSON.stringify(data, null, 2);
  await writeFile(path, `${payload}\n`, "utf-8");
};

const readJson = async (path: string): Promise<unknown> => {
  const text = await readFile(path, "utf-8");
  return JSON.parse(text);
};

const createRunContext = async (
  runsRoot: string,
  task: RunTask
): Promise<RunContext> => {
  const runDir = join(runsRoot, task.run_id);
  await ensureDir(runDir);
  await writeJson(join(runDir, TASK_FILE), task);
  return {
    run_id: task.run_id,
    run_dir: runDir,
    task,
  };
};

/** Checkpoint hook for the driver: rewrites state.json after every transition. */
const createCheckpointWriter =
  (runDir: string) => async (state: PipelineState) => {
    await writeJson(join(runDir, STATE_FILE), state);
  };

const writeDiffPatch = async (runDir: string, diff: string) => {
  await writeFile(join(runDir, DIFF_FILE), diff, "utf-8");
};

const readStateFile = async (runDir: string): Promise<PipelineState> => {
  const path = join(runDir, STATE_FILE);
  const parsed = parsePipelineState(await readJson(path));
  if (!parsed.ok || !parsed.value) {
    throw new Error(`${path} is invalid: ${parsed.errors.join(" ")}`);
  }
  return parsed.value;
};

const getRunDirectories = async (runsRoot: string) => {
  try {
    const entries = await readdir(runsRoot, { withFileTypes: true });
    return entries
      .filter((entry) => entry.isDirectory())
      .map((entry) => join(runsRoot, entry.name));
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      return [];
    }
    throw error;
  }
};

const getLatestRunDir = async (runsRoot: string) => {
  const runDirs = await getRunDirectories(runsRoot);
  let latestDir: string | null = null;
  let latestTime = Number.NEGATIVE_INFINITY;

  for (const runDir of runDirs) {
    const currentTime = (await stat(runDir)).mtimeMs;
    if (currentTime > latestTime) {
      latestTime = currentTime;
      latestDir = runDir;
    }
  }

  return latestDir;
};

export {
  DIFF_FILE,
  STATE_FILE,
  TASK_FILE,
  createCheckpointWriter,
  createRunContext,
  getLatestRunDir,
  readJson,
  readStateFile,
  writeDiffPatch,
  writeJson,
};
export type { RunContext, RunTask };
