import { spawn } from "node:child_process";
import { mkdir, rm } from "node:fs/promises";
import { join } from "node:path";

interface GitCommandResult {
  ok: boolean;
  stdout: string;
  stderr: string;
  exitCode: number;
}

interface GitCommandOptions {
  signal?: AbortSignal;
  // `git diff --no-index` exits 1 when the inputs differ.
  okExitCodes?: number[];
}

const WORKSPACES_ROOT = ".integrator/workspaces";

const runGitCommand = (
  args: string[],
  cwd: string,
  options: GitCommandOptions = {}
): Promise<GitCommandResult> =>
  new Promise((resolveCommand, rejectCommand) => {
    const okExitCodes = options.okExitCodes ?? [0];
    const proc = spawn("git", args, {
      cwd,
      stdio: ["ignore", "pipe", "pipe"],
      signal: options.signal,
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    proc.stdout.on("data", (chunk: Buffer) => stdout.push(chunk));
    proc.stderr.on("data", (chunk: Buffer) => stderr.push(chunk));

    proc.on("error", rejectCommand);
    proc.on("close", (code) => {
      const exitCode = code ?? -1;
      resolveCommand({
        ok: okExitCodes.includes(exitCode),
        stdout: Buffer.concat(stdout).toString("utf-8"),
        stderr: Buffer.concat(stderr).toString("utf-8"),
        exitCode,
      });
    });
  });

const ensureWorkspaceRoot = async () => {
  const root = join(process.cwd(), WORKSPACES_ROOT);
  await mkdir(root, { recursive: true });
  return root;
};

const cloneRepo = async (repoUrl: string, runId: string) => {
  const workspaceRoot = await ensureWorkspaceRoot();
  const workspaceDir = join(workspaceRoot, runId);
  await rm(workspaceDir, { recursive: true, force: true });

  const cloneResult = await runGitCommand(
    ["clone", "--depth", "1", repoUrl, workspaceDir],
    process.cwd()
  );
  if (!cloneResult.ok) {
    const message = cloneResult.stderr || cloneResult.stdout || "Unknown error.";
    throw new Error(`Git clone failed: ${message}`);
  }

  return workspaceDir;
};

const cleanupWorkspace = async (workspaceDir: string) => {
  await rm(workspaceDir, { recursive: true, force: true });
};

export { WORKSPACES_ROOT, cleanupWorkspace, cloneRepo, runGitCommand };
export type { GitCommandOptions, GitCommandResult };
