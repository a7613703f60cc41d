import { resolve } from "node:path";
import { getLatestRunDir } from "../orchestrator/artifacts";

export const resolveRunDir = async (runsRoot: string, runId?: string) => {
  if (runId && runId.trim().length > 0) {
    return resolve(runsRoot, runId.trim());
  }

  const latest = await getLatestRunDir(runsRoot);
  if (!latest) {
    throw new Error(`No runs found under ${runsRoot}.`);
  }
  return resolve(latest);
};

export const parsePositiveInt = (raw: string | undefined, flag: string) => {
  if (raw === undefined) {
    return undefined;
  }
  const trimmed = raw.trim();
  const parsed = Number.parseInt(trimmed, 10);
  if (!/^\d+$/.test(trimmed) || parsed <= 0) {
    throw new Error(`Invalid ${flag} value "${raw}". Expected a positive integer.`);
  }
  return parsed;
};
