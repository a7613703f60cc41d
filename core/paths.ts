import { existsSync } from "node:fs";
import { dirname, join } from "node:path";

const findPackageRoot = (start: string): string => {
  let current = start;
  while (!existsSync(join(current, "package.json"))) {
    const parent = dirname(current);
    if (parent === current) {
      return start;
    }
    current = parent;
  }
  return current;
};

// Same answer from sources and from dist/, so prompt files resolve in both.
export const PACKAGE_ROOT = findPackageRoot(__dirname);

export const promptPath = (agent: string) =>
  join(PACKAGE_ROOT, "agents", agent, `${agent}.system.md`);
