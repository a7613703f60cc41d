import type { DiffStats } from "./diff.types";

const DIFF_HEADER = /^diff --git a\/(.+?) b\/(.+)$/;

const parseUnifiedDiff = (diff: string): DiffStats => {
  const files = new Set<string>();
  let addedLines = 0;
  let removedLines = 0;
  // `---`/`+++` are file headers only until the first hunk of each file.
  let inFileHeader = true;

  diff.split("\n").forEach((line) => {
    if (line.startsWith("diff --git ")) {
      inFileHeader = true;
      const match = DIFF_HEADER.exec(line);
      if (match && match[2]) {
        files.add(match[2]);
      }
      return;
    }
    if (line.startsWith("@@")) {
      inFileHeader = false;
      return;
    }
    if (inFileHeader) {
      return;
    }
    if (line.startsWith("+")) {
      addedLines += 1;
    }
    if (line.startsWith("-")) {
      removedLines += 1;
    }
  });

  return {
    filesChanged: Array.from(files),
    addedLines,
    removedLines,
    totalChangedLines: addedLines + removedLines,
    totalBytes: Buffer.byteLength(diff, "utf-8"),
  };
};

/**
 * `git diff --no-index` names files after the directories it compared; strip
 * those so headers read `a/<path>` and `b/<path>`.
 */
const stripCompareRoots = (diff: string, roots: string[]): string => {
  let inFileHeader = true;
  return diff
    .split("\n")
    .map((line) => {
      if (line.startsWith("diff --git ")) {
        inFileHeader = true;
      } else if (line.startsWith("@@")) {
        inFileHeader = false;
      }
      if (
        !inFileHeader ||
        !(
          line.startsWith("diff --git ") ||
          line.startsWith("--- ") ||
          line.startsWith("+++ ")
        )
      ) {
        return line;
      }
      return roots.reduce(
        (current, root) =>
          current
            .split(` a/${root}/`)
            .join(" a/")
            .split(` b/${root}/`)
            .join(" b/"),
        line
      );
    })
    .join("\n");
};

export { parseUnifiedDiff, stripCompareRoots };
