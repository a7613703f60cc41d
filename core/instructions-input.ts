import { readFile, stat } from "node:fs/promises";
import { extname, resolve } from "node:path";

interface InstructionsInput {
  instructions: string;
  source: "cli" | "file";
  filePath?: string;
}

interface StringMap {
  [key: string]: unknown;
}

const isRecord = (value: unknown): value is StringMap =>
  typeof value === "object" && value !== null && !Array.isArray(value);

const INSTRUCTION_KEYS = ["instructions", "task", "description", "prompt"];

const findStringField = (value: StringMap, keys: string[]) => {
  for (const key of keys) {
    const candidate = value[key];
    if (typeof candidate === "string" && candidate.trim().length > 0) {
      return candidate.trim();
    }
  }
  return "";
};

const fileExists = async (path: string) => {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
};

const readInstructionsFromJson = async (filePath: string) => {
  const text = await readFile(filePath, "utf-8");
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : "Invalid JSON.";
    throw new Error(`Unable to parse JSON instructions file: ${message}`);
  }

  if (typeof parsed === "string") {
    const trimmed = parsed.trim();
    if (trimmed.length === 0) {
      throw new Error("JSON instructions file is an empty string.");
    }
    return trimmed;
  }

  if (!isRecord(parsed)) {
    throw new Error("JSON instructions file must be a string or object.");
  }

  const direct = findStringField(parsed, INSTRUCTION_KEYS);
  if (direct.length > 0) {
    return direct;
  }

  const nestedTask = parsed["task"];
  if (isRecord(nestedTask)) {
    const nested = findStringField(nestedTask, INSTRUCTION_KEYS);
    if (nested.length > 0) {
      return nested;
    }
  }

  throw new Error(
    "JSON instructions file must include a string field named instructions, task, description, or prompt."
  );
};

/**
 * Accepts inline instructions or a path to a `.md`/`.json` file. A path that
 * does not exist is treated as inline text.
 */
export const resolveInstructionsInput = async (
  input: string,
  cwd: string = process.cwd()
): Promise<InstructionsInput> => {
  const ext = extname(input).toLowerCase();
  if (ext === ".md" || ext === ".json") {
    const filePath = resolve(cwd, input);
    if (await fileExists(filePath)) {
      if (ext === ".md") {
        const trimmed = (await readFile(filePath, "utf-8")).trim();
        if (trimmed.length === 0) {
          throw new Error("Markdown instructions file is empty.");
        }
        return { instructions: trimmed, source: "file", filePath };
      }

      const instructions = await readInstructionsFromJson(filePath);
      return { instructions, source: "file", filePath };
    }
  }

  const trimmed = input.trim();
  if (trimmed.length === 0) {
    throw new Error("Instructions must not be empty.");
  }
  return { instructions: trimmed, source: "cli" };
};

export type { InstructionsInput };
