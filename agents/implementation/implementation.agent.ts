import type {
  ImplementationAgent,
  ImplementationAgentOptions,
  ImplementationRequest,
  ImplementationResult,
} from "./implementation.types";
import {
  enforceImplementationConstraints,
  validateImplementationResult,
} from "./implementation.validators";
import { readPrompt, requestStructured } from "../shared/structured-response";
import { promptPath } from "../../core/paths";

const RESULT_JSON_SCHEMA: Record<string, unknown> = {
  type: "object",
  additionalProperties: false,
  required: ["modified_files", "success", "error_message", "execution_logs"],
  properties: {
    modified_files: {
      type: "array",
      items: {
        type: "object",
        additionalProperties: false,
        required: ["path", "content"],
        properties: {
          path: { type: "string" },
          content: { type: "string" },
        },
      },
    },
    success: { type: "boolean" },
    error_message: { type: "string" },
    execution_logs: { type: "array", items: { type: "string" } },
  },
};

const buildUserInput = (request: ImplementationRequest) => {
  const targets = new Set(request.analysis.files.map((file) => file.path));
  const payload = {
    instructions: request.instructions,
    plan: request.analysis,
    // Only the files the plan touches; the full snapshot went to analysis.
    files: Object.entries(request.repo_snapshot)
      .filter(([path]) => targets.has(path))
      .map(([path, content]) => ({ path, content })),
  };

  return JSON.stringify(payload, null, 2);
};

const createImplementationAgent = (
  options: ImplementationAgentOptions
): ImplementationAgent => {
  const systemPromptPath =
    options.systemPromptPath ?? promptPath("implementation");

  const implement = async (
    request: ImplementationRequest,
    signal?: AbortSignal
  ): Promise<ImplementationResult> => {
    const systemPrompt = await readPrompt(systemPromptPath);

    const result = await requestStructured(
      options.responder,
      {
        agent: "implementation",
        model: options.model,
        instructions: systemPrompt,
        input: buildUserInput(request),
        schemaName: "ImplementationResult",
        schema: RESULT_JSON_SCHEMA,
      },
      validateImplementationResult,
      signal
    );

    return enforceImplementationConstraints(result, request.repo_snapshot);
  };

  return { implement };
};

export { createImplementationAgent };
