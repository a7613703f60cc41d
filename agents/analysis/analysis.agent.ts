import type {
  AnalysisAgent,
  AnalysisAgentOptions,
  AnalysisRequest,
  AnalysisResult,
} from "./analysis.types";
import { validateAnalysisResult } from "./analysis.validators";
import { readPrompt, requestStructured } from "../shared/structured-response";
import { promptPath } from "../../core/paths";

const RESULT_JSON_SCHEMA: Record<string, unknown> = {
  type: "object",
  additionalProperties: false,
  required: ["files", "dependencies", "risks", "steps"],
  properties: {
    files: {
      type: "array",
      items: {
        type: "object",
        additionalProperties: false,
        required: ["path", "reason", "change_type", "confidence"],
        properties: {
          path: { type: "string" },
          reason: { type: "string" },
          change_type: { type: "string", enum: ["modify", "create", "delete"] },
          confidence: { type: "integer", minimum: 0, maximum: 100 },
        },
      },
    },
    dependencies: { type: "array", items: { type: "string" } },
    risks: { type: "array", items: { type: "string" } },
    steps: { type: "array", items: { type: "string" } },
  },
};

const buildUserInput = (request: AnalysisRequest) => {
  const payload = {
    instructions: request.instructions,
    files: Object.entries(request.repo_snapshot).map(([path, content]) => ({
      path,
      content,
    })),
  };

  return JSON.stringify(payload, null, 2);
};

const createAnalysisAgent = (options: AnalysisAgentOptions): AnalysisAgent => {
  const systemPromptPath = options.systemPromptPath ?? promptPath("analysis");

  const analyze = async (
    request: AnalysisRequest,
    signal?: AbortSignal
  ): Promise<AnalysisResult> => {
    const systemPrompt = await readPrompt(systemPromptPath);

    return requestStructured(
      options.responder,
      {
        agent: "analysis",
        model: options.model,
        instructions: systemPrompt,
        input: buildUserInput(request),
        schemaName: "AnalysisResult",
        schema: RESULT_JSON_SCHEMA,
      },
      validateAnalysisResult,
      signal
    );
  };

  return { analyze };
};

export { createAnalysisAgent };
