import type {
  ResearchAgent,
  ResearchAgentOptions,
  ResearchRequest,
  ResearchResult,
} from "./research.types";
import { validateResearchResult } from "./research.validators";
import { readPrompt, requestStructured } from "../shared/structured-response";
import { promptPath } from "../../core/paths";

const RESULT_JSON_SCHEMA: Record<string, unknown> = {
  type: "object",
  additionalProperties: false,
  required: ["solutions", "search_queries"],
  properties: {
    solutions: {
      type: "array",
      items: {
        type: "object",
        additionalProperties: false,
        required: ["description", "code_snippet", "rank"],
        properties: {
          description: { type: "string" },
          code_snippet: { type: "string" },
          rank: { type: "integer", minimum: 1 },
        },
      },
    },
    search_queries: { type: "array", items: { type: "string" } },
  },
};

const buildUserInput = (request: ResearchRequest) =>
  JSON.stringify(
    {
      error: request.error_message,
      execution_logs: request.execution_logs_tail,
      context: request.original_context,
    },
    null,
    2
  );

const createResearchAgent = (options: ResearchAgentOptions): ResearchAgent => {
  const systemPromptPath = options.systemPromptPath ?? promptPath("research");

  const research = async (
    request: ResearchRequest,
    signal?: AbortSignal
  ): Promise<ResearchResult> => {
    const systemPrompt = await readPrompt(systemPromptPath);

    return requestStructured(
      options.responder,
      {
        agent: "research",
        model: options.model,
        instructions: systemPrompt,
        input: buildUserInput(request),
        schemaName: "ResearchResult",
        schema: RESULT_JSON_SCHEMA,
      },
      validateResearchResult,
      signal
    );
  };

  return { research };
};

export { createResearchAgent };
