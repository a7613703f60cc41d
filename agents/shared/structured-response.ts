import OpenAI from "openai";
import { readFile } from "node:fs/promises";
import type { ValidationResult } from "./agent.types";
import {
  AgentCallError,
  CancelledError,
  MalformedResponseError,
  getErrorMessage,
} from "../../core/errors";
import type { AgentName } from "../../core/errors";
import { logger } from "../../core/logger";

interface StructuredRequest {
  agent: AgentName;
  model: string;
  instructions: string;
  input: string;
  schemaName: string;
  schema: Record<string, unknown>;
}

/**
 * One request against the reasoning backend, answering with the raw output
 * text. The OpenAI-backed responder is the production one; tests pass stubs.
 */
type StructuredResponder = (
  request: StructuredRequest,
  signal?: AbortSignal
) => Promise<string>;

const createOpenAIResponder = (apiKey: string): StructuredResponder => {
  const openai = new OpenAI({ apiKey });

  return async (request, signal) => {
    const response = await openai.responses.create(
      {
        model: request.model,
        instructions: request.instructions,
        input: [{ role: "user", content: request.input }],
        text: {
          format: {
            type: "json_schema",
            name: request.schemaName,
            schema: request.schema,
            strict: true,
          },
        },
      },
      { signal }
    );
    return response.output_text;
  };
};

const readPrompt = async (path: string) => {
  try {
    return await readFile(path, "utf-8");
  } catch {
    throw new Error(`Prompt file not found: ${path}`);
  }
};

const parseOutput = (agent: AgentName, outputText: string): unknown => {
  if (outputText.trim().length === 0) {
    throw new MalformedResponseError(agent, [`${agent} returned empty output.`]);
  }
  try {
    return JSON.parse(outputText);
  } catch (error) {
    throw new MalformedResponseError(
      agent,
      [`Output is not valid JSON (${getErrorMessage(error)}).`],
      { cause: error }
    );
  }
};

/**
 * Sends the request and validates the answer at the boundary. Transport
 * failures become AgentCallError carrying the original message, invalid
 * payloads become MalformedResponseError.
 */
const requestStructured = async <T>(
  responder: StructuredResponder,
  request: StructuredRequest,
  validate: (input: unknown) => ValidationResult<T>,
  signal?: AbortSignal
): Promise<T> => {
  logger.debug(`Calling ${request.agent} (model=${request.model})`, {
    scope: request.agent,
  });

  let outputText: string;
  try {
    outputText = await responder(request, signal);
  } catch (error) {
    if (signal?.aborted) {
      throw new CancelledError(signal.reason);
    }
    throw new AgentCallError(request.agent, getErrorMessage(error), {
      cause: error,
    });
  }

  const validated = validate(parseOutput(request.agent, outputText));
  if (!validated.ok || validated.value === undefined) {
    throw new MalformedResponseError(request.agent, validated.errors);
  }
  return validated.value;
};

export { createOpenAIResponder, readPrompt, requestStructured };
export type { StructuredRequest, StructuredResponder };
