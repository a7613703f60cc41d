import { createAnalysisAgent } from "../agents/analysis/analysis.agent";
import { createDiffAgent } from "../agents/diff/diff.agent";
import { createImplementationAgent } from "../agents/implementation/implementation.agent";
import { createResearchAgent } from "../agents/research/research.agent";
import { createOpenAIResponder } from "../agents/shared/structured-response";
import type { StructuredResponder } from "../agents/shared/structured-response";
import { requireApiKey } from "../core/config";
import type { IntegratorConfig } from "../core/config";
import type { AgentSuite } from "./pipeline.types";

/**
 * Wires the production agents. A responder can be passed in to run the real
 * agents against a stubbed backend.
 */
const createAgentSuite = (
  config: IntegratorConfig,
  responder: StructuredResponder = createOpenAIResponder(requireApiKey(config))
): AgentSuite => ({
  analysis: createAnalysisAgent({
    model: config.models.analysis,
    responder,
  }),
  implementation: createImplementationAgent({
    model: config.models.implementation,
    responder,
  }),
  research: createResearchAgent({
    model: config.models.research,
    responder,
  }),
  diff: createDiffAgent(),
});

export { createAgentSuite };
