type AgentName = "analysis" | "implementation" | "research" | "diff";

type FailureKind =
  | "agent_call"
  | "malformed_response"
  | "semantic_failure"
  | "retry_exhausted"
  | "cancelled"
  | "unexpected_stage";

interface PipelineFailure {
  kind: FailureKind;
  message: string;
  agent?: AgentName;
}

/** Transport or backend failure while calling an agent (network, auth, quota). */
class AgentCallError extends Error {
  readonly agent: AgentName;
  readonly kind: FailureKind = "agent_call";

  constructor(agent: AgentName, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AgentCallError";
    this.agent = agent;
  }
}

/** The agent answered, but the payload does not fit its result shape. */
class MalformedResponseError extends AgentCallError {
  readonly issues: string[];
  override readonly kind: FailureKind = "malformed_response";

  constructor(agent: AgentName, issues: string[], options?: { cause?: unknown }) {
    super(
      agent,
      `Malformed ${agent} response: ${issues.join(" ")}`.trim(),
      options
    );
    this.name = "MalformedResponseError";
    this.issues = issues;
  }
}

class CancelledError extends Error {
  readonly kind: FailureKind = "cancelled";

  constructor(reason?: unknown) {
    super(`Cancelled: ${describeReason(reason)}`);
    this.name = "CancelledError";
  }
}

class ConfigError extends Error {
  constructor(issues: string[]) {
    super(`Invalid configuration: ${issues.join(" ")}`);
    this.name = "ConfigError";
  }
}

const describeReason = (reason: unknown): string => {
  if (reason instanceof Error) {
    return reason.message;
  }
  if (typeof reason === "string" && reason.trim().length > 0) {
    return reason;
  }
  return "operation aborted.";
};

const getErrorMessage = (error: unknown, fallback = "Unknown error."): string => {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string" && error.length > 0) {
    return error;
  }
  return fallback;
};

/**
 * Maps any thrown value to a failure record. Non-taxonomy errors thrown by an
 * agent count as agent call failures.
 */
const toPipelineFailure = (error: unknown, agent: AgentName): PipelineFailure => {
  if (error instanceof AgentCallError) {
    return { kind: error.kind, message: error.message, agent: error.agent };
  }
  if (error instanceof CancelledError) {
    return { kind: "cancelled", message: error.message, agent };
  }
  return { kind: "agent_call", message: getErrorMessage(error), agent };
};

export {
  AgentCallError,
  CancelledError,
  ConfigError,
  MalformedResponseError,
  describeReason,
  getErrorMessage,
  toPipelineFailure,
};
export type { AgentName, FailureKind, PipelineFailure };
