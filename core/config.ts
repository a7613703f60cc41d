import { z } from "zod";
import { ConfigError } from "./errors";

type ModelAgent = "analysis" | "implementation" | "research";

interface IntegratorConfig {
  openaiApiKey?: string;
  models: Record<ModelAgent, string>;
  logTailLines: number;
  runsRoot: string;
  maxSnapshotBytes: number;
}

const DEFAULT_MODEL = "gpt-5";

const optionalText = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

const positiveInt = (fallback: number) =>
  z.coerce.number().int().positive().default(fallback);

const envSchema = z.object({
  OPENAI_API_KEY: optionalText,
  OPENAI_MODEL: optionalText,
  OPENAI_ANALYSIS_MODEL: optionalText,
  OPENAI_IMPLEMENTATION_MODEL: optionalText,
  OPENAI_RESEARCH_MODEL: optionalText,
  INTEGRATOR_LOG_TAIL_LINES: positiveInt(10),
  INTEGRATOR_RUNS_ROOT: z.string().trim().min(1).default(".integrator/runs"),
  INTEGRATOR_MAX_SNAPSHOT_BYTES: positiveInt(200_000),
});

const loadConfig = (
  env: Record<string, string | undefined> = process.env
): IntegratorConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map(
        (issue) => `${issue.path.join(".")}: ${issue.message}.`
      )
    );
  }

  const values = parsed.data;
  const shared = values.OPENAI_MODEL ?? DEFAULT_MODEL;

  return {
    openaiApiKey: values.OPENAI_API_KEY,
    models: {
      analysis: values.OPENAI_ANALYSIS_MODEL ?? shared,
      implementation: values.OPENAI_IMPLEMENTATION_MODEL ?? shared,
      research: values.OPENAI_RESEARCH_MODEL ?? shared,
    },
    logTailLines: values.INTEGRATOR_LOG_TAIL_LINES,
    runsRoot: values.INTEGRATOR_RUNS_ROOT,
    maxSnapshotBytes: values.INTEGRATOR_MAX_SNAPSHOT_BYTES,
  };
};

const requireApiKey = (config: IntegratorConfig): string => {
  if (!config.openaiApiKey) {
    throw new ConfigError(["OPENAI_API_KEY is required to call model-backed agents."]);
  }
  return config.openaiApiKey;
};

export { DEFAULT_MODEL, loadConfig, requireApiKey };
export type { IntegratorConfig, ModelAgent };
