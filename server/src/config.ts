import { z } from "zod";
import { DEFAULT_MODEL } from "./pipeline/agents.js";
import { MissingCredentialError } from "./pipeline/errors.js";
import { DEFAULT_DOCUMENT_CHAR_LIMIT } from "./pipeline/stages.js";
import { DEFAULT_MAX_RETRIES } from "./pipeline/workflow.js";

export const MAX_RETRIES_LIMIT = 10;

export type PipelineMode = "live" | "fake";

export type AppConfig = {
  openaiApiKey: string | null;
  model: string;
  maxRetries: number;
  documentCharLimit: number;
  pipelineMode: PipelineMode;
  maxConcurrentRuns: number;
  port: number;
};

const trimmed = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

function intInRange(fallback: number, min: number, max: number) {
  // Out-of-range or non-numeric values fall back rather than failing startup.
  return trimmed.transform((v) => {
    const n = v === undefined ? Number.NaN : Number(v);
    return Number.isInteger(n) && n >= min && n <= max ? n : fallback;
  });
}

const EnvSchema = z.object({
  OPENAI_API_KEY: trimmed,
  GF_MODEL: trimmed,
  GF_MAX_RETRIES: intInRange(DEFAULT_MAX_RETRIES, 1, MAX_RETRIES_LIMIT),
  GF_DOC_CHAR_LIMIT: intInRange(DEFAULT_DOCUMENT_CHAR_LIMIT, 500, 200_000),
  GF_PIPELINE_MODE: trimmed,
  GF_MAX_CONCURRENT_RUNS: intInRange(1, 1, 16),
  PORT: intInRange(5050, 1, 65_535)
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.parse(env);
  return {
    openaiApiKey: parsed.OPENAI_API_KEY ?? null,
    model: parsed.GF_MODEL ?? DEFAULT_MODEL,
    maxRetries: parsed.GF_MAX_RETRIES,
    documentCharLimit: parsed.GF_DOC_CHAR_LIMIT,
    pipelineMode: parsed.GF_PIPELINE_MODE?.toLowerCase() === "fake" ? "fake" : "live",
    maxConcurrentRuns: parsed.GF_MAX_CONCURRENT_RUNS,
    port: parsed.PORT
  };
}

export function requireApiKey(config: AppConfig): string {
  if (!config.openaiApiKey) throw new MissingCredentialError("OPENAI_API_KEY");
  return config.openaiApiKey;
}
