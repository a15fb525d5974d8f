import { z } from "zod";

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

const positiveInt = (fallback: number) => z.coerce.number().int().positive().default(fallback);
const nonNegativeInt = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z.object({
  PROJECT_ENDPOINT: z.string().url("PROJECT_ENDPOINT must be a URL"),
  PROJECT_API_KEY: z.string().min(1),
  AGENT_MODEL_DEPLOYMENT_NAME: z.string().min(1),
  AGENT_NAME: z.string().min(1).default("Environment Segregation Analyzer"),
  ANALYSIS_BATCH_SIZE: positiveInt(10),
  ANALYSIS_MAX_RETRIES: positiveInt(5),
  ANALYSIS_MAX_CONCURRENCY: positiveInt(Number.MAX_SAFE_INTEGER),
  RUN_POLL_INTERVAL_MS: nonNegativeInt(2000),
  RUN_MAX_POLLS: positiveInt(30),
  RUN_RETRY_DELAY_MS: nonNegativeInt(2000),
  REPORT_ENVIRONMENT: z.string().min(1).default("Development"),
  LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info"),
});

export interface AgentsConfig {
  endpoint: string;
  apiKey: string;
  modelDeployment: string;
  agentName: string;
}

export interface AnalysisConfig {
  batchSize: number;
  maxRetries: number;
  maxConcurrentBatches: number;
  pollIntervalMs: number;
  maxPolls: number;
  retryDelayMs: number;
  reportEnvironment: string;
}

export interface AppConfig {
  agents: AgentsConfig;
  analysis: AnalysisConfig;
  logLevel: z.infer<typeof envSchema>["LOG_LEVEL"];
}

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  batchSize: 10,
  maxRetries: 5,
  maxConcurrentBatches: Number.MAX_SAFE_INTEGER,
  pollIntervalMs: 2000,
  maxPolls: 30,
  retryDelayMs: 2000,
  reportEnvironment: "Development",
};

/**
 * Read and validate configuration from the process environment.
 * Blank variables count as missing.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== "")
  );

  const parsed = envSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new ConfigurationError(`Invalid configuration - ${problems}`);
  }

  const vars = parsed.data;
  return {
    agents: {
      endpoint: vars.PROJECT_ENDPOINT,
      apiKey: vars.PROJECT_API_KEY,
      modelDeployment: vars.AGENT_MODEL_DEPLOYMENT_NAME,
      agentName: vars.AGENT_NAME,
    },
    analysis: {
      batchSize: vars.ANALYSIS_BATCH_SIZE,
      maxRetries: vars.ANALYSIS_MAX_RETRIES,
      maxConcurrentBatches: vars.ANALYSIS_MAX_CONCURRENCY,
      pollIntervalMs: vars.RUN_POLL_INTERVAL_MS,
      maxPolls: vars.RUN_MAX_POLLS,
      retryDelayMs: vars.RUN_RETRY_DELAY_MS,
      reportEnvironment: vars.REPORT_ENVIRONMENT,
    },
    logLevel: vars.LOG_LEVEL,
  };
}
