import { parseArgs } from "node:util";
import { z } from "zod";

import { kindsForSelector, PROCESS_SELECTORS } from "@shared/entities";
import { ConfigurationError, loadConfig, type AgentsConfig, type AppConfig } from "./config";
import { createLogger, errorMessage, setLogLevel } from "./logger";
import { createOpenAIClient, OpenAIAgentsService } from "./openai";
import { WorkflowScheduler } from "./scheduler";
import type { AgentsService } from "./services/agentsService";
import { WorkflowManager } from "./services/workflowManager";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

const log = createLogger("Main");

const cliOptionsSchema = z.object({
  mode: z.enum(["run", "schedule"]).default("run"),
  interval: z.coerce.number().int().positive().default(5),
  duration: z.coerce.number().int().nonnegative().default(60),
  dataDir: z.string().min(1).default("data/input"),
  outputDir: z.string().min(1).default("data/output"),
  process: z.enum(PROCESS_SELECTORS).default("env"),
});

export type CliOptions = z.infer<typeof cliOptionsSchema>;

export const USAGE = `Usage: segregation-analyzer [options]

  --mode run|schedule        single pass or periodic execution (default: run)
  --interval <minutes>       schedule interval (default: 5)
  --duration <minutes>       how long to schedule, 0 for indefinite (default: 60)
  --data-dir <path>          directory holding the source and parameter workbooks (default: data/input)
  --output-dir <path>        directory for population and analysis files (default: data/output)
  --process env|db|server|url|cloud|all
                             inventory to process (default: env)
  -h, --help                 show this help`;

export type ParsedCommand = { help: true } | { help: false; options: CliOptions };

export function parseCliArgs(argv: string[]): ParsedCommand {
  const { values } = parseArgs({
    args: argv,
    strict: true,
    allowPositionals: false,
    options: {
      mode: { type: "string" },
      interval: { type: "string" },
      duration: { type: "string" },
      "data-dir": { type: "string" },
      "output-dir": { type: "string" },
      process: { type: "string" },
      help: { type: "boolean", short: "h" },
    },
  });

  if (values.help) {
    return { help: true };
  }

  const parsed = cliOptionsSchema.safeParse({
    mode: values.mode,
    interval: values.interval,
    duration: values.duration,
    dataDir: values["data-dir"],
    outputDir: values["output-dir"],
    process: values.process,
  });
  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `--${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new Error(problems);
  }
  return { help: false, options: parsed.data };
}

export interface MainDependencies {
  env?: NodeJS.ProcessEnv;
  createService?: (config: AgentsConfig) => AgentsService;
}

function defaultService(config: AgentsConfig): AgentsService {
  return new OpenAIAgentsService(createOpenAIClient(config));
}

export async function main(argv: string[], deps: MainDependencies = {}): Promise<number> {
  let command: ParsedCommand;
  try {
    command = parseCliArgs(argv);
  } catch (error) {
    log.error(errorMessage(error));
    console.error(USAGE);
    return EXIT_USAGE;
  }
  if (command.help) {
    console.log(USAGE);
    return EXIT_OK;
  }
  const options = command.options;

  let config: AppConfig;
  try {
    config = loadConfig(deps.env ?? process.env);
  } catch (error) {
    if (error instanceof ConfigurationError) {
      log.error(error.message);
      return EXIT_FAILURE;
    }
    throw error;
  }
  setLogLevel(config.logLevel);

  log.info("Starting Data Extraction and Analysis");
  const kinds = kindsForSelector(options.process);
  const manager = new WorkflowManager({
    dataDir: options.dataDir,
    outputDir: options.outputDir,
    service: (deps.createService ?? defaultService)(config.agents),
    agents: config.agents,
    analysis: config.analysis,
  });

  if (options.mode === "run") {
    log.info("Running in single execution mode");
    const results = await manager.runWorkflows(kinds);
    const failed = kinds.filter((kind) => !results[kind]);
    if (failed.length > 0) {
      log.error(`Failed workflows: ${failed.join(", ")}`);
      return EXIT_FAILURE;
    }
    log.info("Data Extraction and Analysis completed");
    return EXIT_OK;
  }

  log.info(`Running in periodic execution mode with ${options.interval} minute interval`);
  const scheduler = new WorkflowScheduler(manager, {
    kinds,
    intervalMinutes: options.interval,
    durationMinutes: options.duration,
  });

  const onInterrupt = () => {
    log.info("Stopping schedulers...");
    void scheduler.stop();
  };
  process.once("SIGINT", onInterrupt);
  try {
    await scheduler.start();
  } finally {
    process.removeListener("SIGINT", onInterrupt);
  }

  return scheduler.stats.failedRuns > 0 ? EXIT_FAILURE : EXIT_OK;
}
