import { mkdir } from "fs/promises";

import { ENTITY_PROFILES, type EntityKind, type EntityProfile } from "@shared/entities";
import type { AgentsConfig, AnalysisConfig } from "../config";
import { createLogger, errorMessage, type Logger } from "../logger";
import { AgentResolver } from "./agentResolver";
import type { AgentsService } from "./agentsService";
import { BatchScheduler } from "./batchScheduler";
import { DataExtractor } from "./dataExtractor";
import { DeviationAnalyzer } from "./deviationAnalyzer";
import { RunClient } from "./runClient";

export interface WorkflowManagerOptions {
  dataDir: string;
  outputDir: string;
  service: AgentsService;
  agents: Pick<AgentsConfig, "agentName" | "modelDeployment">;
  analysis: AnalysisConfig;
  currentUser?: () => string;
  now?: () => Date;
  logger?: Logger;
}

export type WorkflowResults = Partial<Record<EntityKind, boolean>>;

/**
 * Runs extraction followed by deviation analysis for each entity kind. The
 * population file written by the extractor is the analyzer's input, so both
 * stages share the output directory.
 */
export class WorkflowManager {
  private readonly logger: Logger;

  constructor(private readonly options: WorkflowManagerOptions) {
    this.logger = options.logger ?? createLogger("WorkflowManager");
  }

  private childLogger(name: string): Logger | undefined {
    return this.options.logger?.child(name);
  }

  async runExtraction(kind: EntityKind): Promise<string | null> {
    const profile = ENTITY_PROFILES[kind];
    const extractor = new DataExtractor({
      profile,
      dataDir: this.options.dataDir,
      outputDir: this.options.outputDir,
      currentUser: this.options.currentUser,
      now: this.options.now,
      logger: this.childLogger(profile.extractorName),
    });

    if (!(await extractor.run())) {
      this.logger.error(`${profile.displayName} extraction failed`);
      return null;
    }
    const outputFile = await extractor.savePopulationFile();
    if (!outputFile) {
      this.logger.error(`Failed to save ${profile.displayName.toLowerCase()} output file`);
      return null;
    }

    this.logger.info(`${profile.displayName} extraction completed successfully. Output file: ${outputFile}`);
    return outputFile;
  }

  createAnalyzer(profile: EntityProfile): DeviationAnalyzer {
    const { service, analysis, agents } = this.options;
    const logger = this.childLogger(profile.analyzerName);

    // One resolver per analyzer run: every batch of the run shares its agent
    const resolver = new AgentResolver(service, {
      agentName: agents.agentName,
      agentDescription: `Classifies ${profile.displayName.toLowerCase()} inventories against the DEV/TEST/PROD segregation policy`,
      modelDeployment: agents.modelDeployment,
      logger: logger?.child("AgentResolver"),
    });
    const runClient = new RunClient(service, {
      maxRetries: analysis.maxRetries,
      pollIntervalMs: analysis.pollIntervalMs,
      maxPolls: analysis.maxPolls,
      retryDelayMs: analysis.retryDelayMs,
      logger: logger?.child("RunClient"),
    });
    const scheduler = new BatchScheduler(runClient, profile, {
      batchSize: analysis.batchSize,
      maxConcurrentBatches: analysis.maxConcurrentBatches,
      maxRetries: analysis.maxRetries,
      logger: logger?.child("BatchScheduler"),
    });

    return new DeviationAnalyzer({
      profile,
      inputDir: this.options.outputDir,
      outputDir: this.options.outputDir,
      resolver,
      scheduler,
      reportEnvironment: analysis.reportEnvironment,
      currentUser: this.options.currentUser,
      now: this.options.now,
      logger,
    });
  }

  /**
   * Analyze `populationFile`, or the newest population file for the kind in the
   * output directory when none is given.
   */
  async runAnalysis(kind: EntityKind, populationFile?: string): Promise<boolean> {
    const profile = ENTITY_PROFILES[kind];
    this.logger.info(`Starting ${profile.displayName} Deviation Analysis`);

    try {
      const analyzer = this.createAnalyzer(profile);
      if (populationFile) analyzer.useInputFile(populationFile);
      const succeeded = await analyzer.run();
      if (succeeded) {
        this.logger.info(`${profile.displayName} Deviation Analysis completed successfully`);
      } else {
        this.logger.error(`${profile.displayName} Deviation Analysis failed`);
      }
      return succeeded;
    } catch (error) {
      this.logger.error(`Error running ${profile.displayName} Deviation Analysis: ${errorMessage(error)}`);
      return false;
    }
  }

  /**
   * Extract, then analyze. Fails when either stage fails; analysis is skipped
   * when extraction produced no population file.
   */
  async runWorkflow(kind: EntityKind): Promise<boolean> {
    const profile = ENTITY_PROFILES[kind];
    this.logger.info(`Starting ${profile.displayName} Workflow`);

    try {
      await mkdir(this.options.outputDir, { recursive: true });
      const populationFile = await this.runExtraction(kind);
      if (!populationFile) return false;
      return await this.runAnalysis(kind, populationFile);
    } catch (error) {
      this.logger.error(`Error in ${profile.displayName.toLowerCase()} workflow: ${errorMessage(error)}`);
      return false;
    }
  }

  // Sequential; a failing workflow does not stop the ones after it
  async runWorkflows(kinds: readonly EntityKind[]): Promise<WorkflowResults> {
    const results: WorkflowResults = {};
    for (const kind of kinds) {
      const profile = ENTITY_PROFILES[kind];
      this.logger.info(`Running ${profile.displayName} process`);
      results[kind] = await this.runWorkflow(kind);
      if (results[kind]) {
        this.logger.info(`${profile.displayName} process completed successfully`);
      } else {
        this.logger.error(`${profile.displayName} workflow failed`);
      }
    }
    return results;
  }
}
