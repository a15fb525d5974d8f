import { mkdir } from "fs/promises";
import path from "path";

import { populationFileName, reportFileName, type EntityProfile } from "@shared/entities";
import { mapToEnvironmentStage } from "@shared/environmentMapping";
import {
  classificationRecordSchema,
  ENVIRONMENT_TYPE_COLUMN,
  SYSTEM_NAME_COLUMN,
  verdictSchema,
  type BatchReport,
  type ClassificationResult,
  type InventoryRecord,
  type RunTarget,
  type SystemSummary,
} from "@shared/schema";
import { findLatestFile, missingColumns, readSheet, readWorkbookFile, type SheetData } from "../excel-parser";
import { createLogger, errorMessage, type Logger } from "../logger";
import type { ClassificationRun } from "./batchScheduler";
import { currentUserName, writeAnalysisReport } from "./reportWriter";

export const NO_VERDICT_REASON = "No verdict returned by the classification service";

export interface DeviationAnalyzerOptions {
  profile: EntityProfile;
  inputDir: string;
  outputDir: string;
  resolver: { resolve(): Promise<RunTarget> };
  scheduler: { classify(summaries: readonly SystemSummary[], target: RunTarget): Promise<ClassificationRun> };
  reportEnvironment: string;
  currentUser?: () => string;
  now?: () => Date;
  logger?: Logger;
}

export interface ReconciliationOutcome {
  results: ClassificationResult[];
  missing: string[];
  unexpected: string[];
  malformed: number;
}

function cellText(value: InventoryRecord[string] | undefined): string {
  if (value === null || value === undefined) return "";
  return value instanceof Date ? value.toISOString() : String(value).trim();
}

/**
 * One summary per distinct system name, in first-seen order, with the distinct
 * environment types observed and the DEV/TEST/PROD presence flags.
 */
export function summarizeSystems(records: readonly InventoryRecord[]): SystemSummary[] {
  const bySystem = new Map<string, Set<string>>();

  for (const record of records) {
    const systemName = cellText(record[SYSTEM_NAME_COLUMN]);
    if (!systemName) continue;

    let types = bySystem.get(systemName);
    if (!types) {
      types = new Set<string>();
      bySystem.set(systemName, types);
    }
    const environmentType = cellText(record[ENVIRONMENT_TYPE_COLUMN]);
    if (environmentType) types.add(environmentType);
  }

  return Array.from(bySystem, ([systemName, types]) => {
    const environmentTypes = Array.from(types);
    const stages = new Set(environmentTypes.map(mapToEnvironmentStage));
    return {
      systemName,
      environmentTypes,
      hasDev: stages.has("DEV"),
      hasTest: stages.has("TEST"),
      hasProd: stages.has("PROD"),
    };
  });
}

/**
 * Match returned records to summaries by system name, never by position.
 * The first record for a system wins; records for systems that were not sent
 * are dropped; systems nobody answered for get an "Unknown" verdict.
 */
export function reconcileResults(
  summaries: readonly SystemSummary[],
  records: readonly unknown[],
  verdictField: string
): ReconciliationOutcome {
  const expected = new Set(summaries.map((summary) => summary.systemName));
  const bySystem = new Map<string, ClassificationResult>();
  const unexpected: string[] = [];
  let malformed = 0;

  for (const record of records) {
    const parsed = classificationRecordSchema.safeParse(record);
    if (!parsed.success) {
      malformed++;
      continue;
    }

    const systemName = parsed.data.System_Name;
    if (!expected.has(systemName)) {
      unexpected.push(systemName);
      continue;
    }
    if (bySystem.has(systemName)) continue;

    const verdict = verdictSchema.safeParse(parsed.data[verdictField]);
    bySystem.set(
      systemName,
      verdict.success
        ? { systemName, verdict: verdict.data, reason: parsed.data.Reason }
        : {
            systemName,
            verdict: "Unknown",
            reason: `Unrecognized verdict ${JSON.stringify(parsed.data[verdictField] ?? null)}`,
          }
    );
  }

  const missing: string[] = [];
  const results = summaries.map((summary) => {
    const result = bySystem.get(summary.systemName);
    if (result) return result;
    missing.push(summary.systemName);
    return { systemName: summary.systemName, verdict: "Unknown" as const, reason: NO_VERDICT_REASON };
  });

  return { results, missing, unexpected, malformed };
}

/**
 * Loads the latest population file for one entity kind, has every system
 * classified by the remote agent and writes the analysis workbook.
 */
export class DeviationAnalyzer {
  readonly name: string;
  inputFile: string | null = null;
  clientName: string | null = null;
  inputColumns: string[] = [];
  inputRows: InventoryRecord[] | null = null;
  summaries: SystemSummary[] = [];
  analysisResults: ClassificationResult[] | null = null;
  batchReports: BatchReport[] = [];

  private readonly profile: EntityProfile;
  private readonly logger: Logger;

  constructor(private readonly options: DeviationAnalyzerOptions) {
    this.profile = options.profile;
    this.name = options.profile.analyzerName;
    this.logger = options.logger ?? createLogger(this.name);
  }

  async findLatestInputFile(): Promise<boolean> {
    const suffix = populationFileName("", this.profile);
    const latest = await findLatestFile(this.options.inputDir, suffix);
    if (!latest) {
      this.logger.error(`No ${suffix.slice(1)} files found in ${this.options.inputDir}`);
      return false;
    }

    this.logger.info(`Found input file: ${latest}`);
    this.useInputFile(latest);
    return true;
  }

  // Analyze this population file instead of looking for the newest one
  useInputFile(file: string): void {
    const suffix = populationFileName("", this.profile);
    const base = path.basename(file);
    this.inputFile = file;
    this.clientName = (base.endsWith(suffix) ? base.slice(0, -suffix.length) : "") || "Default";
    this.logger.info(`Client name: ${this.clientName}`);
  }

  async loadData(): Promise<boolean> {
    if (!this.inputFile && !(await this.findLatestInputFile())) {
      return false;
    }
    const inputFile = this.inputFile;
    if (!inputFile) return false;

    let sheet: SheetData | null;
    try {
      const workbook = await readWorkbookFile(inputFile);
      sheet = readSheet(workbook, this.profile.sourceSheet);
    } catch (error) {
      this.logger.error(`Could not read ${inputFile}: ${errorMessage(error)}`);
      return false;
    }

    if (!sheet) {
      this.logger.error(`Required sheet '${this.profile.sourceSheet}' not found in input file`);
      return false;
    }

    const missing = missingColumns(sheet.columns, this.profile.requiredColumns);
    if (missing.length > 0) {
      this.logger.error(`Required columns ${missing.join(", ")} not found in ${this.profile.sourceSheet} sheet`);
      return false;
    }

    this.inputColumns = sheet.columns;
    this.inputRows = sheet.rows;
    this.logger.info(`Loaded ${sheet.rows.length} records from ${inputFile}`);
    return true;
  }

  async analyzeDeviations(): Promise<boolean> {
    if (!this.inputRows || this.inputRows.length === 0) {
      this.logger.error("No data to analyze");
      return false;
    }

    this.summaries = summarizeSystems(this.inputRows);
    if (this.summaries.length === 0) {
      this.logger.error(`No rows carry a ${SYSTEM_NAME_COLUMN}`);
      return false;
    }

    try {
      const target = await this.options.resolver.resolve();
      const run = await this.options.scheduler.classify(this.summaries, target);
      this.batchReports = run.batches;

      if (run.records.length === 0) {
        this.logger.error("No results returned from AI analysis");
        return false;
      }

      const outcome = reconcileResults(this.summaries, run.records, this.profile.verdictField);
      if (outcome.malformed > 0) {
        this.logger.warn(`Ignored ${outcome.malformed} malformed result records`);
      }
      if (outcome.unexpected.length > 0) {
        this.logger.warn(`Ignored results for systems that were not submitted: ${outcome.unexpected.join(", ")}`);
      }
      if (outcome.missing.length > 0) {
        this.logger.warn(`No verdict for ${outcome.missing.length} systems: ${outcome.missing.join(", ")}`);
      }

      this.analysisResults = outcome.results;
      this.logger.info(`Analysis completed with ${outcome.results.length} results`);
      return true;
    } catch (error) {
      this.logger.error(`Error analyzing deviations: ${errorMessage(error)}`);
      return false;
    }
  }

  async saveAnalysisResults(): Promise<string | null> {
    if (!this.analysisResults || this.analysisResults.length === 0) {
      this.logger.error("No analysis results to save");
      return null;
    }
    if (!this.inputFile || !this.inputRows) {
      this.logger.error("No input data available");
      return null;
    }

    const outputFile = path.join(this.options.outputDir, reportFileName(this.clientName ?? "Default", this.profile));

    try {
      await mkdir(this.options.outputDir, { recursive: true });
      const artifact = await writeAnalysisReport(
        outputFile,
        this.profile,
        {
          inputRows: this.inputRows,
          results: this.analysisResults,
          sourceFileName: path.basename(this.inputFile),
          generatedBy: this.name,
          generatedAt: (this.options.now ?? (() => new Date()))(),
          user: (this.options.currentUser ?? currentUserName)(),
          environment: this.options.reportEnvironment,
        },
        this.inputColumns
      );
      this.logger.info(
        `Analysis results saved to ${artifact.filePath} (${artifact.counts.deviation} deviations, ` +
          `${artifact.counts.ok} ok, ${artifact.counts.unknown} unknown, sha256 ${artifact.contentSha256.slice(0, 12)})`
      );
      return artifact.filePath;
    } catch (error) {
      this.logger.error(`Error saving analysis results: ${errorMessage(error)}`);
      return null;
    }
  }

  async run(): Promise<boolean> {
    this.logger.info(`Starting ${this.profile.displayName} Deviation Analysis`);

    if (!(await this.loadData())) {
      this.logger.error("Failed to load data");
      return false;
    }
    if (!(await this.analyzeDeviations())) {
      this.logger.error("Failed to analyze deviations");
      return false;
    }
    const outputFile = await this.saveAnalysisResults();
    if (!outputFile) {
      this.logger.error("Failed to save analysis results");
      return false;
    }

    this.logger.info(`${this.profile.displayName} Deviation Analysis completed successfully. Results saved to ${outputFile}`);
    return true;
  }
}
