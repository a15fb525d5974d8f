import { createHash } from "crypto";
import { access, mkdir } from "fs/promises";
import path from "path";

import { populationFileName, type EntityProfile } from "@shared/entities";
import {
  CLIENT_NAME_COLUMN,
  extractionParametersRowSchema,
  SYSTEM_NAME_COLUMN,
  type ExtractionParametersRow,
  type InventoryRecord,
  type SystemSelection,
} from "@shared/schema";
import { missingColumns, readSheet, readWorkbookFile, writeWorkbookFile, type SheetData } from "../excel-parser";
import { createLogger, errorMessage, type Logger } from "../logger";
import { currentUserName, formatTimestamp, METADATA_SHEET } from "./reportWriter";

export const PARAMETERS_FILE_NAME = "extraction_parameters.xlsx";
export const PARAMETERS_SHEET = "Sheet1";
export const SOURCE_WORKBOOK_FILE_NAME = "Control3_Environment_Segregation_MockData_v4.xlsx";

const DEFAULT_CLIENT_NAME = "Default";
const ALL_SYSTEMS = "all";

export interface DataExtractorOptions {
  profile: EntityProfile;
  dataDir: string;
  outputDir: string;
  currentUser?: () => string;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Keep letters, digits, spaces, "_" and "-", then turn spaces into "_" so the
 * name can prefix a file name.
 */
export function sanitizeClientName(raw: string): string {
  const cleaned = raw
    .trim()
    .replace(/[^\p{L}\p{N} _-]/gu, "")
    .replace(/ /g, "_");
  return cleaned || DEFAULT_CLIENT_NAME;
}

/**
 * "All" on any parameter row selects every system. Otherwise the last row that
 * names systems wins, as a comma-separated list.
 */
export function parseSystemSelection(rows: readonly ExtractionParametersRow[]): SystemSelection | null {
  let selection: SystemSelection | null = null;

  for (const row of rows) {
    const value = row[SYSTEM_NAME_COLUMN];
    if (!value) continue;

    if (value.toLowerCase() === ALL_SYSTEMS) {
      return { all: true, systemNames: [] };
    }
    const systemNames = value
      .split(",")
      .map((name) => name.trim())
      .filter((name) => name.length > 0);
    if (systemNames.length > 0) selection = { all: false, systemNames };
  }

  return selection;
}

export function filterBySelection(rows: readonly InventoryRecord[], selection: SystemSelection): InventoryRecord[] {
  if (selection.all) return [...rows];
  const wanted = new Set(selection.systemNames);
  return rows.filter((row) => wanted.has(String(row[SYSTEM_NAME_COLUMN] ?? "").trim()));
}

// Checksum over the extracted rows, recorded in the population file metadata
export function hashTotal(rows: readonly InventoryRecord[]): string {
  return createHash("md5").update(JSON.stringify(rows)).digest("hex");
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    await access(filePath);
    return true;
  } catch {
    return false;
  }
}

/**
 * Pulls one entity kind's rows out of the source workbook, filtered by the
 * systems named in the parameter workbook, and saves them as the population
 * file the analyzer reads.
 */
export class DataExtractor {
  readonly name: string;
  readonly parametersFile: string;
  readonly sourceFile: string;
  clientName = DEFAULT_CLIENT_NAME;
  selection: SystemSelection | null = null;
  sourceColumns: string[] = [];
  extractedRows: InventoryRecord[] | null = null;
  outputFile: string | null = null;

  private parameterRows: ExtractionParametersRow[] = [];
  private sourceRows: InventoryRecord[] = [];
  private readonly profile: EntityProfile;
  private readonly logger: Logger;

  constructor(private readonly options: DataExtractorOptions) {
    this.profile = options.profile;
    this.name = options.profile.extractorName;
    this.parametersFile = path.join(options.dataDir, PARAMETERS_FILE_NAME);
    this.sourceFile = path.join(options.dataDir, SOURCE_WORKBOOK_FILE_NAME);
    this.logger = options.logger ?? createLogger(this.name);
  }

  async run(): Promise<boolean> {
    this.selection = null;
    this.extractedRows = null;
    this.outputFile = null;
    try {
      if (!(await this.loadData())) return false;
      if (!this.validateData()) return false;
      this.extractClientName();
      if (!this.filterRows()) return false;

      this.outputFile = path.join(this.options.outputDir, populationFileName(this.clientName, this.profile));
      return true;
    } catch (error) {
      this.logger.error(`Error during extraction process: ${errorMessage(error)}`);
      return false;
    }
  }

  private async loadData(): Promise<boolean> {
    if (!(await fileExists(this.parametersFile))) {
      this.logger.error(`Extraction parameters file not found: ${this.parametersFile}`);
      return false;
    }
    if (!(await fileExists(this.sourceFile))) {
      this.logger.error(`${this.profile.displayName} data file not found: ${this.sourceFile}`);
      return false;
    }

    const parameters = readSheet(await readWorkbookFile(this.parametersFile), PARAMETERS_SHEET);
    if (!parameters) {
      this.logger.error(`Required sheet '${PARAMETERS_SHEET}' not found in extraction parameters file`);
      return false;
    }
    if (!parameters.columns.includes(SYSTEM_NAME_COLUMN)) {
      this.logger.error(`Missing required column '${SYSTEM_NAME_COLUMN}' in extraction parameters`);
      return false;
    }

    const parameterRows: ExtractionParametersRow[] = [];
    for (const [index, row] of parameters.rows.entries()) {
      const parsed = extractionParametersRowSchema.safeParse(row);
      if (parsed.success) {
        parameterRows.push(parsed.data);
      } else {
        this.logger.warn(`Skipping unreadable parameter row ${index + 2}: ${parsed.error.issues[0]?.message}`);
      }
    }
    this.parameterRows = parameterRows;
    this.logger.info(`Loaded extraction parameters with ${parameterRows.length} records`);

    const source = readSheet(await readWorkbookFile(this.sourceFile), this.profile.sourceSheet);
    if (!source) {
      this.logger.error(`Required sheet '${this.profile.sourceSheet}' not found in ${SOURCE_WORKBOOK_FILE_NAME}`);
      return false;
    }
    this.sourceColumns = source.columns;
    this.sourceRows = source.rows;
    this.logger.info(`Loaded ${this.profile.displayName.toLowerCase()} data with ${source.rows.length} records`);
    return true;
  }

  private validateData(): boolean {
    if (this.parameterRows.length === 0) {
      this.logger.error("Extraction parameters sheet is empty");
      return false;
    }
    if (this.sourceRows.length === 0) {
      this.logger.error(`${this.profile.sourceSheet} sheet is empty`);
      return false;
    }

    const missing = missingColumns(this.sourceColumns, this.profile.requiredColumns);
    if (missing.length > 0) {
      this.logger.error(`Missing required columns in ${this.profile.sourceSheet}: ${missing.join(", ")}`);
      return false;
    }

    const named = this.sourceRows.filter((row) => row[SYSTEM_NAME_COLUMN] !== null && row[SYSTEM_NAME_COLUMN] !== undefined);
    if (named.length === 0) {
      this.logger.error(`All records have missing values in required column '${SYSTEM_NAME_COLUMN}'`);
      return false;
    }
    if (named.length < this.sourceRows.length) {
      this.logger.warn(`Filtered out ${this.sourceRows.length - named.length} records without a ${SYSTEM_NAME_COLUMN}`);
      this.sourceRows = named;
    }
    return true;
  }

  private extractClientName(): void {
    const first = this.parameterRows[0]?.[CLIENT_NAME_COLUMN] ?? "";
    this.clientName = sanitizeClientName(first);
  }

  private filterRows(): boolean {
    this.selection = parseSystemSelection(this.parameterRows);
    if (!this.selection) {
      this.logger.error("No valid system names provided in extraction parameters");
      return false;
    }

    const rows = filterBySelection(this.sourceRows, this.selection);
    if (rows.length === 0) {
      this.logger.error("No matching records found for the requested systems");
      return false;
    }

    this.extractedRows = rows;
    this.logger.info(`Extracted ${rows.length} records for ${this.describeSelection()}`);
    return true;
  }

  private describeSelection(): string {
    if (!this.selection || this.selection.all) return "All";
    return this.selection.systemNames.join(", ");
  }

  buildMetadataRow(): InventoryRecord {
    const rows = this.extractedRows ?? [];
    return {
      "Extraction timestamp": formatTimestamp((this.options.now ?? (() => new Date()))()),
      "Extracted by user ID": (this.options.currentUser ?? currentUserName)(),
      "Agentic/Non-agentic process": "Agentic",
      "Agent name": this.name,
      "System name": this.describeSelection(),
      "Record count": rows.length,
      "Hash total": hashTotal(rows),
      "Parameter file used": path.basename(this.parametersFile),
    };
  }

  /**
   * Write the filtered rows and a one-row metadata sheet. Returns the file path,
   * or null when there is nothing to save or the write fails.
   */
  async savePopulationFile(): Promise<string | null> {
    if (!this.extractedRows || !this.outputFile) {
      this.logger.error("No data to save or output file not specified");
      return null;
    }

    const metadata = this.buildMetadataRow();
    const sheets: SheetData[] = [
      { name: this.profile.sourceSheet, columns: this.sourceColumns, rows: this.extractedRows },
      { name: METADATA_SHEET, columns: Object.keys(metadata), rows: [metadata] },
    ];

    try {
      await mkdir(this.options.outputDir, { recursive: true });
      await writeWorkbookFile(this.outputFile, sheets);
      this.logger.info(`Data saved to ${this.outputFile}`);
      return this.outputFile;
    } catch (error) {
      this.logger.error(`Error saving data: ${errorMessage(error)}`);
      return null;
    }
  }
}
