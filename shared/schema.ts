import { z } from "zod";

// A single spreadsheet cell as SheetJS hands it back with `defval: null`
export type CellValue = string | number | boolean | Date | null;

// One row of a source inventory sheet, keyed by column header
export type InventoryRecord = Record<string, CellValue>;

export const SYSTEM_NAME_COLUMN = "System Name";
export const ENVIRONMENT_TYPE_COLUMN = "Environment Type";
export const CLIENT_NAME_COLUMN = "Client Name";

// === SUMMARIES ===

export interface SystemSummary {
  systemName: string;
  environmentTypes: string[];
  hasDev: boolean;
  hasTest: boolean;
  hasProd: boolean;
}

// Shape each summary takes inside the prompt payload
export interface SummaryPromptRow {
  "System Name": string;
  "Environment Types": string[];
  "Has DEV": boolean;
  "Has TEST": boolean;
  "Has PROD": boolean;
}

export function toPromptRow(summary: SystemSummary): SummaryPromptRow {
  return {
    "System Name": summary.systemName,
    "Environment Types": summary.environmentTypes,
    "Has DEV": summary.hasDev,
    "Has TEST": summary.hasTest,
    "Has PROD": summary.hasProd,
  };
}

// === CLASSIFICATION ===

export const verdictSchema = z.enum(["OK", "Deviation"]);

export type RemoteVerdict = z.infer<typeof verdictSchema>;

// "Unknown" is never produced by the remote service; it marks systems with no verdict
export type Verdict = RemoteVerdict | "Unknown";

export interface ClassificationResult {
  systemName: string;
  verdict: Verdict;
  reason: string;
}

// Spreadsheet/JSON scalar read as trimmed text; absent values become ""
export const cellTextSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .nullish()
  .transform((value) => (value === null || value === undefined ? "" : String(value).trim()));

/**
 * One record of the model's response. The verdict column is named per entity
 * kind ("Environment_DTAP", "Cloud_Config", ...) so it passes through and is
 * read with `verdictSchema` by the caller.
 */
export const classificationRecordSchema = z
  .object({
    System_Name: cellTextSchema.pipe(z.string().min(1)),
    Reason: cellTextSchema,
  })
  .passthrough();

// === BATCHES ===

export interface Batch {
  index: number;
  offset: number;
  total: number;
  rows: SystemSummary[];
  prompt: string;
}

export type BatchStatus = "ok" | "empty" | "mismatch" | "failed";

export interface BatchReport {
  index: number;
  sent: number;
  returned: number;
  status: BatchStatus;
  error?: string;
}

// === REMOTE RUNS ===

export interface RunHandle {
  threadId: string;
  runId: string;
}

export type RunTarget =
  | { kind: "agent"; agentId: string }
  | { kind: "model"; model: string };

export const TERMINAL_FAILURE_STATUSES = ["failed", "cancelled", "expired"] as const;

// === REPORTS ===

export interface VerdictCounts {
  total: number;
  deviation: number;
  ok: number;
  unknown: number;
}

export interface AnalysisReport {
  inputRows: InventoryRecord[];
  results: ClassificationResult[];
  sourceFileName: string;
  generatedBy: string;
  generatedAt: Date;
  user: string;
  environment: string;
}

// === EXTRACTION PARAMETERS ===

export const extractionParametersRowSchema = z.object({
  [CLIENT_NAME_COLUMN]: cellTextSchema,
  [SYSTEM_NAME_COLUMN]: cellTextSchema,
});

export type ExtractionParametersRow = z.infer<typeof extractionParametersRowSchema>;

export interface SystemSelection {
  all: boolean;
  systemNames: string[];
}
