import { createHash } from "crypto";
import { userInfo } from "os";

import type { EntityProfile } from "@shared/entities";
import type { AnalysisReport, ClassificationResult, InventoryRecord, VerdictCounts } from "@shared/schema";
import { writeWorkbookFile, type SheetData } from "../excel-parser";

export const METADATA_SHEET = "Metadata";

export interface ReportArtifact {
  filePath: string;
  fileSize: number;
  contentSha256: string;
  counts: VerdictCounts;
}

export function countVerdicts(results: readonly ClassificationResult[]): VerdictCounts {
  const deviation = results.filter((result) => result.verdict === "Deviation").length;
  const ok = results.filter((result) => result.verdict === "OK").length;
  return {
    total: results.length,
    deviation,
    ok,
    unknown: results.length - deviation - ok,
  };
}

const pad = (n: number) => String(n).padStart(2, "0");

// YYYY-MM-DD HH:MM:SS in local time
export function formatTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

export function currentUserName(): string {
  try {
    return userInfo().username;
  } catch {
    // no passwd entry, as in some containers
    return process.env.USER ?? process.env.USERNAME ?? "unknown";
  }
}

export function buildMetadataRows(report: AnalysisReport): InventoryRecord[] {
  const counts = countVerdicts(report.results);
  const entries: Array<[string, string | number]> = [
    ["user", report.user],
    ["report_timestamp", formatTimestamp(report.generatedAt)],
    ["generated_by", report.generatedBy],
    ["source_population_file", report.sourceFileName],
    ["total_records_analyzed", counts.total],
    ["exception_records", counts.deviation],
    ["ok_records", counts.ok],
    ["unknown_records", counts.unknown],
    ["environment", report.environment],
  ];
  return entries.map(([key, value]) => ({ Key: key, Value: value }));
}

export function buildReportSheets(
  profile: EntityProfile,
  report: AnalysisReport,
  inputColumns: readonly string[]
): SheetData[] {
  return [
    { name: profile.sourceSheet, columns: [...inputColumns], rows: report.inputRows },
    {
      name: profile.resultsSheet,
      columns: ["System_Name", profile.verdictField, "Reason"],
      rows: report.results.map((result) => ({
        System_Name: result.systemName,
        [profile.verdictField]: result.verdict,
        Reason: result.reason,
      })),
    },
    { name: METADATA_SHEET, columns: ["Key", "Value"], rows: buildMetadataRows(report) },
  ];
}

/**
 * Write the input rows, the per-system verdicts and the metadata block to a
 * three-sheet workbook.
 */
export async function writeAnalysisReport(
  filePath: string,
  profile: EntityProfile,
  report: AnalysisReport,
  inputColumns: readonly string[]
): Promise<ReportArtifact> {
  const buffer = await writeWorkbookFile(filePath, buildReportSheets(profile, report, inputColumns));

  return {
    filePath,
    fileSize: buffer.length,
    contentSha256: createHash("sha256").update(buffer).digest("hex"),
    counts: countVerdicts(report.results),
  };
}
