import { describe, it, expect, beforeEach, afterEach } from "vitest";
import path from "path";
import { ENTITY_PROFILES } from "@shared/entities";
import type { AnalysisReport, ClassificationResult } from "@shared/schema";
import {
  buildMetadataRows,
  countVerdicts,
  formatTimestamp,
  writeAnalysisReport,
} from "../../server/services/reportWriter";
import { inventory, makeTempDir, metadataValues, readBack, removeDir } from "../mocks/fixtures";

const profile = ENTITY_PROFILES.database;
const columns = ["Database Instance", "System Name", "Environment Type"];

const results: ClassificationResult[] = [
  { systemName: "Payroll", verdict: "Deviation", reason: "No TEST environment available" },
  { systemName: "Ledger", verdict: "OK", reason: "DEV, TEST, PROD environments are present" },
  { systemName: "Billing", verdict: "Unknown", reason: "No verdict returned by the classification service" },
];

function report(): AnalysisReport {
  return {
    inputRows: inventory(columns, ["db-01", "Payroll", "DEV"], ["db-02", "Ledger", "PROD"]),
    results,
    sourceFileName: "Acme_Database_Data.xlsx",
    generatedBy: "DatabaseDeviationAnalyzer",
    generatedAt: new Date(2024, 4, 6, 7, 8, 9),
    user: "tester",
    environment: "Development",
  };
}

describe("reportWriter", () => {
  it("counts verdicts", () => {
    expect(countVerdicts(results)).toEqual({ total: 3, deviation: 1, ok: 1, unknown: 1 });
  });

  it("formats timestamps as YYYY-MM-DD HH:MM:SS", () => {
    expect(formatTimestamp(new Date(2024, 0, 5, 9, 7, 3))).toBe("2024-01-05 09:07:03");
  });

  it("builds metadata rows in order", () => {
    expect(buildMetadataRows(report())).toEqual([
      { Key: "user", Value: "tester" },
      { Key: "report_timestamp", Value: "2024-05-06 07:08:09" },
      { Key: "generated_by", Value: "DatabaseDeviationAnalyzer" },
      { Key: "source_population_file", Value: "Acme_Database_Data.xlsx" },
      { Key: "total_records_analyzed", Value: 3 },
      { Key: "exception_records", Value: 1 },
      { Key: "ok_records", Value: 1 },
      { Key: "unknown_records", Value: 1 },
      { Key: "environment", Value: "Development" },
    ]);
  });

  describe("writeAnalysisReport", () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await removeDir(dir);
    });

    it("writes the input, results and metadata sheets", async () => {
      const filePath = path.join(dir, "Acme_Database_Deviation_Analysis.xlsx");

      const artifact = await writeAnalysisReport(filePath, profile, report(), columns);

      expect(artifact.filePath).toBe(filePath);
      expect(artifact.fileSize).toBeGreaterThan(0);
      expect(artifact.contentSha256).toMatch(/^[0-9a-f]{64}$/);
      expect(artifact.counts).toEqual({ total: 3, deviation: 1, ok: 1, unknown: 1 });

      const workbook = await readBack(filePath);
      expect(workbook.sheetNames).toEqual(["Database_Inventory", "Database_Deviation_Analysis", "Metadata"]);
      expect(workbook.sheet("Database_Inventory").rows).toEqual(report().inputRows);
      expect(workbook.sheet("Database_Deviation_Analysis").columns).toEqual(["System_Name", "Database_Config", "Reason"]);
      expect(workbook.sheet("Database_Deviation_Analysis").rows[0]).toEqual({
        System_Name: "Payroll",
        Database_Config: "Deviation",
        Reason: "No TEST environment available",
      });
      expect(metadataValues(workbook.sheet("Metadata"))).toMatchObject({
        total_records_analyzed: 3,
        exception_records: 1,
        report_timestamp: "2024-05-06 07:08:09",
      });
    });
  });
});
