import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { utimes, writeFile } from "fs/promises";
import path from "path";
import {
  buildWorkbook,
  findLatestFile,
  hasSheet,
  missingColumns,
  readSheet,
  readWorkbookFile,
  writeWorkbookFile,
} from "../server/excel-parser";
import { inventory, makeTempDir, removeDir } from "./mocks/fixtures";

describe("excel-parser", () => {
  let dir: string;

  beforeEach(async () => {
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  describe("readSheet", () => {
    it("reads header-keyed rows with trimmed text", async () => {
      const filePath = path.join(dir, "inventory.xlsx");
      const columns = ["System Name", "Environment Type", "Count"];
      await writeWorkbookFile(filePath, [
        {
          name: "Inventory",
          columns,
          rows: inventory(columns, ["  Payroll  ", "DEV", 3], ["Ledger", "PROD", 7]),
        },
      ]);

      const sheet = readSheet(await readWorkbookFile(filePath), "Inventory");

      expect(sheet?.columns).toEqual(columns);
      expect(sheet?.rows).toEqual([
        { "System Name": "Payroll", "Environment Type": "DEV", Count: 3 },
        { "System Name": "Ledger", "Environment Type": "PROD", Count: 7 },
      ]);
    });

    it("returns empty cells as null and skips blank rows", async () => {
      const filePath = path.join(dir, "gaps.xlsx");
      const columns = ["System Name", "Environment Type"];
      await writeWorkbookFile(filePath, [
        {
          name: "Inventory",
          columns,
          rows: inventory(columns, ["Payroll", null], [null, null], ["Ledger", "TEST"]),
        },
      ]);

      const sheet = readSheet(await readWorkbookFile(filePath), "Inventory");

      expect(sheet?.rows).toEqual([
        { "System Name": "Payroll", "Environment Type": null },
        { "System Name": "Ledger", "Environment Type": "TEST" },
      ]);
    });

    it("returns null for a missing sheet", () => {
      const workbook = buildWorkbook([{ name: "Present", columns: ["A"], rows: [] }]);

      expect(readSheet(workbook, "Absent")).toBeNull();
      expect(hasSheet(workbook, "Present")).toBe(true);
    });
  });

  it("truncates sheet names to 31 characters", () => {
    const workbook = buildWorkbook([{ name: "A".repeat(40), columns: ["A"], rows: [] }]);

    expect(workbook.SheetNames).toEqual(["A".repeat(31)]);
  });

  it("lists missing columns in required order", () => {
    expect(missingColumns(["System Name"], ["Env-ID", "System Name", "Environment Type"])).toEqual([
      "Env-ID",
      "Environment Type",
    ]);
  });

  describe("findLatestFile", () => {
    it("picks the most recently modified match", async () => {
      const older = path.join(dir, "Acme_Environment_Data.xlsx");
      const newer = path.join(dir, "Globex_Environment_Data.xlsx");
      const lockFile = path.join(dir, "~$Initech_Environment_Data.xlsx");
      for (const filePath of [older, newer, lockFile, path.join(dir, "notes.txt")]) {
        await writeFile(filePath, "x");
      }
      await utimes(older, new Date("2024-01-01T00:00:00Z"), new Date("2024-01-01T00:00:00Z"));
      await utimes(newer, new Date("2024-02-01T00:00:00Z"), new Date("2024-02-01T00:00:00Z"));
      await utimes(lockFile, new Date("2024-03-01T00:00:00Z"), new Date("2024-03-01T00:00:00Z"));

      expect(await findLatestFile(dir, "_Environment_Data.xlsx")).toBe(newer);
    });

    it("returns null when nothing matches", async () => {
      expect(await findLatestFile(dir, "_Environment_Data.xlsx")).toBeNull();
    });

    it("returns null for a missing directory", async () => {
      expect(await findLatestFile(path.join(dir, "nope"), "_Environment_Data.xlsx")).toBeNull();
    });
  });
});
