import { mkdtemp, rm } from "fs/promises";
import { tmpdir } from "os";
import path from "path";

import { describeMissingStages, type RequiredStage } from "@shared/environmentMapping";
import type { InventoryRecord } from "@shared/schema";
import { readSheet, readWorkbookFile, type SheetData } from "../../server/excel-parser";

export async function makeTempDir(): Promise<string> {
  return mkdtemp(path.join(tmpdir(), "segregation-test-"));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

export function inventory(columns: string[], ...rows: Array<Array<string | number | null>>): InventoryRecord[] {
  return rows.map((cells) => Object.fromEntries(columns.map((column, idx) => [column, cells[idx] ?? null])));
}

export async function readBack(filePath: string): Promise<{ sheetNames: string[]; sheet(name: string): SheetData }> {
  const workbook = await readWorkbookFile(filePath);
  return {
    sheetNames: workbook.SheetNames,
    sheet(name: string): SheetData {
      const data = readSheet(workbook, name);
      if (!data) throw new Error(`Sheet ${name} missing from ${filePath}`);
      return data;
    },
  };
}

export function metadataValues(sheet: SheetData): Record<string, unknown> {
  return Object.fromEntries(sheet.rows.map((row) => [String(row.Key), row.Value]));
}

interface PromptRow {
  "System Name": string;
  "Has DEV": boolean;
  "Has TEST": boolean;
  "Has PROD": boolean;
}

function isPromptRow(value: unknown): value is PromptRow {
  return typeof value === "object" && value !== null && "System Name" in value && "Has DEV" in value;
}

// The summaries a classification prompt carries
export function promptRows(prompt: string): PromptRow[] {
  const line = prompt.split("\n").find((candidate) => candidate.startsWith('[{"System Name"'));
  if (!line) return [];
  const parsed: unknown = JSON.parse(line);
  return Array.isArray(parsed) ? parsed.filter(isPromptRow) : [];
}

/**
 * A responder for MockAgentsService that answers the way the instructions ask,
 * wrapped in a fenced block with some chatter around it.
 */
export function classifyingResponder(verdictField: string, skip: readonly string[] = []): (prompt: string) => string {
  return (prompt) => {
    const records = promptRows(prompt)
      .filter((row) => !skip.includes(row["System Name"]))
      .map((row) => {
        const missing: RequiredStage[] = [];
        if (!row["Has DEV"]) missing.push("DEV");
        if (!row["Has TEST"]) missing.push("TEST");
        if (!row["Has PROD"]) missing.push("PROD");
        return {
          System_Name: row["System Name"],
          [verdictField]: missing.length === 0 ? "OK" : "Deviation",
          Reason: describeMissingStages(missing),
        };
      });
    return `Here is the analysis:\n\`\`\`json\n${JSON.stringify(records, null, 2)}\n\`\`\`\nDone.`;
  };
}
