import * as XLSX from "xlsx";
import { readFile, readdir, stat, writeFile } from "fs/promises";
import path from "path";

import type { CellValue, InventoryRecord } from "@shared/schema";

export interface SheetData {
  name: string;
  columns: string[];
  rows: InventoryRecord[];
}

// Excel caps sheet names at 31 characters
const MAX_SHEET_NAME_LENGTH = 31;

export async function readWorkbookFile(filePath: string): Promise<XLSX.WorkBook> {
  const buffer = await readFile(filePath);
  return XLSX.read(buffer, { type: "buffer" });
}

export function hasSheet(workbook: XLSX.WorkBook, sheetName: string): boolean {
  return workbook.SheetNames.includes(sheetName);
}

function normalizeCell(value: unknown): CellValue {
  if (value === null || value === undefined) return null;
  if (typeof value === "string") {
    const trimmed = value.trim();
    return trimmed.length > 0 ? trimmed : null;
  }
  if (typeof value === "number" || typeof value === "boolean" || value instanceof Date) {
    return value;
  }
  return String(value);
}

/**
 * Read one sheet as header-keyed rows. Blank rows are skipped, text cells are
 * trimmed and empty cells come back as null. Returns null when the sheet is
 * missing.
 */
export function readSheet(workbook: XLSX.WorkBook, sheetName: string): SheetData | null {
  const sheet = workbook.Sheets[sheetName];
  if (!sheet) {
    return null;
  }

  const grid = XLSX.utils.sheet_to_json<unknown[]>(sheet, {
    header: 1,
    defval: null,
    blankrows: false,
  });
  if (grid.length === 0) {
    return { name: sheetName, columns: [], rows: [] };
  }

  const headerRow = grid[0];
  const columns = headerRow.map((header) => (header === null ? "" : String(header).trim()));

  const rows: InventoryRecord[] = [];
  for (const cells of grid.slice(1)) {
    const row: InventoryRecord = {};
    for (let idx = 0; idx < columns.length; idx++) {
      if (columns[idx]) row[columns[idx]] = normalizeCell(cells[idx]);
    }
    if (Object.values(row).some((value) => value !== null)) rows.push(row);
  }

  return { name: sheetName, columns: columns.filter((column) => column.length > 0), rows };
}

export function missingColumns(columns: readonly string[], required: readonly string[]): string[] {
  return required.filter((column) => !columns.includes(column));
}

export function buildWorkbook(sheets: readonly SheetData[]): XLSX.WorkBook {
  const workbook = XLSX.utils.book_new();

  for (const sheetData of sheets) {
    const worksheet = XLSX.utils.json_to_sheet(sheetData.rows, { header: sheetData.columns });
    worksheet["!cols"] = sheetData.columns.map((column) => ({ wch: Math.max(12, column.length + 2) }));
    XLSX.utils.book_append_sheet(workbook, worksheet, sheetData.name.slice(0, MAX_SHEET_NAME_LENGTH));
  }

  return workbook;
}

export async function writeWorkbookFile(filePath: string, sheets: readonly SheetData[]): Promise<Buffer> {
  const workbook = buildWorkbook(sheets);
  const buffer: Buffer = XLSX.write(workbook, { type: "buffer", bookType: "xlsx" });
  await writeFile(filePath, buffer);
  return buffer;
}

/**
 * Newest file in a directory whose name ends with the given suffix, by
 * modification time. Returns null when nothing matches or the directory is
 * missing.
 */
export async function findLatestFile(directory: string, suffix: string): Promise<string | null> {
  let entries: string[];
  try {
    entries = await readdir(directory);
  } catch {
    return null;
  }

  let latest: { filePath: string; mtimeMs: number } | null = null;
  for (const entry of entries) {
    if (!entry.endsWith(suffix) || entry.startsWith("~$")) continue;
    const filePath = path.join(directory, entry);
    const info = await stat(filePath);
    if (!info.isFile()) continue;
    if (!latest || info.mtimeMs > latest.mtimeMs) {
      latest = { filePath, mtimeMs: info.mtimeMs };
    }
  }

  return latest ? latest.filePath : null;
}
