import { promises as fs } from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { stringify } from "csv-stringify/sync";
import { DatasetError } from "./errors";
import type { DatasetRow } from "./types";

async function exists(p: string) {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

export async function loadDataset(filePath: string): Promise<DatasetRow[]> {
  if (!(await exists(filePath))) {
    throw new DatasetError(`File not found at ${filePath}`, { filePath });
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".csv") {
    throw new DatasetError(`Unsupported file type: ${ext || "(none)"} at ${filePath}`, { filePath });
  }

  const csvText = await fs.readFile(filePath, "utf8");
  return parse(csvText, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  }) as DatasetRow[];
}

export function requireColumns(rows: DatasetRow[], columns: readonly string[]) {
  for (const [i, r] of rows.entries()) {
    for (const k of columns) {
      // Header row is line 1
      if (!(k in r)) throw new DatasetError(`Missing column '${k}' in row ${i + 2}`, { column: k });
    }
  }
}

/** Union of the row keys, in first-seen order. */
export function columnsOf(rows: DatasetRow[]): string[] {
  const cols = new Set<string>();
  for (const r of rows) for (const k of Object.keys(r)) cols.add(k);
  return [...cols];
}

export async function writeDataset(filePath: string, rows: DatasetRow[], columns?: string[]) {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const csv = stringify(rows, {
    header: true,
    columns: columns ?? columnsOf(rows),
  });
  await fs.writeFile(filePath, csv, "utf8");
}
