/**
 * Raw CSV rows with their line numbers.
 *
 * The export is read in one pass, so quoted fields may span lines; a
 * row's line is the line it ends on. When the text as a whole cannot be
 * read, it is re-read line by line and only the damaged lines are lost.
 */

import { parse } from "csv-parse/sync";

export interface CsvRow {
  /** 1-based line in the export */
  readonly line: number;
  readonly cells: readonly string[];
}

export interface UnreadableLine {
  readonly line: number;
  readonly reason: string;
}

export interface CsvReadResult {
  readonly rows: readonly CsvRow[];
  readonly unreadable: readonly UnreadableLine[];
}

const PARSE_OPTIONS = {
  bom: true,
  relax_column_count: true,
  relax_quotes: true,
  skip_empty_lines: true,
} as const;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function toCells(record: unknown): readonly string[] {
  if (!Array.isArray(record)) return [];
  return record.map((cell: unknown) => (typeof cell === "string" ? cell.trim() : ""));
}

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isBlank(cells: readonly string[]): boolean {
  return cells.every((cell) => cell === "");
}

function readWhole(text: string): readonly CsvRow[] {
  const parsed: unknown = parse(text, { ...PARSE_OPTIONS, info: true });
  if (!Array.isArray(parsed)) return [];

  const rows: CsvRow[] = [];
  for (const entry of parsed) {
    if (!isRecord(entry) || !isRecord(entry["info"])) continue;
    const lines = entry["info"]["lines"];
    const cells = toCells(entry["record"]);
    if (typeof lines !== "number" || isBlank(cells)) continue;
    rows.push({ line: lines, cells });
  }
  return rows;
}

function readByLine(text: string): CsvReadResult {
  const rows: CsvRow[] = [];
  const unreadable: UnreadableLine[] = [];
  text.split(/\r?\n/).forEach((content, index) => {
    if (content.trim() === "") return;
    const line = index + 1;
    try {
      const parsed: unknown = parse(content, PARSE_OPTIONS);
      const cells = toCells(Array.isArray(parsed) ? parsed[0] : undefined);
      if (!isBlank(cells)) rows.push({ line, cells });
    } catch (error) {
      unreadable.push({ line, reason: reasonOf(error) });
    }
  });
  return { rows, unreadable };
}

export function readCsvRows(text: string): CsvReadResult {
  try {
    return { rows: readWhole(text), unreadable: [] };
  } catch {
    return readByLine(text);
  }
}
