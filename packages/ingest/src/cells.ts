/**
 * Cell-level parsing: dates, numbers, first-present field lookup.
 *
 * Parsers return undefined on failure; the row reader decides what
 * a failure means for the row.
 */

export type FieldRecord = Readonly<Record<string, string>>;

/**
 * Value of the first listed column that is present and non-empty.
 */
export function firstField(record: FieldRecord, names: readonly string[]): string {
  for (const name of names) {
    const value = record[name];
    if (value !== undefined && value.trim() !== "") {
      return value.trim();
    }
  }
  return "";
}

// ─── Dates ───────────────────────────────────────────────────────────────

const ISO = /^(\d{4})-(\d{2})-(\d{2})$/;
const COMPACT = /^(\d{4})(\d{2})(\d{2})$/;
const DAY_FIRST = /^(\d{2})-(\d{2})-(\d{4})$/;
const US = /^(\d{1,2})\/(\d{1,2})\/(\d{4})$/;

function calendarDate(year: string, month: string, day: string): string | undefined {
  const y = Number(year);
  const m = Number(month);
  const d = Number(day);
  const candidate = new Date(Date.UTC(y, m - 1, d));
  if (candidate.getUTCFullYear() !== y || candidate.getUTCMonth() !== m - 1 || candidate.getUTCDate() !== d) {
    return undefined;
  }
  return `${year}-${month.padStart(2, "0")}-${day.padStart(2, "0")}`;
}

/**
 * Normalise a broker date cell to YYYY-MM-DD.
 *
 * Any time part after ";" or a space is dropped. Accepted layouts:
 * YYYY-MM-DD, YYYYMMDD, DD-MM-YYYY, MM/DD/YYYY.
 */
export function parseDateCell(cell: string): string | undefined {
  const [datePart = ""] = cell.trim().split(";");
  const [value = ""] = datePart.trim().split(" ");

  let match = ISO.exec(value) ?? COMPACT.exec(value);
  if (match !== null) {
    const [, y = "", m = "", d = ""] = match;
    return calendarDate(y, m, d);
  }
  match = DAY_FIRST.exec(value);
  if (match !== null) {
    const [, d = "", m = "", y = ""] = match;
    return calendarDate(y, m, d);
  }
  match = US.exec(value);
  if (match !== null) {
    const [, m = "", d = "", y = ""] = match;
    return calendarDate(y, m, d);
  }
  return undefined;
}

// ─── Numbers ─────────────────────────────────────────────────────────────

const NUMBER = /^([+-])?(\d*)(?:\.(\d*))?$/;

/**
 * Normalise a numeric cell to a plain decimal string.
 *
 * Thousands separators are removed; empty and "--" read as zero.
 * "1,234.50" → "1234.50", "-.5" → "-0.5", "" → "0".
 */
export function parseNumberCell(cell: string): string | undefined {
  const value = cell.trim().replaceAll(",", "");
  if (value === "" || value === "--") {
    return "0";
  }
  const match = NUMBER.exec(value);
  if (match === null) return undefined;
  const [, sign, intPart = "", fracPart = ""] = match;
  if (intPart === "" && fracPart === "") return undefined;

  const digits = `${intPart.replace(/^0+(?=\d)/, "") || "0"}${fracPart === "" ? "" : `.${fracPart}`}`;
  return sign === "-" && !isZeroDecimal(digits) ? `-${digits}` : digits;
}

export function isZeroDecimal(value: string): boolean {
  return /^-?0*(\.0*)?$/.test(value);
}

export function absDecimal(value: string): string {
  return value.startsWith("-") ? value.slice(1) : value;
}
