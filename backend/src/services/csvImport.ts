import * as XLSX from "xlsx";
import type { CsvRecord, CsvRow } from "../types.ts";
import type { ApplicantInput } from "./applicantStore.ts";

export interface ColumnMap {
  name?: string;
  email?: string;
  contact?: string;
  phone?: string;
  job?: string;
  appliedDate?: string;
  notes?: string;
}

/**
 * Parse CSV text into one record per data row, keyed by the header row.
 * Cells are kept as text. Blank lines yield no record but still count
 * towards the row numbers of the lines after them.
 */
export function parseCsv(input: Buffer | string): CsvRecord[] {
  const text = (typeof input === "string" ? input : input.toString("utf-8")).replace(/^\uFEFF/, "");
  if (text.trim().length === 0) {
    return [];
  }
  const workbook = XLSX.read(text, { type: "string", raw: true });
  const sheetName = workbook.SheetNames[0];
  const sheet = sheetName ? workbook.Sheets[sheetName] : undefined;
  if (!sheet) {
    return [];
  }
  const records = XLSX.utils.sheet_to_json<Record<string, unknown>>(sheet, { defval: "", raw: true });
  return records
    .map((record, index) => ({
      rowNumber: sheetRowNumber(record) ?? index + 1,
      cells: Object.fromEntries(Object.entries(record).map(([header, value]) => [header.trim(), String(value).trim()]))
    }))
    .filter((record) => Object.values(record.cells).some((cell) => cell.length > 0));
}

// sheet_to_json tags each record with a non-enumerable, zero-based __rowNum__; the header is row 0.
function sheetRowNumber(record: Record<string, unknown>): number | undefined {
  const rowNum = record["__rowNum__"];
  return typeof rowNum === "number" && rowNum > 0 ? rowNum : undefined;
}

export function collectHeaders(rows: readonly CsvRow[]): string[] {
  const headers = new Set<string>();
  for (const row of rows) {
    for (const header of Object.keys(row)) {
      headers.add(header);
    }
  }
  return [...headers];
}

export function resolveColumns(headers: readonly string[]): ColumnMap {
  const keyed = headers.map((header) => ({ header, key: header.trim().toLowerCase() }));
  const firstContaining = (...needles: string[]): string | undefined => {
    for (const needle of needles) {
      const hit = keyed.find(({ key }) => key.includes(needle));
      if (hit) return hit.header;
    }
    return undefined;
  };

  return {
    name: keyed.find(({ key }) => key === "name")?.header ?? firstContaining("name"),
    email: firstContaining("email"),
    contact: firstContaining("contact"),
    phone: firstContaining("phone"),
    job: firstContaining("job", "title"),
    appliedDate: firstContaining("applied", "date"),
    notes: firstContaining("note")
  };
}

export function mapRow(row: CsvRow, columns: ColumnMap): ApplicantInput {
  const read = (header?: string): string => (header ? (row[header] ?? "").trim() : "");

  let email = read(columns.email);
  let phone = read(columns.phone);
  // A generic "contact" column fills whichever of email/phone its value looks like.
  if (columns.contact && columns.contact !== columns.email && columns.contact !== columns.phone) {
    const contact = read(columns.contact);
    if (contact.includes("@")) {
      email = email || contact;
    } else if (contact) {
      phone = phone || contact;
    }
  }

  return {
    name: read(columns.name),
    email,
    phone,
    job: read(columns.job),
    notes: read(columns.notes),
    appliedDate: read(columns.appliedDate)
  };
}
