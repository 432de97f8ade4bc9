/**
 * CSV parsing for response exports.
 * Handles quoted fields, escaped quotes and line breaks inside quotes.
 */

export type CsvErrorReason = "empty_file" | "malformed_csv" | "missing_header";

export interface CsvError {
  /** 0-based record index (0 = header) */
  rowIndex: number;
  reason: CsvErrorReason;
  rawValue: string;
}

export interface CsvTable {
  columns: string[];
  /** Column name -> raw value. Short rows are padded with "". */
  rows: Record<string, string>[];
  errors: CsvError[];
}

export interface CsvOptions {
  /** Field delimiter; default "," */
  delimiter?: string;
  /** Applied to header cells before they become column names */
  normalizeHeader?: (header: string) => string;
}

const DEFAULT_DELIMITER = ",";

/**
 * Split content into records of fields. Returns null when a quote is never closed.
 */
function splitRecords(content: string, delimiter: string): string[][] | null {
  const records: string[][] = [];
  let fields: string[] = [];
  let field = "";
  let inQuotes = false;
  let i = 0;

  while (i < content.length) {
    const ch = content[i];
    if (inQuotes) {
      if (ch === '"') {
        if (content[i + 1] === '"') {
          field += '"';
          i += 2;
          continue;
        }
        inQuotes = false;
      } else {
        field += ch;
      }
      i++;
      continue;
    }

    if (ch === '"' && field.trim() === "") {
      field = "";
      inQuotes = true;
    } else if (ch === delimiter) {
      fields.push(field.trim());
      field = "";
    } else if (ch === "\n" || ch === "\r") {
      fields.push(field.trim());
      records.push(fields);
      fields = [];
      field = "";
      if (ch === "\r" && content[i + 1] === "\n") i++;
    } else {
      field += ch;
    }
    i++;
  }

  if (inQuotes) return null;
  if (field !== "" || fields.length > 0) {
    fields.push(field.trim());
    records.push(fields);
  }
  return records;
}

function isEmptyLine(record: string[]): boolean {
  return record.length === 1 && record[0] === "";
}

export function parseCsv(content: string, options: CsvOptions = {}): CsvTable {
  const delimiter = options.delimiter ?? DEFAULT_DELIMITER;
  const normalizeHeader = options.normalizeHeader ?? ((h: string) => h);

  if (content.trim().length === 0) {
    return { columns: [], rows: [], errors: [{ rowIndex: 0, reason: "empty_file", rawValue: "" }] };
  }

  const records = splitRecords(content, delimiter);
  if (records === null) {
    return {
      columns: [],
      rows: [],
      errors: [{ rowIndex: 0, reason: "malformed_csv", rawValue: content.slice(0, 80) }],
    };
  }

  const nonBlank = records.filter((r) => !isEmptyLine(r));
  const header = nonBlank[0];
  if (!header || header.every((h) => h === "")) {
    return { columns: [], rows: [], errors: [{ rowIndex: 0, reason: "missing_header", rawValue: "" }] };
  }

  const columns = header.map(normalizeHeader);
  const rows: Record<string, string>[] = [];
  for (const record of nonBlank.slice(1)) {
    const row: Record<string, string> = {};
    columns.forEach((col, c) => {
      row[col] = record[c] ?? "";
    });
    rows.push(row);
  }
  return { columns, rows, errors: [] };
}
