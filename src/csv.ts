// src/csv.ts — CSV reading and writing
// Small RFC 4180 reader/writer: quoted fields, doubled quotes, commas and newlines inside quotes.

export type CsvCell = string | number | boolean | null | undefined;

/**
 * Split CSV text into rows of raw fields. Blank lines are dropped.
 */
export function parseCsv(content: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let current = "";
  let inQuotes = false;

  const text = content.charCodeAt(0) === 0xfeff ? content.slice(1) : content;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];

    if (inQuotes) {
      if (char === '"') {
        if (text[i + 1] === '"') {
          // Escaped quote
          current += '"';
          i++;
        } else {
          inQuotes = false;
        }
      } else {
        current += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ",") {
      row.push(current);
      current = "";
    } else if (char === "\n" || char === "\r") {
      if (char === "\r" && text[i + 1] === "\n") i++;
      row.push(current);
      pushRow(rows, row);
      row = [];
      current = "";
    } else {
      current += char;
    }
  }

  row.push(current);
  pushRow(rows, row);
  return rows;
}

function pushRow(rows: string[][], row: string[]): void {
  if (row.length === 1 && row[0].trim() === "") return;
  rows.push(row.map((field) => field.trim()));
}

export interface CsvTable {
  header: string[];
  records: Record<string, string>[];
}

/**
 * Parse CSV text whose first row is a header. Missing trailing cells become "".
 */
export function parseCsvTable(content: string): CsvTable {
  const rows = parseCsv(content);
  if (rows.length === 0) return { header: [], records: [] };

  const [header, ...body] = rows;
  const records = body.map((cells) => {
    const record: Record<string, string> = {};
    header.forEach((column, index) => {
      record[column] = cells[index] ?? "";
    });
    return record;
  });
  return { header, records };
}

/** Quote a field when it contains a comma, quote or line break. */
export function escapeCsvField(value: CsvCell): string {
  if (value === null || value === undefined) return "";
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/** Render rows as CSV text, one trailing newline. */
export function toCsv(rows: CsvCell[][]): string {
  return rows.map((row) => row.map(escapeCsvField).join(",")).join("\n") + "\n";
}
