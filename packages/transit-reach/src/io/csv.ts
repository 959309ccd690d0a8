/**
 * Minimal CSV reading and writing (RFC 4180 quoting, comma separator).
 */

export interface CsvColumn<T> {
  readonly header: string;
  readonly value: (row: T) => string | number | boolean | null | undefined;
}

export interface CsvTable {
  /** Lower-cased, trimmed header names */
  readonly headers: readonly string[];
  readonly records: readonly Readonly<Record<string, string>>[];
}

/**
 * Parse CSV text with a header row. Blank lines are skipped, quoted fields
 * may contain commas, doubled quotes and line breaks.
 */
export function parseCsv(content: string): CsvTable {
  const rows = splitRows(content.replace(/^\uFEFF/, '')).filter((row) =>
    row.some((field) => field.trim().length > 0)
  );
  if (rows.length === 0) {
    return { headers: [], records: [] };
  }

  const headers = rows[0].map((header) => header.trim().toLowerCase());
  const records = rows.slice(1).map((row) => {
    const record: Record<string, string> = {};
    headers.forEach((header, index) => {
      record[header] = (row[index] ?? '').trim();
    });
    return record;
  });

  return { headers, records };
}

/**
 * Render rows as CSV text with a trailing newline
 */
export function formatCsv<T>(rows: readonly T[], columns: readonly CsvColumn<T>[]): string {
  const headerRow = columns.map((column) => escapeCsv(column.header)).join(',');
  const dataRows = rows.map((row) =>
    columns.map((column) => escapeCsv(formatValue(column.value(row)))).join(',')
  );
  return [headerRow, ...dataRows].join('\n') + '\n';
}

/**
 * Escape a value for CSV output
 */
export function escapeCsv(value: string): string {
  if (/[",\r\n]/.test(value)) {
    return `"${value.replace(/"/g, '""')}"`;
  }
  return value;
}

function formatValue(value: string | number | boolean | null | undefined): string {
  if (value === null || value === undefined) {
    return '';
  }
  if (typeof value === 'number' && !Number.isFinite(value)) {
    return '';
  }
  return String(value);
}

function splitRows(content: string): string[][] {
  const rows: string[][] = [];
  let row: string[] = [];
  let field = '';
  let inQuotes = false;

  for (let i = 0; i < content.length; i++) {
    const char = content[i];

    if (inQuotes) {
      if (char === '"' && content[i + 1] === '"') {
        field += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        field += char;
      }
      continue;
    }

    if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      row.push(field);
      field = '';
    } else if (char === '\n' || char === '\r') {
      if (char === '\r' && content[i + 1] === '\n') {
        i++;
      }
      row.push(field);
      rows.push(row);
      row = [];
      field = '';
    } else {
      field += char;
    }
  }

  if (field.length > 0 || row.length > 0) {
    row.push(field);
    rows.push(row);
  }
  return rows;
}
