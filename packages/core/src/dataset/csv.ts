/**
 * CSV reader for sales data files.
 * Handles a BOM, quoted fields with "" escapes, and CRLF or LF line endings.
 */

import { DatasetError } from '../errors.js';
import { SOURCE_COLUMNS, type SalesRow } from './schema.js';

export interface ParsedCsv {
  headers: string[];
  /** Data records, each paired with its 1-based line number */
  records: Array<{ line: number; cells: string[] }>;
}

const DATE_RE = /^(\d{4})-(\d{2})-(\d{2})$/;
const INT_RE = /^-?\d+$/;

export function parseCsv(raw: string): ParsedCsv {
  const text = raw.charCodeAt(0) === 0xfeff ? raw.slice(1) : raw;
  const lines = splitLines(text);
  if (lines.length === 0) {
    throw new DatasetError('CSV file is empty');
  }

  const headers = parseLine(lines[0].text).map((h) => h.trim());
  const records: ParsedCsv['records'] = [];
  for (const { line, text: rowText } of lines.slice(1)) {
    if (!rowText.trim()) continue;
    records.push({ line, cells: parseLine(rowText) });
  }
  return { headers, records };
}

/**
 * Convert parsed records to typed rows, deriving month and revenue.
 */
export function toSalesRows(csv: ParsedCsv): SalesRow[] {
  const index = new Map<string, number>();
  csv.headers.forEach((h, i) => index.set(h.toLowerCase(), i));

  const missing = SOURCE_COLUMNS.filter((c) => !index.has(c));
  if (missing.length > 0) {
    throw new DatasetError(`CSV is missing required column(s): ${missing.join(', ')}`);
  }

  return csv.records.map(({ line, cells }) => {
    const cell = (name: (typeof SOURCE_COLUMNS)[number]): string =>
      (cells[index.get(name) ?? -1] ?? '').trim();

    const date = cell('date');
    const dateMatch = DATE_RE.exec(date);
    if (!dateMatch) {
      throw new DatasetError(`Line ${line}: invalid date "${date}" (expected YYYY-MM-DD)`);
    }
    const units = parseInteger(cell('units'), 'units', line);
    const unitPrice = parseInteger(cell('unit_price'), 'unit_price', line);

    return {
      date,
      month: `${dateMatch[1]}-${dateMatch[2]}`,
      category: requireText(cell('category'), 'category', line),
      units,
      unit_price: unitPrice,
      region: requireText(cell('region'), 'region', line),
      sales_channel: requireText(cell('sales_channel'), 'sales_channel', line),
      customer_segment: requireText(cell('customer_segment'), 'customer_segment', line),
      revenue: units * unitPrice,
    };
  });
}

function parseInteger(value: string, column: string, line: number): number {
  if (!INT_RE.test(value)) {
    throw new DatasetError(`Line ${line}: ${column} must be an integer, got "${value}"`);
  }
  return Number(value);
}

function requireText(value: string, column: string, line: number): string {
  if (!value) {
    throw new DatasetError(`Line ${line}: ${column} is empty`);
  }
  return value;
}

function splitLines(text: string): Array<{ line: number; text: string }> {
  const lines: Array<{ line: number; text: string }> = [];
  let current = '';
  let inQuotes = false;
  let lineNo = 1;
  let startLine = 1;

  for (let i = 0; i < text.length; i++) {
    const ch = text[i];
    if (ch === '"') {
      inQuotes = !inQuotes;
      current += ch;
    } else if ((ch === '\n' || ch === '\r') && !inQuotes) {
      lines.push({ line: startLine, text: current });
      current = '';
      if (ch === '\r' && text[i + 1] === '\n') i++;
      lineNo++;
      startLine = lineNo;
    } else {
      if (ch === '\n') lineNo++;
      current += ch;
    }
  }
  if (current.trim()) lines.push({ line: startLine, text: current });
  return lines;
}

function parseLine(line: string): string[] {
  const cells: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (ch === '"') {
      if (inQuotes && line[i + 1] === '"') {
        current += '"';
        i++;
      } else {
        inQuotes = !inQuotes;
      }
    } else if (ch === ',' && !inQuotes) {
      cells.push(current);
      current = '';
    } else {
      current += ch;
    }
  }
  cells.push(current);
  return cells;
}

/** Parse sales CSV text into typed rows */
export function loadSalesRows(text: string): SalesRow[] {
  return toSalesRows(parseCsv(text));
}
