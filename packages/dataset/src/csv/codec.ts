/**
 * Candle CSV Codec
 *
 * Text <-> rows for the archive schema:
 * `timestamp,open,close,volume,unix_timestamp,high,low`, header row present.
 * Parsing never throws on bad data; malformed lines are collected with their
 * line number and skipped.
 */

import { CANDLE_COLUMNS, type CandleRow } from '@candle-archive/shared';

export const CSV_HEADER = CANDLE_COLUMNS.join(',');

export interface RowError {
  /** 1-based line number in the file (header is line 1) */
  line: number;
  message: string;
}

export interface ParsedCandleCsv {
  /** Header fields as found, empty for an empty file */
  header: string[];
  headerValid: boolean;
  rows: CandleRow[];
  /** Line number of each entry of `rows` */
  lines: number[];
  errors: RowError[];
}

/**
 * Parse a CSV line handling quoted values
 */
export function parseCSVLine(line: string, delimiter: string = ','): string[] {
  const result: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];

    if (char === '"') {
      inQuotes = !inQuotes;
    } else if (char === delimiter && !inQuotes) {
      result.push(current.trim());
      current = '';
    } else {
      current += char;
    }
  }

  result.push(current.trim());
  return result;
}

/**
 * Strict number parse: rejects empty strings and trailing garbage that parseFloat accepts
 */
function parseNumber(value: string): number | null {
  if (value === '') return null;
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

/**
 * Parse one data line into a row
 *
 * @returns the row, or a message describing why it was rejected
 */
export function parseCandleLine(line: string): CandleRow | string {
  const values = parseCSVLine(line);
  if (values.length !== CANDLE_COLUMNS.length) {
    return `expected ${CANDLE_COLUMNS.length} columns, found ${values.length}`;
  }

  const [timestamp = '', open, close, volume, unix, high, low] = values;
  const numbers = [open, close, volume, unix, high, low].map((v) => parseNumber(v ?? ''));

  const invalid = numbers.findIndex((n) => n === null);
  if (invalid !== -1) {
    const column = CANDLE_COLUMNS[invalid + 1];
    return `invalid number in column "${column}"`;
  }

  const [o = 0, c = 0, v = 0, u = 0, h = 0, l = 0] = numbers.map((n) => n ?? 0);
  if (!Number.isInteger(u)) {
    return 'unix_timestamp must be an integer';
  }
  if (timestamp === '') {
    return 'empty timestamp';
  }

  return { timestamp, open: o, close: c, volume: v, unix_timestamp: u, high: h, low: l };
}

/**
 * Parse a whole candle file
 */
export function parseCandleCsv(text: string): ParsedCandleCsv {
  const rawLines = text.split('\n').map((line) => (line.endsWith('\r') ? line.slice(0, -1) : line));
  const result: ParsedCandleCsv = { header: [], headerValid: false, rows: [], lines: [], errors: [] };

  const headerLine = rawLines[0];
  if (headerLine === undefined || headerLine.trim() === '') {
    return result;
  }

  result.header = parseCSVLine(headerLine);
  result.headerValid = result.header.join(',') === CSV_HEADER;

  for (let i = 1; i < rawLines.length; i++) {
    const line = rawLines[i] ?? '';
    if (line.trim().length === 0) continue;

    const parsed = parseCandleLine(line);
    if (typeof parsed === 'string') {
      result.errors.push({ line: i + 1, message: parsed });
    } else {
      result.rows.push(parsed);
      result.lines.push(i + 1);
    }
  }

  return result;
}

/**
 * Render rows as CSV text (header + one line per row + trailing newline)
 */
export function serializeCandleCsv(rows: readonly CandleRow[]): string {
  const lines = [CSV_HEADER];
  for (const row of rows) {
    lines.push(serializeCandleRow(row));
  }
  return lines.join('\n') + '\n';
}

export function serializeCandleRow(row: CandleRow): string {
  return CANDLE_COLUMNS.map((column) => String(row[column])).join(',');
}
