import { parse } from 'csv-parse/sync';
import { HEADER_LINE_COUNT } from '../constants/index.js';
import { HeaderParseError } from '../errors/index.js';
import type { HeaderInfo } from '../types/index.js';
import type { Logger } from '../utils/logger.js';

// csv-parse hands back untyped records; keep only arrays of strings
export function toStringRows(records: unknown): string[][] {
  if (!Array.isArray(records)) return [];
  return records.map((record: unknown) =>
    Array.isArray(record) ? record.map((cell: unknown) => (typeof cell === 'string' ? cell : String(cell ?? ''))) : []
  );
}

function parseLine(line: string): string[] {
  const rows = toStringRows(parse(line, { relax_quotes: true, relax_column_count: true, trim: true }));
  return rows[0] ?? [];
}

/**
 * Parse the 4-line file header: free-form metadata, column names, units and
 * statistics. Units and stats align with column names by position; short
 * lines leave the trailing columns with "".
 */
export function parseHeader(content: string, source: string): HeaderInfo {
  const lines = content.split(/\r?\n/, HEADER_LINE_COUNT + 1).slice(0, HEADER_LINE_COUNT);
  if (lines.length < HEADER_LINE_COUNT) {
    throw new HeaderParseError(`File ${source} has fewer than ${HEADER_LINE_COUNT} header lines`);
  }

  const columns = parseLine(lines[1]);
  if (columns.length === 0 || columns.every(c => c === '')) {
    throw new HeaderParseError(`File ${source} has no column names on header line 2`);
  }
  const unitCells = parseLine(lines[2]);
  const statCells = parseLine(lines[3]);

  const units: Record<string, string> = {};
  const stats: Record<string, string> = {};
  columns.forEach((column, i) => {
    units[column] = unitCells[i] ?? '';
    stats[column] = statCells[i] ?? '';
  });

  return { columns, units, stats };
}

// Warn when a header's column list differs from the first one seen
export function validateHeaderConsistency(headers: readonly HeaderInfo[], logger: Logger): void {
  const reference = headers[0];
  if (!reference) return;

  const refSet = new Set(reference.columns);
  headers.slice(1).forEach((header, offset) => {
    const same = header.columns.length === reference.columns.length &&
      header.columns.every((c, i) => c === reference.columns[i]);
    if (same) return;

    logger.warn(`Header ${offset + 1} has different columns than reference header`);
    const current = new Set(header.columns);
    const missing = reference.columns.filter(c => !current.has(c));
    const extra = header.columns.filter(c => !refSet.has(c));
    if (missing.length > 0) logger.warn(`Missing columns: ${missing.join(', ')}`);
    if (extra.length > 0) logger.warn(`Extra columns: ${extra.join(', ')}`);
  });
}
