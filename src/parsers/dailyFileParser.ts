import { parse } from 'csv-parse/sync';
import { existsSync, readFileSync } from 'fs';
import { HEADER_LINE_COUNT, MISSING_TOKENS } from '../constants/index.js';
import { errorMessage } from '../errors/index.js';
import type {
  CellValue,
  DailyRecordSet,
  ExpectedFile,
  FileLoadOutcome,
  HeaderInfo,
  RawRow
} from '../types/index.js';
import { findTimestampColumn } from '../utils/dataMerger.js';
import type { Logger } from '../utils/logger.js';
import { parseHeader, toStringRows } from './headerParser.js';

export interface ParsedDailyFile {
  header: HeaderInfo;
  recordSet: DailyRecordSet;
}

// Plain decimal or exponent notation; no hex, binary or Infinity
const DECIMAL_NUMBER = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

function toNumber(cell: string): number | null {
  if (MISSING_TOKENS.has(cell) || !DECIMAL_NUMBER.test(cell)) return null;
  const value = Number(cell);
  return Number.isFinite(value) ? value : null;
}

// Numeric when any cell reads as a number, text otherwise
function coerceColumn(cells: string[]): CellValue[] {
  const numbers = cells.map(toNumber);
  if (numbers.some(n => n !== null)) return numbers;
  return cells.map(cell => (MISSING_TOKENS.has(cell) ? null : cell));
}

/**
 * Parse one daily logger file: 4 header lines followed by comma-separated
 * data rows. The timestamp column keeps its text label; every other column
 * is coerced as a whole to numbers or left as text.
 */
export function parseDailyFile(content: string, source: string): ParsedDailyFile {
  const header = parseHeader(content, source);
  const { columns } = header;

  const rows = toStringRows(parse(content, {
    from_line: HEADER_LINE_COUNT + 1,
    relax_column_count: true,
    relax_quotes: true,
    skip_empty_lines: true,
    trim: true
  }));

  const timestampColumn = findTimestampColumn(columns) ?? columns[0];

  const columnValues = columns.map((column, i): CellValue[] => {
    const cells = rows.map(row => row[i] ?? '');
    return column === timestampColumn
      ? cells.map(cell => (cell === '' ? null : cell))
      : coerceColumn(cells);
  });

  const records: RawRow[] = rows.map((_, r) => {
    const record: RawRow = {};
    columns.forEach((column, c) => {
      record[column] = columnValues[c][r];
    });
    return record;
  });

  return {
    header,
    recordSet: { source, columns, rows: records }
  };
}

// Load one expected daily file; failures become outcomes, never exceptions
export function loadDailyFile(file: ExpectedFile, logger: Logger): FileLoadOutcome {
  if (!existsSync(file.path)) {
    return { status: 'missing', date: file.date, path: file.path };
  }

  try {
    const content = readFileSync(file.path, 'utf-8');
    const { header, recordSet } = parseDailyFile(content, file.path);
    logger.debug(`Read ${recordSet.rows.length} rows from ${file.path}`);
    return { status: 'loaded', date: file.date, path: file.path, header, recordSet };
  } catch (error) {
    const reason = errorMessage(error);
    logger.warn(`Failed to load ${file.path}: ${reason}`);
    return { status: 'failed', date: file.date, path: file.path, reason };
  }
}
