import { NoDataError, MergeError } from '../errors/index.js';
import { TIMESTAMP_CANDIDATES } from '../constants/index.js';
import type {
  CellValue,
  DailyRecordSet,
  DateRange,
  MergeStats,
  MergeSummary,
  RawRow
} from '../types/index.js';
import type { Logger } from './logger.js';
import { MergedSeries } from './mergedSeries.js';
import { buildCanonicalGrid, describeDateRange, parseTimestampLabel } from './time.js';

export interface MergeResult {
  series: MergedSeries;
  stats: MergeStats;
}

interface KeyedRow {
  key: number;
  row: RawRow;
}

// First standard timestamp name present, or null
export function findTimestampColumn(columns: readonly string[]): string | null {
  for (const candidate of TIMESTAMP_CANDIDATES) {
    if (columns.includes(candidate)) return candidate;
  }
  return null;
}

// Standard name, else the first column (degraded mode, warned)
export function resolveTimestampColumn(
  columns: readonly string[],
  logger: Logger
): { column: string; fallback: boolean } {
  const standard = findTimestampColumn(columns);
  if (standard) return { column: standard, fallback: false };

  const first = columns[0];
  if (first === undefined) {
    throw new MergeError('No timestamp column found: no input exposes any column');
  }
  logger.warn(`No standard timestamp column found, using first column: ${first}`);
  return { column: first, fallback: true };
}

// Union of all source columns in first-seen order
export function unionColumns(recordSets: readonly DailyRecordSet[]): string[] {
  const seen = new Set<string>();
  for (const set of recordSets) {
    for (const column of set.columns) seen.add(column);
  }
  return [...seen];
}

/**
 * Concatenate, sort, deduplicate and reindex daily record sets onto the
 * 30-minute grid covering `range`.
 *
 * Record sets must be in processing order: when several rows share a
 * timestamp the earliest one in that order is kept.
 */
export function mergeDailyData(
  recordSets: readonly DailyRecordSet[],
  range: DateRange,
  logger: Logger
): MergeResult {
  if (recordSets.length === 0) {
    throw new NoDataError('No record sets provided for merging');
  }

  logger.info('Starting data merge pipeline');

  const columns = unionColumns(recordSets);
  const { column: timestampColumn, fallback } = resolveTimestampColumn(columns, logger);

  // Concatenate, keying each row by its parsed timestamp
  const keyed: KeyedRow[] = [];
  let inputRows = 0;
  let droppedRows = 0;
  for (const set of recordSets) {
    for (const row of set.rows) {
      inputRows++;
      const label = row[timestampColumn];
      const dt = typeof label === 'string' ? parseTimestampLabel(label) : null;
      if (!dt) {
        droppedRows++;
        continue;
      }
      keyed.push({ key: dt.toMillis(), row });
    }
  }
  logger.info(`Concatenated ${recordSets.length} record sets into ${inputRows} rows`);
  if (droppedRows > 0) {
    logger.warn(`Dropped ${droppedRows} rows with a missing or unreadable ${timestampColumn}`);
  }

  // Array.prototype.sort is stable: equal timestamps keep concatenation order
  keyed.sort((a, b) => a.key - b.key);

  const unique = new Map<number, RawRow>();
  let duplicatesRemoved = 0;
  for (const { key, row } of keyed) {
    if (unique.has(key)) {
      duplicatesRemoved++;
    } else {
      unique.set(key, row);
    }
  }
  if (duplicatesRemoved > 0) {
    logger.warn(`Removed ${duplicatesRemoved} duplicate timestamps`);
  }

  // Left-join onto the canonical grid
  const grid = buildCanonicalGrid(range);
  const valueColumns = columns.filter(c => c !== timestampColumn);
  const values = valueColumns.map(() => new Array<CellValue>(grid.length).fill(null));

  let matchedSlots = 0;
  grid.forEach((dt, index) => {
    const row = unique.get(dt.toMillis());
    if (!row) return;
    matchedSlots++;
    valueColumns.forEach((column, c) => {
      values[c][index] = row[column] ?? null;
    });
  });

  const offGridRows = unique.size - matchedSlots;
  if (offGridRows > 0) {
    logger.warn(`${offGridRows} rows fall outside the requested grid and were not carried over`);
  }

  const series = new MergedSeries(
    timestampColumn,
    grid,
    valueColumns.map((column, c): [string, CellValue[]] => [column, values[c]])
  );

  logger.info(
    `Reindexed to complete grid: ${grid.length} timestamps, ${grid.length - matchedSlots} without data`
  );

  return {
    series,
    stats: {
      inputFiles: recordSets.length,
      inputRows,
      droppedRows,
      duplicatesRemoved,
      offGridRows,
      matchedSlots,
      timestampColumn,
      timestampFallback: fallback
    }
  };
}

export function summarizeMerge(series: MergedSeries, range: DateRange): MergeSummary {
  const expectedRows = buildCanonicalGrid(range).length;
  let missingTimestamps = 0;
  for (let i = 0; i < series.length; i++) {
    if (series.isEmptyRow(i)) missingTimestamps++;
  }

  return {
    totalRows: series.length,
    expectedRows,
    missingTimestamps,
    dataCoverage: expectedRows > 0 ? ((series.length - missingTimestamps) / expectedRows) * 100 : 0,
    timestampColumn: series.timestampColumn,
    dateRange: describeDateRange(range)
  };
}
