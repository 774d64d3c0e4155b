import { stringify } from 'csv-stringify/sync';
import { writeFileSync } from 'fs';
import { CSV_MISSING_VALUE } from '../constants/index.js';
import type { CellValue, ColumnMetadata, MetadataRecord } from '../types/index.js';
import type { MergedSeries } from '../utils/mergedSeries.js';
import { toMetadataRecords } from '../utils/metadataConsolidator.js';
import { formatTimestamp } from '../utils/time.js';

function formatCell(value: CellValue): string {
  if (value === null) return CSV_MISSING_VALUE;
  return typeof value === 'number' ? String(value) : value;
}

// Merged series as CSV text: timestamps as "yyyy-MM-dd HH:mm:ss", missing cells as NaN
export function formatMergedCsv(series: MergedSeries): string {
  const columns = series.columns;
  const rows: string[][] = [columns];

  for (let i = 0; i < series.length; i++) {
    const row = [formatTimestamp(series.timestamps[i])];
    for (const column of series.valueColumns) {
      row.push(formatCell(series.valueAt(column, i)));
    }
    rows.push(row);
  }

  return stringify(rows);
}

export function writeMergedCsv(series: MergedSeries, filePath: string): void {
  writeFileSync(filePath, formatMergedCsv(series));
}

export function formatMetadataCsv(records: MetadataRecord[]): string {
  return stringify(records, {
    header: true,
    columns: ['column_name', 'unit', 'statistic']
  });
}

export function writeMetadataCsv(metadata: ColumnMetadata, filePath: string): void {
  writeFileSync(filePath, formatMetadataCsv(toMetadataRecords(metadata)));
}
