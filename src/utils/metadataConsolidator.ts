import type { ColumnMetadata, HeaderInfo, MetadataRecord } from '../types/index.js';
import type { Logger } from './logger.js';

export interface MetadataDisagreement {
  column: string;
  field: 'unit' | 'stat';
  values: string[];
}

export interface ConsolidatedMetadata {
  metadata: ColumnMetadata;
  disagreements: MetadataDisagreement[];
}

type Annotations = Record<string, string>;

function clean(value: string | undefined): string {
  return value?.trim() ?? '';
}

// First non-empty value per column, plus every distinct non-empty value seen
function scan(
  perFile: readonly Annotations[],
  columns: readonly string[]
): Map<string, { first: string; distinct: string[] }> {
  const result = new Map<string, { first: string; distinct: string[] }>();
  for (const column of columns) {
    const distinct: string[] = [];
    for (const annotations of perFile) {
      const value = clean(annotations[column]);
      if (value && !distinct.includes(value)) distinct.push(value);
    }
    result.set(column, { first: distinct[0] ?? '', distinct });
  }
  return result;
}

/**
 * Resolve one unit and one stat per column across files.
 *
 * Files are scanned in processing order; the first non-empty value wins.
 * Conflicting non-empty values are reported as warnings, never voted on.
 */
export function consolidateMetadata(
  units: readonly Annotations[],
  stats: readonly Annotations[],
  logger: Logger
): ConsolidatedMetadata {
  if (units.length !== stats.length) {
    logger.warn(`Mismatch in metadata list lengths: ${units.length} units vs ${stats.length} stats`);
  }

  const columns = new Set<string>();
  for (const annotations of [...units, ...stats]) {
    for (const column of Object.keys(annotations)) columns.add(column);
  }
  const ordered = [...columns];

  const unitScan = scan(units, ordered);
  const statScan = scan(stats, ordered);

  const metadata: ColumnMetadata = new Map();
  const disagreements: MetadataDisagreement[] = [];

  for (const column of ordered) {
    const unit = unitScan.get(column) ?? { first: '', distinct: [] };
    const stat = statScan.get(column) ?? { first: '', distinct: [] };
    metadata.set(column, { unit: unit.first, stat: stat.first });

    if (unit.distinct.length > 1) {
      disagreements.push({ column, field: 'unit', values: unit.distinct });
      logger.warn(
        `Column '${column}' has inconsistent units across files: ${unit.distinct.join(', ')} (using '${unit.first}')`
      );
    }
    if (stat.distinct.length > 1) {
      disagreements.push({ column, field: 'stat', values: stat.distinct });
      logger.warn(
        `Column '${column}' has inconsistent statistics across files: ${stat.distinct.join(', ')} (using '${stat.first}')`
      );
    }
  }

  logger.info(`Consolidated metadata for ${metadata.size} columns`);
  return { metadata, disagreements };
}

export function consolidateHeaders(headers: readonly HeaderInfo[], logger: Logger): ConsolidatedMetadata {
  return consolidateMetadata(
    headers.map(h => h.units),
    headers.map(h => h.stats),
    logger
  );
}

// One record per column, sorted by column name
export function toMetadataRecords(metadata: ColumnMetadata): MetadataRecord[] {
  return [...metadata.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([column, { unit, stat }]) => ({
      column_name: column,
      unit,
      statistic: stat
    }));
}
