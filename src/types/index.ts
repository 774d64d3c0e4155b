import type { DateTime } from 'luxon';

// A single cell; null is the missing marker
export type CellValue = number | string | null;

export type RawRow = Record<string, CellValue>;

// Column names plus unit/stat annotations from a file header
export interface HeaderInfo {
  columns: string[];
  units: Record<string, string>;
  stats: Record<string, string>;
}

// One daily file's rows
export interface DailyRecordSet {
  source: string;
  columns: string[];
  rows: RawRow[];
}

// Inclusive calendar-date interval (dates at UTC midnight)
export interface DateRange {
  start: DateTime;
  end: DateTime;
}

export interface ExpectedFile {
  date: DateTime;
  path: string;
}

export type FileLoadOutcome =
  | { status: 'loaded'; date: DateTime; path: string; header: HeaderInfo; recordSet: DailyRecordSet }
  | { status: 'missing'; date: DateTime; path: string }
  | { status: 'failed'; date: DateTime; path: string; reason: string };

export interface LoadCounts {
  loaded: number;
  missing: number;
  failed: number;
}

export interface ColumnAnnotation {
  unit: string;
  stat: string;
}

export type ColumnMetadata = Map<string, ColumnAnnotation>;

export interface MetadataRecord {
  column_name: string;
  unit: string;
  statistic: string;
}

export interface MergeStats {
  inputFiles: number;
  inputRows: number;
  droppedRows: number;
  duplicatesRemoved: number;
  offGridRows: number;
  matchedSlots: number;
  timestampColumn: string;
  timestampFallback: boolean;
}

export interface MergeSummary {
  totalRows: number;
  expectedRows: number;
  missingTimestamps: number;
  dataCoverage: number;
  timestampColumn: string;
  dateRange: string;
}

// Input channel column names for heat-stress derivation
export interface ChannelMapping {
  blackGlobe: string;
  airTemperature: string;
  relativeHumidity: string;
  airPressure: string;
}

export type WetBulbMethod = 'fixed-step' | 'bisection';

export type WetBulbStatus = 'converged' | 'capped' | 'bailed-out';

export interface WetBulbResult {
  value: number;
  status: WetBulbStatus;
  iterations: number;
}

export interface DerivationStats {
  rows: number;
  incompleteInputRows: number;
  missingChannels: string[];
  valueCounts: Record<string, number>;
  solverStatus: Record<WetBulbStatus, number>;
}

export interface OutputFiles {
  csv: string;
  metadata: string;
  plots: string;
  plotsSummary: string;
}
