import { existsSync } from 'fs';
import { join } from 'path';
import { DAILY_FILE_EXTENSION, FILE_DATE_FORMAT } from '../constants/index.js';
import { OutputExistsError } from '../errors/index.js';
import { loadDailyFile } from '../parsers/dailyFileParser.js';
import type { DateRange, ExpectedFile, FileLoadOutcome, LoadCounts, OutputFiles } from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import { formatDateRange, generateDateList } from '../utils/time.js';

// One expected "<prefix>_<yyyyMMdd>.dat" per day, in date order
export function buildExpectedFiles(inputDir: string, range: DateRange, prefix: string): ExpectedFile[] {
  return generateDateList(range).map(date => ({
    date,
    path: join(inputDir, `${prefix}_${date.toFormat(FILE_DATE_FORMAT)}${DAILY_FILE_EXTENSION}`)
  }));
}

export function checkFileExistence(files: ExpectedFile[], logger: Logger): {
  existing: ExpectedFile[];
  missing: ExpectedFile[];
} {
  const existing: ExpectedFile[] = [];
  const missing: ExpectedFile[] = [];
  for (const file of files) {
    (existsSync(file.path) ? existing : missing).push(file);
  }
  logger.info(`Found ${existing.length} existing files, ${missing.length} missing files`);
  return { existing, missing };
}

export interface LoadResult {
  outcomes: FileLoadOutcome[];
  counts: LoadCounts;
}

// Load every expected file in order; each yields an outcome
export function loadAllFiles(files: ExpectedFile[], logger: Logger): LoadResult {
  const outcomes = files.map(file => loadDailyFile(file, logger));
  const counts: LoadCounts = { loaded: 0, missing: 0, failed: 0 };
  for (const outcome of outcomes) {
    counts[outcome.status]++;
  }
  logger.info(`Found ${files.length - counts.missing} existing files, ${counts.missing} missing files`);
  logger.info(`Successfully loaded ${counts.loaded} files`);
  if (counts.failed > 0) {
    logger.warn(`${counts.failed} files could not be loaded`);
  }
  return { outcomes, counts };
}

export function buildOutputFiles(outputDir: string, range: DateRange, prefix: string): OutputFiles {
  const base = join(outputDir, `${prefix}_merged_${formatDateRange(range)}`);
  return {
    csv: `${base}.csv`,
    metadata: `${base}_metadata.csv`,
    plots: `${base}_plots.html`,
    plotsSummary: `${base}_plots_summary.html`
  };
}

// Paths this run writes; plot pages only when plots are enabled
export function plannedOutputs(outputs: OutputFiles, plots: boolean): string[] {
  return plots
    ? [outputs.csv, outputs.metadata, outputs.plots, outputs.plotsSummary]
    : [outputs.csv, outputs.metadata];
}

// Refuse to clobber existing outputs unless overwrite is set
export function validateOutputFiles(outputs: OutputFiles, overwrite: boolean, plots = true): void {
  if (overwrite) return;
  const existing = plannedOutputs(outputs, plots).filter(path => existsSync(path));
  if (existing.length > 0) {
    throw new OutputExistsError(existing);
  }
}
