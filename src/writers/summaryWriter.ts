import { existsSync } from 'fs';
import type { MergeConfig } from '../config/index.js';
import type { DerivationStats, FileLoadOutcome, MergeStats, MergeSummary, OutputFiles } from '../types/index.js';
import { describeDateRange } from '../utils/time.js';

export interface ProcessingReport {
  config: MergeConfig;
  outcomes: FileLoadOutcome[];
  summary: MergeSummary;
  mergeStats: MergeStats;
  derivation: DerivationStats;
  metadataDisagreements: number;
  outputs: OutputFiles;
}

const RULE = '='.repeat(60);

export function formatProcessingSummary(report: ProcessingReport): string[] {
  const { config, outcomes, summary, mergeStats, derivation, outputs } = report;
  const lines: string[] = [];

  const loaded = outcomes.filter(o => o.status === 'loaded').length;
  const missing = outcomes.filter(o => o.status === 'missing');
  const failed = outcomes.filter(o => o.status === 'failed');

  lines.push('');
  lines.push(RULE);
  lines.push('MERGE PROCESSING SUMMARY');
  lines.push(RULE);

  lines.push('');
  lines.push('⚙️  Configuration:');
  lines.push(`  Input directory: ${config.inputDir}`);
  lines.push(`  Output directory: ${config.outputDir}`);
  lines.push(`  Date range: ${describeDateRange(config.range)}`);

  lines.push('');
  lines.push('📁 File Discovery:');
  lines.push(`  Expected files: ${outcomes.length}`);
  lines.push(`  Loaded files: ${loaded}`);
  lines.push(`  Missing files: ${missing.length}`);
  if (missing.length > 0) {
    const dates = missing.slice(0, 5).map(o => o.date.toFormat('yyyyMMdd'));
    lines.push(`  Missing file dates: ${dates.join(', ')}`);
    if (missing.length > 5) {
      lines.push(`    ... and ${missing.length - 5} more`);
    }
  }
  if (failed.length > 0) {
    lines.push(`  Failed to load: ${failed.length}`);
    for (const outcome of failed) {
      lines.push(`    ${outcome.path}: ${outcome.reason}`);
    }
  }

  lines.push('');
  lines.push('📊 Data Processing:');
  lines.push(`  Total rows: ${summary.totalRows.toLocaleString('en-US')}`);
  lines.push(`  Expected rows: ${summary.expectedRows.toLocaleString('en-US')}`);
  lines.push(`  Missing timestamps: ${summary.missingTimestamps.toLocaleString('en-US')}`);
  lines.push(`  Data coverage: ${summary.dataCoverage.toFixed(1)}%`);
  lines.push(`  Timestamp column: ${summary.timestampColumn}${mergeStats.timestampFallback ? ' (fallback)' : ''}`);
  lines.push(`  Duplicate timestamps removed: ${mergeStats.duplicatesRemoved}`);
  if (mergeStats.droppedRows > 0) {
    lines.push(`  Rows with unreadable timestamps: ${mergeStats.droppedRows}`);
  }
  if (mergeStats.offGridRows > 0) {
    lines.push(`  Rows outside the date range: ${mergeStats.offGridRows}`);
  }
  if (report.metadataDisagreements > 0) {
    lines.push(`  ⚠️  Metadata disagreements: ${report.metadataDisagreements}`);
  }

  lines.push('');
  lines.push('🌡️  Heat Stress:');
  lines.push(`  WBGT values: ${derivation.valueCounts['WBGT_C'] ?? 0} of ${derivation.rows}`);
  lines.push(`  Rows with incomplete inputs: ${derivation.incompleteInputRows}`);
  const unconverged = derivation.solverStatus['capped'] + derivation.solverStatus['bailed-out'];
  if (unconverged > 0) {
    lines.push(`  Wet-bulb not converged: ${unconverged}`);
  }
  if (derivation.missingChannels.length > 0) {
    lines.push(`  ⚠️  Missing input columns: ${derivation.missingChannels.join(', ')}`);
  }

  lines.push('');
  lines.push('📄 Output Files:');
  const entries: Array<[string, string]> = [
    ['CSV', outputs.csv],
    ['METADATA', outputs.metadata]
  ];
  if (config.plots) {
    entries.push(['PLOTS', outputs.plots], ['PLOTS SUMMARY', outputs.plotsSummary]);
  }
  for (const [label, path] of entries) {
    lines.push(`  ${existsSync(path) ? '✓' : '✗'} ${label}: ${path}`);
  }

  lines.push('');
  lines.push(RULE);
  return lines;
}

export function printProcessingSummary(report: ProcessingReport): void {
  console.log(formatProcessingSummary(report).join('\n'));
}
