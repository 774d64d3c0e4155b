import { mkdirSync } from 'fs';
import type { MergeConfig } from '../config/index.js';
import { NoDataError } from '../errors/index.js';
import { addHeatStressColumns } from '../features/index.js';
import { validateHeaderConsistency } from '../parsers/index.js';
import type { DailyRecordSet, ExpectedFile, HeaderInfo, OutputFiles } from '../types/index.js';
import { consolidateHeaders, mergeDailyData, summarizeMerge, type Logger } from '../utils/index.js';
import { describeDateRange } from '../utils/time.js';
import {
  writeMergedCsv,
  writeMetadataCsv,
  writeSummaryPlot,
  writeTimeSeriesPlots,
  type ProcessingReport
} from '../writers/index.js';
import {
  buildExpectedFiles,
  buildOutputFiles,
  checkFileExistence,
  loadAllFiles,
  validateOutputFiles
} from './fileDiscovery.js';

// Per-run options, passed explicitly to every stage
export interface RunContext {
  logger: Logger;
  dryRun: boolean;
  overwrite: boolean;
}

export type RunResult =
  | { status: 'dry-run'; existing: ExpectedFile[]; missing: ExpectedFile[]; outputs: OutputFiles }
  | { status: 'completed'; report: ProcessingReport };

/**
 * Discover, load, merge and derive, then write the merged CSV, metadata
 * CSV and plots. Fatal errors are thrown before any output is written.
 */
export function runPipeline(config: MergeConfig, context: RunContext): RunResult {
  const { logger } = context;
  logger.info('Starting merge pipeline');
  logger.info(`Processing date range: ${describeDateRange(config.range)}`);

  const outputs = buildOutputFiles(config.outputDir, config.range, config.filePrefix);
  validateOutputFiles(outputs, context.overwrite, config.plots);

  const expected = buildExpectedFiles(config.inputDir, config.range, config.filePrefix);

  if (context.dryRun) {
    const { existing, missing } = checkFileExistence(expected, logger);
    return { status: 'dry-run', existing, missing, outputs };
  }

  const { outcomes, counts } = loadAllFiles(expected, logger);
  if (counts.missing === outcomes.length) {
    throw new NoDataError('No input files found in the specified date range');
  }

  const headers: HeaderInfo[] = [];
  const recordSets: DailyRecordSet[] = [];
  for (const outcome of outcomes) {
    if (outcome.status !== 'loaded') continue;
    headers.push(outcome.header);
    recordSets.push(outcome.recordSet);
  }
  if (counts.loaded === 0) {
    throw new NoDataError('Failed to load any data files');
  }

  validateHeaderConsistency(headers, logger);
  const { metadata, disagreements } = consolidateHeaders(headers, logger);

  const { series, stats: mergeStats } = mergeDailyData(recordSets, config.range, logger);
  const derivation = addHeatStressColumns(series, config.channels, logger, { method: config.wetBulbMethod });
  const summary = summarizeMerge(series, config.range);

  mkdirSync(config.outputDir, { recursive: true });
  writeMergedCsv(series, outputs.csv);
  logger.info(`Saved CSV file: ${outputs.csv}`);
  writeMetadataCsv(metadata, outputs.metadata);
  logger.info(`Saved metadata to ${outputs.metadata}`);

  if (config.plots) {
    writeTimeSeriesPlots(series, outputs.plots, {
      title: `${config.filePrefix} Meteorological Data Time Series`,
      temperatureColumns: [config.channels.blackGlobe, config.channels.airTemperature]
    });
    writeSummaryPlot(summary, outputs.plotsSummary);
    logger.info(`Created plots: ${outputs.plots}`);
  }

  logger.info('Pipeline completed successfully');

  return {
    status: 'completed',
    report: {
      config,
      outcomes,
      summary,
      mergeStats,
      derivation,
      metadataDisagreements: disagreements.length,
      outputs
    }
  };
}
