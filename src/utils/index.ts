export {
  mergeDailyData,
  summarizeMerge,
  findTimestampColumn,
  resolveTimestampColumn,
  unionColumns,
  type MergeResult
} from './dataMerger.js';

export {
  consolidateMetadata,
  consolidateHeaders,
  toMetadataRecords,
  type ConsolidatedMetadata,
  type MetadataDisagreement
} from './metadataConsolidator.js';

export { MergedSeries } from './mergedSeries.js';

export {
  createConsoleLogger,
  isLogLevel,
  LOG_LEVELS,
  type Logger,
  type LogLevel
} from './logger.js';

export * from './time.js';
