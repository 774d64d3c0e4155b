// Re-export all writers
export {
  formatMergedCsv,
  writeMergedCsv,
  formatMetadataCsv,
  writeMetadataCsv
} from './seriesWriter.js';

export {
  buildTimeSeriesFigure,
  buildTimeSeriesPlotHtml,
  buildSummaryPlotHtml,
  writeTimeSeriesPlots,
  writeSummaryPlot,
  determinePlotColumns,
  calculateSubplotLayout,
  downsampleIndices,
  type PlotOptions
} from './plotWriter.js';

export {
  formatProcessingSummary,
  printProcessingSummary,
  type ProcessingReport
} from './summaryWriter.js';
