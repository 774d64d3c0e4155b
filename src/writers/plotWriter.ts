import { writeFileSync } from 'fs';
import {
  PLOT_EXCLUDED_COLUMNS,
  PLOT_MAX_COLUMNS,
  PLOT_MAX_POINTS,
  PLOT_MIN_NUMERIC_SHARE,
  PLOTLY_CDN_URL
} from '../constants/index.js';
import type { MergeSummary } from '../types/index.js';
import type { MergedSeries } from '../utils/mergedSeries.js';
import { formatTimestamp } from '../utils/time.js';

export interface PlotOptions {
  title: string;
  // Channels drawn together in one "Temperature (°C)" panel
  temperatureColumns: string[];
  maxPoints?: number;
}

interface Trace {
  type: 'scatter';
  mode: 'lines';
  name: string;
  x: string[];
  y: Array<number | null>;
  xaxis: string;
  yaxis: string;
  showlegend: boolean;
  line: { width: number; color?: string };
}

interface Panel {
  title: string;
  columns: string[];
  combined: boolean;
}

export interface PlotFigure {
  data: Trace[];
  layout: Record<string, unknown>;
  panels: number;
}

const TEMPERATURE_COLORS = ['red', 'blue'];

// Numeric columns worth plotting: at least 10% numeric cells, key columns excluded
export function determinePlotColumns(series: MergedSeries): string[] {
  if (series.length === 0) return [];
  return series.valueColumns.filter(column => {
    if (PLOT_EXCLUDED_COLUMNS.includes(column)) return false;
    let numeric = 0;
    for (let i = 0; i < series.length; i++) {
      if (series.numberAt(column, i) !== null) numeric++;
    }
    return numeric / series.length >= PLOT_MIN_NUMERIC_SHARE;
  });
}

export function calculateSubplotLayout(panels: number, maxColumns = PLOT_MAX_COLUMNS): { rows: number; columns: number } {
  if (panels === 0) return { rows: 1, columns: 1 };
  const columns = Math.min(panels, maxColumns);
  return { rows: Math.ceil(panels / columns), columns };
}

// Row indices kept after fixed-stride downsampling
export function downsampleIndices(length: number, maxPoints = PLOT_MAX_POINTS): number[] {
  const stride = length <= maxPoints ? 1 : Math.ceil(length / maxPoints);
  const indices: number[] = [];
  for (let i = 0; i < length; i += stride) indices.push(i);
  return indices;
}

function buildPanels(plotColumns: string[], temperatureColumns: string[]): Panel[] {
  const temps = temperatureColumns.filter(c => plotColumns.includes(c));
  if (temps.length === 0) {
    return plotColumns.map(column => ({ title: column, columns: [column], combined: false }));
  }
  return [
    { title: 'Temperature (°C)', columns: temps, combined: true },
    ...plotColumns
      .filter(c => !temps.includes(c))
      .map(column => ({ title: column, columns: [column], combined: false }))
  ];
}

export function buildTimeSeriesFigure(series: MergedSeries, options: PlotOptions): PlotFigure {
  const plotColumns = determinePlotColumns(series);
  const panels = buildPanels(plotColumns, options.temperatureColumns);
  const { rows, columns } = calculateSubplotLayout(panels.length);
  const indices = downsampleIndices(series.length, options.maxPoints);
  const x = indices.map(i => formatTimestamp(series.timestamps[i]));

  const data: Trace[] = [];
  const annotations: Array<Record<string, unknown>> = [];
  const layout: Record<string, unknown> = {};

  panels.forEach((panel, p) => {
    const axis = p === 0 ? '' : String(p + 1);
    layout[`xaxis${axis}`] = { title: { text: 'Time' } };
    layout[`yaxis${axis}`] = {};
    annotations.push({
      text: panel.title,
      xref: `x${axis} domain`,
      yref: `y${axis} domain`,
      x: 0.5,
      y: 1.08,
      showarrow: false
    });

    panel.columns.forEach((column, c) => {
      const y = indices.map(i => series.numberAt(column, i));
      if (y.every(v => v === null)) return;
      data.push({
        type: 'scatter',
        mode: 'lines',
        name: column,
        x,
        y,
        xaxis: `x${axis}`,
        yaxis: `y${axis}`,
        showlegend: panel.combined,
        line: panel.combined ? { width: 1, color: TEMPERATURE_COLORS[c % TEMPERATURE_COLORS.length] } : { width: 1 }
      });
    });
  });

  return {
    data,
    layout: {
      ...layout,
      title: { text: options.title, x: 0.5, font: { size: 16 } },
      height: 300 * rows,
      grid: { rows, columns, pattern: 'independent' },
      showlegend: panels.some(p => p.combined),
      annotations
    },
    panels: panels.length
  };
}

function embed(value: unknown): string {
  return JSON.stringify(value).replace(/</g, '\\u003c');
}

function renderPage(title: string, data: unknown, layout: unknown): string {
  return [
    '<!DOCTYPE html>',
    '<html>',
    '<head>',
    '<meta charset="utf-8">',
    `<title>${title.replace(/</g, '&lt;')}</title>`,
    `<script src="${PLOTLY_CDN_URL}"></script>`,
    '</head>',
    '<body>',
    '<div id="plot" style="width:100%;"></div>',
    '<script>',
    `Plotly.newPlot('plot', ${embed(data)}, ${embed(layout)}, ${embed({ displayModeBar: true, displaylogo: false, responsive: true })});`,
    '</script>',
    '</body>',
    '</html>',
    ''
  ].join('\n');
}

export function buildTimeSeriesPlotHtml(series: MergedSeries, options: PlotOptions): string {
  const figure = buildTimeSeriesFigure(series, options);
  if (figure.panels === 0) {
    return renderPage(`${options.title} - No Data`, [], {
      title: { text: `${options.title} - No Data` },
      annotations: [{
        text: 'No numeric data columns available for plotting',
        xref: 'paper',
        yref: 'paper',
        x: 0.5,
        y: 0.5,
        showarrow: false,
        font: { size: 16 }
      }]
    });
  }
  return renderPage(options.title, figure.data, figure.layout);
}

export function buildSummaryPlotHtml(summary: MergeSummary): string {
  const coverage = summary.dataCoverage;
  const missing = 100 - coverage;
  const data = [{
    type: 'bar',
    x: ['Data Coverage', 'Missing Data'],
    y: [coverage, missing],
    marker: { color: ['green', 'red'] },
    text: [`${coverage.toFixed(1)}%`, `${missing.toFixed(1)}%`],
    textposition: 'auto'
  }];
  const layout = {
    title: { text: `Data Coverage Summary<br>${summary.dateRange}` },
    yaxis: { title: { text: 'Percentage' } },
    showlegend: false,
    annotations: [{
      text: `Total rows: ${summary.totalRows}<br>Expected rows: ${summary.expectedRows}<br>` +
        `Missing timestamps: ${summary.missingTimestamps}`,
      xref: 'paper',
      yref: 'paper',
      x: 0.02,
      y: 0.98,
      showarrow: false,
      align: 'left',
      bgcolor: 'lightgray',
      bordercolor: 'black',
      borderwidth: 1
    }]
  };
  return renderPage('Data Coverage Summary', data, layout);
}

export function writeTimeSeriesPlots(series: MergedSeries, filePath: string, options: PlotOptions): void {
  writeFileSync(filePath, buildTimeSeriesPlotHtml(series, options));
}

export function writeSummaryPlot(summary: MergeSummary, filePath: string): void {
  writeFileSync(filePath, buildSummaryPlotHtml(summary));
}
