// Timestamp column candidates, searched in this order
export const TIMESTAMP_CANDIDATES = [
  'TIMESTAMP', 'timestamp', 'DateTime', 'datetime', 'TIME', 'time'
] as const;

// Native logger cadence
export const INTERVAL_MINUTES = 30;
export const SLOTS_PER_DAY = (24 * 60) / INTERVAL_MINUTES;

// Label format for timestamps read from and written to files
export const TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';

// Daily file and output naming
export const DEFAULT_FILE_PREFIX = 'MM1';
export const DAILY_FILE_EXTENSION = '.dat';
export const FILE_DATE_FORMAT = 'yyyyMMdd';

// Header layout: metadata, names, units, stats
export const HEADER_LINE_COUNT = 4;

// Tokens the logger writes for a missing reading
export const MISSING_TOKENS = new Set(['', 'NAN', 'NaN', 'nan', 'NA', 'null']);

// Written to CSV for a missing cell
export const CSV_MISSING_VALUE = 'NaN';

// Default input channels for heat-stress derivation
export const DEFAULT_CHANNELS = {
  blackGlobe: 'BGTemp_C_Avg',
  airTemperature: 'AirTC_Avg',
  relativeHumidity: 'RH_Avg',
  airPressure: 'P_Air_Avg'
} as const;

// Derived output columns, in append order
export const DERIVED_COLUMNS = [
  'esat_kPa', 'ea_kPa', 'dewpoint_C', 'wet_bulb_C', 'WBGT_C'
] as const;

// Saturated vapor pressure polynomial (hPa, scaled to kPa by 0.1)
export const ESAT_COEFFICIENTS = [
  6.107799961,
  4.436518521e-1,
  1.428945805e-2,
  2.650648471e-4,
  3.031240396e-6,
  2.034080948e-8,
  6.136820929e-11
] as const;

// Inverse Teten's equation
export const TETEN_E0_KPA = 0.61078;
export const TETEN_A = 17.558;
export const TETEN_B = 241.88;

// Psychrometric constant terms for the wet-bulb vapor pressure
export const PSYCHROMETER_COEFFICIENT = 6.6e-4;
export const PSYCHROMETER_TEMP_FACTOR = 1.15e-3;

// Wet-bulb solver
export const WET_BULB_TOLERANCE_C = 0.01;
export const WET_BULB_MAX_ITERATIONS = 50;
export const WET_BULB_STEP_FACTOR = 0.5;
export const WET_BULB_BOUND_MARGIN_C = 5;

// WBGT weights: globe, wet bulb, dry bulb
export const WBGT_WEIGHTS = { globe: 0.2, wetBulb: 0.7, dryBulb: 0.1 } as const;

// Plots
export const PLOT_EXCLUDED_COLUMNS = ['TIMESTAMP', 'RECORD', 'timestamp', 'record'];
export const PLOT_MAX_POINTS = 200_000;
export const PLOT_MAX_COLUMNS = 2;
export const PLOT_MIN_NUMERIC_SHARE = 0.1;
export const PLOTLY_CDN_URL = 'https://cdn.plot.ly/plotly-2.35.2.min.js';
