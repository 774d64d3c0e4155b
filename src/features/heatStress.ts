import {
  DERIVED_COLUMNS,
  ESAT_COEFFICIENTS,
  PSYCHROMETER_COEFFICIENT,
  PSYCHROMETER_TEMP_FACTOR,
  TETEN_A,
  TETEN_B,
  TETEN_E0_KPA,
  WBGT_WEIGHTS,
  WET_BULB_BOUND_MARGIN_C,
  WET_BULB_MAX_ITERATIONS,
  WET_BULB_STEP_FACTOR,
  WET_BULB_TOLERANCE_C
} from '../constants/index.js';
import type {
  CellValue,
  ChannelMapping,
  DerivationStats,
  WetBulbMethod,
  WetBulbResult,
  WetBulbStatus
} from '../types/index.js';
import type { Logger } from '../utils/logger.js';
import type { MergedSeries } from '../utils/mergedSeries.js';

export interface WetBulbOptions {
  tolerance?: number;
  maxIterations?: number;
}

export interface HeatStressOptions extends WetBulbOptions {
  method?: WetBulbMethod;
}

// Saturated vapor pressure over water (kPa) for temperature in °C
export function calculateSaturatedVaporPressure(temp: number): number {
  let sum = 0;
  ESAT_COEFFICIENTS.forEach((coefficient, power) => {
    sum += coefficient * temp ** power;
  });
  return sum * 0.1;
}

// Actual vapor pressure (kPa) from relative humidity (%) and esat (kPa)
export function calculateVaporPressure(rh: number, esat: number): number {
  return rh * esat / 100;
}

// Dewpoint (°C) by inverse Teten's equation; undefined for ea <= 0
export function calculateDewpoint(ea: number): number | null {
  if (!(ea > 0)) return null;
  const lnRatio = Math.log(ea / TETEN_E0_KPA);
  return (TETEN_B * lnRatio) / (TETEN_A - lnRatio);
}

// Vapor pressure at the wet-bulb temperature (kPa); pressure in kPa
export function calculateWetBulbVaporPressure(airTemp: number, wetBulb: number, pressureKpa: number): number {
  const eswt = calculateSaturatedVaporPressure(wetBulb);
  return eswt - PSYCHROMETER_COEFFICIENT * (1 + PSYCHROMETER_TEMP_FACTOR * wetBulb) * (airTemp - wetBulb) * pressureKpa;
}

/**
 * Wet-bulb temperature by the fixed half-step update
 * `Tw' = Tw - 0.5 * (ewt(Tw) - ea)`, starting from the dewpoint.
 *
 * Stops when a step is smaller than the tolerance, after `maxIterations`,
 * or as soon as the estimate leaves `[Td - 5, T + 5]`. The last computed
 * estimate is always returned; `status` tells which of the three happened.
 * Returns null when the dewpoint is undefined.
 */
export function calculateWetBulbTemperature(
  airTemp: number,
  ea: number,
  pressureKpa: number,
  options: WetBulbOptions = {}
): WetBulbResult | null {
  const tolerance = options.tolerance ?? WET_BULB_TOLERANCE_C;
  const maxIterations = options.maxIterations ?? WET_BULB_MAX_ITERATIONS;

  const dewpoint = calculateDewpoint(ea);
  if (dewpoint === null) return null;

  let wetBulb = dewpoint;
  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    const ewt = calculateWetBulbVaporPressure(airTemp, wetBulb, pressureKpa);
    const next = wetBulb - (ewt - ea) * WET_BULB_STEP_FACTOR;

    if (Math.abs(next - wetBulb) < tolerance) {
      return { value: next, status: 'converged', iterations: iteration };
    }

    wetBulb = next;

    if (wetBulb < dewpoint - WET_BULB_BOUND_MARGIN_C || wetBulb > airTemp + WET_BULB_BOUND_MARGIN_C) {
      return { value: wetBulb, status: 'bailed-out', iterations: iteration };
    }
  }

  return { value: wetBulb, status: 'capped', iterations: maxIterations };
}

/**
 * Wet-bulb temperature by bisection of `ewt(Tw) - ea` on a bracket around
 * `[Td, T]`. Not the reference method; selected with `wet_bulb_method: bisection`.
 * When the residual does not change sign over the bracket the endpoint with
 * the smaller residual is returned with status `bailed-out`.
 */
export function calculateWetBulbTemperatureBisection(
  airTemp: number,
  ea: number,
  pressureKpa: number,
  options: WetBulbOptions = {}
): WetBulbResult | null {
  const tolerance = options.tolerance ?? WET_BULB_TOLERANCE_C;
  const maxIterations = options.maxIterations ?? WET_BULB_MAX_ITERATIONS;

  const dewpoint = calculateDewpoint(ea);
  if (dewpoint === null) return null;

  const residual = (tw: number): number => calculateWetBulbVaporPressure(airTemp, tw, pressureKpa) - ea;

  let low = Math.min(dewpoint, airTemp) - WET_BULB_BOUND_MARGIN_C;
  let high = Math.max(dewpoint, airTemp) + WET_BULB_BOUND_MARGIN_C;
  let lowResidual = residual(low);
  const highResidual = residual(high);

  if (Math.sign(lowResidual) === Math.sign(highResidual)) {
    const value = Math.abs(lowResidual) <= Math.abs(highResidual) ? low : high;
    return { value, status: 'bailed-out', iterations: 0 };
  }

  for (let iteration = 1; iteration <= maxIterations; iteration++) {
    const mid = (low + high) / 2;
    const midResidual = residual(mid);
    if (midResidual === 0 || high - low < tolerance) {
      return { value: mid, status: 'converged', iterations: iteration };
    }
    if (Math.sign(midResidual) === Math.sign(lowResidual)) {
      low = mid;
      lowResidual = midResidual;
    } else {
      high = mid;
    }
  }

  return { value: (low + high) / 2, status: 'capped', iterations: maxIterations };
}

// Wet-Bulb Globe Temperature (°C)
export function calculateWbgt(blackGlobe: number, wetBulb: number, airTemp: number): number {
  return WBGT_WEIGHTS.globe * blackGlobe + WBGT_WEIGHTS.wetBulb * wetBulb + WBGT_WEIGHTS.dryBulb * airTemp;
}

export interface HeatStressRow {
  esat: number | null;
  ea: number | null;
  dewpoint: number | null;
  wetBulb: WetBulbResult | null;
  wbgt: number | null;
}

function emptyRow(): HeatStressRow {
  return { esat: null, ea: null, dewpoint: null, wetBulb: null, wbgt: null };
}

// Full chain for one row; any missing input leaves every output missing
export function deriveHeatStressRow(
  inputs: { blackGlobe: number | null; airTemp: number | null; rh: number | null; pressureMbar: number | null },
  options: HeatStressOptions = {}
): HeatStressRow {
  const { blackGlobe, airTemp, rh, pressureMbar } = inputs;
  if (blackGlobe === null || airTemp === null || rh === null || pressureMbar === null) {
    return emptyRow();
  }

  const esat = calculateSaturatedVaporPressure(airTemp);
  const ea = calculateVaporPressure(rh, esat);
  const dewpoint = calculateDewpoint(ea);

  const solve = options.method === 'bisection'
    ? calculateWetBulbTemperatureBisection
    : calculateWetBulbTemperature;
  const wetBulb = solve(airTemp, ea, pressureMbar * 0.1, options);

  return {
    esat,
    ea,
    dewpoint,
    wetBulb,
    wbgt: wetBulb ? calculateWbgt(blackGlobe, wetBulb.value, airTemp) : null
  };
}

/**
 * Append esat_kPa, ea_kPa, dewpoint_C, wet_bulb_C and WBGT_C to the series.
 * Rows are independent of one another.
 */
export function addHeatStressColumns(
  series: MergedSeries,
  channels: ChannelMapping,
  logger: Logger,
  options: HeatStressOptions = {}
): DerivationStats {
  logger.info('Calculating meteorological parameters (esat, ea, dewpoint, wet-bulb, WBGT)');

  const required = [channels.blackGlobe, channels.airTemperature, channels.relativeHumidity, channels.airPressure];
  const missingChannels = required.filter(name => !series.hasColumn(name));
  for (const name of missingChannels) {
    logger.warn(`Derivation input column '${name}' not found; derived columns will be missing`);
  }

  const read = (column: string, index: number): number | null =>
    series.hasColumn(column) ? series.numberAt(column, index) : null;

  const outputs: Record<typeof DERIVED_COLUMNS[number], CellValue[]> = {
    esat_kPa: [],
    ea_kPa: [],
    dewpoint_C: [],
    wet_bulb_C: [],
    WBGT_C: []
  };
  const solverStatus: Record<WetBulbStatus, number> = { 'converged': 0, 'capped': 0, 'bailed-out': 0 };
  let incompleteInputRows = 0;

  for (let i = 0; i < series.length; i++) {
    const inputs = {
      blackGlobe: read(channels.blackGlobe, i),
      airTemp: read(channels.airTemperature, i),
      rh: read(channels.relativeHumidity, i),
      pressureMbar: read(channels.airPressure, i)
    };
    const row = deriveHeatStressRow(inputs, options);
    if (row.esat === null) incompleteInputRows++;

    if (row.wetBulb) {
      solverStatus[row.wetBulb.status]++;
      if (row.wetBulb.status !== 'converged') {
        logger.debug(
          `Wet-bulb calculation ${row.wetBulb.status} after ${row.wetBulb.iterations} iterations ` +
          `for T=${inputs.airTemp}, ea=${row.ea}, P=${inputs.pressureMbar}`
        );
      }
    }

    outputs.esat_kPa.push(row.esat);
    outputs.ea_kPa.push(row.ea);
    outputs.dewpoint_C.push(row.dewpoint);
    outputs.wet_bulb_C.push(row.wetBulb ? row.wetBulb.value : null);
    outputs.WBGT_C.push(row.wbgt);
  }

  const valueCounts: Record<string, number> = {};
  for (const column of DERIVED_COLUMNS) {
    series.appendColumn(column, outputs[column]);
    valueCounts[column] = outputs[column].filter(v => v !== null).length;
  }

  logger.info('Meteorological calculations completed:');
  for (const column of DERIVED_COLUMNS) {
    logger.info(`  - ${column}: ${valueCounts[column]} values`);
  }
  const unconverged = solverStatus['capped'] + solverStatus['bailed-out'];
  if (unconverged > 0) {
    logger.info(`  - wet-bulb not converged: ${solverStatus['capped']} capped, ${solverStatus['bailed-out']} bailed out`);
  }

  return {
    rows: series.length,
    incompleteInputRows,
    missingChannels,
    valueCounts,
    solverStatus
  };
}
