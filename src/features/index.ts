// Heat-stress derivation - appends derived meteorological channels to a merged series
export {
  calculateSaturatedVaporPressure,
  calculateVaporPressure,
  calculateDewpoint,
  calculateWetBulbVaporPressure,
  calculateWetBulbTemperature,
  calculateWetBulbTemperatureBisection,
  calculateWbgt,
  deriveHeatStressRow,
  addHeatStressColumns,
  type HeatStressOptions,
  type HeatStressRow,
  type WetBulbOptions
} from './heatStress.js';
