import { describe, it, expect } from 'vitest';
import { DateTime } from 'luxon';
import { MergeError } from '../src/errors/index.js';
import { MergedSeries } from '../src/utils/mergedSeries.js';

const t0 = DateTime.fromISO('2024-01-01T00:00:00', { zone: 'utc' });

function series(): MergedSeries {
  return new MergedSeries('TIMESTAMP', [t0, t0.plus({ minutes: 30 })], [
    ['AirTC_Avg', [21.5, null]],
    ['Status', ['ok', 'fault']]
  ]);
}

describe('MergedSeries', () => {
  it('hands out a copy of a column', () => {
    const merged = series();

    const values = merged.column('AirTC_Avg');
    values[0] = 99;

    expect(values).toEqual([99, null]);
    expect(merged.valueAt('AirTC_Avg', 0)).toBe(21.5);
  });

  it('rejects unknown columns', () => {
    expect(() => series().column('RH_Avg')).toThrow(MergeError);
    expect(() => series().column('RH_Avg')).toThrow("Column 'RH_Avg' is not part of the merged series");
  });

  it('reads numbers only from numeric cells', () => {
    const merged = series();
    expect(merged.numberAt('AirTC_Avg', 0)).toBe(21.5);
    expect(merged.numberAt('Status', 0)).toBeNull();
  });

  it('appends whole columns of matching length only', () => {
    const merged = series();

    expect(() => merged.appendColumn('WBGT_C', [1])).toThrow("Column 'WBGT_C' has 1 values, expected 2");
    merged.appendColumn('WBGT_C', [18, null]);

    expect(merged.columns).toEqual(['TIMESTAMP', 'AirTC_Avg', 'Status', 'WBGT_C']);
  });
});
