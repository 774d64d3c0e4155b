import { describe, it, expect } from 'vitest';
import { MergeError, NoDataError } from '../src/errors/index.js';
import { mergeDailyData, summarizeMerge, resolveTimestampColumn } from '../src/utils/dataMerger.js';
import { formatTimestamp } from '../src/utils/time.js';
import { createTestLogger, range, recordSet, slotLabel } from './helpers.js';

const DAY = range('2024-01-01', '2024-01-01');

function fullDay(date: string, value: number) {
  return Array.from({ length: 48 }, (_, slot): [string, number] => [slotLabel(date, slot), value]);
}

describe('mergeDailyData', () => {
  it('fails with NoDataError on an empty input list', () => {
    expect(() => mergeDailyData([], DAY, createTestLogger())).toThrow(NoDataError);
  });

  it('fails with MergeError when no input has any column', () => {
    const empty = { source: 'empty.dat', columns: [], rows: [] };
    expect(() => mergeDailyData([empty], DAY, createTestLogger())).toThrow(MergeError);
  });

  it('fills gaps in a sparse day with missing markers', () => {
    const sparse = recordSet('a.dat', [
      ['2024-01-01 00:00:00', 1],
      ['2024-01-01 01:00:00', 2]
    ]);

    const { series, stats } = mergeDailyData([sparse], DAY, createTestLogger());

    expect(series.length).toBe(48);
    expect(series.valueAt('value', 0)).toBe(1);
    expect(series.valueAt('value', 1)).toBeNull();
    expect(series.valueAt('value', 2)).toBe(2);
    expect(stats.matchedSlots).toBe(2);
  });

  it('keeps the row from the earlier file when timestamps collide', () => {
    const a = recordSet('a.dat', [['2024-01-01 12:00:00', 1]]);
    const b = recordSet('b.dat', [['2024-01-01 12:00:00', 2]]);
    const logger = createTestLogger();

    const forward = mergeDailyData([a, b], DAY, logger);
    expect(forward.series.valueAt('value', 24)).toBe(1);
    expect(forward.stats.duplicatesRemoved).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith('Removed 1 duplicate timestamps');

    const reversed = mergeDailyData([b, a], DAY, createTestLogger());
    expect(reversed.series.valueAt('value', 24)).toBe(2);
  });

  it('uses input order, not position after sorting, to pick the first duplicate', () => {
    // file a lists its rows out of order; its 00:00 row still precedes file b's
    const a = recordSet('a.dat', [
      ['2024-01-01 01:00:00', 10],
      ['2024-01-01 00:00:00', 20]
    ]);
    const b = recordSet('b.dat', [['2024-01-01 00:00:00', 30]]);

    const { series } = mergeDailyData([a, b], DAY, createTestLogger());

    expect(series.valueAt('value', 0)).toBe(20);
    expect(series.valueAt('value', 2)).toBe(10);
  });

  it('leaves an absent day entirely missing', () => {
    const twoDays = range('2024-01-01', '2024-01-02');
    const { series } = mergeDailyData([recordSet('a.dat', fullDay('2024-01-01', 5))], twoDays, createTestLogger());

    expect(series.length).toBe(96);
    expect(formatTimestamp(series.timestamps[48])).toBe('2024-01-02 00:00:00');
    for (let i = 0; i < 48; i++) {
      expect(series.isEmptyRow(i)).toBe(false);
    }
    for (let i = 48; i < 96; i++) {
      expect(series.isEmptyRow(i)).toBe(true);
    }
  });

  it('unions columns and marks cells a file lacks as missing', () => {
    const a = recordSet('a.dat', [['2024-01-01 00:00:00', 1]]);
    const b = {
      source: 'b.dat',
      columns: ['TIMESTAMP', 'RECORD', 'value', 'extra'],
      rows: [{ TIMESTAMP: '2024-01-01 00:30:00', RECORD: 0, value: 2, extra: 7 }]
    };

    const { series } = mergeDailyData([a, b], DAY, createTestLogger());

    expect(series.columns).toEqual(['TIMESTAMP', 'RECORD', 'value', 'extra']);
    expect(series.valueAt('extra', 0)).toBeNull();
    expect(series.valueAt('extra', 1)).toBe(7);
  });

  it('falls back to the first column and warns when no standard timestamp exists', () => {
    const logger = createTestLogger();
    const set = recordSet('a.dat', [['2024-01-01 00:00:00', 1]], ['Stamp', 'RECORD', 'value']);

    const { series, stats } = mergeDailyData([set], DAY, logger);

    expect(series.timestampColumn).toBe('Stamp');
    expect(stats.timestampFallback).toBe(true);
    expect(series.valueAt('value', 0)).toBe(1);
    expect(logger.warn).toHaveBeenCalledWith('No standard timestamp column found, using first column: Stamp');
  });

  it('drops rows with unreadable timestamps and counts rows off the grid', () => {
    const set = recordSet('a.dat', [
      ['2024-01-01 00:00:00', 1],
      ['garbled', 2],
      ['2024-01-03 00:00:00', 3],
      ['2024-01-01 00:15:00', 4]
    ]);

    const { stats } = mergeDailyData([set], DAY, createTestLogger());

    expect(stats.inputRows).toBe(4);
    expect(stats.droppedRows).toBe(1);
    expect(stats.offGridRows).toBe(2);
    expect(stats.matchedSlots).toBe(1);
  });
});

describe('mergeDailyData with offset labels', () => {
  it('keys a label carrying an offset by its wall-clock time', () => {
    const set = recordSet('a.dat', [['2024-01-01T02:00:00+02:00', 7]]);

    const { series, stats } = mergeDailyData([set], DAY, createTestLogger());

    expect(series.valueAt('value', 4)).toBe(7);
    expect(series.valueAt('value', 0)).toBeNull();
    expect(stats.matchedSlots).toBe(1);
  });
});

describe('resolveTimestampColumn', () => {
  it('follows the candidate order', () => {
    const logger = createTestLogger();
    expect(resolveTimestampColumn(['time', 'DateTime', 'x'], logger)).toEqual({ column: 'DateTime', fallback: false });
    expect(logger.warn).not.toHaveBeenCalled();
  });
});

describe('summarizeMerge', () => {
  it('reports coverage from rows that carry any data', () => {
    const set = recordSet('a.dat', [
      ['2024-01-01 00:00:00', 1],
      ['2024-01-01 00:30:00', 2]
    ]);
    const { series } = mergeDailyData([set], DAY, createTestLogger());

    const summary = summarizeMerge(series, DAY);

    expect(summary.totalRows).toBe(48);
    expect(summary.expectedRows).toBe(48);
    expect(summary.missingTimestamps).toBe(46);
    expect(summary.dataCoverage).toBeCloseTo(100 * 2 / 48, 6);
    expect(summary.timestampColumn).toBe('TIMESTAMP');
    expect(summary.dateRange).toBe('2024-01-01 to 2024-01-01');
  });
});
