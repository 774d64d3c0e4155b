import { vi } from 'vitest';
import { DateTime } from 'luxon';
import type { Logger } from '../src/utils/logger.js';
import type { DailyRecordSet, DateRange, RawRow } from '../src/types/index.js';

export function createTestLogger() {
  return {
    debug: vi.fn<(message: string) => void>(),
    info: vi.fn<(message: string) => void>(),
    warn: vi.fn<(message: string) => void>(),
    error: vi.fn<(message: string) => void>()
  } satisfies Logger;
}

export function range(start: string, end: string): DateRange {
  return {
    start: DateTime.fromISO(start, { zone: 'utc' }),
    end: DateTime.fromISO(end, { zone: 'utc' })
  };
}

// "2024-01-01" + slot 3 -> "2024-01-01 01:30:00"
export function slotLabel(date: string, slot: number): string {
  const hours = String(Math.floor(slot / 2)).padStart(2, '0');
  const minutes = slot % 2 === 0 ? '00' : '30';
  return `${date} ${hours}:${minutes}:00`;
}

export function recordSet(
  source: string,
  rows: Array<[timestamp: string, value: number]>,
  columns: string[] = ['TIMESTAMP', 'RECORD', 'value']
): DailyRecordSet {
  return {
    source,
    columns,
    rows: rows.map(([timestamp, value], i): RawRow => ({
      [columns[0]]: timestamp,
      RECORD: i,
      value
    }))
  };
}

export const STATION_COLUMNS = ['TIMESTAMP', 'RECORD', 'BGTemp_C_Avg', 'AirTC_Avg', 'RH_Avg', 'P_Air_Avg'];

// A full day of half-hourly rows in logger file layout
export function buildDailyFile(date: string, slots = 48): string {
  const lines = [
    '"TOA5","MM1","CR6","1234","CR6.Std.12","CPU:Station.CR6","5678","Table30"',
    STATION_COLUMNS.map(c => `"${c}"`).join(','),
    '"TS","RN","Deg C","Deg C","%","mbar"',
    '"","","Avg","Avg","Avg","Avg"'
  ];
  for (let slot = 0; slot < slots; slot++) {
    lines.push(`"${slotLabel(date, slot)}",${slot},30.5,25.1,55,1012.4`);
  }
  return lines.join('\n') + '\n';
}
