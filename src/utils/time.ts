import { DateTime } from 'luxon';
import {
  FILE_DATE_FORMAT,
  INTERVAL_MINUTES,
  SLOTS_PER_DAY,
  TIMESTAMP_FORMAT
} from '../constants/index.js';
import type { DateRange } from '../types/index.js';

// All timestamps are handled as UTC wall-clock labels; nothing is converted
const UTC = { zone: 'utc' } as const;

// Parse a config date in YYYYMMDD or YYYY-MM-DD form
export function parseDate(value: string): DateTime | null {
  const trimmed = value.trim();
  for (const format of [FILE_DATE_FORMAT, 'yyyy-MM-dd']) {
    const dt = DateTime.fromFormat(trimmed, format, UTC);
    if (dt.isValid) return dt.startOf('day');
  }
  return null;
}

const KEEP_OFFSET = { zone: 'utc', setZone: true } as const;

// Parse a logger timestamp label ("2024-01-01 00:30:00", optional fraction, or ISO "T" form).
// A label carrying an offset keeps its wall-clock fields; it is never shifted.
export function parseTimestampLabel(label: string): DateTime | null {
  const trimmed = label.trim();
  if (!trimmed) return null;

  let dt = DateTime.fromSQL(trimmed, KEEP_OFFSET);
  if (!dt.isValid) dt = DateTime.fromISO(trimmed, KEEP_OFFSET);
  if (!dt.isValid) return null;

  return DateTime.fromObject(dt.toObject(), UTC);
}

export function formatTimestamp(dt: DateTime): string {
  return dt.toFormat(TIMESTAMP_FORMAT);
}

export function daysInRange(range: DateRange): number {
  return Math.round(range.end.diff(range.start, 'days').days) + 1;
}

// Calendar dates from start to end, inclusive
export function generateDateList(range: DateRange): DateTime[] {
  const dates: DateTime[] = [];
  for (let current = range.start; current.toMillis() <= range.end.toMillis(); current = current.plus({ days: 1 })) {
    dates.push(current);
  }
  return dates;
}

// start@00:00:00 .. end@23:30:00 at the native cadence
export function buildCanonicalGrid(range: DateRange): DateTime[] {
  const first = range.start.startOf('day');
  const slots = daysInRange(range) * SLOTS_PER_DAY;
  const grid: DateTime[] = [];
  for (let k = 0; k < slots; k++) {
    grid.push(first.plus({ minutes: k * INTERVAL_MINUTES }));
  }
  return grid;
}

// "20240101-20240102", used in output file names
export function formatDateRange(range: DateRange): string {
  return `${range.start.toFormat(FILE_DATE_FORMAT)}-${range.end.toFormat(FILE_DATE_FORMAT)}`;
}

// "2024-01-01 to 2024-01-02", used in summaries
export function describeDateRange(range: DateRange): string {
  return `${range.start.toFormat('yyyy-MM-dd')} to ${range.end.toFormat('yyyy-MM-dd')}`;
}
