import type { DateTime } from 'luxon';
import { MergeError } from '../errors/index.js';
import type { CellValue } from '../types/index.js';

/**
 * Column-oriented time series on the canonical grid.
 *
 * The schema (timestamp column plus data columns) is fixed at construction;
 * afterwards the series only grows by whole columns via `appendColumn`.
 */
export class MergedSeries {
  readonly timestampColumn: string;
  readonly timestamps: readonly DateTime[];
  private readonly dataColumns: string[];
  private readonly data = new Map<string, CellValue[]>();

  constructor(
    timestampColumn: string,
    timestamps: DateTime[],
    columns: Array<[name: string, values: CellValue[]]>
  ) {
    this.timestampColumn = timestampColumn;
    this.timestamps = timestamps;
    this.dataColumns = [];
    for (const [name, values] of columns) {
      this.appendColumn(name, values);
    }
  }

  get length(): number {
    return this.timestamps.length;
  }

  // Timestamp column first, then data columns in schema order
  get columns(): string[] {
    return [this.timestampColumn, ...this.dataColumns];
  }

  get valueColumns(): readonly string[] {
    return this.dataColumns;
  }

  hasColumn(name: string): boolean {
    return name === this.timestampColumn || this.data.has(name);
  }

  requireColumn(name: string): readonly CellValue[] {
    const values = this.data.get(name);
    if (!values) {
      throw new MergeError(`Column '${name}' is not part of the merged series`);
    }
    return values;
  }

  // Copy of a data column's values
  column(name: string): CellValue[] {
    return [...this.requireColumn(name)];
  }

  valueAt(column: string, index: number): CellValue {
    return this.requireColumn(column)[index] ?? null;
  }

  // Numeric reading or null; text cells never count as numbers
  numberAt(column: string, index: number): number | null {
    const value = this.valueAt(column, index);
    return typeof value === 'number' ? value : null;
  }

  appendColumn(name: string, values: CellValue[]): void {
    if (this.hasColumn(name)) {
      throw new MergeError(`Column '${name}' already exists in the merged series`);
    }
    if (values.length !== this.length) {
      throw new MergeError(
        `Column '${name}' has ${values.length} values, expected ${this.length}`
      );
    }
    this.dataColumns.push(name);
    this.data.set(name, values);
  }

  // True when every data cell of the row is missing
  isEmptyRow(index: number): boolean {
    for (const name of this.dataColumns) {
      if (this.valueAt(name, index) !== null) return false;
    }
    return true;
  }
}
