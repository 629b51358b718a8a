import type { Resolution } from '../shared/types.js';
import { TerrainError } from '../shared/errors.js';

export function validateResolution(resolution: Resolution): void {
  const { rows, columns } = resolution;
  if (!Number.isInteger(rows) || !Number.isInteger(columns) || rows <= 0 || columns <= 0) {
    throw new TerrainError('InvalidResolution', `Resolution must be positive integers, got ${rows}x${columns}`);
  }
}

/** Read access to a grid, as handed to meshing and rendering. */
export interface ReadonlyHeightGrid {
  readonly resolution: Resolution;
  readonly rows: number;
  readonly columns: number;
  readonly minHeight: number;
  readonly maxHeight: number;
  readonly heightRange: number;
  get(row: number, col: number): number;
  row(row: number): ArrayLike<number>;
  clone(): HeightGrid;
  toArray(): number[][];
}

/**
 * Row-major elevation grid. Cell (row, col) lives at `row * columns + col`.
 */
export class HeightGrid implements ReadonlyHeightGrid {
  public readonly resolution: Resolution;
  private readonly cells: Float64Array;

  constructor(resolution: Resolution, initialValue: number = 0) {
    validateResolution(resolution);
    if (!Number.isFinite(initialValue)) {
      throw new TerrainError('InvalidConfiguration', `Initial grid value must be finite, got ${initialValue}`);
    }
    this.resolution = { rows: resolution.rows, columns: resolution.columns };
    this.cells = new Float64Array(resolution.rows * resolution.columns);
    if (initialValue !== 0) {
      this.cells.fill(initialValue);
    }
  }

  get rows(): number {
    return this.resolution.rows;
  }

  get columns(): number {
    return this.resolution.columns;
  }

  get(row: number, col: number): number {
    return this.cells[this.getIndex(row, col)];
  }

  set(row: number, col: number, value: number): void {
    this.cells[this.getIndex(row, col)] = value;
  }

  // Live view: writes through to the grid
  row(row: number): Float64Array {
    this.checkBounds(row, 0);
    const start = row * this.resolution.columns;
    return this.cells.subarray(start, start + this.resolution.columns);
  }

  get minHeight(): number {
    let min = Infinity;
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] < min) min = this.cells[i];
    }
    return min;
  }

  get maxHeight(): number {
    let max = -Infinity;
    for (let i = 0; i < this.cells.length; i++) {
      if (this.cells[i] > max) max = this.cells[i];
    }
    return max;
  }

  get heightRange(): number {
    return this.maxHeight - this.minHeight;
  }

  clone(): HeightGrid {
    const copy = new HeightGrid(this.resolution);
    copy.cells.set(this.cells);
    return copy;
  }

  toArray(): number[][] {
    const out: number[][] = [];
    for (let r = 0; r < this.resolution.rows; r++) {
      out.push(Array.from(this.row(r)));
    }
    return out;
  }

  static fromArray(values: readonly (readonly number[])[]): HeightGrid {
    const rows = values.length;
    const columns = rows > 0 ? values[0].length : 0;
    const grid = new HeightGrid({ rows, columns });
    for (let r = 0; r < rows; r++) {
      if (values[r].length !== columns) {
        throw new TerrainError('InvalidResolution', `Row ${r} has ${values[r].length} cells, expected ${columns}`);
      }
      for (let c = 0; c < columns; c++) {
        if (!Number.isFinite(values[r][c])) {
          throw new TerrainError('InvalidConfiguration', `Cell (${r}, ${c}) is not a finite number`);
        }
        grid.set(r, c, values[r][c]);
      }
    }
    return grid;
  }

  private getIndex(row: number, col: number): number {
    this.checkBounds(row, col);
    return row * this.resolution.columns + col;
  }

  private checkBounds(row: number, col: number): void {
    if (row < 0 || row >= this.resolution.rows || col < 0 || col >= this.resolution.columns) {
      throw new RangeError(`Cell (${row}, ${col}) is outside a ${this.resolution.rows}x${this.resolution.columns} grid`);
    }
  }
}

export function initializeGrid(resolution: Resolution, initialValue: number = 0): HeightGrid {
  return new HeightGrid(resolution, initialValue);
}
