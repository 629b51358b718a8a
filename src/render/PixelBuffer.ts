import type { Resolution, Rgb } from '../shared/types.js';
import { validateResolution } from '../world/HeightGrid.js';

export const CHANNELS = 3;

/** What callers get back from a render: pixels can be read but not written. */
export interface PixelImage {
  readonly rows: number;
  readonly columns: number;
  getPixel(row: number, col: number): Rgb;
  /** Copy of the packed RGB bytes, row-major. */
  copyData(): Uint8Array;
}

/**
 * Packed RGB pixels, row-major. Pixel (row, col) starts at
 * `(row * columns + col) * 3`. Only the renderer writes through `setPixel`;
 * it hands the buffer on as a `PixelImage`.
 */
export class PixelBuffer implements PixelImage {
  public readonly rows: number;
  public readonly columns: number;
  private readonly data: Uint8Array;

  constructor(resolution: Resolution) {
    validateResolution(resolution);
    this.rows = resolution.rows;
    this.columns = resolution.columns;
    this.data = new Uint8Array(this.rows * this.columns * CHANNELS);
  }

  getPixel(row: number, col: number): Rgb {
    const i = this.getOffset(row, col);
    return { r: this.data[i], g: this.data[i + 1], b: this.data[i + 2] };
  }

  copyData(): Uint8Array {
    return this.data.slice();
  }

  setPixel(row: number, col: number, color: Rgb): void {
    const i = this.getOffset(row, col);
    this.data[i] = color.r;
    this.data[i + 1] = color.g;
    this.data[i + 2] = color.b;
  }

  private getOffset(row: number, col: number): number {
    if (row < 0 || row >= this.rows || col < 0 || col >= this.columns) {
      throw new RangeError(`Pixel (${row}, ${col}) is outside a ${this.rows}x${this.columns} buffer`);
    }
    return (row * this.columns + col) * CHANNELS;
  }
}
