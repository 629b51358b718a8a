import type { Mesh, NoiseLayer, RenderConfiguration, RenderMode, Resolution } from '../shared/types.js';
import { DEFAULT_SEED } from '../shared/terrainConsts.js';
import { initializeGrid, validateResolution, type HeightGrid, type ReadonlyHeightGrid } from './HeightGrid.js';
import { cutoff, perturbate } from './heightField.js';
import { buildMesh } from './buildMesh.js';
import { createNoiseSource, type NoiseSource } from './noise.js';
import { renderTerrain } from '../render/renderTerrain.js';
import type { PixelImage } from '../render/PixelBuffer.js';

export interface TerrainGeneratorOptions {
  seed?: number;
  noise?: NoiseSource; // takes precedence over seed
}

/**
 * Chainable handle over one height grid.
 *
 * `flatten` and `perturbate` swap in a new grid; `cutoff` edits the current
 * grid in place. Grids previously read through `grid` are never touched by
 * the replacing calls. `grid` is a read-only view; only the handle's own
 * methods write heights.
 */
export class TerrainGenerator {
  public readonly resolution: Resolution;
  private readonly noise: NoiseSource;
  private current: HeightGrid;

  constructor(resolution: Resolution, options: TerrainGeneratorOptions = {}) {
    validateResolution(resolution);
    this.resolution = { rows: resolution.rows, columns: resolution.columns };
    this.noise = options.noise ?? createNoiseSource(options.seed ?? DEFAULT_SEED);
    this.current = initializeGrid(this.resolution);
  }

  get grid(): ReadonlyHeightGrid {
    return this.current;
  }

  get minHeight(): number {
    return this.current.minHeight;
  }

  get maxHeight(): number {
    return this.current.maxHeight;
  }

  get heightRange(): number {
    return this.current.heightRange;
  }

  getHeight(row: number, col: number): number {
    return this.current.get(row, col);
  }

  /** Replaces the grid with a flat one at 0. */
  flatten(): this {
    this.current = initializeGrid(this.resolution);
    return this;
  }

  /** Replaces the grid with the sum of `layers`. */
  perturbate(layers: readonly NoiseLayer[]): this {
    this.current = perturbate(this.resolution, layers, this.noise);
    return this;
  }

  /** Floors the current grid against `layers`, in place. */
  cutoff(layers: readonly NoiseLayer[]): this {
    cutoff(this.current, layers, this.noise);
    return this;
  }

  createMesh(): Mesh {
    return buildMesh(this.current);
  }

  render(mode: RenderMode, configuration: Partial<RenderConfiguration> = {}): PixelImage {
    return renderTerrain(this.current, mode, configuration);
  }
}
