import type { NoiseLayer, Resolution } from '../shared/types.js';
import { TerrainError } from '../shared/errors.js';
import { HeightGrid, initializeGrid } from './HeightGrid.js';
import type { NoiseSource } from './noise.js';

export function validateLayers(layers: readonly NoiseLayer[]): void {
  layers.forEach((layer, i) => {
    if (!Number.isFinite(layer.frequency) || layer.frequency <= 0) {
      throw new TerrainError('InvalidConfiguration', `Layer ${i}: frequency must be > 0, got ${layer.frequency}`);
    }
    if (!Number.isFinite(layer.amplitude) || layer.amplitude < 0) {
      throw new TerrainError('InvalidConfiguration', `Layer ${i}: amplitude must be >= 0, got ${layer.amplitude}`);
    }
  });
}

// Each row reads only the noise source and writes only its own cells.
function perturbateRow(grid: HeightGrid, row: number, layers: readonly NoiseLayer[], noise: NoiseSource): void {
  const cells = grid.row(row);
  for (let col = 0; col < cells.length; col++) {
    let height = cells[col];
    for (const layer of layers) {
      height += noise.sample(row, col, layer.frequency) * layer.amplitude * 2 - layer.amplitude;
    }
    cells[col] = height;
  }
}

/**
 * Sums every layer into a fresh grid. Layer order does not matter.
 * An empty layer list yields a flat grid at 0.
 */
export function perturbate(resolution: Resolution, layers: readonly NoiseLayer[], noise: NoiseSource): HeightGrid {
  validateLayers(layers);
  const grid = initializeGrid(resolution, 0);
  for (let row = 0; row < grid.rows; row++) {
    perturbateRow(grid, row, layers, noise);
  }
  return grid;
}

/**
 * Raises every cell of `grid` to at least the matching cell of `cutoffGrid`.
 */
export function cutoffInPlace(grid: HeightGrid, cutoffGrid: HeightGrid): void {
  if (grid.rows !== cutoffGrid.rows || grid.columns !== cutoffGrid.columns) {
    throw new TerrainError(
      'InvalidResolution',
      `Cutoff grid is ${cutoffGrid.rows}x${cutoffGrid.columns}, expected ${grid.rows}x${grid.columns}`
    );
  }
  for (let row = 0; row < grid.rows; row++) {
    const cells = grid.row(row);
    const floor = cutoffGrid.row(row);
    for (let col = 0; col < cells.length; col++) {
      if (floor[col] > cells[col]) cells[col] = floor[col];
    }
  }
}

/**
 * Floors `baseGrid` against a second field built from `cutoffLayers`.
 * Usually the cutoff layers are the base stack minus its finest octaves, so
 * detail survives above a smooth plateau and is flattened below it.
 * Mutates `baseGrid`.
 */
export function cutoff(baseGrid: HeightGrid, cutoffLayers: readonly NoiseLayer[], noise: NoiseSource): void {
  const cutoffGrid = perturbate(baseGrid.resolution, cutoffLayers, noise);
  cutoffInPlace(baseGrid, cutoffGrid);
}
