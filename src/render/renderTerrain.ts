import type { RenderConfiguration, RenderMode, RenderStats } from '../shared/types.js';
import { RENDER_MODES } from '../shared/types.js';
import { DEFAULT_RENDER_CONFIGURATION } from '../shared/terrainConsts.js';
import { TerrainError } from '../shared/errors.js';
import type { ReadonlyHeightGrid } from '../world/HeightGrid.js';
import { PixelBuffer, type PixelImage } from './PixelBuffer.js';
import {
  contourShader,
  heightShader,
  heightWithContourShader,
  reliefShader,
  type CellShader,
} from './renderModes.js';

export function isRenderMode(value: string): value is RenderMode {
  return (RENDER_MODES as readonly string[]).includes(value);
}

/**
 * Merges a partial configuration over the defaults and validates it.
 */
export function resolveRenderConfiguration(overrides: Partial<RenderConfiguration> = {}): RenderConfiguration {
  const config: RenderConfiguration = {
    seaLevelRatio: overrides.seaLevelRatio ?? DEFAULT_RENDER_CONFIGURATION.seaLevelRatio,
    showSea: overrides.showSea ?? DEFAULT_RENDER_CONFIGURATION.showSea,
    contourLineDensity: overrides.contourLineDensity ?? DEFAULT_RENDER_CONFIGURATION.contourLineDensity,
  };
  if (!Number.isFinite(config.seaLevelRatio) || config.seaLevelRatio < 0 || config.seaLevelRatio > 1) {
    throw new TerrainError('InvalidConfiguration', `seaLevelRatio must be within [0, 1], got ${config.seaLevelRatio}`);
  }
  if (!Number.isFinite(config.contourLineDensity) || config.contourLineDensity <= 0) {
    throw new TerrainError('InvalidConfiguration', `contourLineDensity must be > 0, got ${config.contourLineDensity}`);
  }
  return config;
}

export function computeRenderStats(grid: ReadonlyHeightGrid, config: RenderConfiguration): RenderStats {
  const minHeight = grid.minHeight;
  const maxHeight = grid.maxHeight;
  const heightRange = maxHeight - minHeight;
  return {
    minHeight,
    maxHeight,
    heightRange,
    seaLevel: config.seaLevelRatio * heightRange + minHeight,
  };
}

function selectShader(mode: RenderMode, stats: RenderStats, config: RenderConfiguration): CellShader {
  switch (mode) {
    case 'height':
      return heightShader(stats, config);
    case 'relief':
      return reliefShader(stats);
    case 'contour':
      return contourShader(stats, config);
    case 'heightWithContour':
      return heightWithContourShader(stats, config);
    default: {
      const unknown: never = mode;
      throw new TerrainError('InvalidConfiguration', `Unknown render mode: ${String(unknown)}`);
    }
  }
}

/**
 * Renders the grid into a new pixel buffer of the same resolution. The grid
 * is only read.
 */
export function renderTerrain(
  grid: ReadonlyHeightGrid,
  mode: RenderMode,
  overrides: Partial<RenderConfiguration> = {}
): PixelImage {
  const config = resolveRenderConfiguration(overrides);
  const stats = computeRenderStats(grid, config);
  const shade = selectShader(mode, stats, config);

  const pixels = new PixelBuffer(grid.resolution);
  for (let row = 0; row < grid.rows; row++) {
    const cells = grid.row(row);
    for (let col = 0; col < cells.length; col++) {
      pixels.setPixel(row, col, shade(cells[col]));
    }
  }
  return pixels;
}
