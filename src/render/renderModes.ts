import type { RenderConfiguration, RenderStats, Rgb } from '../shared/types.js';
import {
  CONTINENT_LINE_BUFFER,
  CONTINENT_LINE_COLOR,
  CONTOUR_BACKGROUND_COLOR,
  CONTOUR_LINE_COLOR,
  CONTOUR_LINE_EDGE_COLOR,
  CONTOUR_LINE_WIDTH,
  CONTOUR_SPILL_WIDTH,
  DARK_SEA_COLOR,
  HIGH_LAND_COLOR,
  LOW_LAND_COLOR,
  SEA_COLOR,
} from '../shared/terrainConsts.js';
import { blend, gray } from './colors.js';

/** Colors one cell from its height and the per-render statistics. */
export type CellShader = (height: number) => Rgb;

/**
 * Distance from `height` to the nearest contour level, where levels sit at
 * `minHeight + k * contourSpan`. Null when the span is degenerate.
 */
export function contourDistance(height: number, minHeight: number, contourSpan: number): number | null {
  if (!(contourSpan > 0) || !Number.isFinite(contourSpan)) return null;
  const remainder = (height - minHeight) % contourSpan;
  return Math.min(remainder, contourSpan - remainder);
}

function elevationColor(height: number, stats: RenderStats, config: RenderConfiguration): Rgb {
  if (config.showSea && height < stats.seaLevel) {
    return SEA_COLOR;
  }
  const ratio = stats.heightRange > 0 ? (height - stats.minHeight) / stats.heightRange : 0;
  return gray(Math.trunc(ratio * 255));
}

export function heightShader(stats: RenderStats, config: RenderConfiguration): CellShader {
  return height => elevationColor(height, stats, config);
}

export function reliefShader(stats: RenderStats): CellShader {
  const buffer = CONTINENT_LINE_BUFFER * stats.heightRange;
  const landRange = stats.maxHeight - stats.seaLevel;
  const seaRange = stats.seaLevel - stats.minHeight;

  return height => {
    if (Math.abs(height - stats.seaLevel) <= buffer) {
      return CONTINENT_LINE_COLOR;
    }
    if (height > stats.seaLevel) {
      return blend(LOW_LAND_COLOR, HIGH_LAND_COLOR, (height - stats.seaLevel) / landRange);
    }
    return blend(SEA_COLOR, DARK_SEA_COLOR, (stats.seaLevel - height) / seaRange);
  };
}

export function contourShader(stats: RenderStats, config: RenderConfiguration): CellShader {
  const contourSpan = stats.heightRange / config.contourLineDensity;
  const lineWidth = contourSpan * CONTOUR_LINE_WIDTH;

  return height => {
    const distance = contourDistance(height, stats.minHeight, contourSpan);
    if (distance !== null && distance < lineWidth) {
      return blend(CONTOUR_LINE_COLOR, CONTOUR_LINE_EDGE_COLOR, distance / lineWidth);
    }
    return CONTOUR_BACKGROUND_COLOR;
  };
}

export function heightWithContourShader(stats: RenderStats, config: RenderConfiguration): CellShader {
  const contourSpan = stats.heightRange / config.contourLineDensity;
  const spill = contourSpan * CONTOUR_SPILL_WIDTH;

  return height => {
    const base = elevationColor(height, stats, config);
    const distance = contourDistance(height, stats.minHeight, contourSpan);
    if (distance !== null && distance < spill) {
      return blend(base, CONTOUR_LINE_COLOR, distance / spill);
    }
    return base;
  };
}
