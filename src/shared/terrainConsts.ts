// src/shared/terrainConsts.ts
import type { NoiseLayer, RenderConfiguration, Resolution, Rgb } from './types.js';

export const DEFAULT_RESOLUTION: Resolution = { rows: 350, columns: 500 };
export const DEFAULT_SEED = 12345;

// Continental shelf down to surface grain. The last octave only adds roughness.
export const DEFAULT_LAYERS: readonly NoiseLayer[] = [
  { frequency: 0.001, amplitude: 30 },
  { frequency: 0.005, amplitude: 30 },
  { frequency: 0.01, amplitude: 20 },
  { frequency: 0.07, amplitude: 0.8 },
  { frequency: 0.2, amplitude: 0.5 },
];

// Same stack without the finest octave, so the plateau floor stays smooth.
export const DEFAULT_CUTOFF_LAYERS: readonly NoiseLayer[] = DEFAULT_LAYERS.slice(0, 4);

export const DEFAULT_RENDER_CONFIGURATION: Readonly<RenderConfiguration> = {
  seaLevelRatio: 0.2,
  showSea: true,
  contourLineDensity: 25,
};

export const CONTINENT_LINE_BUFFER = 3 / 255; // fraction of the height range
export const CONTOUR_LINE_WIDTH = 0.05; // fraction of the contour span
export const CONTOUR_SPILL_WIDTH = 0.1;

export const SEA_COLOR: Rgb = { r: 61, g: 168, b: 204 };
export const DARK_SEA_COLOR: Rgb = { r: 13, g: 35, b: 56 };
export const LOW_LAND_COLOR: Rgb = { r: 110, g: 108, b: 81 };
export const HIGH_LAND_COLOR: Rgb = { r: 245, g: 243, b: 218 };
export const CONTINENT_LINE_COLOR: Rgb = { r: 46, g: 46, b: 44 };
export const CONTOUR_LINE_COLOR: Rgb = { r: 36, g: 30, b: 29 };
export const CONTOUR_LINE_EDGE_COLOR: Rgb = { r: 12, g: 12, b: 12 };
export const CONTOUR_BACKGROUND_COLOR: Rgb = { r: 224, g: 222, b: 222 };
