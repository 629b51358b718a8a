// Core types
export type {
  Resolution,
  NoiseLayer,
  Vertex,
  Edge,
  Face,
  Mesh,
  Rgb,
  RenderMode,
  RenderConfiguration,
  RenderStats,
} from './shared/types.js';
export { RENDER_MODES } from './shared/types.js';
export { TerrainError, isTerrainError } from './shared/errors.js';
export type { TerrainErrorKind } from './shared/errors.js';
export * from './shared/terrainConsts.js';

// Height field
export { HeightGrid, initializeGrid, validateResolution } from './world/HeightGrid.js';
export type { ReadonlyHeightGrid } from './world/HeightGrid.js';
export { perturbate, cutoff, cutoffInPlace, validateLayers } from './world/heightField.js';
export { createNoiseSource, mulberry32 } from './world/noise.js';
export type { NoiseSource } from './world/noise.js';

// Geometry
export { buildMesh, getMeshVertex } from './world/buildMesh.js';

// Rendering
export { PixelBuffer } from './render/PixelBuffer.js';
export type { PixelImage } from './render/PixelBuffer.js';
export { blend } from './render/colors.js';
export {
  renderTerrain,
  computeRenderStats,
  resolveRenderConfiguration,
  isRenderMode,
} from './render/renderTerrain.js';

// Builder
export { TerrainGenerator } from './world/TerrainGenerator.js';
export type { TerrainGeneratorOptions } from './world/TerrainGenerator.js';

// Encoding and job scheduling
export { encodePng, writePng } from './server/imageWriter.js';
export { TerrainJobQueue, runTerrainJob, terrainJobKey } from './server/terrainJobQueue.js';
export type { TerrainJobRequest, TerrainJobResult, TerrainJobRunner } from './server/terrainJobQueue.js';
