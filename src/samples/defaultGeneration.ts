import { DEFAULT_CUTOFF_LAYERS, DEFAULT_LAYERS, DEFAULT_RESOLUTION, DEFAULT_SEED } from '../shared/terrainConsts.js';
import { TerrainGenerator } from '../world/TerrainGenerator.js';
import { writePng } from '../server/imageWriter.js';

const outputPath = process.argv[2] ?? 'Output.png';

const pixels = new TerrainGenerator(DEFAULT_RESOLUTION, { seed: DEFAULT_SEED })
  .perturbate(DEFAULT_LAYERS)
  .cutoff(DEFAULT_CUTOFF_LAYERS)
  .render('height', { seaLevelRatio: 0.2 });

writePng(pixels, outputPath).catch((error: unknown) => {
  console.error('[DefaultGeneration] Failed to write image:', error);
  process.exitCode = 1;
});
