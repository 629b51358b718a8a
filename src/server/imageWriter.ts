import { writeFile } from 'fs/promises';
import path from 'path';
import { PNG } from 'pngjs';
import { CHANNELS, type PixelImage } from '../render/PixelBuffer.js';

/**
 * Encodes the pixel buffer as an opaque 8-bit RGBA PNG, one image pixel per
 * grid cell (width = columns, height = rows).
 */
export function encodePng(pixels: PixelImage): Buffer {
  const png = new PNG({ width: pixels.columns, height: pixels.rows });
  const rgb = pixels.copyData();
  const cellCount = pixels.rows * pixels.columns;
  for (let i = 0; i < cellCount; i++) {
    const src = i * CHANNELS;
    const dst = i * 4;
    png.data[dst] = rgb[src];
    png.data[dst + 1] = rgb[src + 1];
    png.data[dst + 2] = rgb[src + 2];
    png.data[dst + 3] = 255;
  }
  return PNG.sync.write(png);
}

/**
 * Writes the PNG and resolves with the absolute path. I/O errors reject
 * unchanged.
 */
export async function writePng(pixels: PixelImage, filePath: string): Promise<string> {
  const target = path.resolve(filePath);
  await writeFile(target, encodePng(pixels));
  console.log(`[ImageWriter] Wrote ${pixels.columns}x${pixels.rows} image to ${target}`);
  return target;
}
