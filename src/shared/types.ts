export interface Resolution {
  readonly rows: number;
  readonly columns: number;
}

/** One octave of noise. `amplitude` bounds the layer's contribution to [-amplitude, +amplitude]. */
export interface NoiseLayer {
  frequency: number;
  amplitude: number;
}

export interface Vertex {
  x: number; // grid row
  y: number; // grid column
  z: number; // elevation
}

export interface Edge {
  v1: number;
  v2: number;
}

export interface Face {
  v1: number;
  v2: number;
  v3: number;
}

export interface Mesh {
  readonly resolution: Resolution;
  readonly vertices: readonly Vertex[]; // row-major
  readonly edges: readonly Edge[]; // reserved, always empty for now
  readonly faces: readonly Face[];
}

export interface Rgb {
  r: number;
  g: number;
  b: number;
}

export type RenderMode = 'height' | 'relief' | 'contour' | 'heightWithContour';

export const RENDER_MODES: readonly RenderMode[] = ['height', 'relief', 'contour', 'heightWithContour'];

export interface RenderConfiguration {
  seaLevelRatio: number; // [0, 1]
  showSea: boolean;
  contourLineDensity: number; // contour lines across the full height range
}

export interface RenderStats {
  minHeight: number;
  maxHeight: number;
  heightRange: number;
  seaLevel: number;
}
