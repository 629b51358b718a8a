import type { Rgb } from '../shared/types.js';

/**
 * Linear per-channel blend from `from` (t = 0) to `to` (t = 1), truncated to
 * integer channels. `t` is clamped to [0, 1].
 */
export function blend(from: Rgb, to: Rgb, t: number): Rgb {
  const ratio = Number.isNaN(t) ? 0 : Math.min(1, Math.max(0, t));
  return {
    r: Math.trunc(from.r + ratio * (to.r - from.r)),
    g: Math.trunc(from.g + ratio * (to.g - from.g)),
    b: Math.trunc(from.b + ratio * (to.b - from.b)),
  };
}

export function gray(value: number): Rgb {
  return { r: value, g: value, b: value };
}
