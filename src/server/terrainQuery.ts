import type { RenderConfiguration, RenderMode, Resolution } from '../shared/types.js';
import { TerrainError } from '../shared/errors.js';
import { DEFAULT_RESOLUTION } from '../shared/terrainConsts.js';
import { validateResolution } from '../world/HeightGrid.js';
import { isRenderMode, resolveRenderConfiguration } from '../render/renderTerrain.js';

export type QueryValue = string | QueryObject | (string | QueryObject)[] | undefined;
export interface QueryObject {
  [key: string]: QueryValue;
}

export interface TerrainQuery {
  mode: RenderMode;
  resolution: Resolution;
  seed: number;
  configuration: RenderConfiguration;
}

function single(query: QueryObject, name: string): string | undefined {
  const value = query[name];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new TerrainError('InvalidConfiguration', `Query parameter "${name}" must be given once`);
  }
  return value;
}

function numberParam(query: QueryObject, name: string, kind: 'int' | 'float'): number | undefined {
  const raw = single(query, name);
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (raw.trim() === '' || !Number.isFinite(value) || (kind === 'int' && !Number.isInteger(value))) {
    throw new TerrainError('InvalidConfiguration', `Query parameter "${name}" must be ${kind === 'int' ? 'an integer' : 'a number'}, got "${raw}"`);
  }
  return value;
}

function booleanParam(query: QueryObject, name: string): boolean | undefined {
  const raw = single(query, name);
  if (raw === undefined) return undefined;
  if (raw === 'true' || raw === '1') return true;
  if (raw === 'false' || raw === '0') return false;
  throw new TerrainError('InvalidConfiguration', `Query parameter "${name}" must be true or false, got "${raw}"`);
}

/**
 * Turns `/terrain/:mode.png` parameters into a validated request.
 */
export function parseTerrainQuery(
  mode: string,
  query: QueryObject,
  defaults: { seed: number; maxCells: number }
): TerrainQuery {
  if (!isRenderMode(mode)) {
    throw new TerrainError('InvalidConfiguration', `Unknown render mode "${mode}"`);
  }

  const resolution: Resolution = {
    rows: numberParam(query, 'rows', 'int') ?? DEFAULT_RESOLUTION.rows,
    columns: numberParam(query, 'columns', 'int') ?? DEFAULT_RESOLUTION.columns,
  };
  validateResolution(resolution);
  if (resolution.rows * resolution.columns > defaults.maxCells) {
    throw new TerrainError(
      'InvalidResolution',
      `${resolution.rows}x${resolution.columns} exceeds the limit of ${defaults.maxCells} cells`
    );
  }

  const configuration = resolveRenderConfiguration({
    seaLevelRatio: numberParam(query, 'seaLevelRatio', 'float'),
    showSea: booleanParam(query, 'showSea'),
    contourLineDensity: numberParam(query, 'contourLineDensity', 'float'),
  });

  return {
    mode,
    resolution,
    seed: numberParam(query, 'seed', 'int') ?? defaults.seed,
    configuration,
  };
}
