import { DEFAULT_SEED } from '../shared/terrainConsts.js';

export interface ServerConfig {
  port: number;
  seed: number;
  concurrency: number;
  maxCells: number; // rows * columns accepted per request
}

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value)) {
    throw new Error(`Environment variable ${name} must be an integer, got "${raw}"`);
  }
  return value;
}

export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: readInt(env, 'PORT', 3000),
    seed: readInt(env, 'TERRAIN_SEED', DEFAULT_SEED),
    concurrency: readInt(env, 'TERRAIN_CONCURRENCY', 4),
    maxCells: readInt(env, 'TERRAIN_MAX_CELLS', 2048 * 2048),
  };
}
