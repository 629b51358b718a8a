import { loadServerConfig } from '../../src/server/config.js';

describe('loadServerConfig', () => {
  it('falls back to defaults', () => {
    expect(loadServerConfig({})).toEqual({
      port: 3000,
      seed: 12345,
      concurrency: 4,
      maxCells: 2048 * 2048,
    });
  });

  it('reads overrides from the environment', () => {
    const config = loadServerConfig({ PORT: '8080', TERRAIN_SEED: '7', TERRAIN_CONCURRENCY: '2', TERRAIN_MAX_CELLS: '100' });
    expect(config).toEqual({ port: 8080, seed: 7, concurrency: 2, maxCells: 100 });
  });

  it('rejects non-integer values', () => {
    expect(() => loadServerConfig({ PORT: 'abc' })).toThrow('Environment variable PORT must be an integer, got "abc"');
  });
});
