import {
  TerrainJobQueue,
  runTerrainJob,
  terrainJobKey,
  type TerrainJobRequest,
  type TerrainJobResult,
} from '../../src/server/terrainJobQueue.js';
import { PixelBuffer } from '../../src/render/PixelBuffer.js';
import { TerrainError } from '../../src/shared/errors.js';
import { DEFAULT_CUTOFF_LAYERS, DEFAULT_LAYERS } from '../../src/shared/terrainConsts.js';

function request(seed: number, overrides: Partial<TerrainJobRequest> = {}): TerrainJobRequest {
  return {
    resolution: { rows: 8, columns: 12 },
    seed,
    layers: DEFAULT_LAYERS,
    cutoffLayers: DEFAULT_CUTOFF_LAYERS,
    mode: 'height',
    ...overrides,
  };
}

// Stand-in runner that skips generation and tracks how many jobs overlap.
function trackingRunner() {
  const calls: TerrainJobRequest[] = [];
  const runner = (req: TerrainJobRequest): TerrainJobResult => {
    calls.push(req);
    return {
      id: `job-${calls.length}`,
      key: terrainJobKey(req),
      stats: { minHeight: 0, maxHeight: 0, heightRange: 0, seaLevel: 0 },
      pixels: new PixelBuffer(req.resolution),
      elapsedMs: 0,
    };
  };
  return { calls, runner };
}

describe('TerrainJobQueue', () => {
  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('runs at most `concurrency` jobs at once', async () => {
    const { calls, runner } = trackingRunner();
    const queue = new TerrainJobQueue(2, runner);

    const jobs = [1, 2, 3, 4, 5].map(seed => queue.enqueue(request(seed)));
    expect(queue.getQueueStatus()).toEqual({ queueSize: 3, processingCount: 2, pendingCount: 5 });

    const results = await Promise.all(jobs);
    expect(results).toHaveLength(5);
    expect(calls.map(c => c.seed)).toEqual([1, 2, 3, 4, 5]);
    expect(queue.getQueueStatus()).toEqual({ queueSize: 0, processingCount: 0, pendingCount: 0 });
  });

  it('shares one promise between identical pending requests', async () => {
    const { calls, runner } = trackingRunner();
    const queue = new TerrainJobQueue(1, runner);

    const first = queue.enqueue(request(7));
    const second = queue.enqueue(request(7));
    expect(second).toBe(first);

    await first;
    expect(calls).toHaveLength(1);
  });

  it('runs an identical request again once the first has settled', async () => {
    const { calls, runner } = trackingRunner();
    const queue = new TerrainJobQueue(1, runner);

    await queue.enqueue(request(7));
    await queue.enqueue(request(7));
    expect(calls).toHaveLength(2);
  });

  it('forgets a job before its caller resumes', async () => {
    const { runner } = trackingRunner();
    const queue = new TerrainJobQueue(1, runner);

    const first = await queue.enqueue(request(7));
    expect(queue.getQueueStatus()).toEqual({ queueSize: 0, processingCount: 0, pendingCount: 0 });

    const again = queue.enqueue(request(7));
    expect(queue.getQueueStatus().pendingCount).toBe(1);
    expect((await again).id).toBe('job-2');
    expect(first.id).toBe('job-1');
  });

  it('forgets a failed job before its caller resumes', async () => {
    let attempts = 0;
    const flaky = (req: TerrainJobRequest): TerrainJobResult => {
      attempts += 1;
      if (attempts === 1) throw new Error('first attempt failed');
      return trackingRunner().runner(req);
    };
    const queue = new TerrainJobQueue(1, flaky);

    await expect(queue.enqueue(request(7))).rejects.toThrow('first attempt failed');
    expect(queue.getQueueStatus().pendingCount).toBe(0);
    await expect(queue.enqueue(request(7))).resolves.toMatchObject({ id: 'job-1' });
    expect(attempts).toBe(2);
  });

  it('rejects with the runner error and keeps going', async () => {
    const { runner } = trackingRunner();
    const failing = (req: TerrainJobRequest): TerrainJobResult => {
      if (req.seed === 13) throw new Error('generation exploded');
      return runner(req);
    };
    const queue = new TerrainJobQueue(1, failing);

    const bad = queue.enqueue(request(13));
    const good = queue.enqueue(request(14));
    await expect(bad).rejects.toThrow('generation exploded');
    await expect(good).resolves.toMatchObject({ id: 'job-1' });
  });

  it('rejects invalid render settings before queueing', async () => {
    const queue = new TerrainJobQueue(1, trackingRunner().runner);
    await expect(queue.enqueue(request(1, { configuration: { contourLineDensity: -1 } })))
      .rejects.toBeInstanceOf(TerrainError);
    expect(queue.getQueueStatus().pendingCount).toBe(0);
  });

  it('rejects a non-positive concurrency', () => {
    expect(() => new TerrainJobQueue(0)).toThrow(RangeError);
  });
});

describe('runTerrainJob', () => {
  it('produces identical pixels for identical requests', () => {
    const first = runTerrainJob(request(12345, { mode: 'relief' }));
    const second = runTerrainJob(request(12345, { mode: 'relief' }));
    expect(second.key).toBe(first.key);
    expect(second.id).not.toBe(first.id);
    expect(second.stats).toEqual(first.stats);
    expect(Array.from(second.pixels.copyData())).toEqual(Array.from(first.pixels.copyData()));
  });

  it('reports the grid statistics behind the image', () => {
    const result = runTerrainJob(request(3, { configuration: { seaLevelRatio: 0.5 } }));
    const { minHeight, maxHeight, heightRange, seaLevel } = result.stats;
    expect(heightRange).toBeCloseTo(maxHeight - minHeight, 12);
    expect(seaLevel).toBeCloseTo(minHeight + heightRange / 2, 12);
    expect(result.pixels.rows).toBe(8);
    expect(result.pixels.columns).toBe(12);
  });
});

describe('terrainJobKey', () => {
  it('treats omitted render settings as the defaults', () => {
    expect(terrainJobKey(request(1))).toBe(
      terrainJobKey(request(1, { configuration: { seaLevelRatio: 0.2, showSea: true, contourLineDensity: 25 } }))
    );
  });

  it('distinguishes modes and seeds', () => {
    expect(terrainJobKey(request(1))).not.toBe(terrainJobKey(request(2)));
    expect(terrainJobKey(request(1))).not.toBe(terrainJobKey(request(1, { mode: 'contour' })));
  });
});
