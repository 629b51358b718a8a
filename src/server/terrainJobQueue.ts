import { nanoid } from 'nanoid';
import type { NoiseLayer, RenderConfiguration, RenderMode, RenderStats, Resolution } from '../shared/types.js';
import { TerrainGenerator } from '../world/TerrainGenerator.js';
import { computeRenderStats, resolveRenderConfiguration } from '../render/renderTerrain.js';
import type { PixelImage } from '../render/PixelBuffer.js';

export interface TerrainJobRequest {
  resolution: Resolution;
  seed: number;
  layers: readonly NoiseLayer[];
  cutoffLayers?: readonly NoiseLayer[]; // no cutoff pass when omitted or empty
  mode: RenderMode;
  configuration?: Partial<RenderConfiguration>;
}

export interface TerrainJobResult {
  id: string;
  key: string;
  stats: RenderStats;
  pixels: PixelImage;
  elapsedMs: number;
}

interface TerrainJobTask {
  request: TerrainJobRequest;
  key: string;
  resolve: (result: TerrainJobResult) => void;
  reject: (reason: unknown) => void;
}

export type TerrainJobRunner = (request: TerrainJobRequest) => TerrainJobResult;

export function terrainJobKey(request: TerrainJobRequest): string {
  const { resolution, seed, layers, cutoffLayers, mode } = request;
  const configuration = resolveRenderConfiguration(request.configuration);
  const layerKey = (list: readonly NoiseLayer[] | undefined) =>
    (list ?? []).map(l => `${l.frequency}:${l.amplitude}`).join(',');
  return [
    `${resolution.rows}x${resolution.columns}`,
    `s${seed}`,
    `L${layerKey(layers)}`,
    `C${layerKey(cutoffLayers)}`,
    mode,
    `${configuration.seaLevelRatio}/${configuration.showSea}/${configuration.contourLineDensity}`,
  ].join('|');
}

/**
 * Flatten, perturbate, optional cutoff, then render. Each phase finishes
 * before the next starts.
 */
export function runTerrainJob(request: TerrainJobRequest): TerrainJobResult {
  const started = performance.now();
  const configuration = resolveRenderConfiguration(request.configuration);
  const generator = new TerrainGenerator(request.resolution, { seed: request.seed })
    .flatten()
    .perturbate(request.layers);
  if (request.cutoffLayers && request.cutoffLayers.length > 0) {
    generator.cutoff(request.cutoffLayers);
  }
  const pixels = generator.render(request.mode, configuration);
  return {
    id: nanoid(),
    key: terrainJobKey(request),
    stats: computeRenderStats(generator.grid, configuration),
    pixels,
    elapsedMs: performance.now() - started,
  };
}

export class TerrainJobQueue {
  private queue: TerrainJobTask[] = [];
  private processing: Set<string> = new Set(); // keys of jobs currently running
  private pendingJobs: Map<string, Promise<TerrainJobResult>> = new Map();
  private readonly concurrency: number;
  private readonly runner: TerrainJobRunner;

  constructor(concurrency: number = 4, runner: TerrainJobRunner = runTerrainJob) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`Concurrency must be a positive integer, got ${concurrency}`);
    }
    this.concurrency = concurrency;
    this.runner = runner;
    console.log(`[TerrainJobQueue] Initialized with concurrency: ${this.concurrency}`);
  }

  /** Identical requests that are still pending share one promise. */
  enqueue(request: TerrainJobRequest): Promise<TerrainJobResult> {
    let key: string;
    try {
      key = terrainJobKey(request);
    } catch (error) {
      return Promise.reject(error);
    }

    const pending = this.pendingJobs.get(key);
    if (pending) {
      return pending;
    }

    const promise = new Promise<TerrainJobResult>((resolve, reject) => {
      this.queue.push({ request, key, resolve, reject });
    });
    this.pendingJobs.set(key, promise);
    this.tryProcessNext();
    return promise;
  }

  getQueueStatus(): { queueSize: number; processingCount: number; pendingCount: number } {
    return {
      queueSize: this.queue.length,
      processingCount: this.processing.size,
      pendingCount: this.pendingJobs.size,
    };
  }

  private tryProcessNext(): void {
    while (this.queue.length > 0 && this.processing.size < this.concurrency) {
      const task = this.queue.shift();
      if (!task) return;
      this.processing.add(task.key);
      this.processJob(task).then(
        result => {
          this.release(task.key);
          task.resolve(result);
        },
        error => {
          this.release(task.key);
          task.reject(error);
        }
      );
    }
  }

  // Forget the key before settling, so a caller that re-enqueues on resume starts a new job.
  private release(key: string): void {
    this.processing.delete(key);
    this.pendingJobs.delete(key);
    this.tryProcessNext();
  }

  // Deferred to a later turn of the event loop. The runner itself is synchronous
  // and blocks the loop while it runs, so started jobs execute one after another.
  private processJob(task: TerrainJobTask): Promise<TerrainJobResult> {
    return new Promise((resolve, reject) => {
      setImmediate(() => {
        try {
          const result = this.runner(task.request);
          console.log(`[TerrainJobQueue] Job ${result.id} (${task.key}) finished in ${result.elapsedMs.toFixed(1)}ms`);
          resolve(result);
        } catch (error) {
          console.error(`[TerrainJobQueue] Error processing job ${task.key}:`, error);
          reject(error);
        }
      });
    });
  }
}
