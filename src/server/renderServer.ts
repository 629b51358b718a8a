import express, { type Express, type Response } from 'express';
import type { Server } from 'http';
import { DEFAULT_CUTOFF_LAYERS, DEFAULT_LAYERS } from '../shared/terrainConsts.js';
import { isTerrainError } from '../shared/errors.js';
import { TerrainJobQueue } from './terrainJobQueue.js';
import { parseTerrainQuery } from './terrainQuery.js';
import { encodePng } from './imageWriter.js';
import { loadServerConfig, type ServerConfig } from './config.js';

// Helper function to send standardized error responses
function sendError(res: Response, status: number, code: string, reason: string) {
  res.status(status).json({ code, reason });
}

export function createRenderApp(queue: TerrainJobQueue, config: ServerConfig): Express {
  const app = express();

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  app.get('/queue', (_req, res) => {
    res.json(queue.getQueueStatus());
  });

  app.get('/terrain/:file', async (req, res) => {
    const file = req.params.file;
    if (!file.endsWith('.png')) {
      sendError(res, 404, 'NotFound', `Unsupported image "${file}", expected <mode>.png`);
      return;
    }

    try {
      const query = parseTerrainQuery(file.slice(0, -'.png'.length), req.query, config);
      const result = await queue.enqueue({
        resolution: query.resolution,
        seed: query.seed,
        layers: DEFAULT_LAYERS,
        cutoffLayers: DEFAULT_CUTOFF_LAYERS,
        mode: query.mode,
        configuration: query.configuration,
      });
      res
        .status(200)
        .type('png')
        .set('X-Terrain-Job', result.id)
        .send(encodePng(result.pixels));
    } catch (error) {
      if (isTerrainError(error)) {
        sendError(res, 400, error.kind, error.message);
        return;
      }
      console.error(`[RenderServer] Failed to render ${file}:`, error);
      sendError(res, 500, 'InternalError', 'Terrain rendering failed');
    }
  });

  return app;
}

export function startRenderServer(config: ServerConfig = loadServerConfig()): Server {
  const queue = new TerrainJobQueue(config.concurrency);
  const app = createRenderApp(queue, config);
  return app.listen(config.port, () => {
    console.log(`[RenderServer] Terrain render server running on port ${config.port} (seed ${config.seed})`);
  });
}
