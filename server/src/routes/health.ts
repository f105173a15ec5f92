import { Router } from 'express';
import os from 'node:os';
import type { FrameRelay } from '../stream/frameRelay.js';

export function createHealthRouter(relay: FrameRelay): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const memory = process.memoryUsage();
    const stats = relay.stats();
    const publisherFailed = stats.publisher?.state === 'failed';
    res.status(publisherFailed ? 503 : 200).json({
      status: publisherFailed ? 'degraded' : 'ok',
      uptime: process.uptime(),
      viewers: stats.viewers,
      frameVersion: stats.version,
      publisher: stats.publisher?.state,
      load: os.loadavg?.() ?? [],
      memory: {
        rss: memory.rss,
        heapUsed: memory.heapUsed,
      },
    });
  });

  return router;
}
