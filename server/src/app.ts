import express, { type Express } from 'express';
import cors from 'cors';
import { createHealthRouter } from './routes/health.js';
import { createStreamRouter } from './routes/streamRoutes.js';
import { createViewerRouter } from './routes/viewerRoutes.js';
import type { FrameRelay } from './stream/frameRelay.js';

export const APP_NAME = 'Framecast Relay';
export const APP_VERSION = '0.1.0';

export interface AppOptions {
  relay: FrameRelay;
  corsOrigins: string[];
}

export function createApp({ relay, corsOrigins }: AppOptions): Express {
  const app = express();

  app.use(
    cors({
      origin: corsOrigins,
      credentials: true,
    }),
  );
  app.use(express.json({ limit: '64kb' }));

  app.get('/', (_req, res) => {
    res.json({
      name: APP_NAME,
      version: APP_VERSION,
      viewer: '/ws/view',
      ingest: '/ws/stream',
    });
  });

  app.use('/health', createHealthRouter(relay));
  app.use('/api/stream', createStreamRouter(relay));
  app.use('/api/viewers', createViewerRouter(relay));

  return app;
}
