import { Router } from 'express';
import type { FrameRelay } from '../stream/frameRelay.js';

export function createStreamRouter(relay: FrameRelay): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json(relay.stats());
  });

  router.get('/frame', (_req, res) => {
    const frame = relay.slot.read();
    if (frame.version === 0) {
      res.status(404).json({ error: 'NO_FRAME' });
      return;
    }
    res.set({
      'Content-Type': 'image/jpeg',
      'Content-Length': String(frame.payload.byteLength),
      'Cache-Control': 'no-cache, no-store, must-revalidate',
      'X-Frame-Version': String(frame.version),
    });
    res.end(frame.payload);
  });

  return router;
}
