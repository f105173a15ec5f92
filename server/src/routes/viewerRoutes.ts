import { Router } from 'express';
import type { FrameRelay } from '../stream/frameRelay.js';

export function createViewerRouter(relay: FrameRelay): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ viewers: relay.viewers() });
  });

  router.get('/:id', (req, res) => {
    const session = relay.registry.get(req.params.id);
    if (!session) {
      res.status(404).json({ error: 'NOT_FOUND' });
      return;
    }
    res.json(session.info());
  });

  router.delete('/:id', (req, res) => {
    if (!relay.disconnectViewer(req.params.id, 'kicked')) {
      res.status(404).json({ error: 'NOT_FOUND' });
      return;
    }
    res.json({ status: 'disconnected' });
  });

  return router;
}
