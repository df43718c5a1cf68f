import { Router } from 'express';
import { listClients, toClientListing } from '../lib/clientListing.js';
import type { ClientRegistry } from '../lib/clientRegistry.js';

export function createClientRouter(registry: ClientRegistry): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    res.json({ clients: listClients(registry.list()) });
  });

  router.get('/:id', (req, res) => {
    const record = registry.get(req.params.id);
    if (!record) {
      res.status(404).json({ error: 'NOT_FOUND' });
      return;
    }
    res.json({ id: record.id, ...toClientListing(record) });
  });

  return router;
}
