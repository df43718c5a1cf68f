import { Router } from 'express';
import os from 'node:os';
import type { ClientRegistry } from '../lib/clientRegistry.js';

export function createHealthRouter(registry: ClientRegistry): Router {
  const router = Router();

  router.get('/', (_req, res) => {
    const memory = process.memoryUsage();
    res.json({
      status: 'ok',
      uptime: process.uptime(),
      clients: registry.size,
      load: os.loadavg(),
      memory: {
        rss: memory.rss,
        heapUsed: memory.heapUsed,
      },
    });
  });

  return router;
}
