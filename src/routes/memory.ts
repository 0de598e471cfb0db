import { Router } from 'express';
import { z } from 'zod';
import type { MemoryChatRegistry } from '../services/ServiceRegistry.js';

const statsQuerySchema = z.object({
  namespace: z.string().min(1).optional().default('default'),
  user_id: z.string().optional()
});

export function buildMemoryRouter(registry: MemoryChatRegistry) {
  const router = Router();

  router.get('/stats', async (req, res, next) => {
    try {
      const query = statsQuerySchema.parse(req.query);
      const service = registry.resolve(query.namespace, query.user_id);
      res.json(await service.stats());
    } catch (error) {
      next(error);
    }
  });

  router.get('/namespaces', (_req, res) => {
    res.json(registry.list());
  });

  return router;
}
