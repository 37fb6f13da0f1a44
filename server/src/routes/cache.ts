import express from 'express';
import type { SubtitleCache } from '../services/cache/subtitleCache.js';
import { info } from '../utils/log.js';

export function cacheRoutes(cache: SubtitleCache) {
  const router = express.Router();

  router.delete('/cache', async (_req, res, next) => {
    try {
      const removed = await cache.clearAll();
      info('cache.cleared', { removed });
      res.json({ removed_count: removed });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
