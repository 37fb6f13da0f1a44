import express from 'express';
import { VERSION } from '../config.js';
import { listCatalog } from '../config/catalog.js';
import type { ProviderRegistry } from '../services/providers/registry.js';

export function healthRoutes(providers: ProviderRegistry) {
  const router = express.Router();

  router.get('/', (_req, res) => {
    res.json({ message: 'YouTube AI Subtitles Backend', version: VERSION });
  });

  router.get('/health', (_req, res) => {
    res.json({ status: 'healthy', providers: providers.list(), version: VERSION });
  });

  router.get('/models', (_req, res) => {
    const registered = new Set(providers.list());
    res.json({ providers: listCatalog().filter((p) => registered.has(p.id)) });
  });

  return router;
}
