import express from 'express';
import cors from 'cors';
import morgan from 'morgan';
import createError from 'http-errors';
import type { Server } from 'http';
import { jobRoutes } from './routes/transcriptions.js';
import { healthRoutes } from './routes/health.js';
import { cacheRoutes } from './routes/cache.js';
import { attachChannelServer } from './services/channel.js';
import { Pipeline } from './services/pipeline.js';
import type { AudioFetcher } from './services/downloader.js';
import type { ProviderRegistry } from './services/providers/registry.js';
import type { SubtitleCache } from './services/cache/subtitleCache.js';
import { error as logError } from './utils/log.js';

export interface AppDeps {
  providers: ProviderRegistry;
  fetcher: AudioFetcher;
  cache: SubtitleCache;
  defaultProvider: string;
  jobTimeoutMs: number;
  keepAliveIntervalMs: number;
  /** Set false to silence the access log, e.g. in tests. */
  accessLog?: boolean;
}

export function createApp(deps: AppDeps) {
  const pipeline = new Pipeline({
    providers: deps.providers,
    fetcher: deps.fetcher,
    cache: deps.cache,
    timeoutMs: deps.jobTimeoutMs,
  });

  const app = express();
  // The extension calls from its own origin
  app.use(cors());
  app.use(express.json({ limit: '1mb' }));
  if (deps.accessLog !== false) app.use(morgan('dev'));

  app.use(healthRoutes(deps.providers));
  app.use(cacheRoutes(deps.cache));
  app.use(
    jobRoutes({
      pipeline,
      defaultProvider: deps.defaultProvider,
      keepAliveIntervalMs: deps.keepAliveIntervalMs,
    })
  );

  app.use((_req, _res, next) => {
    next(createError(404, 'Not Found'));
  });

  app.use((err: unknown, _req: express.Request, res: express.Response, _next: express.NextFunction) => {
    const status = createError.isHttpError(err) ? err.status : 500;
    const message = err instanceof Error && err.message ? err.message : 'Internal Server Error';
    if (status >= 500) logError('http.error', { status, error: message });
    res.status(status).json({ error: status >= 500 ? 'Internal Server Error' : message });
  });

  return { app, pipeline };
}

/** Adds the WebSocket job channel to a listening HTTP server. */
export function attachRealtime(server: Server, pipeline: Pipeline, defaultProvider: string) {
  return attachChannelServer(server, pipeline, { defaultProvider });
}
