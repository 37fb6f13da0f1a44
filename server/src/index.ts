import 'dotenv/config';
import { Redis } from 'ioredis';
import { ENV } from './config.js';
import { attachRealtime, createApp } from './app.js';
import { YtDlpFetcher } from './services/downloader.js';
import { createDefaultRegistry } from './services/providers/registry.js';
import { MemoryCacheStore, type CacheStore } from './services/cache/store.js';
import { RedisCacheStore } from './services/cache/redisStore.js';
import { DAY_MS, SubtitleCache } from './services/cache/subtitleCache.js';
import { ensureDirectories } from './utils/fsutil.js';
import { error, info } from './utils/log.js';

async function main() {
  await ensureDirectories([ENV.tempDir]);

  const ttlMs = ENV.cacheTtlDays * DAY_MS;
  let redis: Redis | undefined;
  let store: CacheStore;
  if (ENV.redisUrl) {
    redis = new Redis(ENV.redisUrl, { maxRetriesPerRequest: 3 });
    store = new RedisCacheStore(redis, ttlMs);
  } else {
    // In-memory fallback: entries live as long as the process
    store = new MemoryCacheStore(ENV.cacheMaxEntries);
  }

  const providers = createDefaultRegistry();
  const { app, pipeline } = createApp({
    providers,
    fetcher: new YtDlpFetcher(),
    cache: new SubtitleCache(store, { ttlMs }),
    defaultProvider: ENV.defaultProvider,
    jobTimeoutMs: ENV.jobTimeoutMs,
    keepAliveIntervalMs: ENV.keepAliveIntervalMs,
  });

  const server = app.listen(ENV.port, ENV.host, () => {
    info('server.listening', {
      url: `http://${ENV.host}:${ENV.port}`,
      providers: providers.list(),
      cache: redis ? 'redis' : 'memory',
    });
  });
  const wss = attachRealtime(server, pipeline, ENV.defaultProvider);

  const shutdown = (signal: string) => {
    info('server.shutdown', { signal });
    wss.close();
    server.close(() => {
      if (redis) redis.disconnect();
      process.exit(0);
    });
  };
  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((e: unknown) => {
  error('server.startFailed', { error: e instanceof Error ? e.message : String(e) });
  process.exit(1);
});
