import type { CacheRecord, CacheStore } from './store.js';
import { warn } from '../../utils/log.js';

const PREFIX = 'subtitles:';

/** The slice of an ioredis client the store calls. */
export interface RedisClient {
  get(key: string): Promise<string | null>;
  set(key: string, value: string, mode: 'PX', milliseconds: number): Promise<unknown>;
  del(...keys: string[]): Promise<number>;
  scan(cursor: string, match: 'MATCH', pattern: string, count: 'COUNT', n: number): Promise<[string, string[]]>;
}

function parseRecord(raw: string): CacheRecord | undefined {
  try {
    const value: unknown = JSON.parse(raw);
    if (
      typeof value === 'object' &&
      value !== null &&
      'payload' in value &&
      'createdAt' in value &&
      typeof value.payload === 'string' &&
      typeof value.createdAt === 'number'
    ) {
      return { payload: value.payload, createdAt: value.createdAt };
    }
  } catch (e) {
    warn('cache.redis.corrupt', { error: e instanceof Error ? e.message : String(e) });
  }
  return undefined;
}

/**
 * Stores records as JSON under `subtitles:<key>`. Redis expiry is set to the
 * cache window as a backstop; freshness is still decided by SubtitleCache.
 */
export class RedisCacheStore implements CacheStore {
  constructor(private readonly redis: RedisClient, private readonly ttlMs: number) {}

  async get(key: string) {
    const raw = await this.redis.get(PREFIX + key);
    return raw === null ? undefined : parseRecord(raw);
  }

  async set(key: string, record: CacheRecord) {
    await this.redis.set(PREFIX + key, JSON.stringify(record), 'PX', this.ttlMs);
  }

  async delete(key: string) {
    return (await this.redis.del(PREFIX + key)) > 0;
  }

  async clear() {
    let removed = 0;
    let cursor = '0';
    do {
      const [next, keys] = await this.redis.scan(cursor, 'MATCH', `${PREFIX}*`, 'COUNT', 200);
      cursor = next;
      if (keys.length) removed += await this.redis.del(...keys);
    } while (cursor !== '0');
    return removed;
  }
}
