import type { JobPayload, Operation } from '../../models/types.js';
import { debug, warn } from '../../utils/log.js';
import type { CacheStore } from './store.js';

export const DAY_MS = 24 * 60 * 60 * 1000;

export interface SubtitleCacheOptions {
  ttlMs?: number;
  now?: () => number;
}

/** `operation:language:videoId`; language is case-folded and each part escaped so keys cannot collide. */
export function cacheKey(videoId: string, language: string, operation: Operation): string {
  const lang = encodeURIComponent(language.trim().toLowerCase());
  return `${operation}:${lang}:${encodeURIComponent(videoId.trim())}`;
}

function isPayload(value: unknown): value is JobPayload {
  if (typeof value !== 'object' || value === null) return false;
  return ('vtt' in value && typeof value.vtt === 'string') || ('summary' in value && typeof value.summary === 'string');
}

/** Finished payloads keyed by (video, language, operation), expiring lazily on read. */
export class SubtitleCache {
  readonly ttlMs: number;
  private readonly now: () => number;

  constructor(private readonly store: CacheStore, opts: SubtitleCacheOptions = {}) {
    this.ttlMs = opts.ttlMs ?? 7 * DAY_MS;
    this.now = opts.now ?? Date.now;
  }

  async get(key: string): Promise<JobPayload | undefined> {
    const record = await this.store.get(key);
    if (!record) return undefined;
    if (this.now() - record.createdAt > this.ttlMs) {
      debug('cache.expired', { key });
      await this.store.delete(key);
      return undefined;
    }
    let payload: unknown;
    try {
      payload = JSON.parse(record.payload);
    } catch (e) {
      warn('cache.corrupt', { key, error: e instanceof Error ? e.message : String(e) });
      await this.store.delete(key);
      return undefined;
    }
    return isPayload(payload) ? payload : undefined;
  }

  async put(key: string, payload: JobPayload): Promise<void> {
    await this.store.set(key, { payload: JSON.stringify(payload), createdAt: this.now() });
  }

  async clearAll(): Promise<number> {
    return this.store.clear();
  }
}
