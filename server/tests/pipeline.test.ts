/**
 * Tests for the job pipeline
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { Pipeline } from '../src/services/pipeline.js';
import { parseJobRequest, type JobRequestBody } from '../src/models/protocol.js';
import type { Operation, ProgressEvent, Transcript } from '../src/models/types.js';
import { MemoryCacheStore, type CacheStore } from '../src/services/cache/store.js';
import { SubtitleCache } from '../src/services/cache/subtitleCache.js';
import type { AudioResource } from '../src/services/downloader.js';
import { AuthenticationError } from '../src/services/errors.js';
import { API_KEY, FakeFetcher, FakeProvider, registryWith, vttOf } from './helpers.js';

const VIDEO_URL = 'https://www.youtube.com/watch?v=abc123';

function request(body: Partial<JobRequestBody> = {}, operation: Operation = 'transcribe') {
  return parseJobRequest(
    operation,
    { video_url: VIDEO_URL, api_key: API_KEY, target_language: 'en', provider: 'openai', ...body },
    'openai'
  );
}

function setup(opts: { store?: CacheStore; timeoutMs?: number } = {}) {
  const provider = new FakeProvider();
  const fetcher = new FakeFetcher();
  const store = opts.store ?? new MemoryCacheStore();
  const cache = new SubtitleCache(store);
  const pipeline = new Pipeline({ providers: registryWith(provider), fetcher, cache, timeoutMs: opts.timeoutMs });
  const events: ProgressEvent[] = [];
  const listener = (e: ProgressEvent) => events.push(e);
  return { provider, fetcher, store, cache, pipeline, events, listener };
}

const stages = (events: ProgressEvent[]) => events.map((e) => [e.stage, e.progress]);

afterEach(() => {
  vi.useRealTimers();
});

describe('Pipeline.run', () => {
  it('should transcribe, cache and report each stage', async () => {
    const { pipeline, events, listener, provider, fetcher, cache } = setup();

    const result = await pipeline.run(request(), listener);

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.cached).toBe(false);
    expect(result.payload.vtt?.startsWith('WEBVTT')).toBe(true);
    expect(stages(events)).toEqual([
      ['queued', 0],
      ['fetching-audio', 15],
      ['transcribing', 50],
      ['complete', 100],
    ]);
    expect(provider.transcribe).toHaveBeenCalledWith('/tmp/fake-audio.mp3', 'whisper-1', { apiKey: API_KEY, baseUrl: undefined }, expect.anything());
    expect(provider.translate).not.toHaveBeenCalled();
    expect(fetcher.release).toHaveBeenCalledTimes(1);
    await expect(cache.get('transcribe:en:abc123')).resolves.toEqual(result.payload);
  });

  it('should translate when the spoken language differs from the target', async () => {
    const { pipeline, events, listener, provider } = setup();
    provider.transcribe.mockResolvedValueOnce({ vtt: vttOf(['00:00:00.000', '00:00:01.000', 'Hola']), language: 'spanish' });
    provider.translate.mockImplementationOnce(async (vtt, _lang, _model, _creds, opts) => {
      opts?.onProgress?.(1, 2);
      opts?.onProgress?.(2, 2);
      return vtt.replace('Hola', 'Hello');
    });

    const result = await pipeline.run(request(), listener);

    expect(result).toEqual({
      ok: true,
      cached: false,
      payload: { vtt: 'WEBVTT\n\n00:00:00.000 --> 00:00:01.000\nHello\n\n' },
    });
    expect(provider.translate.mock.calls[0].slice(1, 3)).toEqual(['en', 'gpt-4o-mini']);
    expect(stages(events)).toEqual([
      ['queued', 0],
      ['fetching-audio', 15],
      ['transcribing', 50],
      ['translating', 75],
      ['translating', 85],
      ['translating', 95],
      ['complete', 100],
    ]);
  });

  it('should skip translation for the original language', async () => {
    const { pipeline, provider } = setup();
    provider.transcribe.mockResolvedValueOnce({ vtt: vttOf(['00:00:00.000', '00:00:01.000', 'Hola']) });

    const result = await pipeline.run(request({ target_language: 'original' }));

    expect(result.ok).toBe(true);
    expect(provider.translate).not.toHaveBeenCalled();
  });

  it('should summarize with key moments', async () => {
    const { pipeline, events, listener, provider, cache } = setup();

    const result = await pipeline.run(request({}, 'summarize'), listener);

    expect(result).toEqual({
      ok: true,
      cached: false,
      payload: { summary: '## Overview\n- a point', keyMoments: [{ offset: 65, headline: 'Demo starts' }] },
    });
    expect(provider.summarize.mock.calls[0].slice(1, 3)).toEqual(['en', 'gpt-4o-mini']);
    expect(events.map((e) => e.stage)).toEqual(['queued', 'fetching-audio', 'transcribing', 'summarizing', 'complete']);
    await expect(cache.get('summarize:en:abc123')).resolves.toEqual({
      summary: '## Overview\n- a point',
      keyMoments: [{ offset: 65, headline: 'Demo starts' }],
    });
  });

  it('should answer a repeated request from the cache', async () => {
    const { pipeline, events, listener, provider, fetcher } = setup();
    await pipeline.run(request());
    const result = await pipeline.run(request(), listener);

    expect(result.ok && result.cached).toBe(true);
    expect(provider.transcribe).toHaveBeenCalledTimes(1);
    expect(fetcher.fetch).toHaveBeenCalledTimes(1);
    expect(events).toEqual([
      { stage: 'queued', progress: 0 },
      { stage: 'cached-hit', progress: 100, details: 'Loaded from cache' },
    ]);
  });

  it('should fail on rejected credentials without caching', async () => {
    const { pipeline, provider, store, fetcher } = setup();
    provider.transcribe.mockRejectedValueOnce(new AuthenticationError('openai rejected the API key (401)'));

    const result = await pipeline.run(request());

    expect(result).toEqual({ ok: false, kind: 'AuthenticationError', message: 'openai rejected the API key (401)' });
    expect(store instanceof MemoryCacheStore && store.size).toBe(0);
    expect(fetcher.release).toHaveBeenCalledTimes(1);
  });

  it('should classify unexpected fetch failures as FetchError', async () => {
    const { pipeline, fetcher, provider } = setup();
    fetcher.fetch.mockRejectedValueOnce(new Error('socket hang up'));

    const result = await pipeline.run(request());

    expect(result).toEqual({ ok: false, kind: 'FetchError', message: 'socket hang up' });
    expect(provider.transcribe).not.toHaveBeenCalled();
  });

  it('should keep progress monotonic and within 0..100', async () => {
    const { pipeline, events, listener, provider } = setup();
    provider.transcribe.mockResolvedValueOnce({ vtt: vttOf(['00:00:00.000', '00:00:01.000', 'Hola']), language: 'es' });
    provider.translate.mockImplementationOnce(async (vtt, _lang, _model, _creds, opts) => {
      opts?.onProgress?.(2, 3);
      opts?.onProgress?.(1, 3);
      opts?.onProgress?.(3, 3);
      return vtt;
    });

    await pipeline.run(request(), listener);

    const values = events.map((e) => e.progress);
    expect(values).toEqual([...values].sort((a, b) => a - b));
    expect(Math.min(...values)).toBe(0);
    expect(Math.max(...values)).toBe(100);
  });

  it('should complete when the cache is unavailable', async () => {
    const broken: CacheStore = {
      get: async () => Promise.reject(new Error('cache down')),
      set: async () => Promise.reject(new Error('cache down')),
      delete: async () => false,
      clear: async () => 0,
    };
    const { pipeline } = setup({ store: broken });

    const result = await pipeline.run(request());

    expect(result.ok).toBe(true);
  });

  it('should time out long jobs and release the audio', async () => {
    vi.useFakeTimers();
    const { pipeline, provider, fetcher } = setup();
    let seen: AbortSignal | undefined;
    provider.transcribe.mockImplementationOnce(async (_path, _model, _creds, opts) => {
      seen = opts?.signal;
      return new Promise<Transcript>(() => {});
    });

    const pending = pipeline.run(request());
    await vi.advanceTimersByTimeAsync(30 * 60 * 1000);
    const result = await pending;

    expect(result).toEqual({ ok: false, kind: 'TimeoutError', message: 'Job exceeded 30 minute limit' });
    expect(seen?.aborted).toBe(true);
    expect(fetcher.release).toHaveBeenCalledTimes(1);
  });

  it('should release audio that arrives after the deadline', async () => {
    vi.useFakeTimers();
    const { pipeline, fetcher } = setup();
    let deliver: (resource: AudioResource) => void = () => {};
    fetcher.fetch.mockImplementationOnce(
      () => new Promise<AudioResource>((resolve) => {
        deliver = resolve;
      })
    );

    const pending = pipeline.run(request());
    await vi.advanceTimersByTimeAsync(30 * 60 * 1000);
    const result = await pending;
    vi.useRealTimers();

    expect(result.ok).toBe(false);
    const late = vi.fn(async () => {});
    deliver({ path: '/tmp/late.mp3', release: late });
    await vi.waitFor(() => expect(late).toHaveBeenCalledTimes(1));
  });
});

describe('Pipeline.validate', () => {
  it('should reject short API keys before any external call', async () => {
    const { pipeline, events, listener, fetcher, provider } = setup();

    const result = await pipeline.run(request({ api_key: 'short' }), listener);

    expect(result).toEqual({ ok: false, kind: 'ValidationError', message: 'API key must be at least 10 characters' });
    expect(events).toEqual([]);
    expect(fetcher.fetch).not.toHaveBeenCalled();
    expect(provider.transcribe).not.toHaveBeenCalled();
  });

  it('should reject a missing video URL', () => {
    const { pipeline } = setup();
    expect(() => pipeline.validate(request({ video_url: '' }))).toThrow('video_url is required');
  });

  it('should reject unregistered providers', () => {
    const { pipeline } = setup();
    expect(() => pipeline.validate(request({ provider: 'acme' }))).toThrow("Invalid provider 'acme'. Available: openai");
  });

  it('should reject models missing from the catalog', () => {
    const { pipeline } = setup();
    expect(() => pipeline.validate(request({ transcription_model: 'whisper-9' }))).toThrow(
      "Unknown transcription model 'whisper-9' for provider 'openai'"
    );
    expect(() => pipeline.validate(request({ translation_model: 'gpt-0' }))).toThrow(
      "Unknown model 'gpt-0' for provider 'openai'"
    );
  });

  it('should accept any model on a custom endpoint', () => {
    const { pipeline } = setup();
    expect(() =>
      pipeline.validate(request({ transcription_model: 'local-whisper', base_url: 'http://localhost:9000/v1' }))
    ).not.toThrow();
  });
});
