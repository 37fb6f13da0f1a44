import { nanoid } from 'nanoid';
import type {
  JobPayload,
  JobRequest,
  JobResult,
  ProgressEvent,
  StageName,
} from '../models/types.js';
import { findModel } from '../config/catalog.js';
import { isSameLanguage } from '../utils/languages.js';
import { debug, info, startStep, warn } from '../utils/log.js';
import type { AudioFetcher, AudioResource } from './downloader.js';
import {
  FetchError,
  PipelineError,
  TimeoutError,
  ValidationError,
  errorMessage,
  toPipelineError,
} from './errors.js';
import type { ProviderRegistry } from './providers/registry.js';
import { cacheKey, type SubtitleCache } from './cache/subtitleCache.js';

export type JobState =
  | 'queued'
  | 'fetching-audio'
  | 'transcribing'
  | 'translating'
  | 'summarizing'
  | 'complete'
  | 'failed';

const TRANSITIONS: Record<JobState, readonly JobState[]> = {
  queued: ['fetching-audio', 'complete', 'failed'],
  'fetching-audio': ['transcribing', 'failed'],
  transcribing: ['translating', 'summarizing', 'complete', 'failed'],
  translating: ['complete', 'failed'],
  summarizing: ['complete', 'failed'],
  complete: [],
  failed: [],
};

export const STAGE_PROGRESS = {
  queued: 0,
  fetchingAudio: 15,
  transcribing: 50,
  postProcessing: 75,
  postProcessingEnd: 95,
  complete: 100,
} as const;

export type ProgressListener = (event: ProgressEvent) => void;

export interface PipelineOptions {
  providers: ProviderRegistry;
  fetcher: AudioFetcher;
  cache: SubtitleCache;
  timeoutMs?: number;
}

function sameEndpoint(a: string, b: string) {
  return a.replace(/\/+$/, '').toLowerCase() === b.replace(/\/+$/, '').toLowerCase();
}

/**
 * Per-run state: stage, monotonic progress, the owned audio file and the
 * abort signal handed to every external call.
 */
class JobRun {
  state: JobState = 'queued';
  private progress = 0;
  private audio?: AudioResource;
  private closed = false;
  readonly controller = new AbortController();

  constructor(readonly id: string, private readonly listener?: ProgressListener) {}

  get signal() {
    return this.controller.signal;
  }

  transition(next: JobState) {
    if (!TRANSITIONS[this.state].includes(next)) {
      throw new Error(`Illegal job transition ${this.state} -> ${next}`);
    }
    debug('job.transition', { jobId: this.id, from: this.state, to: next });
    this.state = next;
  }

  emit(stage: StageName, progress: number, details?: string) {
    if (this.closed) return;
    this.progress = Math.min(100, Math.max(this.progress, Math.round(progress)));
    const event: ProgressEvent = { stage, progress: this.progress };
    if (details) event.details = details;
    this.listener?.(event);
  }

  /** Takes ownership of the audio; a resource arriving after the job ended is released at once. */
  async adopt(resource: AudioResource): Promise<AudioResource> {
    if (this.closed) {
      await resource.release();
      throw new TimeoutError('Audio arrived after the job ended');
    }
    this.audio = resource;
    return resource;
  }

  async close() {
    this.closed = true;
    const audio = this.audio;
    this.audio = undefined;
    if (!audio) return;
    try {
      await audio.release();
    } catch (e) {
      warn('job.audio.releaseFailed', { jobId: this.id, error: errorMessage(e) });
    }
  }
}

/**
 * Drives one job from request to terminal result: cache probe, audio fetch,
 * transcription, then translation or summary. `run` never rejects.
 */
export class Pipeline {
  readonly timeoutMs: number;

  constructor(private readonly opts: PipelineOptions) {
    this.timeoutMs = opts.timeoutMs ?? 30 * 60 * 1000;
  }

  /** Throws ValidationError; makes no external calls. */
  validate(request: JobRequest) {
    if (!request.videoUrl.trim() || !request.videoId.trim()) {
      throw new ValidationError('video_url is required');
    }
    if (!request.credentials.apiKey || request.credentials.apiKey.length < 10) {
      throw new ValidationError('API key must be at least 10 characters');
    }
    if (request.operation !== 'transcribe' && request.operation !== 'summarize') {
      throw new ValidationError(`Unknown operation '${String(request.operation)}'`);
    }
    if (!this.opts.providers.has(request.provider)) {
      throw new ValidationError(
        `Invalid provider '${request.provider}'. Available: ${this.opts.providers.list().join(', ')}`
      );
    }
    if (!request.targetLanguage.trim()) {
      throw new ValidationError('target_language must not be empty');
    }

    // A custom endpoint may serve models the catalog does not list
    const provider = this.opts.providers.get(request.provider);
    const baseUrl = request.credentials.baseUrl;
    if (baseUrl && !sameEndpoint(baseUrl, provider.defaultBaseUrl)) return;

    if (!findModel(request.provider, 'transcription', request.transcriptionModel)) {
      throw new ValidationError(
        `Unknown transcription model '${request.transcriptionModel}' for provider '${request.provider}'`
      );
    }
    const textModel =
      request.operation === 'summarize' ? request.summarizationModel : request.translationModel;
    if (!findModel(request.provider, 'translation', textModel)) {
      throw new ValidationError(`Unknown model '${textModel}' for provider '${request.provider}'`);
    }
  }

  async run(request: JobRequest, listener?: ProgressListener): Promise<JobResult> {
    const job = new JobRun(nanoid(10), listener);
    const meta = {
      jobId: job.id,
      videoId: request.videoId,
      operation: request.operation,
      provider: request.provider,
    };
    const timer = startStep('job', meta);

    let timeoutHandle: NodeJS.Timeout | undefined;
    const deadline = new Promise<never>((_, reject) => {
      timeoutHandle = setTimeout(() => {
        reject(new TimeoutError(`Job exceeded ${Math.round(this.timeoutMs / 60000)} minute limit`));
      }, this.timeoutMs);
    });

    try {
      const result = await Promise.race([this.execute(job, request), deadline]);
      timer.end({ outcome: result.cached ? 'cached-hit' : 'complete' });
      return result;
    } catch (err) {
      const failure = toPipelineError(err);
      job.controller.abort(failure);
      if (job.state !== 'failed' && job.state !== 'complete') job.transition('failed');
      timer.end({ outcome: 'failed', kind: failure.kind });
      warn('job.failed', { ...meta, kind: failure.kind, error: failure.message });
      return { ok: false, kind: failure.kind, message: failure.message };
    } finally {
      clearTimeout(timeoutHandle);
      await job.close();
    }
  }

  private async execute(
    job: JobRun,
    request: JobRequest
  ): Promise<{ ok: true; payload: JobPayload; cached: boolean }> {
    this.validate(request);
    job.emit('queued', STAGE_PROGRESS.queued);

    const { cache, providers, fetcher } = this.opts;
    const key = cacheKey(request.videoId, request.targetLanguage, request.operation);
    const cached = await this.probeCache(key);
    if (cached) {
      job.transition('complete');
      job.emit('cached-hit', STAGE_PROGRESS.complete, 'Loaded from cache');
      info('job.cacheHit', { jobId: job.id, key });
      return { ok: true, payload: cached, cached: true };
    }

    const provider = providers.get(request.provider);
    const creds = request.credentials;
    const signal = job.signal;

    job.transition('fetching-audio');
    job.emit('fetching-audio', STAGE_PROGRESS.fetchingAudio, 'Downloading audio');
    const fetchTimer = startStep('job.fetch', { jobId: job.id });
    let audio: AudioResource;
    try {
      audio = await job.adopt(await fetcher.fetch(request.videoUrl, signal));
    } catch (err) {
      if (err instanceof PipelineError) throw err;
      throw new FetchError(errorMessage(err), { cause: err });
    }
    fetchTimer.end();

    job.transition('transcribing');
    job.emit('transcribing', STAGE_PROGRESS.transcribing, `Transcribing with ${provider.name}`);
    const transcribeTimer = startStep('job.transcribe', { jobId: job.id, model: request.transcriptionModel });
    const transcript = await provider.transcribe(audio.path, request.transcriptionModel, creds, { signal });
    transcribeTimer.end({ language: transcript.language });

    const span = STAGE_PROGRESS.postProcessingEnd - STAGE_PROGRESS.postProcessing;
    let payload: JobPayload;
    if (request.operation === 'summarize') {
      job.transition('summarizing');
      job.emit('summarizing', STAGE_PROGRESS.postProcessing, 'Generating summary');
      const summary = await provider.summarize(
        transcript.vtt,
        request.targetLanguage,
        request.summarizationModel,
        creds,
        { signal }
      );
      payload = { summary: summary.synopsis, keyMoments: summary.keyMoments };
    } else if (
      request.targetLanguage !== 'original' &&
      !isSameLanguage(transcript.language, request.targetLanguage)
    ) {
      job.transition('translating');
      job.emit('translating', STAGE_PROGRESS.postProcessing, `Translating to ${request.targetLanguage}`);
      const vtt = await provider.translate(
        transcript.vtt,
        request.targetLanguage,
        request.translationModel,
        creds,
        {
          signal,
          onProgress: (done, total) =>
            job.emit(
              'translating',
              STAGE_PROGRESS.postProcessing + (span * done) / total,
              `Translated batch ${done}/${total}`
            ),
        }
      );
      payload = { vtt };
    } else {
      payload = { vtt: transcript.vtt };
    }

    if (signal.aborted) throw signal.reason instanceof Error ? signal.reason : new TimeoutError('Job aborted');
    await this.storeResult(key, payload);
    job.transition('complete');
    job.emit('complete', STAGE_PROGRESS.complete);
    return { ok: true, payload, cached: false };
  }

  // Cache trouble degrades to a miss or a skipped write, never a failed job
  private async probeCache(key: string): Promise<JobPayload | undefined> {
    try {
      return await this.opts.cache.get(key);
    } catch (e) {
      warn('cache.read.failed', { key, error: errorMessage(e) });
      return undefined;
    }
  }

  private async storeResult(key: string, payload: JobPayload) {
    try {
      await this.opts.cache.put(key, payload);
    } catch (e) {
      warn('cache.write.failed', { key, error: errorMessage(e) });
    }
  }
}
