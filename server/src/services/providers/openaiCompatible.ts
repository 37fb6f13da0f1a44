import axios, { AxiosError, type AxiosAdapter, type AxiosInstance } from 'axios';
import { readFile } from 'fs/promises';
import path from 'path';
import type { Credentials, Cue, KeyMoment, StructuredSummary, Transcript } from '../../models/types.js';
import { supportsStructuredOutput } from '../../config/catalog.js';
import { createLimiter } from '../../utils/limit.js';
import { languageName } from '../../utils/languages.js';
import { debug, warn } from '../../utils/log.js';
import { cuesToPlainText, parseTimestamp, parseVtt, serializeVtt } from '../vtt.js';
import {
  AlignmentError,
  AuthenticationError,
  ConnectionError,
  InvalidModelError,
  PipelineError,
  ProviderError,
  RateLimitError,
  toPipelineError,
} from '../errors.js';
import type { ProviderCallOptions, TranscriptionProvider } from './base.js';

export const BATCH_SIZE = 150;
export const SUMMARY_INPUT_LIMIT = 10000;
// Used when a provider returns plain text without timings
const WHOLE_FILE_END = 359999.999;

export type FormFields = Record<string, string | string[]>;
export type JsonBody = Record<string, unknown>;

export interface OpenAICompatibleOptions {
  /** Replaces axios' HTTP transport; used by tests. */
  adapter?: AxiosAdapter;
  timeoutMs?: number;
}

type Json = Record<string, unknown>;

function isRecord(value: unknown): value is Json {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function vendorMessage(data: unknown): string | undefined {
  if (typeof data === 'string') return data.slice(0, 300);
  if (!isRecord(data)) return undefined;
  const inner = data.error;
  if (isRecord(inner) && typeof inner.message === 'string') return inner.message;
  if (typeof inner === 'string') return inner;
  if (typeof data.message === 'string') return data.message;
  return undefined;
}

function vendorCode(data: unknown): string | undefined {
  if (!isRecord(data) || !isRecord(data.error)) return undefined;
  const code = data.error.code;
  return typeof code === 'string' ? code : undefined;
}

/** Maps an HTTP failure from an OpenAI-dialect API onto the error taxonomy. */
export function classifyHttpError(err: unknown, provider: string, model?: string): PipelineError {
  if (err instanceof PipelineError) return err;
  if (!(err instanceof AxiosError)) return toPipelineError(err);

  if (err.code === AxiosError.ERR_CANCELED) {
    return new ConnectionError(`Request to ${provider} was aborted`, { cause: err });
  }
  const res = err.response;
  if (!res) {
    return new ConnectionError(`Could not reach the ${provider} API (${err.code ?? err.message})`, {
      cause: err,
    });
  }

  const status = res.status;
  const message = vendorMessage(res.data) ?? err.message;
  if (status === 401 || status === 403) {
    return new AuthenticationError(`${provider} rejected the API key (${status})`, { cause: err });
  }
  if (status === 429) {
    const header = res.headers?.['retry-after'];
    const retryAfter = typeof header === 'string' ? parseInt(header, 10) : undefined;
    return new RateLimitError(
      `${provider} rate limit exceeded`,
      retryAfter !== undefined && Number.isFinite(retryAfter) ? retryAfter : undefined,
      { cause: err }
    );
  }
  if (
    status === 404 ||
    vendorCode(res.data) === 'model_not_found' ||
    (status === 400 && /model/i.test(message))
  ) {
    const which = model ? `model "${model}"` : 'the requested model';
    return new InvalidModelError(`${provider} does not accept ${which}: ${message}`, { cause: err });
  }
  return new ProviderError(`${provider} API error (${status}): ${message}`, status, { cause: err });
}

function chatContent(data: unknown): string {
  if (isRecord(data) && Array.isArray(data.choices)) {
    const first: unknown = data.choices[0];
    if (isRecord(first) && isRecord(first.message) && typeof first.message.content === 'string') {
      return first.message.content;
    }
  }
  throw new AlignmentError('Model reply has no message content');
}

function parseJsonReply(content: string): Json {
  // Some models wrap JSON in a markdown fence despite instructions
  const trimmed = content.trim().replace(/^```(?:json)?\s*/i, '').replace(/\s*```$/, '');
  let parsed: unknown;
  try {
    parsed = JSON.parse(trimmed);
  } catch (e) {
    throw new AlignmentError('Model reply is not valid JSON', { cause: e });
  }
  if (!isRecord(parsed)) throw new AlignmentError('Model reply is not a JSON object');
  return parsed;
}

export function parseTranslations(content: string, expected: number): string[] {
  const reply = parseJsonReply(content);
  const translations = reply.translations;
  if (!Array.isArray(translations) || !translations.every((t): t is string => typeof t === 'string')) {
    throw new AlignmentError('Model reply has no "translations" string array');
  }
  if (translations.length !== expected) {
    throw new AlignmentError(`Model returned ${translations.length} translations for ${expected} cues`);
  }
  return translations;
}

// `[HH:]MM:SS[.mmm]` or plain seconds, optionally still in the transcript's brackets
const TIMESTAMP_TEXT = /^\d+(?::\d{1,2}){0,2}(?:\.\d+)?$/;

function readOffset(ts: unknown): number | undefined {
  if (typeof ts === 'number') return ts >= 0 ? ts : undefined;
  if (typeof ts !== 'string') return undefined;
  const text = ts.trim().replace(/^\[(.*)\]$/, '$1').trim();
  return TIMESTAMP_TEXT.test(text) ? parseTimestamp(text) : undefined;
}

export function parseSummary(content: string): StructuredSummary {
  const reply = parseJsonReply(content);
  const synopsis = reply.synopsis;
  if (typeof synopsis !== 'string' || !synopsis.trim()) {
    throw new AlignmentError('Model reply has no synopsis');
  }
  const raw = reply.key_moments ?? [];
  if (!Array.isArray(raw)) throw new AlignmentError('Model reply "key_moments" is not an array');

  const keyMoments: KeyMoment[] = raw.map((item: unknown) => {
    if (!isRecord(item) || typeof item.headline !== 'string') {
      throw new AlignmentError('Key moment without a headline');
    }
    const offset = readOffset(item.timestamp);
    if (offset === undefined) {
      throw new AlignmentError(`Key moment has an unreadable timestamp: ${String(item.timestamp)}`);
    }
    return { offset, headline: item.headline.trim() };
  });
  keyMoments.sort((a, b) => a.offset - b.offset);
  return { synopsis: synopsis.trim(), keyMoments };
}

function segmentsToCues(segments: unknown[]): Cue[] {
  const cues: Cue[] = [];
  for (const seg of segments) {
    if (!isRecord(seg)) continue;
    const start = typeof seg.start === 'number' ? seg.start : 0;
    const end = typeof seg.end === 'number' ? seg.end : start;
    const text = typeof seg.text === 'string' ? seg.text.trim() : '';
    if (text) cues.push({ start, end, text });
  }
  return cues;
}

/** Normalizes the three reply shapes of `/audio/transcriptions` into a Transcript. */
export function transcriptFromResponse(data: unknown): Transcript {
  if (typeof data === 'string') {
    const cues = parseVtt(data);
    if (cues.length) return { vtt: serializeVtt(cues) };
    const text = data.trim();
    return { vtt: serializeVtt(text ? [{ start: 0, end: WHOLE_FILE_END, text }] : []) };
  }
  if (!isRecord(data)) throw new ProviderError('Transcription reply has an unexpected shape');

  const language = typeof data.language === 'string' ? data.language : undefined;
  if (Array.isArray(data.segments) && data.segments.length) {
    return { vtt: serializeVtt(segmentsToCues(data.segments)), language };
  }
  const text = typeof data.text === 'string' ? data.text.trim() : '';
  const end = typeof data.duration === 'number' && data.duration > 0 ? data.duration : WHOLE_FILE_END;
  return { vtt: serializeVtt(text ? [{ start: 0, end, text }] : []), language };
}

/**
 * Adapter for vendors speaking the OpenAI REST dialect. Subclasses name the
 * vendor and tune request parameters.
 */
export abstract class OpenAICompatibleProvider implements TranscriptionProvider {
  abstract readonly name: string;
  abstract readonly defaultBaseUrl: string;

  protected readonly adapter?: AxiosAdapter;
  protected readonly timeoutMs: number;

  constructor(opts: OpenAICompatibleOptions = {}) {
    this.adapter = opts.adapter;
    this.timeoutMs = opts.timeoutMs ?? 600000;
  }

  concurrencyLimit(): number {
    return 10;
  }

  /** Whether json_schema strict mode may be used for models that support it. */
  useStructuredOutput(): boolean {
    return false;
  }

  transcriptionParams(model: string): FormFields {
    return { model, response_format: 'verbose_json' };
  }

  translationParams(model: string): JsonBody {
    return {
      model,
      temperature: 0.1,
      response_format: this.responseFormat(model, 'batch_translation', {
        type: 'object',
        properties: { translations: { type: 'array', items: { type: 'string' } } },
        required: ['translations'],
        additionalProperties: false,
      }),
    };
  }

  summaryParams(model: string): JsonBody {
    return {
      model,
      temperature: 0.3,
      response_format: this.responseFormat(model, 'video_summary', {
        type: 'object',
        properties: {
          synopsis: { type: 'string' },
          key_moments: {
            type: 'array',
            items: {
              type: 'object',
              properties: { timestamp: { type: 'string' }, headline: { type: 'string' } },
              required: ['timestamp', 'headline'],
              additionalProperties: false,
            },
          },
        },
        required: ['synopsis', 'key_moments'],
        additionalProperties: false,
      }),
    };
  }

  protected responseFormat(model: string, name: string, schema: JsonBody): JsonBody {
    if (this.useStructuredOutput() && supportsStructuredOutput(this.name, model)) {
      return { type: 'json_schema', json_schema: { name, strict: true, schema } };
    }
    return { type: 'json_object' };
  }

  protected client(credentials: Credentials): AxiosInstance {
    return axios.create({
      baseURL: credentials.baseUrl || this.defaultBaseUrl,
      headers: { Authorization: `Bearer ${credentials.apiKey}` },
      timeout: this.timeoutMs,
      maxContentLength: Infinity,
      maxBodyLength: Infinity,
      adapter: this.adapter,
    });
  }

  async transcribe(
    audioPath: string,
    model: string,
    credentials: Credentials,
    opts: ProviderCallOptions = {}
  ): Promise<Transcript> {
    const audio = await readFile(audioPath);
    const form = new FormData();
    form.append('file', new Blob([new Uint8Array(audio)]), path.basename(audioPath));
    for (const [key, value] of Object.entries(this.transcriptionParams(model))) {
      if (Array.isArray(value)) {
        for (const v of value) form.append(`${key}[]`, v);
      } else {
        form.append(key, value);
      }
    }

    try {
      const resp = await this.client(credentials).post<unknown>('/audio/transcriptions', form, {
        signal: opts.signal,
        responseType: 'text',
      });
      return transcriptFromResponse(this.decodeText(resp.data));
    } catch (err) {
      throw classifyHttpError(err, this.name, model);
    }
  }

  async translate(
    vtt: string,
    targetLanguage: string,
    model: string,
    credentials: Credentials,
    opts: ProviderCallOptions = {}
  ): Promise<string> {
    if (targetLanguage === 'original') return vtt;
    const cues = parseVtt(vtt);
    if (!cues.length) return vtt;

    const batches: Cue[][] = [];
    for (let i = 0; i < cues.length; i += BATCH_SIZE) batches.push(cues.slice(i, i + BATCH_SIZE));

    const limit = createLimiter(this.concurrencyLimit());
    let done = 0;
    const translated = await Promise.all(
      batches.map((batch, idx) =>
        limit(async () => {
          const texts = await this.withAlignmentRetry(`translate batch ${idx + 1}/${batches.length}`, () =>
            this.translateBatch(batch.map((c) => c.text), targetLanguage, model, credentials, opts.signal)
          );
          done += 1;
          opts.onProgress?.(done, batches.length);
          return batch.map((cue, i) => ({ start: cue.start, end: cue.end, text: texts[i] }));
        })
      )
    );
    return serializeVtt(translated.flat());
  }

  async summarize(
    transcript: string,
    targetLanguage: string,
    model: string,
    credentials: Credentials,
    opts: ProviderCallOptions = {}
  ): Promise<StructuredSummary> {
    const cues = parseVtt(transcript);
    const plain = (cues.length ? cuesToPlainText(cues) : transcript).slice(0, SUMMARY_INPUT_LIMIT);
    const lang = languageName(targetLanguage);
    const messages = [
      {
        role: 'system',
        content:
          `You are a professional content summarizer. You MUST respond EXCLUSIVELY in ${lang}. ` +
          'Return ONLY a JSON object with two keys: "synopsis", a markdown summary with headers (##) ' +
          'and bullet points (-) covering the key takeaways and a brief conclusion, and "key_moments", ' +
          'an array of {"timestamp": "MM:SS", "headline": string} taken from the bracketed times in the transcript.',
      },
      { role: 'user', content: `Summarize this video transcript in ${lang}:\n\n${plain}` },
    ];
    return this.withAlignmentRetry('summarize', async () => {
      const content = await this.chat(messages, this.summaryParams(model), credentials, opts.signal);
      return parseSummary(content);
    });
  }

  protected async translateBatch(
    texts: string[],
    targetLanguage: string,
    model: string,
    credentials: Credentials,
    signal?: AbortSignal
  ): Promise<string[]> {
    const messages = [
      {
        role: 'system',
        content:
          `You are a professional translator. Translate the following subtitles to ${languageName(targetLanguage)}. ` +
          "Return ONLY a JSON object with a 'translations' key containing an array of translated strings " +
          'in the exact same order and quantity. Do not add any explanation or markdown.',
      },
      { role: 'user', content: `JSON array to translate:\n${JSON.stringify(texts)}` },
    ];
    const content = await this.chat(messages, this.translationParams(model), credentials, signal);
    return parseTranslations(content, texts.length);
  }

  protected async chat(
    messages: Array<{ role: string; content: string }>,
    params: JsonBody,
    credentials: Credentials,
    signal?: AbortSignal
  ): Promise<string> {
    const model = typeof params.model === 'string' ? params.model : undefined;
    let data: unknown;
    try {
      const resp = await this.client(credentials).post<unknown>(
        '/chat/completions',
        { ...params, messages },
        { signal }
      );
      data = resp.data;
    } catch (err) {
      throw classifyHttpError(err, this.name, model);
    }
    return chatContent(data);
  }

  /** One retry for replies that do not line up with the request, then fail. */
  protected async withAlignmentRetry<T>(label: string, call: () => Promise<T>): Promise<T> {
    try {
      return await call();
    } catch (err) {
      if (!(err instanceof AlignmentError)) throw err;
      warn('provider.alignment.retry', { provider: this.name, label, error: err.message });
    }
    try {
      return await call();
    } catch (err) {
      if (err instanceof AlignmentError) {
        throw new AlignmentError(`${label}: ${err.message} (after retry)`, { cause: err });
      }
      throw err;
    }
  }

  private decodeText(data: unknown): unknown {
    if (typeof data !== 'string') return data;
    const trimmed = data.trim();
    if (!trimmed.startsWith('{')) return data;
    try {
      return JSON.parse(trimmed);
    } catch {
      debug('provider.transcribe.notJson', { provider: this.name });
      return data;
    }
  }
}
