/**
 * Shared fakes for server tests
 */

import { vi } from 'vitest';
import {
  AxiosError,
  type AxiosAdapter,
  type AxiosResponse,
  type InternalAxiosRequestConfig,
} from 'axios';
import type { Credentials, StructuredSummary, Transcript } from '../src/models/types.js';
import type { ProviderCallOptions, TranscriptionProvider } from '../src/services/providers/base.js';
import type { AudioFetcher, AudioResource } from '../src/services/downloader.js';
import { ProviderRegistry } from '../src/services/providers/registry.js';

export const API_KEY = 'test-secret-key';

export interface StubReply {
  status?: number;
  data: unknown;
  headers?: Record<string, string>;
}

/** axios adapter answering from a handler; 4xx/5xx replies reject like the real transport. */
export function stubHttp(handler: (config: InternalAxiosRequestConfig, call: number) => StubReply) {
  const calls: InternalAxiosRequestConfig[] = [];
  const adapter: AxiosAdapter = async (config) => {
    calls.push(config);
    const reply = handler(config, calls.length);
    const status = reply.status ?? 200;
    const response: AxiosResponse = {
      data: reply.data,
      status,
      statusText: String(status),
      headers: reply.headers ?? {},
      config,
    };
    if (status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${status}`,
        status >= 500 ? AxiosError.ERR_BAD_RESPONSE : AxiosError.ERR_BAD_REQUEST,
        config,
        undefined,
        response
      );
    }
    return response;
  };
  return { adapter, calls };
}

export function field(value: unknown, key: string): unknown {
  if (typeof value !== 'object' || value === null) return undefined;
  for (const [k, v] of Object.entries(value)) {
    if (k === key) return v;
  }
  return undefined;
}

export function jsonBody(config: InternalAxiosRequestConfig): unknown {
  const raw: unknown = config.data;
  if (typeof raw !== 'string') throw new Error('Request has no JSON body');
  return JSON.parse(raw);
}

/** Subtitle texts a translation request asked for. */
export function requestedTexts(config: InternalAxiosRequestConfig): string[] {
  const messages = field(jsonBody(config), 'messages');
  if (!Array.isArray(messages)) throw new Error('Request has no messages');
  const content = field(messages[1], 'content');
  if (typeof content !== 'string') throw new Error('User message has no content');
  const parsed: unknown = JSON.parse(content.slice(content.indexOf('\n') + 1));
  if (!Array.isArray(parsed)) throw new Error('User message has no JSON array');
  return parsed.map((t) => String(t));
}

export function chatReply(content: string) {
  return { choices: [{ index: 0, message: { role: 'assistant', content } }] };
}

export function vttOf(...cues: Array<[string, string, string]>): string {
  return ['WEBVTT', '', ...cues.flatMap(([start, end, text]) => [`${start} --> ${end}`, text, ''])].join('\n') + '\n';
}

export const SAMPLE_VTT = vttOf(['00:00:00.000', '00:00:01.000', 'Hello']);

export class FakeProvider implements TranscriptionProvider {
  readonly defaultBaseUrl = 'https://api.openai.com/v1';

  transcribe = vi.fn(
    async (_audioPath: string, _model: string, _creds: Credentials, _opts?: ProviderCallOptions): Promise<Transcript> => ({
      vtt: SAMPLE_VTT,
      language: 'english',
    })
  );

  translate = vi.fn(
    async (vtt: string, _lang: string, _model: string, _creds: Credentials, _opts?: ProviderCallOptions) => vtt
  );

  summarize = vi.fn(
    async (
      _transcript: string,
      _lang: string,
      _model: string,
      _creds: Credentials,
      _opts?: ProviderCallOptions
    ): Promise<StructuredSummary> => ({
      synopsis: '## Overview\n- a point',
      keyMoments: [{ offset: 65, headline: 'Demo starts' }],
    })
  );

  constructor(readonly name = 'openai') {}
}

export function registryWith(provider: TranscriptionProvider) {
  return new ProviderRegistry().register(provider);
}

export class FakeFetcher implements AudioFetcher {
  readonly release = vi.fn(async () => {});

  fetch = vi.fn(
    async (_videoUrl: string, _signal?: AbortSignal): Promise<AudioResource> => ({
      path: '/tmp/fake-audio.mp3',
      release: this.release,
    })
  );
}
