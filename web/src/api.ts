import axios, { type AxiosAdapter, type AxiosInstance } from 'axios';
import { APIError, NetworkError, TimeoutError } from './errors.js';
import { DEFAULT_RETRY_CONFIG, withRetry, type RetryConfig } from './retry.js';
import type { HealthResponse, ModelsResponse } from './types.js';

export interface ApiClientOptions {
  baseUrl: string;
  timeoutMs?: number;
  retry?: RetryConfig;
  adapter?: AxiosAdapter;
}

export interface ApiClient {
  health(): Promise<HealthResponse>;
  models(): Promise<ModelsResponse>;
  /** Not retried: a repeated clear would report a misleading count. */
  clearCache(): Promise<number>;
}

function detailOf(data: unknown): string | undefined {
  if (typeof data === 'object' && data !== null && 'error' in data && typeof data.error === 'string') {
    return data.error;
  }
  return undefined;
}

export function toApiError(err: unknown): Error {
  if (!axios.isAxiosError(err)) return err instanceof Error ? err : new Error(String(err));
  if (err.code === 'ECONNABORTED' || err.code === 'ETIMEDOUT') {
    return new TimeoutError(`Request timed out: ${err.message}`);
  }
  if (!err.response) return new NetworkError(`Backend unreachable: ${err.message}`);
  const status = err.response.status;
  return new APIError(detailOf(err.response.data) ?? `Request failed with status ${status}`, status);
}

export function createApiClient(opts: ApiClientOptions): ApiClient {
  const http: AxiosInstance = axios.create({
    baseURL: opts.baseUrl.replace(/\/+$/, ''),
    timeout: opts.timeoutMs ?? 10_000,
    adapter: opts.adapter,
  });
  const retry = opts.retry ?? DEFAULT_RETRY_CONFIG;

  async function call<T>(fn: () => Promise<{ data: T }>): Promise<T> {
    try {
      const r = await fn();
      return r.data;
    } catch (err) {
      throw toApiError(err);
    }
  }

  return {
    health: () => withRetry(() => call(() => http.get<HealthResponse>('/health')), retry),
    models: () => withRetry(() => call(() => http.get<ModelsResponse>('/models')), retry),
    async clearCache() {
      const data = await call(() => http.delete<{ removed_count: number }>('/cache'));
      return data.removed_count;
    },
  };
}

/** ws:// or wss:// endpoint for the job channel on the same backend */
export function channelUrl(baseUrl: string, path = '/ws'): string {
  const url = new URL(path, baseUrl.replace(/\/+$/, '') + '/');
  url.protocol = url.protocol === 'https:' ? 'wss:' : 'ws:';
  return url.toString();
}
