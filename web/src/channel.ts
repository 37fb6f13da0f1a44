import { ChannelClosedError, TimeoutError } from './errors.js';
import type { JobRequestBody, Operation, ProgressMessage, ResultMessage, ServerMessage } from './types.js';

export interface SocketHandlers {
  onOpen(): void;
  onMessage(data: string): void;
  onClose(): void;
  onError(): void;
}

export interface SocketHandle {
  readonly isOpen: boolean;
  send(data: string): void;
  close(): void;
}

export type SocketFactory = (url: string, handlers: SocketHandlers) => SocketHandle;

export const browserSocketFactory: SocketFactory = (url, handlers) => {
  const ws = new WebSocket(url);
  ws.onopen = () => handlers.onOpen();
  ws.onmessage = (ev) => handlers.onMessage(typeof ev.data === 'string' ? ev.data : String(ev.data));
  ws.onclose = () => handlers.onClose();
  ws.onerror = () => handlers.onError();
  return {
    get isOpen() {
      return ws.readyState === WebSocket.OPEN;
    },
    send: (data) => ws.send(data),
    close: () => ws.close(1000),
  };
};

export interface ChannelClientOptions {
  url: string;
  socketFactory?: SocketFactory;
  keepAliveMs?: number;
  timeoutMs?: number;
}

export type ProgressHandler = (progress: ProgressMessage) => void;

function parseServerMessage(raw: string): ServerMessage | undefined {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (typeof value !== 'object' || value === null || !('action' in value)) return undefined;
  const action = value.action;
  if (action === 'progress' && 'stage' in value && 'progress' in value) {
    const { stage, progress } = value;
    if (typeof stage !== 'string' || typeof progress !== 'number') return undefined;
    const details = 'details' in value && typeof value.details === 'string' ? value.details : undefined;
    const msg: ProgressMessage = { action, stage: toStage(stage), progress };
    if (details) msg.details = details;
    return msg;
  }
  if ((action === 'transcription_result' || action === 'summary_result') && 'success' in value) {
    if (typeof value.success !== 'boolean') return undefined;
    const msg: ResultMessage = { action, success: value.success };
    if ('cached' in value && typeof value.cached === 'boolean') msg.cached = value.cached;
    if ('error' in value && typeof value.error === 'string') msg.error = value.error;
    if ('error_kind' in value && typeof value.error_kind === 'string') msg.error_kind = value.error_kind;
    if ('data' in value && typeof value.data === 'object' && value.data !== null) {
      const data = value.data;
      msg.data = {};
      if ('vtt' in data && typeof data.vtt === 'string') msg.data.vtt = data.vtt;
      if ('summary' in data && typeof data.summary === 'string') msg.data.summary = data.summary;
      if ('key_moments' in data && Array.isArray(data.key_moments)) {
        msg.data.key_moments = data.key_moments.filter(isKeyMoment);
      }
    }
    return msg;
  }
  return undefined;
}

const STAGES: readonly ProgressMessage['stage'][] = [
  'queued',
  'fetching-audio',
  'transcribing',
  'translating',
  'summarizing',
  'cached-hit',
  'complete',
];

function toStage(stage: string): ProgressMessage['stage'] {
  return STAGES.find((s) => s === stage) ?? 'queued';
}

function isKeyMoment(v: unknown): v is { offset: number; timestamp: string; headline: string } {
  return (
    typeof v === 'object' &&
    v !== null &&
    'offset' in v &&
    typeof v.offset === 'number' &&
    'timestamp' in v &&
    typeof v.timestamp === 'string' &&
    'headline' in v &&
    typeof v.headline === 'string'
  );
}

/**
 * One job over one WebSocket. Pings keep the connection alive while the
 * backend works; the promise settles on the terminal result, a dropped
 * connection, the client-side timeout, or `cancel`.
 */
export class ChannelClient {
  private socket?: SocketHandle;
  private settle?: (err?: Error) => void;

  constructor(private readonly opts: ChannelClientOptions) {}

  get active() {
    return this.settle !== undefined;
  }

  run(operation: Operation, body: JobRequestBody, onProgress?: ProgressHandler): Promise<ResultMessage> {
    if (this.active) return Promise.reject(new Error('A job is already running on this channel'));
    const factory = this.opts.socketFactory ?? browserSocketFactory;
    const keepAliveMs = this.opts.keepAliveMs ?? 20_000;
    const timeoutMs = this.opts.timeoutMs ?? 30 * 60 * 1000;

    return new Promise<ResultMessage>((resolve, reject) => {
      let keepAlive: ReturnType<typeof setInterval> | undefined;
      const timeout = setTimeout(() => {
        finish(new TimeoutError(`Request timed out after ${Math.round(timeoutMs / 60000)} minutes`));
      }, timeoutMs);

      const finish = (err?: Error, result?: ResultMessage) => {
        if (!this.settle) return;
        this.settle = undefined;
        clearTimeout(timeout);
        if (keepAlive) clearInterval(keepAlive);
        const socket = this.socket;
        this.socket = undefined;
        if (socket?.isOpen) socket.close();
        if (result) resolve(result);
        else reject(err ?? new ChannelClosedError('Channel closed'));
      };
      this.settle = finish;

      this.socket = factory(this.opts.url, {
        onOpen: () => {
          this.socket?.send(JSON.stringify({ action: operation, data: body }));
          keepAlive = setInterval(() => {
            if (this.socket?.isOpen) this.socket.send(JSON.stringify({ action: 'ping' }));
          }, keepAliveMs);
        },
        onMessage: (raw) => {
          const msg = parseServerMessage(raw);
          if (!msg) return;
          if (msg.action === 'progress') onProgress?.(msg);
          else finish(undefined, msg);
        },
        onClose: () => finish(new ChannelClosedError('Connection closed before a result arrived')),
        onError: () => finish(new ChannelClosedError('Connection to the backend failed')),
      });
    });
  }

  cancel() {
    this.settle?.(new ChannelClosedError('Cancelled'));
  }
}
