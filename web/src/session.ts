import type { ChannelClient } from './channel.js';
import type { JobRequestBody, KeyMoment, Operation, ProgressMessage, ResultMessage } from './types.js';

export type SessionStatus = 'idle' | 'loading' | 'ready' | 'failed';

export interface SessionState {
  videoId: string;
  status: SessionStatus;
  progress?: ProgressMessage;
  vtt?: string;
  summary?: string;
  keyMoments?: KeyMoment[];
  error?: string;
  errorKind?: string;
}

export type SessionListener = (state: SessionState) => void;

const ID_PATTERN = /^[A-Za-z0-9_-]{6,}$/;

/** Video id from a watch, shorts or youtu.be URL; undefined off a video page. */
export function videoIdFromUrl(raw: string): string | undefined {
  let url: URL;
  try {
    url = new URL(raw);
  } catch {
    return undefined;
  }
  const host = url.hostname.replace(/^(www|m|music)\./, '');
  let id: string | null | undefined;
  if (host === 'youtu.be') id = url.pathname.split('/')[1];
  else if (host === 'youtube.com') {
    if (url.pathname === '/watch') id = url.searchParams.get('v');
    else {
      const m = url.pathname.match(/^\/(?:shorts|embed|live)\/([^/?#]+)/);
      id = m?.[1];
    }
  }
  return id && ID_PATTERN.test(id) ? id : undefined;
}

/**
 * Subtitle state for one video in one tab. Once disposed it ignores late
 * results and never notifies again.
 */
export class SubtitleSession {
  private state: SessionState;
  private channel?: ChannelClient;
  private disposed = false;
  private readonly listeners = new Set<SessionListener>();

  constructor(readonly videoId: string, private readonly createChannel: () => ChannelClient) {
    this.state = { videoId, status: 'idle' };
  }

  get snapshot(): SessionState {
    return { ...this.state };
  }

  get isDisposed() {
    return this.disposed;
  }

  subscribe(listener: SessionListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  async request(operation: Operation, body: JobRequestBody): Promise<SessionState> {
    if (this.disposed) throw new Error('Session has been disposed');
    if (this.state.status === 'loading') throw new Error('A request is already in progress');
    if (operation === 'transcribe' && this.state.vtt !== undefined) return this.snapshot;
    if (operation === 'summarize' && this.state.summary !== undefined) return this.snapshot;

    const channel = this.createChannel();
    this.channel = channel;
    this.update({ status: 'loading', progress: undefined, error: undefined, errorKind: undefined });

    let result: ResultMessage;
    try {
      result = await channel.run(operation, body, (progress) => this.update({ progress }));
    } catch (err) {
      if (!this.disposed) {
        this.update({ status: 'failed', error: err instanceof Error ? err.message : String(err) });
      }
      return this.snapshot;
    } finally {
      if (this.channel === channel) this.channel = undefined;
    }

    if (this.disposed) return this.snapshot;
    if (!result.success) {
      this.update({ status: 'failed', error: result.error ?? 'Request failed', errorKind: result.error_kind });
    } else if (operation === 'summarize') {
      this.update({ status: 'ready', summary: result.data?.summary ?? '', keyMoments: result.data?.key_moments ?? [] });
    } else {
      this.update({ status: 'ready', vtt: result.data?.vtt ?? '' });
    }
    return this.snapshot;
  }

  dispose() {
    if (this.disposed) return;
    this.disposed = true;
    this.channel?.cancel();
    this.channel = undefined;
    this.listeners.clear();
  }

  private update(patch: Partial<SessionState>) {
    if (this.disposed) return;
    this.state = { ...this.state, ...patch };
    const snapshot = this.snapshot;
    for (const listener of this.listeners) listener(snapshot);
  }
}

/** Keeps one session per tab and tears it down when the tab leaves the video. */
export class SessionSupervisor {
  private current?: SubtitleSession;

  constructor(private readonly createChannel: () => ChannelClient) {}

  get session(): SubtitleSession | undefined {
    return this.current;
  }

  navigate(url: string): SubtitleSession | undefined {
    const videoId = videoIdFromUrl(url);
    if (this.current && this.current.videoId === videoId) return this.current;
    this.current?.dispose();
    this.current = videoId ? new SubtitleSession(videoId, this.createChannel) : undefined;
    return this.current;
  }

  dispose() {
    this.current?.dispose();
    this.current = undefined;
  }
}
