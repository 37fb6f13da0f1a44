/**
 * Tests for per-tab subtitle sessions
 */

import { describe, it, expect } from 'vitest';
import { ChannelClient } from '../src/channel.js';
import { SessionSupervisor, SubtitleSession, videoIdFromUrl, type SessionStatus } from '../src/session.js';
import type { JobRequestBody, ResultMessage } from '../src/types.js';
import { fakeSockets } from './fakeSocket.js';

const BODY: JobRequestBody = {
  video_url: 'https://www.youtube.com/watch?v=abc123',
  api_key: 'test-secret-key',
};

const VTT = 'WEBVTT\n\n00:00:00.000 --> 00:00:01.000\nHello\n\n';
const OK: ResultMessage = { action: 'transcription_result', success: true, cached: false, data: { vtt: VTT } };

function channels() {
  const { sockets, factory } = fakeSockets();
  const createChannel = () => new ChannelClient({ url: 'ws://localhost:8000/ws', socketFactory: factory });
  return { sockets, createChannel };
}

describe('videoIdFromUrl', () => {
  it('should find ids on video pages only', () => {
    expect(videoIdFromUrl('https://www.youtube.com/watch?v=abc123&t=10')).toBe('abc123');
    expect(videoIdFromUrl('https://youtu.be/abc123')).toBe('abc123');
    expect(videoIdFromUrl('https://m.youtube.com/shorts/xyz789')).toBe('xyz789');
    expect(videoIdFromUrl('https://www.youtube.com/feed/subscriptions')).toBeUndefined();
    expect(videoIdFromUrl('https://example.com/watch?v=abc123')).toBeUndefined();
    expect(videoIdFromUrl('not a url')).toBeUndefined();
  });
});

describe('SubtitleSession', () => {
  it('should move from loading to ready', async () => {
    const { sockets, createChannel } = channels();
    const session = new SubtitleSession('abc123', createChannel);
    const seen: SessionStatus[] = [];
    session.subscribe((s) => seen.push(s.status));

    const pending = session.request('transcribe', BODY);
    sockets[0].open();
    sockets[0].deliver({ action: 'progress', stage: 'transcribing', progress: 50 });
    sockets[0].deliver(OK);
    const state = await pending;

    expect(state).toMatchObject({ videoId: 'abc123', status: 'ready', vtt: VTT });
    expect(state.progress).toEqual({ action: 'progress', stage: 'transcribing', progress: 50 });
    expect(seen).toEqual(['loading', 'loading', 'ready']);
  });

  it('should reuse subtitles it already has', async () => {
    const { sockets, createChannel } = channels();
    const session = new SubtitleSession('abc123', createChannel);
    const first = session.request('transcribe', BODY);
    sockets[0].open();
    sockets[0].deliver(OK);
    await first;

    await expect(session.request('transcribe', BODY)).resolves.toMatchObject({ status: 'ready', vtt: VTT });
    expect(sockets).toHaveLength(1);
  });

  it('should record failures with their kind', async () => {
    const { sockets, createChannel } = channels();
    const session = new SubtitleSession('abc123', createChannel);

    const pending = session.request('summarize', BODY);
    sockets[0].open();
    sockets[0].deliver({
      action: 'summary_result',
      success: false,
      error: 'openai rejected the API key (401)',
      error_kind: 'AuthenticationError',
    });

    await expect(pending).resolves.toMatchObject({
      status: 'failed',
      error: 'openai rejected the API key (401)',
      errorKind: 'AuthenticationError',
    });
  });

  it('should mark a dropped connection as failed', async () => {
    const { sockets, createChannel } = channels();
    const session = new SubtitleSession('abc123', createChannel);

    const pending = session.request('transcribe', BODY);
    sockets[0].open();
    sockets[0].drop();

    await expect(pending).resolves.toMatchObject({
      status: 'failed',
      error: 'Connection closed before a result arrived',
    });
  });
});

describe('SessionSupervisor', () => {
  it('should keep the session while the video stays the same', () => {
    const { createChannel } = channels();
    const supervisor = new SessionSupervisor(createChannel);

    const first = supervisor.navigate('https://www.youtube.com/watch?v=abc123');
    const again = supervisor.navigate('https://www.youtube.com/watch?v=abc123&t=42');

    expect(first).toBeDefined();
    expect(again).toBe(first);
  });

  it('should tear down the old session on navigation', async () => {
    const { sockets, createChannel } = channels();
    const supervisor = new SessionSupervisor(createChannel);
    const old = supervisor.navigate('https://www.youtube.com/watch?v=abc123');
    if (!old) throw new Error('Expected a session');
    const updates: SessionStatus[] = [];
    old.subscribe((s) => updates.push(s.status));

    const pending = old.request('transcribe', BODY);
    sockets[0].open();
    const next = supervisor.navigate('https://www.youtube.com/watch?v=def456');
    sockets[0].deliver(OK);
    const finalState = await pending;

    expect(old.isDisposed).toBe(true);
    expect(sockets[0].closed).toBe(true);
    expect(finalState.status).toBe('loading');
    expect(updates).toEqual(['loading']);
    expect(next?.videoId).toBe('def456');
    expect(supervisor.session).toBe(next);
  });

  it('should drop the session when leaving video pages', () => {
    const { createChannel } = channels();
    const supervisor = new SessionSupervisor(createChannel);
    const session = supervisor.navigate('https://youtu.be/abc123');

    expect(supervisor.navigate('https://www.youtube.com/')).toBeUndefined();
    expect(session?.isDisposed).toBe(true);
    expect(supervisor.session).toBeUndefined();
  });
});
