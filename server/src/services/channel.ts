import type { Server } from 'http';
import { WebSocket, WebSocketServer, type RawData } from 'ws';
import type { JobRequest, JobResult, Operation } from '../models/types.js';
import {
  failureMessage,
  parseClientMessage,
  parseJobRequest,
  progressMessage,
  resultMessage,
  type ClientMessage,
  type ServerMessage,
} from '../models/protocol.js';
import { debug, error, info, warn } from '../utils/log.js';
import { errorMessage, toPipelineError } from './errors.js';
import type { Pipeline } from './pipeline.js';

/**
 * Server end of one job's stream. Sends after the client went away are
 * dropped; the transport decides how `close` tears down.
 */
export interface JobChannel {
  readonly isOpen: boolean;
  send(message: ServerMessage): void;
  close(): void;
}

function deliver(channel: JobChannel, message: ServerMessage) {
  if (channel.isOpen) channel.send(message);
}

/** Sends a terminal failure for a request that never became a job. */
export function rejectJob(channel: JobChannel, operation: Operation, err: unknown) {
  const failure = toPipelineError(err);
  deliver(channel, failureMessage(operation, failure.kind, failure.message));
  channel.close();
}

/**
 * Runs one job over a channel: progress events in order, exactly one terminal
 * message, then close. A disconnected client does not stop the job.
 */
export async function serveJob(pipeline: Pipeline, request: JobRequest, channel: JobChannel): Promise<JobResult> {
  const result = await pipeline.run(request, (event) => deliver(channel, progressMessage(event)));
  if (!channel.isOpen) {
    info('channel.resultDiscarded', { videoId: request.videoId, ok: result.ok });
  }
  deliver(channel, resultMessage(request.operation, result));
  channel.close();
  return result;
}

export class WsJobChannel implements JobChannel {
  constructor(private readonly socket: WebSocket) {}

  get isOpen() {
    return this.socket.readyState === WebSocket.OPEN;
  }

  send(message: ServerMessage) {
    this.socket.send(JSON.stringify(message), (err) => {
      if (err) warn('channel.ws.sendFailed', { error: err.message });
    });
  }

  close() {
    if (this.socket.readyState === WebSocket.OPEN) this.socket.close(1000, 'done');
  }
}

export interface ChannelServerOptions {
  path?: string;
  defaultProvider: string;
}

function text(data: RawData): string {
  if (Array.isArray(data)) return Buffer.concat(data).toString('utf8');
  if (data instanceof ArrayBuffer) return Buffer.from(data).toString('utf8');
  return data.toString('utf8');
}

/**
 * Accepts WebSocket clients on `/ws`. Each connection carries one job; client
 * `ping` messages only keep the connection from idling out.
 */
export function attachChannelServer(server: Server, pipeline: Pipeline, opts: ChannelServerOptions) {
  const wss = new WebSocketServer({ server, path: opts.path ?? '/ws' });

  wss.on('connection', (socket) => {
    const channel = new WsJobChannel(socket);
    let started = false;
    debug('channel.open');

    socket.on('message', (data) => {
      let msg: ClientMessage;
      try {
        msg = parseClientMessage(text(data));
      } catch (err) {
        if (started) {
          warn('channel.badMessage', { error: errorMessage(err) });
          return;
        }
        rejectJob(channel, 'transcribe', err);
        return;
      }

      if (msg.action === 'ping') return;
      if (started) {
        warn('channel.duplicateJob', { action: msg.action });
        return;
      }
      started = true;

      let request: JobRequest;
      try {
        request = parseJobRequest(msg.action, msg.data, opts.defaultProvider);
      } catch (err) {
        rejectJob(channel, msg.action, err);
        return;
      }
      serveJob(pipeline, request, channel).catch((err: unknown) => {
        error('channel.job.crashed', { videoId: request.videoId, error: errorMessage(err) });
        channel.close();
      });
    });

    socket.on('close', () => {
      if (started) debug('channel.closed', { detached: true });
    });
    socket.on('error', (err) => warn('channel.ws.error', { error: err.message }));
  });

  return wss;
}
