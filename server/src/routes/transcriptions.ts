import express from 'express';
import type { JobRequest, Operation } from '../models/types.js';
import { parseJobRequest, type ServerMessage } from '../models/protocol.js';
import { rejectJob, serveJob, type JobChannel } from '../services/channel.js';
import type { Pipeline } from '../services/pipeline.js';
import { debug, error } from '../utils/log.js';
import { errorMessage } from '../services/errors.js';

/**
 * Server-sent events over the POST response. Comment frames keep proxies and
 * the extension's service worker from treating the stream as idle.
 */
export class SseJobChannel implements JobChannel {
  private closed = false;
  private readonly heartbeat: NodeJS.Timeout;

  constructor(private readonly res: express.Response, keepAliveMs: number) {
    res.setHeader('Content-Type', 'text/event-stream');
    res.setHeader('Cache-Control', 'no-cache');
    res.setHeader('Connection', 'keep-alive');
    res.flushHeaders?.();

    this.heartbeat = setInterval(() => {
      if (this.isOpen) res.write(': keep-alive\n\n');
    }, keepAliveMs);

    // req 'close' fires once the body is read, not on disconnect
    res.on('close', () => {
      if (!this.closed) debug('channel.sse.clientGone');
      this.stop();
    });
  }

  get isOpen() {
    return !this.closed && !this.res.writableEnded;
  }

  send(message: ServerMessage) {
    this.res.write(`data: ${JSON.stringify(message)}\n\n`);
  }

  close() {
    const wasOpen = this.isOpen;
    this.stop();
    if (wasOpen) this.res.end();
  }

  private stop() {
    this.closed = true;
    clearInterval(this.heartbeat);
  }
}

export interface JobRoutesOptions {
  pipeline: Pipeline;
  defaultProvider: string;
  keepAliveIntervalMs: number;
}

export function jobRoutes(opts: JobRoutesOptions) {
  const router = express.Router();

  const stream = (operation: Operation): express.RequestHandler => (req, res) => {
    const channel = new SseJobChannel(res, opts.keepAliveIntervalMs);
    let request: JobRequest;
    try {
      request = parseJobRequest(operation, req.body, opts.defaultProvider);
    } catch (err) {
      rejectJob(channel, operation, err);
      return;
    }
    serveJob(opts.pipeline, request, channel).catch((err: unknown) => {
      error('channel.job.crashed', { videoId: request.videoId, error: errorMessage(err) });
      channel.close();
    });
  };

  router.post('/transcribe', stream('transcribe'));
  router.post('/summarize', stream('summarize'));

  return router;
}
