import type { ErrorKind, JobRequest, JobResult, Operation, ProgressEvent, StageName } from './types.js';
import { ValidationError } from '../services/errors.js';
import { defaultModels } from '../config/catalog.js';
import { formatTimestamp } from '../services/vtt.js';
import { toVideoId } from '../utils/ids.js';

/** Job submission body, as sent by the extension. */
export interface JobRequestBody {
  video_url: string;
  api_key: string;
  base_url?: string;
  target_language?: string;
  transcription_model?: string;
  translation_model?: string;
  summarization_model?: string;
  provider?: string;
}

export type ClientMessage =
  | { action: 'ping' }
  | { action: Operation; data: unknown };

export interface ProgressMessage {
  action: 'progress';
  stage: StageName;
  progress: number;
  details?: string;
}

export interface KeyMomentWire {
  offset: number;
  timestamp: string;
  headline: string;
}

export interface ResultMessage {
  action: 'transcription_result' | 'summary_result';
  success: boolean;
  cached?: boolean;
  data?: { vtt?: string; summary?: string; key_moments?: KeyMomentWire[] };
  error?: string;
  error_kind?: ErrorKind;
}

export type ServerMessage = ProgressMessage | ResultMessage;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseClientMessage(raw: string): ClientMessage {
  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch {
    throw new ValidationError('Message is not valid JSON');
  }
  if (!isRecord(value)) throw new ValidationError('Message must be a JSON object');
  const action = value.action;
  if (action === 'ping') return { action };
  if (action === 'transcribe' || action === 'summarize') return { action, data: value.data };
  throw new ValidationError(`Unknown action '${String(action)}'`);
}

function optionalString(body: Record<string, unknown>, field: keyof JobRequestBody): string | undefined {
  const value = body[field];
  if (value === undefined || value === null) return undefined;
  if (typeof value !== 'string') throw new ValidationError(`${field} must be a string`);
  const trimmed = value.trim();
  return trimmed === '' ? undefined : trimmed;
}

/** Wire body to a frozen JobRequest with defaults applied. Content checks happen in the pipeline. */
export function parseJobRequest(operation: Operation, body: unknown, defaultProvider: string): JobRequest {
  if (!isRecord(body)) throw new ValidationError('Request body must be a JSON object');

  const videoUrl = optionalString(body, 'video_url') ?? '';
  const provider = optionalString(body, 'provider') ?? defaultProvider;
  const defaults = defaultModels(provider);
  const translationModel = optionalString(body, 'translation_model') ?? defaults.translation;

  return Object.freeze({
    videoUrl,
    videoId: videoUrl ? toVideoId(videoUrl) : '',
    operation,
    targetLanguage: optionalString(body, 'target_language') ?? 'en',
    provider,
    transcriptionModel: optionalString(body, 'transcription_model') ?? defaults.transcription,
    translationModel,
    summarizationModel: optionalString(body, 'summarization_model') ?? translationModel,
    credentials: Object.freeze({
      apiKey: optionalString(body, 'api_key') ?? '',
      baseUrl: optionalString(body, 'base_url'),
    }),
  });
}

export function resultAction(operation: Operation): ResultMessage['action'] {
  return operation === 'summarize' ? 'summary_result' : 'transcription_result';
}

export function progressMessage(event: ProgressEvent): ProgressMessage {
  const msg: ProgressMessage = { action: 'progress', stage: event.stage, progress: event.progress };
  if (event.details) msg.details = event.details;
  return msg;
}

export function resultMessage(operation: Operation, result: JobResult): ResultMessage {
  const action = resultAction(operation);
  if (!result.ok) {
    return { action, success: false, error: result.message, error_kind: result.kind };
  }
  const { vtt, summary, keyMoments } = result.payload;
  const data: NonNullable<ResultMessage['data']> = {};
  if (vtt !== undefined) data.vtt = vtt;
  if (summary !== undefined) data.summary = summary;
  if (keyMoments) {
    data.key_moments = keyMoments.map((m) => ({
      offset: m.offset,
      timestamp: formatTimestamp(m.offset),
      headline: m.headline,
    }));
  }
  return { action, success: true, cached: result.cached, data };
}

export function failureMessage(operation: Operation, kind: ErrorKind, message: string): ResultMessage {
  return { action: resultAction(operation), success: false, error: message, error_kind: kind };
}
