/**
 * Tests for wire message parsing and formatting
 */

import { describe, it, expect } from 'vitest';
import {
  failureMessage,
  parseClientMessage,
  parseJobRequest,
  progressMessage,
  resultMessage,
} from '../src/models/protocol.js';
import { ValidationError } from '../src/services/errors.js';
import { API_KEY } from './helpers.js';

describe('parseClientMessage', () => {
  it('should read ping and job actions', () => {
    expect(parseClientMessage('{"action":"ping"}')).toEqual({ action: 'ping' });
    expect(parseClientMessage('{"action":"summarize","data":{"video_url":"x"}}')).toEqual({
      action: 'summarize',
      data: { video_url: 'x' },
    });
  });

  it('should reject malformed messages', () => {
    expect(() => parseClientMessage('not json')).toThrow(ValidationError);
    expect(() => parseClientMessage('[1]')).toThrow('Message must be a JSON object');
    expect(() => parseClientMessage('{"action":"dance"}')).toThrow("Unknown action 'dance'");
  });
});

describe('parseJobRequest', () => {
  it('should fill defaults from the provider', () => {
    const req = parseJobRequest('transcribe', { video_url: 'https://youtu.be/abc123XYZ', api_key: API_KEY }, 'groq');

    expect(req).toEqual({
      videoUrl: 'https://youtu.be/abc123XYZ',
      videoId: 'abc123XYZ',
      operation: 'transcribe',
      targetLanguage: 'en',
      provider: 'groq',
      transcriptionModel: 'whisper-large-v3-turbo',
      translationModel: 'openai/gpt-oss-20b',
      summarizationModel: 'openai/gpt-oss-20b',
      credentials: { apiKey: API_KEY, baseUrl: undefined },
    });
    expect(Object.isFrozen(req)).toBe(true);
  });

  it('should treat blank fields as absent', () => {
    const req = parseJobRequest(
      'summarize',
      { video_url: 'abc123', api_key: API_KEY, provider: ' ', translation_model: 'gpt-4o', summarization_model: '' },
      'openai'
    );
    expect(req.provider).toBe('openai');
    expect(req.summarizationModel).toBe('gpt-4o');
  });

  it('should reject non-string fields', () => {
    expect(() => parseJobRequest('transcribe', { video_url: 'abc123', api_key: 42 }, 'openai')).toThrow(
      'api_key must be a string'
    );
    expect(() => parseJobRequest('transcribe', 'body', 'openai')).toThrow('Request body must be a JSON object');
  });
});

describe('server messages', () => {
  it('should omit empty progress details', () => {
    expect(progressMessage({ stage: 'queued', progress: 0 })).toEqual({ action: 'progress', stage: 'queued', progress: 0 });
    expect(progressMessage({ stage: 'transcribing', progress: 50, details: 'Transcribing with groq' })).toEqual({
      action: 'progress',
      stage: 'transcribing',
      progress: 50,
      details: 'Transcribing with groq',
    });
  });

  it('should format key moments with a timestamp', () => {
    const msg = resultMessage('summarize', {
      ok: true,
      cached: false,
      payload: { summary: '## s', keyMoments: [{ offset: 65, headline: 'Demo' }] },
    });
    expect(msg).toEqual({
      action: 'summary_result',
      success: true,
      cached: false,
      data: { summary: '## s', key_moments: [{ offset: 65, timestamp: '00:01:05.000', headline: 'Demo' }] },
    });
  });

  it('should carry the error kind on failure', () => {
    expect(resultMessage('transcribe', { ok: false, kind: 'AuthenticationError', message: 'bad key' })).toEqual({
      action: 'transcription_result',
      success: false,
      error: 'bad key',
      error_kind: 'AuthenticationError',
    });
    expect(failureMessage('summarize', 'ValidationError', 'nope').action).toBe('summary_result');
  });
});
