import type { Credentials, StructuredSummary, Transcript } from '../../models/types.js';

export type BatchProgress = (done: number, total: number) => void;

export interface ProviderCallOptions {
  signal?: AbortSignal;
  onProgress?: BatchProgress;
}

/**
 * Capability set every vendor adapter implements. Errors are thrown as
 * PipelineError subclasses, never as raw HTTP client errors.
 */
export interface TranscriptionProvider {
  readonly name: string;
  readonly defaultBaseUrl: string;

  transcribe(
    audioPath: string,
    model: string,
    credentials: Credentials,
    opts?: ProviderCallOptions
  ): Promise<Transcript>;

  /** Replaces cue text only; cue count and timings are preserved. */
  translate(
    vtt: string,
    targetLanguage: string,
    model: string,
    credentials: Credentials,
    opts?: ProviderCallOptions
  ): Promise<string>;

  summarize(
    transcript: string,
    targetLanguage: string,
    model: string,
    credentials: Credentials,
    opts?: ProviderCallOptions
  ): Promise<StructuredSummary>;
}
