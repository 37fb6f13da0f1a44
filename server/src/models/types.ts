export type Operation = 'transcribe' | 'summarize';

export type StageName =
  | 'queued'
  | 'fetching-audio'
  | 'transcribing'
  | 'translating'
  | 'summarizing'
  | 'cached-hit'
  | 'complete';

export type ErrorKind =
  | 'ValidationError'
  | 'FetchError'
  | 'AuthenticationError'
  | 'RateLimitError'
  | 'ConnectionError'
  | 'InvalidModelError'
  | 'InvalidProviderError'
  | 'AlignmentError'
  | 'TimeoutError'
  | 'ProviderError'
  | 'ResourceError';

export interface Cue {
  start: number; // seconds
  end: number; // seconds
  text: string;
}

export interface Transcript {
  vtt: string;
  // Source language as reported by the provider, when it reports one
  language?: string;
}

export interface KeyMoment {
  offset: number; // seconds
  headline: string;
}

export interface StructuredSummary {
  synopsis: string;
  keyMoments: KeyMoment[];
}

export interface Credentials {
  apiKey: string;
  baseUrl?: string;
}

export interface JobRequest {
  videoUrl: string;
  videoId: string;
  operation: Operation;
  targetLanguage: string;
  provider: string;
  transcriptionModel: string;
  translationModel: string;
  summarizationModel: string;
  credentials: Credentials;
}

export interface ProgressEvent {
  stage: StageName;
  progress: number; // 0..100
  details?: string;
}

export interface JobPayload {
  vtt?: string;
  summary?: string;
  keyMoments?: KeyMoment[];
}

export type JobResult =
  | { ok: true; payload: JobPayload; cached: boolean }
  | { ok: false; kind: ErrorKind; message: string };
