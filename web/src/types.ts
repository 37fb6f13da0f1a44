export type Operation = 'transcribe' | 'summarize';

export type StageName =
  | 'queued'
  | 'fetching-audio'
  | 'transcribing'
  | 'translating'
  | 'summarizing'
  | 'cached-hit'
  | 'complete';

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

export interface ProgressMessage {
  action: 'progress';
  stage: StageName;
  progress: number;
  details?: string;
}

export interface KeyMoment {
  offset: number;
  timestamp: string;
  headline: string;
}

export interface ResultMessage {
  action: 'transcription_result' | 'summary_result';
  success: boolean;
  cached?: boolean;
  data?: { vtt?: string; summary?: string; key_moments?: KeyMoment[] };
  error?: string;
  error_kind?: string;
}

export type ServerMessage = ProgressMessage | ResultMessage;

export interface HealthResponse {
  status: string;
  providers: string[];
  version: string;
}

export interface ModelInfo {
  id: string;
  name: string;
  description: string;
  supports_structured_output?: boolean;
}

export interface ProviderModels {
  id: string;
  name: string;
  transcription_models: ModelInfo[];
  translation_models: ModelInfo[];
}

export interface ModelsResponse {
  providers: ProviderModels[];
}
