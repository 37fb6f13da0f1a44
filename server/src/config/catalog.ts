import { fileURLToPath } from 'url';
import { readJson } from '../utils/fsutil.js';

export type ModelKind = 'transcription' | 'translation';

export interface TranscriptionModelInfo {
  id: string;
  name: string;
  description: string;
}

export interface TranslationModelInfo extends TranscriptionModelInfo {
  supports_structured_output: boolean;
}

export interface ProviderCatalogEntry {
  name: string;
  transcription_models: TranscriptionModelInfo[];
  translation_models: TranslationModelInfo[];
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readModel(raw: unknown, where: string): TranscriptionModelInfo {
  if (!isRecord(raw) || typeof raw.id !== 'string' || typeof raw.name !== 'string') {
    throw new Error(`Invalid model entry in ${where}`);
  }
  return { id: raw.id, name: raw.name, description: typeof raw.description === 'string' ? raw.description : '' };
}

function readModels(raw: unknown, where: string): unknown[] {
  if (!Array.isArray(raw)) throw new Error(`Expected a model list at ${where}`);
  return raw;
}

/** Checks the shape of models.json; a malformed catalog fails at start-up. */
export function parseCatalog(raw: unknown): Record<string, ProviderCatalogEntry> {
  if (!isRecord(raw)) throw new Error('Model catalog must be an object');
  const catalog: Record<string, ProviderCatalogEntry> = {};
  for (const [id, entry] of Object.entries(raw)) {
    if (!isRecord(entry) || typeof entry.name !== 'string') throw new Error(`Invalid provider entry: ${id}`);
    catalog[id] = {
      name: entry.name,
      transcription_models: readModels(entry.transcription_models, `${id}.transcription_models`).map((m) =>
        readModel(m, id),
      ),
      translation_models: readModels(entry.translation_models, `${id}.translation_models`).map((m) => ({
        ...readModel(m, id),
        supports_structured_output: isRecord(m) && m.supports_structured_output === true,
      })),
    };
  }
  return catalog;
}

const CATALOG: Readonly<Record<string, ProviderCatalogEntry>> = parseCatalog(
  readJson(fileURLToPath(new URL('./models.json', import.meta.url))),
);

export function listCatalog(): Array<{ id: string } & ProviderCatalogEntry> {
  return Object.entries(CATALOG).map(([id, entry]) => ({ id, ...entry }));
}

export function getProviderModels(provider: string, kind: ModelKind): TranscriptionModelInfo[] {
  const entry = CATALOG[provider.toLowerCase()];
  if (!entry) return [];
  return kind === 'transcription' ? entry.transcription_models : entry.translation_models;
}

export function findModel(provider: string, kind: ModelKind, modelId: string) {
  return getProviderModels(provider, kind).find((m) => m.id === modelId);
}

export function supportsStructuredOutput(provider: string, modelId: string): boolean {
  const entry = CATALOG[provider.toLowerCase()];
  return entry?.translation_models.find((m) => m.id === modelId)?.supports_structured_output ?? false;
}

const DEFAULT_MODELS: Record<string, { transcription: string; translation: string }> = {
  openai: { transcription: 'whisper-1', translation: 'gpt-4o-mini' },
  groq: { transcription: 'whisper-large-v3-turbo', translation: 'openai/gpt-oss-20b' },
};

/** Models used when a request leaves them out; falls back to the first catalog entry. */
export function defaultModels(provider: string): { transcription: string; translation: string } {
  const known = DEFAULT_MODELS[provider.toLowerCase()];
  if (known) return known;
  return {
    transcription: getProviderModels(provider, 'transcription')[0]?.id ?? '',
    translation: getProviderModels(provider, 'translation')[0]?.id ?? '',
  };
}
