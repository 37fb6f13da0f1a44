import { InvalidProviderError } from '../errors.js';
import type { TranscriptionProvider } from './base.js';
import { GroqProvider } from './groq.js';
import { OpenAIProvider } from './openai.js';
import type { OpenAICompatibleOptions } from './openaiCompatible.js';

export class ProviderRegistry {
  private readonly providers = new Map<string, TranscriptionProvider>();

  register(provider: TranscriptionProvider): this {
    this.providers.set(provider.name, provider);
    return this;
  }

  has(name: string): boolean {
    return this.providers.has(name);
  }

  get(name: string): TranscriptionProvider {
    const provider = this.providers.get(name);
    if (!provider) {
      throw new InvalidProviderError(`Provider '${name}' not found. Available: ${this.list().join(', ')}`);
    }
    return provider;
  }

  list(): string[] {
    return Array.from(this.providers.keys());
  }
}

export function createDefaultRegistry(opts: OpenAICompatibleOptions = {}): ProviderRegistry {
  return new ProviderRegistry().register(new OpenAIProvider(opts)).register(new GroqProvider(opts));
}
