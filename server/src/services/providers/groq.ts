import { OpenAICompatibleProvider, type FormFields, type JsonBody } from './openaiCompatible.js';

/**
 * Groq serves the OpenAI dialect. Strict json_schema output is several times
 * slower there, so replies are requested as plain json_object.
 */
export class GroqProvider extends OpenAICompatibleProvider {
  readonly name = 'groq';
  readonly defaultBaseUrl = 'https://api.groq.com/openai/v1';

  transcriptionParams(model: string): FormFields {
    return { ...super.transcriptionParams(model), temperature: '0' };
  }

  translationParams(model: string): JsonBody {
    const params = super.translationParams(model);
    // gpt-oss already has a high output limit; Llama needs it spelled out for full batches
    if (!model.includes('gpt-oss')) params.max_tokens = 4096;
    return params;
  }
}
