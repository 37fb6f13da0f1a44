import { OpenAICompatibleProvider, type FormFields, type JsonBody } from './openaiCompatible.js';

export class OpenAIProvider extends OpenAICompatibleProvider {
  readonly name = 'openai';
  readonly defaultBaseUrl = 'https://api.openai.com/v1';

  useStructuredOutput(): boolean {
    return true;
  }

  transcriptionParams(model: string): FormFields {
    // whisper-1 gives segment timings through verbose_json; the gpt-4o
    // transcribe models only time their output in vtt mode
    if (model === 'whisper-1') {
      return { ...super.transcriptionParams(model), timestamp_granularities: ['segment'] };
    }
    if (model.endsWith('-transcribe')) {
      return { model, response_format: 'vtt' };
    }
    return super.transcriptionParams(model);
  }

  summaryParams(model: string): JsonBody {
    const params = super.summaryParams(model);
    // gpt-5 models only accept the default temperature
    if (model.startsWith('gpt-5')) delete params.temperature;
    return params;
  }

  translationParams(model: string): JsonBody {
    const params = super.translationParams(model);
    if (model.startsWith('gpt-5')) delete params.temperature;
    return params;
  }
}
