import {
  GoogleGenerativeAI,
  GoogleGenerativeAIFetchError,
  GoogleGenerativeAIResponseError
} from '@google/generative-ai';
import { AppConfig } from '../config/environment';
import { AdapterResult, fail, reasonForStatus, succeed } from './adapter-result';

/** The one operation the itinerary handlers need from a language model. */
export interface TextGenerator {
  readonly isConfigured: boolean;
  readonly modelName: string;
  generate(prompt: string): Promise<AdapterResult<string>>;
}

/** Structural slice of the SDK's GenerativeModel. */
export interface ContentModel {
  generateContent(prompt: string): Promise<{ response: { text(): string } }>;
}

type GeminiConfig = Pick<AppConfig, 'geminiApiKey' | 'geminiModel' | 'aiTimeoutMs'>;

const isAbort = (error: Error): boolean =>
  error.name === 'AbortError' || /aborted|timed? ?out/i.test(error.message);

export const classifyGeminiError = (error: unknown): AdapterResult<never> => {
  if (error instanceof GoogleGenerativeAIFetchError) {
    const { status } = error;
    if (status === undefined) {
      return fail('gemini', isAbort(error) ? 'timeout' : 'network', error.message);
    }
    // An invalid key comes back as 400 INVALID_ARGUMENT rather than 401.
    if (status === 400 && /api key/i.test(error.message)) {
      return fail('gemini', 'authentication', error.message, status);
    }
    return fail('gemini', reasonForStatus(status), error.message, status);
  }

  if (error instanceof GoogleGenerativeAIResponseError) {
    return fail('gemini', 'malformed_response', error.message);
  }

  if (error instanceof Error) {
    return fail('gemini', isAbort(error) ? 'timeout' : 'upstream_error', error.message);
  }

  return fail('gemini', 'upstream_error', String(error));
};

export class GeminiService implements TextGenerator {
  readonly modelName: string;
  private readonly model: ContentModel | null;

  constructor(config: GeminiConfig, model?: ContentModel) {
    this.modelName = config.geminiModel;
    if (model) {
      this.model = model;
    } else if (config.geminiApiKey) {
      this.model = new GoogleGenerativeAI(config.geminiApiKey).getGenerativeModel(
        {
          model: config.geminiModel,
          generationConfig: {
            temperature: 0.7,
            responseMimeType: 'application/json'
          }
        },
        { timeout: config.aiTimeoutMs }
      );
    } else {
      this.model = null;
    }
  }

  get isConfigured(): boolean {
    return this.model !== null;
  }

  async generate(prompt: string): Promise<AdapterResult<string>> {
    if (!this.model) {
      return fail('gemini', 'not_configured', 'GEMINI_API_KEY is not set');
    }

    console.log(`Gemini request: model=${this.modelName}, prompt=${prompt.length} chars`);

    let text: string;
    try {
      const result = await this.model.generateContent(prompt);
      text = result.response.text();
    } catch (error) {
      return classifyGeminiError(error);
    }

    if (!text.trim()) {
      return fail('gemini', 'malformed_response', 'Gemini returned an empty response');
    }

    return succeed(text);
  }
}
