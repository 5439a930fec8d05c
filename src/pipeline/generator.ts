import { GoogleGenerativeAI, type GenerativeModel } from '@google/generative-ai';
import { ENV } from './env';
import { GenerationError, MissingApiKeyError, errorMessage } from './errors';
import { debug } from './log';

export interface TextGenerator {
  /** Identifies the model in logs and cache keys. */
  readonly modelName?: string;
  generate(prompt: string): Promise<string>;
}

export interface GeminiOptions {
  apiKey?: string;
  model?: string;
}

/**
 * Gemini-backed generator. The client is created on first use so a missing
 * key only fails the commands that actually call the model.
 */
export class GeminiTextGenerator implements TextGenerator {
  private model: GenerativeModel | null = null;
  private readonly apiKey: string;
  readonly modelName: string;

  constructor(opts: GeminiOptions = {}) {
    this.apiKey = opts.apiKey ?? ENV.googleApiKey;
    this.modelName = opts.model ?? ENV.geminiModel;
  }

  private getModel(): GenerativeModel {
    if (!this.model) {
      if (!this.apiKey) {
        throw new MissingApiKeyError();
      }
      this.model = new GoogleGenerativeAI(this.apiKey).getGenerativeModel({ model: this.modelName });
    }
    return this.model;
  }

  async generate(prompt: string): Promise<string> {
    const model = this.getModel();
    debug('generate.request', { model: this.modelName, promptChars: prompt.length });
    try {
      const result = await model.generateContent(prompt);
      return result.response.text();
    } catch (e) {
      throw new GenerationError(errorMessage(e), e);
    }
  }
}
