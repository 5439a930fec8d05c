import { describe, it, expect, vi, beforeEach } from 'vitest';
import { ENV } from '../src/pipeline/env';
import { GenerationError, MissingApiKeyError } from '../src/pipeline/errors';
import { GeminiTextGenerator } from '../src/pipeline/generator';

type GenerateContent = (prompt: string) => Promise<{ response: { text: () => string } }>;

const gemini = vi.hoisted(() => {
  const keys: string[] = [];
  const models: string[] = [];
  return { keys, models, generateContent: vi.fn<GenerateContent>() };
});

vi.mock('@google/generative-ai', () => ({
  GoogleGenerativeAI: class {
    constructor(apiKey: string) {
      gemini.keys.push(apiKey);
    }

    getGenerativeModel(params: { model: string }) {
      gemini.models.push(params.model);
      return { generateContent: gemini.generateContent };
    }
  },
}));

function reply(text: string) {
  return { response: { text: () => text } };
}

describe('GeminiTextGenerator', () => {
  beforeEach(() => {
    gemini.keys.length = 0;
    gemini.models.length = 0;
    gemini.generateContent.mockReset();
  });

  it('defaults the model name from ENV', () => {
    expect(new GeminiTextGenerator({ apiKey: 'test-key' }).modelName).toBe(ENV.geminiModel);
  });

  it('fails on first use without an API key', async () => {
    const generator = new GeminiTextGenerator({ apiKey: '' });

    await expect(generator.generate('hello')).rejects.toBeInstanceOf(MissingApiKeyError);
    expect(gemini.keys).toEqual([]);
    expect(gemini.generateContent).not.toHaveBeenCalled();
  });

  it('returns the response text and creates the client once', async () => {
    gemini.generateContent.mockResolvedValue(reply('summary'));
    const generator = new GeminiTextGenerator({ apiKey: 'test-key', model: 'test-model' });

    expect(await generator.generate('first')).toBe('summary');
    expect(await generator.generate('second')).toBe('summary');

    expect(gemini.keys).toEqual(['test-key']);
    expect(gemini.models).toEqual(['test-model']);
    expect(gemini.generateContent.mock.calls).toEqual([['first'], ['second']]);
  });

  it('wraps a rejected request as GenerationError with its cause', async () => {
    const failure = new Error('quota exceeded');
    gemini.generateContent.mockRejectedValue(failure);
    const generator = new GeminiTextGenerator({ apiKey: 'test-key' });

    const err = await generator.generate('hello').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(GenerationError);
    if (err instanceof GenerationError) {
      expect(err.message).toBe('Error generating text: quota exceeded');
      expect(err.cause).toBe(failure);
    }
    expect(gemini.generateContent).toHaveBeenCalledTimes(1);
  });

  it('wraps a failing response.text() as GenerationError', async () => {
    gemini.generateContent.mockResolvedValue({
      response: {
        text: () => {
          throw new Error('response blocked');
        },
      },
    });
    const generator = new GeminiTextGenerator({ apiKey: 'test-key' });

    await expect(generator.generate('hello')).rejects.toThrow('Error generating text: response blocked');
  });
});
