import type { CaptionSource } from '../src/pipeline/captions';
import type { TextGenerator } from '../src/pipeline/generator';
import type { MetadataSource } from '../src/pipeline/metadata';
import { parseVideoMetadata } from '../src/pipeline/metadata';
import type { TranscriptFragment, VideoMetadata } from '../src/pipeline/types';

export const VIDEO_ID = 'abcDEF12345';

type Responder = (prompt: string, call: number) => string | Error;

/** Records prompts; answers through `respond` (an Error is thrown instead of returned). */
export class FakeGenerator implements TextGenerator {
  readonly modelName = 'fake-model';
  prompts: string[] = [];
  private respond: Responder;

  constructor(respond: Responder = () => 'ok') {
    this.respond = respond;
  }

  async generate(prompt: string): Promise<string> {
    this.prompts.push(prompt);
    const answer = this.respond(prompt, this.prompts.length - 1);
    if (answer instanceof Error) throw answer;
    return answer;
  }
}

export class FakeCaptions implements CaptionSource {
  calls: Array<{ videoId: string; language: string }> = [];

  constructor(private fragments: TranscriptFragment[]) {}

  async fetchTranscript(videoId: string, language: string): Promise<TranscriptFragment[]> {
    this.calls.push({ videoId, language });
    return this.fragments;
  }
}

export class FakeMetadata implements MetadataSource {
  calls: string[] = [];

  constructor(private metadata: VideoMetadata) {}

  async fetchMetadata(videoId: string): Promise<VideoMetadata> {
    this.calls.push(videoId);
    return this.metadata;
  }
}

export function makeMetadata(overrides: Record<string, unknown> = {}): VideoMetadata {
  return parseVideoMetadata(VIDEO_ID, {
    title: 'Test Video',
    channel: 'Test Channel',
    duration: 253,
    view_count: 1500,
    description: '',
    ...overrides,
  });
}
