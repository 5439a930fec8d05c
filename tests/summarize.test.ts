import { describe, it, expect } from 'vitest';
import { buildTranscript } from '../src/pipeline/captions';
import { GenerationError } from '../src/pipeline/errors';
import {
  CHAPTER_PROMPT,
  CONCISE_PROMPT,
  DETAILED_PROMPT,
  NOTES_PROMPT,
  chapterSectionPrompt,
} from '../src/pipeline/prompts';
import {
  CHAPTER_FAILED_TEXT,
  planChapters,
  renderChapterSummary,
  summarize,
  summarizeCustom,
} from '../src/pipeline/summarize';
import type { SummaryStyle } from '../src/pipeline/types';
import { FakeGenerator, VIDEO_ID, makeMetadata } from './helpers';

const transcript = buildTranscript(VIDEO_ID, 'en', [
  { startSec: 0, text: 'hello there' },
  { startSec: 5, text: 'intro end' },
  { startSec: 12, text: 'main body' },
]);

const withChapters = makeMetadata({ description: 'Chapters\n0:00 Intro\n0:10 Main' });
const withoutChapters = makeMetadata();

function isDetection(prompt: string): boolean {
  return prompt.startsWith('Analyze this YouTube video transcript');
}

describe('summarize', () => {
  const singleCall: Array<[SummaryStyle, string]> = [
    ['concise', CONCISE_PROMPT],
    ['detailed', DETAILED_PROMPT],
    ['notes', NOTES_PROMPT],
  ];

  it.each(singleCall)('sends the %s prompt followed by the transcript', async (style, prompt) => {
    const generator = new FakeGenerator(() => 'summary text');

    const result = await summarize(style, transcript, { generator });

    expect(result).toBe('summary text');
    expect(generator.prompts).toEqual([prompt + 'hello there intro end main body']);
  });

  it('propagates generation failures for single-call styles', async () => {
    const generator = new FakeGenerator(() => new GenerationError('quota exceeded'));

    await expect(summarize('concise', transcript, { generator })).rejects.toThrow(
      'Error generating text: quota exceeded'
    );
  });
});

describe('summarizeCustom', () => {
  it('fills unset options with defaults', async () => {
    const generator = new FakeGenerator();

    await summarizeCustom(transcript, { format: 'Paragraphs', focus: 'Technical' }, generator);

    const prompt = generator.prompts[0];
    expect(prompt).toContain('Format: Paragraphs\nLength: Medium\nFocus: Technical\nStyle: Neutral\n');
    expect(prompt.endsWith('Transcript:\nhello there intro end main body\n')).toBe(true);
  });
});

describe('chapter summaries', () => {
  it('summarizes each description chapter in order', async () => {
    const generator = new FakeGenerator((_prompt, call) => (call === 0 ? 'Intro summary' : 'Main summary'));

    const result = await summarize('chapter', transcript, { generator, metadata: withChapters });

    expect(result).toBe(
      '# Chapter-Based Summary\n\n' +
        '## [0:00] Intro\n\nIntro summary\n\n' +
        '## [0:10] Main\n\nMain summary\n\n'
    );
    expect(generator.prompts).toEqual([
      chapterSectionPrompt('Intro', 'hello there intro end'),
      chapterSectionPrompt('Main', 'main body'),
    ]);
  });

  it('asks the model for chapters when the description has none', async () => {
    const generator = new FakeGenerator((prompt) =>
      isDetection(prompt)
        ? '[{"timestamp": "00:00", "title": "Start"}, {"timestamp": "00:10", "title": "Later"}]'
        : 'S'
    );

    const result = await summarize('chapter', transcript, { generator, metadata: withoutChapters });

    expect(result).toBe('# Chapter-Based Summary\n\n## [00:00] Start\n\nS\n\n## [00:10] Later\n\nS\n\n');
    expect(generator.prompts).toHaveLength(3);
  });

  it('replaces a failed section with a placeholder', async () => {
    const generator = new FakeGenerator((_prompt, call) => (call === 1 ? new GenerationError('boom') : 'fine'));

    const result = await summarize('chapter', transcript, { generator, metadata: withChapters });

    expect(result).toBe(
      `# Chapter-Based Summary\n\n## [0:00] Intro\n\nfine\n\n## [0:10] Main\n\n${CHAPTER_FAILED_TEXT}\n\n`
    );
  });

  it('propagates errors that are not generation failures', async () => {
    const generator = new FakeGenerator(() => new Error('bug'));

    await expect(summarize('chapter', transcript, { generator, metadata: withChapters })).rejects.toThrow('bug');
  });

  it('falls back to a single chapter prompt when detection returns no JSON', async () => {
    const generator = new FakeGenerator((prompt) => (isDetection(prompt) ? 'no chapters here' : 'whole'));

    const result = await summarize('chapter', transcript, { generator, metadata: withoutChapters });

    expect(result).toBe('whole');
    expect(generator.prompts[1]).toBe(CHAPTER_PROMPT + 'hello there intro end main body');
  });
});

describe('planChapters', () => {
  it('partitions by description chapters', async () => {
    const generator = new FakeGenerator();

    const plan = await planChapters(transcript, { generator, metadata: withChapters });

    expect(plan?.origin).toBe('description');
    expect(plan?.sections.map((s) => [s.chapter.title, s.text, s.endSec])).toEqual([
      ['Intro', 'hello there intro end', 10],
      ['Main', 'main body', undefined],
    ]);
    expect(generator.prompts).toHaveLength(0);
  });

  it('ignores description chapters in model mode', async () => {
    const generator = new FakeGenerator(() => '[{"timestamp": "00:00", "title": "All"}]');

    const plan = await planChapters(transcript, { generator, metadata: withChapters, chapterSource: 'model' });

    expect(plan?.origin).toBe('model');
    expect(plan?.sections).toHaveLength(1);
    expect(plan?.sections[0].text).toBe('hello there intro end main body');
  });

  it('returns null in description mode when none are declared', async () => {
    const generator = new FakeGenerator();

    const plan = await planChapters(transcript, {
      generator,
      metadata: withoutChapters,
      chapterSource: 'description',
    });

    expect(plan).toBeNull();
    expect(generator.prompts).toHaveLength(0);
  });

  it('returns null when detection itself fails', async () => {
    const generator = new FakeGenerator(() => new GenerationError('quota'));

    expect(await planChapters(transcript, { generator, metadata: withoutChapters })).toBeNull();
  });

  it('returns null for malformed model timestamps', async () => {
    const generator = new FakeGenerator(() => '[{"timestamp": "soon", "title": "Later"}]');

    expect(await planChapters(transcript, { generator, metadata: withoutChapters })).toBeNull();
  });

  it('returns null for chapters out of order', async () => {
    const generator = new FakeGenerator();
    const metadata = makeMetadata({ description: '5:00 Later\n1:00 Earlier' });

    expect(await planChapters(transcript, { generator, metadata })).toBeNull();
  });
});

describe('renderChapterSummary', () => {
  it('renders only the heading for no chapters', () => {
    expect(renderChapterSummary([])).toBe('# Chapter-Based Summary\n\n');
  });
});
