import { describe, it, expect } from 'vitest';
import { buildTranscript } from '../src/pipeline/captions';
import {
  detectChaptersWithModel,
  parseDescriptionChapters,
  parseModelChapters,
} from '../src/pipeline/chapter-sources';
import { ChapterDetectionError } from '../src/pipeline/errors';
import { FakeGenerator, VIDEO_ID } from './helpers';

describe('parseDescriptionChapters', () => {
  it('reads chapter lines in order, hour-scale included', () => {
    const description = [
      'Thanks for watching!',
      '',
      'Chapters:',
      '0:00 Intro',
      '5:30 Main part',
      '1:02:03 Wrap up  ',
      'Follow me elsewhere',
    ].join('\n');

    expect(parseDescriptionChapters(description)).toEqual([
      { timestamp: '0:00', title: 'Intro' },
      { timestamp: '5:30', title: 'Main part' },
      { timestamp: '1:02:03', title: 'Wrap up' },
    ]);
  });

  it('handles CRLF line endings', () => {
    expect(parseDescriptionChapters('00:00 Start\r\n10:00 End\r\n')).toEqual([
      { timestamp: '00:00', title: 'Start' },
      { timestamp: '10:00', title: 'End' },
    ]);
  });

  it('returns nothing for a description without timestamps', () => {
    expect(parseDescriptionChapters('Just a video about bread.')).toEqual([]);
    expect(parseDescriptionChapters('')).toEqual([]);
  });
});

describe('parseModelChapters', () => {
  it('parses a bare JSON array and trims fields', () => {
    expect(
      parseModelChapters('[{"timestamp": " 00:00 ", "title": " Introduction "}, {"timestamp": "05:30", "title": "Setup"}]')
    ).toEqual([
      { timestamp: '00:00', title: 'Introduction' },
      { timestamp: '05:30', title: 'Setup' },
    ]);
  });

  it('unwraps a fenced code block', () => {
    const response = 'Here are the chapters:\n```json\n[{"timestamp": "00:00", "title": "Intro"}]\n```\n';
    expect(parseModelChapters(response)).toEqual([{ timestamp: '00:00', title: 'Intro' }]);
  });

  it('ignores extra fields on an entry', () => {
    expect(parseModelChapters('[{"timestamp": "01:00", "title": "A", "summary": "x"}]')).toEqual([
      { timestamp: '01:00', title: 'A' },
    ]);
  });

  it.each([
    ['prose', 'I could not find chapters.'],
    ['an object', '{"timestamp": "00:00", "title": "Intro"}'],
    ['a numeric timestamp', '[{"timestamp": 0, "title": "Intro"}]'],
    ['a missing title', '[{"timestamp": "00:00"}]'],
    ['an empty array', '[]'],
  ])('rejects %s', (_label, response) => {
    expect(() => parseModelChapters(response)).toThrow(ChapterDetectionError);
  });
});

describe('detectChaptersWithModel', () => {
  it('sends the transcript and parses the reply', async () => {
    const generator = new FakeGenerator(() => '[{"timestamp": "00:00", "title": "Only"}]');
    const transcript = buildTranscript(VIDEO_ID, 'en', [{ startSec: 0, text: 'hello world' }]);

    const markers = await detectChaptersWithModel(generator, transcript);

    expect(markers).toEqual([{ timestamp: '00:00', title: 'Only' }]);
    expect(generator.prompts).toHaveLength(1);
    expect(
      generator.prompts[0].startsWith(
        'Analyze this YouTube video transcript and create logical chapters with timestamps.'
      )
    ).toBe(true);
    expect(generator.prompts[0].endsWith('Transcript:\nhello world\n')).toBe(true);
  });
});
