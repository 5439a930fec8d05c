import { ChapterDetectionError, errorMessage } from './errors';
import type { TextGenerator } from './generator';
import { chapterDetectionPrompt } from './prompts';
import type { ChapterMarker, Transcript } from './types';

// "0:00 Intro", "12:45 Topic", "1:02:03 Wrap-up"; title runs to end of line
const DESCRIPTION_CHAPTER = /((?:\d{1,2}:)?\d{1,2}:\d{2})[ \t]+([^\r\n]+)/g;

/** Chapter markers declared in a video description, in order of appearance. */
export function parseDescriptionChapters(description: string): ChapterMarker[] {
  const markers: ChapterMarker[] = [];
  for (const match of description.matchAll(DESCRIPTION_CHAPTER)) {
    const title = match[2].trim();
    if (title) markers.push({ timestamp: match[1], title });
  }
  return markers;
}

function stripCodeFence(text: string): string {
  const fenced = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  return (fenced ? fenced[1] : text).trim();
}

function isMarker(value: unknown): value is ChapterMarker {
  return (
    typeof value === 'object' &&
    value !== null &&
    'timestamp' in value &&
    'title' in value &&
    typeof value.timestamp === 'string' &&
    typeof value.title === 'string'
  );
}

/** Validate a model's JSON chapter list. */
export function parseModelChapters(responseText: string): ChapterMarker[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stripCodeFence(responseText));
  } catch (e) {
    throw new ChapterDetectionError(`response is not JSON (${errorMessage(e)})`, e);
  }
  if (!Array.isArray(parsed)) {
    throw new ChapterDetectionError('response is not a JSON array');
  }
  const markers: ChapterMarker[] = [];
  for (const [i, item] of parsed.entries()) {
    if (!isMarker(item)) {
      throw new ChapterDetectionError(`entry ${i} lacks string "timestamp" and "title"`);
    }
    markers.push({ timestamp: item.timestamp.trim(), title: item.title.trim() });
  }
  if (markers.length === 0) {
    throw new ChapterDetectionError('response contained no chapters');
  }
  return markers;
}

export async function detectChaptersWithModel(
  generator: TextGenerator,
  transcript: Transcript
): Promise<ChapterMarker[]> {
  const response = await generator.generate(chapterDetectionPrompt(transcript.fullText));
  return parseModelChapters(response);
}
