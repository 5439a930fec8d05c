import { EmptyChapterListError } from './errors';
import { decodeTimestamp } from './timecode';
import type { Chapter, ChapterMarker, ChapterSpan, ChapterTranscript, TranscriptFragment } from './types';

/** Decode each marker's timestamp once, keeping declaration order. */
export function decodeChapters(markers: ChapterMarker[]): Chapter[] {
  return markers.map((m) => ({
    title: m.title,
    timestamp: m.timestamp,
    startSec: decodeTimestamp(m.timestamp),
  }));
}

export function isChronological(chapters: Chapter[]): boolean {
  for (let i = 1; i < chapters.length; i++) {
    if (chapters[i].startSec < chapters[i - 1].startSec) return false;
  }
  return true;
}

export function chapterSpans(chapters: Chapter[]): ChapterSpan[] {
  return chapters.map((chapter, i) => {
    const next = chapters[i + 1];
    return next ? { chapter, endSec: next.startSec } : { chapter };
  });
}

/**
 * Assign every fragment to the chapter whose half-open span contains its
 * start and join the text per chapter.
 *
 * Both inputs must already be ordered by start time. The chapter cursor only
 * moves forward, so a fragment earlier than the first chapter lands in the
 * first chapter, and out-of-order input is assigned to whichever chapter the
 * cursor is on. Callers can check chapter order with {@link isChronological}.
 *
 * @throws EmptyChapterListError when `markers` is empty
 * @throws MalformedTimestampError when any marker timestamp does not decode
 */
export function partitionTranscript(
  fragments: TranscriptFragment[],
  markers: ChapterMarker[]
): ChapterTranscript[] {
  if (markers.length === 0) {
    throw new EmptyChapterListError();
  }
  const spans = chapterSpans(decodeChapters(markers));
  const buckets: string[][] = spans.map(() => []);

  let cursor = 0;
  for (const fragment of fragments) {
    while (cursor + 1 < spans.length && spans[cursor + 1].chapter.startSec <= fragment.startSec) {
      cursor++;
    }
    buckets[cursor].push(fragment.text);
  }

  return spans.map((span, i) => ({
    ...span,
    text: buckets[i].join(' ').trim(),
    fragmentCount: buckets[i].length,
  }));
}
