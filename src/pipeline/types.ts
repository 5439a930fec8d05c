/** One timed caption unit; `startSec` is floored to whole seconds. */
export interface TranscriptFragment {
  startSec: number;
  text: string;
}

export interface Transcript {
  videoId: string;
  language: string;
  fragments: TranscriptFragment[];
  /** Fragment text space-joined, filler words removed unless preprocessing was disabled. */
  fullText: string;
  source: 'youtube-captions';
}

/** A chapter boundary as declared in a description or proposed by the model. */
export interface ChapterMarker {
  timestamp: string;
  title: string;
}

export interface Chapter {
  title: string;
  timestamp: string;
  startSec: number;
}

export interface ChapterSpan {
  chapter: Chapter;
  /** Exclusive; absent for the last chapter. */
  endSec?: number;
}

export interface ChapterTranscript extends ChapterSpan {
  text: string;
  fragmentCount: number;
}

export interface VideoMetadata {
  videoId: string;
  url: string;
  title: string;
  channel: string;
  description: string;
  durationSec?: number;
  /** Display form, e.g. "1h 2m 3s". */
  duration: string;
  /** Display form with thousands separators. */
  views: string;
  thumbnail: string;
}

export type SummaryStyle = 'concise' | 'detailed' | 'chapter' | 'notes';

export const SUMMARY_STYLES: readonly SummaryStyle[] = ['concise', 'detailed', 'chapter', 'notes'];

export interface CustomSummaryOptions {
  format?: string;
  length?: string;
  focus?: string;
  tone?: string;
}
