import { decodeChapters, isChronological, partitionTranscript } from './chapters';
import { detectChaptersWithModel, parseDescriptionChapters } from './chapter-sources';
import { ChapterDetectionError, GenerationError, MalformedTimestampError } from './errors';
import type { TextGenerator } from './generator';
import { info, warn } from './log';
import {
  CHAPTER_PROMPT,
  CONCISE_PROMPT,
  DETAILED_PROMPT,
  NOTES_PROMPT,
  chapterSectionPrompt,
  customSummaryPrompt,
} from './prompts';
import type {
  Chapter,
  ChapterMarker,
  ChapterTranscript,
  CustomSummaryOptions,
  SummaryStyle,
  Transcript,
  VideoMetadata,
} from './types';

export type ChapterSourceMode = 'auto' | 'description' | 'model';

export interface SummarizeDeps {
  generator: TextGenerator;
  /** Supplies the description scanned for declared chapters. */
  metadata?: VideoMetadata;
  chapterSource?: ChapterSourceMode;
}

export interface ChapterPlan {
  origin: 'description' | 'model';
  sections: ChapterTranscript[];
}

export const CHAPTER_FAILED_TEXT = 'Summary generation failed for this chapter.';

function assertNever(value: never): never {
  throw new Error(`Unhandled summary style: ${String(value)}`);
}

export async function summarize(
  style: SummaryStyle,
  transcript: Transcript,
  deps: SummarizeDeps
): Promise<string> {
  switch (style) {
    case 'concise':
      return deps.generator.generate(CONCISE_PROMPT + transcript.fullText);
    case 'detailed':
      return deps.generator.generate(DETAILED_PROMPT + transcript.fullText);
    case 'notes':
      return deps.generator.generate(NOTES_PROMPT + transcript.fullText);
    case 'chapter':
      return summarizeByChapters(transcript, deps);
    default:
      return assertNever(style);
  }
}

export async function summarizeCustom(
  transcript: Transcript,
  options: CustomSummaryOptions,
  generator: TextGenerator
): Promise<string> {
  return generator.generate(customSummaryPrompt(transcript.fullText, options));
}

async function resolveMarkers(
  transcript: Transcript,
  deps: SummarizeDeps
): Promise<{ origin: ChapterPlan['origin']; markers: ChapterMarker[] }> {
  const mode = deps.chapterSource ?? 'auto';
  if (mode !== 'model') {
    const declared = parseDescriptionChapters(deps.metadata?.description ?? '');
    if (declared.length > 0) return { origin: 'description', markers: declared };
    if (mode === 'description') {
      throw new ChapterDetectionError('no chapters found in the video description');
    }
  }
  return { origin: 'model', markers: await detectChaptersWithModel(deps.generator, transcript) };
}

/**
 * Find chapter boundaries and partition the transcript. Returns `null` when
 * no usable chapter list exists (detection failed, malformed or unordered
 * timestamps); callers then fall back to a whole-transcript summary.
 */
export async function planChapters(
  transcript: Transcript,
  deps: SummarizeDeps
): Promise<ChapterPlan | null> {
  let resolved: { origin: ChapterPlan['origin']; markers: ChapterMarker[] };
  try {
    resolved = await resolveMarkers(transcript, deps);
  } catch (e) {
    if (e instanceof ChapterDetectionError || e instanceof GenerationError) {
      warn('chapters.detect.fail', { videoId: transcript.videoId, error: e.message });
      return null;
    }
    throw e;
  }

  let chapters: Chapter[];
  try {
    chapters = decodeChapters(resolved.markers);
  } catch (e) {
    if (e instanceof MalformedTimestampError) {
      warn('chapters.timestamp.malformed', { videoId: transcript.videoId, input: e.input });
      return null;
    }
    throw e;
  }
  if (!isChronological(chapters)) {
    warn('chapters.unordered', { videoId: transcript.videoId, origin: resolved.origin });
    return null;
  }

  const sections = partitionTranscript(transcript.fragments, resolved.markers);
  info('chapters.planned', { videoId: transcript.videoId, origin: resolved.origin, count: sections.length });
  return { origin: resolved.origin, sections };
}

export function renderChapterSummary(parts: Array<{ chapter: Chapter; summary: string }>): string {
  let out = '# Chapter-Based Summary\n\n';
  for (const { chapter, summary } of parts) {
    out += `## [${chapter.timestamp}] ${chapter.title}\n\n${summary}\n\n`;
  }
  return out;
}

export async function summarizeByChapters(transcript: Transcript, deps: SummarizeDeps): Promise<string> {
  const plan = await planChapters(transcript, deps);
  if (!plan) {
    return deps.generator.generate(CHAPTER_PROMPT + transcript.fullText);
  }

  const parts: Array<{ chapter: Chapter; summary: string }> = [];
  for (const section of plan.sections) {
    let summary: string;
    try {
      summary = await deps.generator.generate(chapterSectionPrompt(section.chapter.title, section.text));
    } catch (e) {
      if (!(e instanceof GenerationError)) throw e;
      warn('chapters.section.fail', { title: section.chapter.title, error: e.message });
      summary = CHAPTER_FAILED_TEXT;
    }
    parts.push({ chapter: section.chapter, summary });
  }
  return renderChapterSummary(parts);
}
