import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { CaptionsDisabledError, CaptionsUnavailableError } from './errors';
import { watchUrl } from './ids';
import { debug, info } from './log';
import type { Transcript, TranscriptFragment } from './types';
import { runYtDlp, YtDlpError } from './ytdlp';

export interface CaptionSource {
  fetchTranscript(videoId: string, language: string): Promise<TranscriptFragment[]>;
}

interface Json3Event {
  tStartMs?: number;
  segs?: { utf8?: string }[];
}

function isJson3Event(value: unknown): value is Json3Event {
  return typeof value === 'object' && value !== null;
}

/** Parse yt-dlp's json3 subtitle format into fragments. Blank events are dropped. */
export function parseJson3(raw: string): TranscriptFragment[] {
  const data: unknown = JSON.parse(raw);
  const events =
    typeof data === 'object' && data !== null && 'events' in data && Array.isArray(data.events)
      ? data.events
      : [];

  const fragments: TranscriptFragment[] = [];
  for (const event of events) {
    if (!isJson3Event(event) || !Array.isArray(event.segs)) continue;
    const text = event.segs
      .map((s) => (typeof s?.utf8 === 'string' ? s.utf8 : ''))
      .join('')
      .replace(/\s*\n\s*/g, ' ')
      .trim();
    if (!text) continue;
    fragments.push({
      startSec: typeof event.tStartMs === 'number' ? Math.floor(event.tStartMs / 1000) : 0,
      text,
    });
  }
  return fragments;
}

const DISABLED = /subtitles are disabled|transcripts? (?:are|is) disabled/i;

/**
 * Captions via yt-dlp: manual subtitles preferred, auto captions accepted,
 * written as json3 into a throwaway directory.
 */
export class YtDlpCaptionSource implements CaptionSource {
  async fetchTranscript(videoId: string, language: string): Promise<TranscriptFragment[]> {
    const workDir = await fs.mkdtemp(path.join(os.tmpdir(), `captions-${videoId}-`));
    const outTemplate = path.join(workDir, 'subs');
    try {
      let stderr = '';
      try {
        const res = await runYtDlp([
          '--write-auto-sub',
          '--write-sub',
          '--sub-lang',
          language,
          '--sub-format',
          'json3',
          '--skip-download',
          '-o',
          outTemplate,
          watchUrl(videoId),
        ]);
        stderr = res.stderr;
      } catch (e) {
        if (e instanceof YtDlpError && DISABLED.test(e.stderr)) {
          throw new CaptionsDisabledError(videoId);
        }
        throw e;
      }

      // yt-dlp writes to <template>.<lang>.json3
      const subPath = `${outTemplate}.${language}.json3`;
      if (!(await fs.pathExists(subPath))) {
        debug('captions.missing', { videoId, language, stderr });
        if (DISABLED.test(stderr)) throw new CaptionsDisabledError(videoId);
        throw new CaptionsUnavailableError(videoId, language);
      }
      const fragments = parseJson3(await fs.readFile(subPath, 'utf8'));
      info('captions.fetched', { videoId, language, fragments: fragments.length });
      return fragments;
    } finally {
      await fs.remove(workDir);
    }
  }
}

const FILLER_WORDS = ['um', 'uh', 'like', 'you know', 'sort of', 'kind of'];

/** Drop filler words (whole words, any case) and collapse whitespace. */
export function preprocessText(text: string): string {
  let out = text;
  for (const word of FILLER_WORDS) {
    out = out.replace(new RegExp(`\\b${word}\\b`, 'gi'), '');
  }
  return out.replace(/\s+/g, ' ').trim();
}

export interface BuildTranscriptOptions {
  preprocess?: boolean;
}

export function buildTranscript(
  videoId: string,
  language: string,
  fragments: TranscriptFragment[],
  opts: BuildTranscriptOptions = {}
): Transcript {
  const joined = fragments.map((f) => f.text).join(' ').trim();
  return {
    videoId,
    language,
    fragments,
    fullText: opts.preprocess === false ? joined : preprocessText(joined),
    source: 'youtube-captions',
  };
}
