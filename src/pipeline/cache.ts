import { debug } from './log';
import type { SummaryStyle, Transcript, VideoMetadata } from './types';

export type ArtifactKind = SummaryStyle | 'custom' | 'transcript' | 'metadata';

export type CacheParams = Record<string, string | number | boolean | undefined>;

interface CacheEntry<T> {
  fingerprint: string;
  value: T;
  createdAt: number;
}

/** Stable JSON of the params: sorted keys, undefined values dropped. */
export function fingerprint(params: CacheParams): string {
  const keys = Object.keys(params)
    .filter((k) => params[k] !== undefined)
    .sort();
  return JSON.stringify(keys.map((k) => [k, params[k]]));
}

/**
 * Results of earlier requests, keyed by (video, artifact kind). Each entry
 * remembers the parameters it was produced with; a lookup with different
 * parameters evicts it.
 */
export class ArtifactCache<T = string> {
  private entries = new Map<string, CacheEntry<T>>();

  private key(videoId: string, kind: ArtifactKind): string {
    return `${videoId}::${kind}`;
  }

  get(videoId: string, kind: ArtifactKind, params: CacheParams = {}): T | undefined {
    const key = this.key(videoId, kind);
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    if (entry.fingerprint !== fingerprint(params)) {
      debug('cache.stale', { videoId, kind });
      this.entries.delete(key);
      return undefined;
    }
    debug('cache.hit', { videoId, kind });
    return entry.value;
  }

  set(videoId: string, kind: ArtifactKind, params: CacheParams, value: T): void {
    this.entries.set(this.key(videoId, kind), {
      fingerprint: fingerprint(params),
      value,
      createdAt: Date.now(),
    });
  }

  /** Drop one artifact, or every artifact of the video when `kind` is omitted. */
  invalidate(videoId: string, kind?: ArtifactKind): number {
    if (kind) {
      return this.entries.delete(this.key(videoId, kind)) ? 1 : 0;
    }
    let removed = 0;
    for (const key of [...this.entries.keys()]) {
      if (key.startsWith(`${videoId}::`)) {
        this.entries.delete(key);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

/**
 * Caller-owned results of one session: generated text per style, the loaded
 * transcript and the video metadata.
 */
export class SessionCache {
  readonly text = new ArtifactCache<string>();
  readonly transcripts = new ArtifactCache<Transcript>();
  readonly metadata = new ArtifactCache<VideoMetadata>();

  /** Drop everything held for `videoId`; returns the number of entries removed. */
  invalidate(videoId: string): number {
    return (
      this.text.invalidate(videoId) +
      this.transcripts.invalidate(videoId) +
      this.metadata.invalidate(videoId)
    );
  }

  clear(): void {
    this.text.clear();
    this.transcripts.clear();
    this.metadata.clear();
  }

  get size(): number {
    return this.text.size + this.transcripts.size + this.metadata.size;
  }
}
