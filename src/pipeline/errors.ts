/**
 * Error classes for the digest pipeline
 */

export type ErrorCode =
  | 'malformed_timestamp'
  | 'empty_chapter_list'
  | 'invalid_video_url'
  | 'video_unavailable'
  | 'captions_unavailable'
  | 'captions_disabled'
  | 'chapter_detection_failed'
  | 'generation_failed'
  | 'missing_api_key';

/**
 * Base class for all pipeline errors
 */
export class DigestError extends Error {
  code: ErrorCode;
  details?: Record<string, unknown>;

  constructor(message: string, code: ErrorCode, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DigestError';
    this.code = code;
    this.details = details;

    // Maintains proper stack trace for where our error was thrown (only available on V8)
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toString(): string {
    return `${this.name}: ${this.message} (code: ${this.code})`;
  }
}

/**
 * A timestamp string could not be decoded into seconds
 */
export class MalformedTimestampError extends DigestError {
  input: string;

  constructor(input: string, reason: string) {
    super(`Malformed timestamp "${input}": ${reason}`, 'malformed_timestamp', { input, reason });
    this.name = 'MalformedTimestampError';
    this.input = input;
  }
}

/**
 * Partitioning was requested with no chapters
 */
export class EmptyChapterListError extends DigestError {
  constructor() {
    super('Cannot partition a transcript into zero chapters', 'empty_chapter_list');
    this.name = 'EmptyChapterListError';
  }
}

export class InvalidVideoUrlError extends DigestError {
  constructor(input: string) {
    super(`Invalid YouTube URL or video ID: ${input}`, 'invalid_video_url', { input });
    this.name = 'InvalidVideoUrlError';
  }
}

/**
 * Video does not exist, is private, or metadata lookup failed
 */
export class VideoUnavailableError extends DigestError {
  constructor(videoId: string, reason: string, cause?: unknown) {
    super(`Video ${videoId} not found or may be private: ${reason}`, 'video_unavailable', { videoId }, { cause });
    this.name = 'VideoUnavailableError';
  }
}

export class CaptionsUnavailableError extends DigestError {
  constructor(videoId: string, language: string) {
    super(`No transcript found for video ${videoId} (language: ${language})`, 'captions_unavailable', {
      videoId,
      language,
    });
    this.name = 'CaptionsUnavailableError';
  }
}

export class CaptionsDisabledError extends DigestError {
  constructor(videoId: string) {
    super(`Transcripts are disabled for video ${videoId}`, 'captions_disabled', { videoId });
    this.name = 'CaptionsDisabledError';
  }
}

/**
 * The model did not return a usable chapter list
 */
export class ChapterDetectionError extends DigestError {
  constructor(reason: string, cause?: unknown) {
    super(`Chapter detection failed: ${reason}`, 'chapter_detection_failed', undefined, { cause });
    this.name = 'ChapterDetectionError';
  }
}

export class GenerationError extends DigestError {
  constructor(message: string, cause?: unknown) {
    super(`Error generating text: ${message}`, 'generation_failed', undefined, { cause });
    this.name = 'GenerationError';
  }
}

export class MissingApiKeyError extends DigestError {
  constructor() {
    super(
      'Text generation requires GOOGLE_API_KEY (or GEMINI_API_KEY). Get one from https://aistudio.google.com',
      'missing_api_key'
    );
    this.name = 'MissingApiKeyError';
  }
}

/** Best-effort message extraction for unknown thrown values. */
export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
