import { InvalidVideoUrlError } from './errors';

// 11-char base64-ish ID (letters, digits, hyphens, underscores)
const ID = /^[\w-]{11}$/;

/**
 * Extract a YouTube video ID from a bare ID or the common URL formats:
 * watch?v=, youtu.be/, /embed/, /shorts/ (www. and m. hosts included).
 * Returns `null` when nothing matches.
 */
export function parseVideoId(videoOrUrl: string): string | null {
  const input = videoOrUrl.trim();
  if (ID.test(input)) return input;

  let u: URL;
  try {
    u = new URL(input);
  } catch {
    return null;
  }
  const host = u.hostname.replace(/^(www|m)\./, '');

  if (host === 'youtu.be') {
    const id = u.pathname.slice(1).split('/')[0];
    return ID.test(id) ? id : null;
  }
  if (host === 'youtube.com') {
    const v = u.searchParams.get('v');
    if (v && ID.test(v)) return v;
    const match = u.pathname.match(/^\/(?:embed|shorts)\/([\w-]{11})(?:\/|$)/);
    if (match) return match[1];
  }
  return null;
}

export function toVideoId(videoOrUrl: string): string {
  const id = parseVideoId(videoOrUrl);
  if (!id) throw new InvalidVideoUrlError(videoOrUrl);
  return id;
}

export function watchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}
