import { VideoUnavailableError, errorMessage } from './errors';
import { watchUrl } from './ids';
import { info } from './log';
import type { VideoMetadata } from './types';
import { runYtDlp, YtDlpNotFoundError } from './ytdlp';

export interface MetadataSource {
    fetchMetadata(videoId: string): Promise<VideoMetadata>;
}

/** "1h 2m 3s", dropping zero parts; "0s" for zero. */
export function formatDuration(totalSec: number): string {
    const total = Math.max(0, Math.floor(totalSec));
    const h = Math.floor(total / 3600);
    const m = Math.floor((total % 3600) / 60);
    const s = total % 60;
    const parts: string[] = [];
    if (h) parts.push(`${h}h`);
    if (m) parts.push(`${m}m`);
    if (s || parts.length === 0) parts.push(`${s}s`);
    return parts.join(' ');
}

function str(obj: Record<string, unknown>, key: string): string | undefined {
    const v = obj[key];
    return typeof v === 'string' && v ? v : undefined;
}

function num(obj: Record<string, unknown>, key: string): number | undefined {
    const v = obj[key];
    return typeof v === 'number' && Number.isFinite(v) ? v : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Map yt-dlp `-J` output onto {@link VideoMetadata}, "Unknown" where fields are missing. */
export function parseVideoMetadata(videoId: string, raw: unknown): VideoMetadata {
    const parsed = isRecord(raw) ? raw : {};
    const durationSec = num(parsed, 'duration');
    const viewCount = num(parsed, 'view_count');
    return {
        videoId,
        url: str(parsed, 'webpage_url') ?? watchUrl(videoId),
        title: str(parsed, 'title') ?? 'Unknown',
        channel: str(parsed, 'channel') ?? str(parsed, 'uploader') ?? 'Unknown',
        description: str(parsed, 'description') ?? '',
        durationSec,
        duration: durationSec !== undefined ? formatDuration(durationSec) : 'Unknown',
        views: viewCount !== undefined ? viewCount.toLocaleString('en-US') : 'Unknown',
        thumbnail: str(parsed, 'thumbnail') ?? `https://img.youtube.com/vi/${videoId}/0.jpg`,
    };
}

export class YtDlpMetadataSource implements MetadataSource {
    async fetchMetadata(videoId: string): Promise<VideoMetadata> {
        let parsed: unknown;
        try {
            const res = await runYtDlp(['-J', '--skip-download', watchUrl(videoId)]);
            parsed = JSON.parse(res.stdout);
        } catch (e) {
            if (e instanceof YtDlpNotFoundError) throw e;
            throw new VideoUnavailableError(videoId, errorMessage(e), e);
        }
        const meta = parseVideoMetadata(videoId, parsed);
        info('metadata.fetched', { videoId, title: meta.title, durationSec: meta.durationSec });
        return meta;
    }
}
