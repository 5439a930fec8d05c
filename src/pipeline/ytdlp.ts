import { execa } from 'execa';
import { ENV, ytdlpCommonArgs } from './env';
import { debug } from './log';

export interface YtDlpResult {
    stdout: string;
    stderr: string;
}

/** Raised when every yt-dlp candidate command failed; keeps their stderr for classification. */
export class YtDlpError extends Error {
    stderr: string;

    constructor(message: string, stderr: string) {
        super(message);
        this.name = 'YtDlpError';
        this.stderr = stderr;
    }
}

/** No candidate command could be started. */
export class YtDlpNotFoundError extends YtDlpError {
    constructor(message: string, stderr: string) {
        super(message, stderr);
        this.name = 'YtDlpNotFoundError';
    }
}

function describeFailure(e: unknown): string {
    if (typeof e === 'object' && e !== null) {
        if ('stderr' in e && typeof e.stderr === 'string' && e.stderr) return e.stderr;
        if ('shortMessage' in e && typeof e.shortMessage === 'string') return e.shortMessage;
    }
    return e instanceof Error ? e.message : String(e);
}

/**
 * Run yt-dlp with `args`, trying the configured binary, plain `yt-dlp`, then
 * `python3 -m yt_dlp`. Missing binaries fall through to the next candidate;
 * the first candidate that runs decides the outcome.
 */
export async function runYtDlp(args: string[]): Promise<YtDlpResult> {
    const fullArgs = [...ytdlpCommonArgs(), ...args];
    const attempts: Array<[string, string[]]> = [];
    attempts.push([ENV.ytdlpBin, fullArgs]);
    if (ENV.ytdlpBin !== 'yt-dlp') attempts.push(['yt-dlp', fullArgs]);
    attempts.push(['python3', ['-m', 'yt_dlp', ...fullArgs]]);

    const errors: string[] = [];
    for (const [cmd, a] of attempts) {
        try {
            const res = await execa(cmd, a, { stdio: 'pipe' });
            debug('ytdlp.ok', { cmd });
            return { stdout: res.stdout, stderr: res.stderr };
        } catch (e) {
            const msg = describeFailure(e);
            errors.push(`[${cmd}] ${msg}`);
            const notFound = typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT';
            if (!notFound) {
                throw new YtDlpError(`yt-dlp failed: ${msg}`, msg);
            }
            debug('ytdlp.missing', { cmd });
        }
    }
    throw new YtDlpNotFoundError(`No yt-dlp executable found. Errors:\n${errors.join('\n---\n')}`, errors.join('\n'));
}
