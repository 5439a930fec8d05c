import * as dotenv from 'dotenv';
dotenv.config();

export const ENV = {
    // Gemini credentials; GEMINI_API_KEY is accepted as a fallback name
    googleApiKey: process.env.GOOGLE_API_KEY || process.env.GEMINI_API_KEY || '',
    geminiModel: process.env.GEMINI_MODEL || 'gemini-1.5-pro',
    artifactsRoot: process.env.ARTIFACTS_ROOT || 'artifacts',
    captionLanguage: process.env.CAPTION_LANGUAGE || 'en',
    force: (process.env.FORCE || 'false') === 'true',
    // Optional: override yt-dlp binary name/path
    ytdlpBin: process.env.YTDLP_BIN || 'yt-dlp',
    ytdlpCookiesFile: process.env.YTDLP_COOKIES_FILE || '',
    ytdlpUserAgent: process.env.YTDLP_USER_AGENT || '',
    // Optional: extra yt-dlp args (space-separated), e.g. "--extractor-args youtube:player_client=web"
    ytdlpExtraArgs: process.env.YTDLP_EXTRA_ARGS || '',
    logLevel: process.env.LOG_LEVEL || 'info',
};

/** Args shared by every yt-dlp invocation (cookies, UA, extras). */
export function ytdlpCommonArgs(): string[] {
    const extra: string[] = [];
    if (ENV.ytdlpCookiesFile) {
        extra.push('--cookies', ENV.ytdlpCookiesFile);
    }
    if (ENV.ytdlpUserAgent) {
        extra.push('--user-agent', ENV.ytdlpUserAgent);
    }
    if (ENV.ytdlpExtraArgs) {
        extra.push(
            ...ENV.ytdlpExtraArgs
                .split(' ')
                .map((s) => s.trim())
                .filter(Boolean)
        );
    }
    return extra;
}
