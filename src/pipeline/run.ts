import path from "path";
import type { ArtifactKind, CacheParams, SessionCache } from "./cache";
import { buildTranscript, YtDlpCaptionSource, type CaptionSource } from "./captions";
import { ENV } from "./env";
import {
  exportFileName,
  renderMarkdownExport,
  renderTimestampedTranscript,
  writeExport,
  type ExportFormat,
} from "./export";
import { GeminiTextGenerator, type TextGenerator } from "./generator";
import { toVideoId } from "./ids";
import { closeLogFile, info, setLogFile, startStep } from "./log";
import { YtDlpMetadataSource, type MetadataSource } from "./metadata";
import {
  planChapters,
  summarize,
  summarizeCustom,
  type ChapterPlan,
  type ChapterSourceMode,
} from "./summarize";
import type { CustomSummaryOptions, SummaryStyle, Transcript, VideoMetadata } from "./types";

export interface PipelineDeps {
  captions?: CaptionSource;
  metadata?: MetadataSource;
  generator?: TextGenerator;
}

export interface LoadOptions extends PipelineDeps {
  language?: string;
  preprocess?: boolean;
  /** Mirror logs into artifacts/<videoId>/run-<ms>.log. */
  logFile?: boolean;
  cache?: SessionCache;
  /** Skip cache lookups; fresh results still replace the cached ones. */
  force?: boolean;
}

export interface ExportTarget {
  outDir: string;
  format: ExportFormat;
  date?: Date;
}

export interface LoadedVideo {
  videoId: string;
  metadata: VideoMetadata;
  transcript: Transcript;
}

export type RunStyle = SummaryStyle | "custom";

export const STYLE_LABELS: Record<RunStyle, string> = {
  concise: "Concise",
  detailed: "Detailed",
  chapter: "Chapter-Based",
  notes: "Notes",
  custom: "Custom",
};

function isForced(opts: LoadOptions): boolean {
  return opts.force ?? ENV.force;
}

async function loadMetadata(videoId: string, opts: LoadOptions): Promise<VideoMetadata> {
  const cached = isForced(opts) ? undefined : opts.cache?.metadata.get(videoId, "metadata");
  if (cached) return cached;

  const metadataSource = opts.metadata ?? new YtDlpMetadataSource();
  const step = startStep("metadata", { videoId });
  const metadata = await metadataSource.fetchMetadata(videoId);
  step.end();
  opts.cache?.metadata.set(videoId, "metadata", {}, metadata);
  return metadata;
}

async function loadTranscript(videoId: string, opts: LoadOptions): Promise<Transcript> {
  const language = opts.language ?? ENV.captionLanguage;
  const params: CacheParams = { language, preprocess: opts.preprocess !== false };
  const cached = isForced(opts) ? undefined : opts.cache?.transcripts.get(videoId, "transcript", params);
  if (cached) return cached;

  const captionSource = opts.captions ?? new YtDlpCaptionSource();
  const step = startStep("captions", { videoId, language });
  const fragments = await captionSource.fetchTranscript(videoId, language);
  const transcript = buildTranscript(videoId, language, fragments, {
    preprocess: opts.preprocess,
  });
  step.end({ fragments: fragments.length, chars: transcript.fullText.length });
  opts.cache?.transcripts.set(videoId, "transcript", params, transcript);
  return transcript;
}

async function loadVideo(videoId: string, opts: LoadOptions): Promise<LoadedVideo> {
  const metadata = await loadMetadata(videoId, opts);
  const transcript = await loadTranscript(videoId, opts);
  return { videoId, metadata, transcript };
}

async function withRunLog<T>(videoOrUrl: string, opts: LoadOptions, fn: (videoId: string) => Promise<T>): Promise<T> {
  const videoId = toVideoId(videoOrUrl);
  if (opts.logFile) {
    setLogFile(path.join(ENV.artifactsRoot, videoId, `run-${Date.now()}.log`));
  }
  try {
    return await fn(videoId);
  } finally {
    if (opts.logFile) closeLogFile();
  }
}

export interface RunSummaryOptions extends LoadOptions {
  style: RunStyle;
  custom?: CustomSummaryOptions;
  chapterSource?: ChapterSourceMode;
  export?: ExportTarget;
}

export interface RunSummaryResult extends LoadedVideo {
  style: RunStyle;
  summary: string;
  cached: boolean;
  exportPath?: string;
}

export async function runSummary(
  videoOrUrl: string,
  opts: RunSummaryOptions
): Promise<RunSummaryResult> {
  return withRunLog(videoOrUrl, opts, async (videoId) => {
    const startTs = Date.now();
    info("run.start", { videoId, style: opts.style });
    const generator = opts.generator ?? new GeminiTextGenerator();
    const loaded = await loadVideo(videoId, opts);

    const kind: ArtifactKind = opts.style;
    const params: CacheParams = {
      language: loaded.transcript.language,
      model: generator.modelName,
      preprocess: opts.preprocess !== false,
      chapterSource: opts.style === "chapter" ? opts.chapterSource ?? "auto" : undefined,
      ...(opts.style === "custom" ? opts.custom : {}),
    };

    let summary = isForced(opts) ? undefined : opts.cache?.text.get(videoId, kind, params);
    const cached = summary !== undefined;
    if (summary === undefined) {
      const genStep = startStep("generate", { videoId, style: opts.style });
      summary =
        opts.style === "custom"
          ? await summarizeCustom(loaded.transcript, opts.custom ?? {}, generator)
          : await summarize(opts.style, loaded.transcript, {
              generator,
              metadata: loaded.metadata,
              chapterSource: opts.chapterSource,
            });
      genStep.end({ chars: summary.length });
      opts.cache?.text.set(videoId, kind, params, summary);
    }

    let exportPath: string | undefined;
    if (opts.export) {
      const date = opts.export.date ?? new Date();
      const exportKind = opts.style === "notes" ? "Notes" : "Summary";
      const content =
        opts.export.format === "md"
          ? renderMarkdownExport(summary, loaded.metadata, STYLE_LABELS[opts.style], date)
          : summary;
      exportPath = await writeExport(
        opts.export.outDir,
        exportFileName(loaded.metadata.title, exportKind, date, opts.export.format),
        content
      );
    }

    info("run.complete", { videoId, style: opts.style, cached, durationMs: Date.now() - startTs, exportPath });
    return { ...loaded, style: opts.style, summary, cached, exportPath };
  });
}

export interface RunTranscriptOptions extends LoadOptions {
  timestamps?: boolean;
  export?: ExportTarget;
}

export interface RunTranscriptResult extends LoadedVideo {
  text: string;
  exportPath?: string;
}

export async function runTranscript(
  videoOrUrl: string,
  opts: RunTranscriptOptions = {}
): Promise<RunTranscriptResult> {
  return withRunLog(videoOrUrl, opts, async (videoId) => {
    const loaded = await loadVideo(videoId, opts);
    const text = opts.timestamps
      ? renderTimestampedTranscript(loaded.transcript.fragments)
      : loaded.transcript.fullText;

    let exportPath: string | undefined;
    if (opts.export) {
      const date = opts.export.date ?? new Date();
      exportPath = await writeExport(
        opts.export.outDir,
        exportFileName(loaded.metadata.title, "Transcript", date, opts.export.format),
        text
      );
    }
    return { ...loaded, text, exportPath };
  });
}

export interface RunChaptersOptions extends LoadOptions {
  chapterSource?: ChapterSourceMode;
}

export interface RunChaptersResult extends LoadedVideo {
  plan: ChapterPlan | null;
}

export async function runChapters(
  videoOrUrl: string,
  opts: RunChaptersOptions = {}
): Promise<RunChaptersResult> {
  return withRunLog(videoOrUrl, opts, async (videoId) => {
    const loaded = await loadVideo(videoId, opts);
    const plan = await planChapters(loaded.transcript, {
      generator: opts.generator ?? new GeminiTextGenerator(),
      metadata: loaded.metadata,
      chapterSource: opts.chapterSource,
    });
    return { ...loaded, plan };
  });
}
