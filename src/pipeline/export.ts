import fs from "fs-extra";
import path from "path";
import { encodeTimestamp } from "./timecode";
import type { TranscriptFragment, VideoMetadata } from "./types";

export type ExportKind = "Summary" | "Notes" | "Transcript";
export type ExportFormat = "txt" | "md";

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local-date `YYYYMMDD`. */
export function compactDate(date: Date): string {
  return `${date.getFullYear()}${pad2(date.getMonth() + 1)}${pad2(date.getDate())}`;
}

/** Local-date `YYYY-MM-DD`. */
export function isoDate(date: Date): string {
  return `${date.getFullYear()}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
}

export function exportFileName(
  title: string,
  kind: ExportKind,
  date: Date,
  format: ExportFormat = "txt"
): string {
  const safeTitle = title.replace(/[\\/:*?"<>|\u0000-\u001f]/g, "_").trim() || "video";
  return `${safeTitle}_${kind}_${compactDate(date)}.${format}`;
}

export function renderMarkdownExport(
  content: string,
  metadata: VideoMetadata,
  heading: string,
  date: Date
): string {
  return `# ${metadata.title}

## Video Information
- **Channel:** ${metadata.channel}
- **Duration:** ${metadata.duration}
- **Views:** ${metadata.views}
- **URL:** https://www.youtube.com/watch?v=${metadata.videoId}

## ${heading} Summary
${content}

---
Generated on ${isoDate(date)} using video-digest
`;
}

export function renderTimestampedTranscript(fragments: TranscriptFragment[]): string {
  return fragments.map((f) => `[${encodeTimestamp(f.startSec)}] ${f.text}`).join("\n");
}

export async function writeExport(
  outDir: string,
  fileName: string,
  content: string
): Promise<string> {
  await fs.ensureDir(outDir);
  const outPath = path.resolve(outDir, fileName);
  await fs.writeFile(outPath, content.endsWith("\n") ? content : content + "\n");
  return outPath;
}
