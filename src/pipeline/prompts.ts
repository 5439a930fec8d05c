import type { CustomSummaryOptions } from './types';

export const CONCISE_PROMPT = `You are a YouTube video summarizer expert. Provide a concise summary of the video transcript below in 3-5 bullet points. Focus on the main ideas and key takeaways only. Keep the total summary within 250 words. Make it easy to understand and skim.

Transcript:
`;

export const DETAILED_PROMPT = `You are a YouTube video summarizer expert. Provide a detailed summary of the video transcript below in well-structured paragraphs. Include the main ideas, key points, and important examples. Keep the total summary within 500 words. Make it comprehensive yet easy to understand.

Transcript:
`;

/** Single-call chapter summary, used when chapter boundaries are not usable. */
export const CHAPTER_PROMPT = `You are a YouTube video summarizer expert. Create a chapter-based summary of the video transcript below. Identify major topics and create logical chapters with headings. Under each chapter, provide a brief summary of the content. Include timestamps where possible. Keep the total summary within 500 words.

Transcript:
`;

export const NOTES_PROMPT = `You are a professional note-taker. Transform the following video transcript into structured, actionable study notes. Include:
1. INTRODUCTION: Brief overview of the video's topic
2. KEY POINTS: Main concepts and ideas
3. ACTION ITEMS: Specific tasks or applications mentioned
4. QUOTES: Important quotes or statements
5. RESOURCES: Any tools, websites, or references mentioned

Use bullet points and keep the notes organized, concise, and easy to reference. Include timestamps where appropriate. Make these notes perfect for study or reference purposes.

Transcript:
`;

export function chapterDetectionPrompt(transcriptText: string): string {
  return `Analyze this YouTube video transcript and create logical chapters with timestamps.
Identify 5-8 main topics or sections in the video and provide a brief title for each.
Format your response as JSON with timestamps and titles. Example:
[
  {"timestamp": "00:00", "title": "Introduction"},
  {"timestamp": "05:30", "title": "Main Topic 1"},
  {"timestamp": "12:45", "title": "Main Topic 2"}
]

Transcript:
${transcriptText}
`;
}

export function chapterSectionPrompt(title: string, chapterText: string): string {
  return `You are a YouTube video summarizer expert. Provide a concise summary of this chapter section in 2-3 sentences. Focus on the main points only.

Chapter: ${title}
Transcript:
${chapterText}
`;
}

export function customSummaryPrompt(transcriptText: string, options: CustomSummaryOptions): string {
  return `You are a YouTube video summarizer expert. Create a summary of the video transcript below based on the following requirements:

Format: ${options.format ?? 'Bullets'}
Length: ${options.length ?? 'Medium'}
Focus: ${options.focus ?? 'General'}
Style: ${options.tone ?? 'Neutral'}

Transcript:
${transcriptText}
`;
}
