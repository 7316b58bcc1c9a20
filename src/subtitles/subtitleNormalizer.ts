import fs from 'fs';
import { CleanedTranscript, SubtitleFile } from './types';

const HEADER_PREFIXES = ['WEBVTT', 'Kind:', 'Language:'];

// Only HH:MM:SS.fff ranges; SRT-style commas are left as caption text
const TIMESTAMP_RANGE_PATTERN = /^\d{2}:\d{2}:\d{2}\.\d+\s*-->\s*\d{2}:\d{2}:\d{2}\.\d+/;

const MARKUP_TAG_PATTERN = /<[^>]*>/g;

function isHeaderLine(line: string): boolean {
  return HEADER_PREFIXES.some((prefix) => line.startsWith(prefix));
}

/**
 * Turns raw subtitle content (WebVTT as written by yt-dlp) into caption lines
 * @param content - Raw subtitle file content
 * @returns Retained caption lines, without consecutive duplicates
 */
export function normalizeSubtitleText(content: string): CleanedTranscript {
  const lines: string[] = [];
  let previous: string | undefined;

  for (const rawLine of content.split(/\r\n|\r|\n/)) {
    const trimmed = rawLine.trim();
    if (!trimmed) continue;
    if (isHeaderLine(trimmed)) continue;
    if (TIMESTAMP_RANGE_PATTERN.test(trimmed)) continue;

    const text = trimmed.replace(MARKUP_TAG_PATTERN, '').trim();
    if (!text) continue;

    // Rolling auto-captions repeat the same line across adjacent cues
    if (text === previous) continue;

    lines.push(text);
    previous = text;
  }

  return { lines: Object.freeze(lines) };
}

/**
 * Joins a cleaned transcript into the flow text used for summarization
 */
export function transcriptToText(transcript: CleanedTranscript): string {
  return transcript.lines.join('\n');
}

/**
 * Reads and normalizes a located subtitle file
 * @throws Error naming the file when it cannot be read
 */
export function readSubtitleFile(file: SubtitleFile): CleanedTranscript {
  let content: string;
  try {
    content = fs.readFileSync(file.path, 'utf-8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Error reading subtitle file '${file.path}': ${reason}`);
  }
  return normalizeSubtitleText(content);
}
