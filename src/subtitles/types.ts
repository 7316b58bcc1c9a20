/**
 * Where a transcript came from
 */
export type TranscriptSource = 'official_subtitle' | 'auto_subtitle' | 'transcription' | 'none';

/**
 * A subtitle file located on disk
 */
export interface SubtitleFile {
  path: string;
  /** Size in bytes; a size of 0 means the file is treated as absent */
  sizeBytes: number;
}

/**
 * Normalized caption text, one entry per retained line
 */
export interface CleanedTranscript {
  readonly lines: readonly string[];
}

/**
 * Result of a successful subtitle acquisition
 */
export interface AcquiredTranscript {
  source: Extract<TranscriptSource, 'official_subtitle' | 'auto_subtitle'>;
  /** Retained lines joined with newlines */
  text: string;
  file: SubtitleFile;
}
