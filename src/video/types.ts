/**
 * Subtitle download request
 */
export interface SubtitleRequest {
  url: string;
  language: string;
  /** true for auto-generated captions, false for publisher-provided ones */
  auto: boolean;
  /** Output template in yt-dlp syntax, e.g. "/tmp/run/subs-official.%(ext)s" */
  outputTemplate: string;
}

/**
 * Metadata resolved without downloading the media
 */
export interface VideoMetadata {
  /** Provider-assigned identifier */
  id: string;
  durationSeconds: number;
  title?: string;
}

/**
 * Fetches subtitles, metadata and media for a video URL
 */
export interface Downloader {
  /** Writes zero or more subtitle files matching the output template */
  fetchSubtitles(request: SubtitleRequest): Promise<void>;
  probeMetadata(url: string): Promise<VideoMetadata>;
  /** Downloads the video and returns the local file path */
  downloadVideo(url: string, outputTemplate: string): Promise<string>;
}

/**
 * Audio track operations on local media files
 */
export interface AudioExtractor {
  /** Writes the audio track next to the video and returns its path */
  extractAudio(videoPath: string): Promise<string>;
  /** Codec name of the first audio stream, e.g. "aac" or "pcm_s16le" */
  probeCodec(audioPath: string): Promise<string>;
  /** Writes a 16-bit PCM WAV copy next to the input and returns its path */
  convertToPcm(audioPath: string): Promise<string>;
}
