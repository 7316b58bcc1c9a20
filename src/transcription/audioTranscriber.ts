import fs from 'fs';
import path from 'path';
import type { AudioExtractor, Downloader } from '../video/types';
import { PCM_CODEC, audioOutputPath, pcmOutputPath } from '../video/ffmpeg';
import { TranscriptionApi, VideoTooLongError } from './types';

/**
 * File name stem for a downloaded video, from the source host and provider id,
 * e.g. "www.youtube.com-dQw4w9WgXcQ"
 */
export function buildVideoStem(url: string, videoId: string): string {
  // yt-dlp also accepts bare ids, which have no host
  const host = (URL.canParse(url) ? new URL(url).hostname : '') || 'video';
  const safeId = videoId.replace(/[^A-Za-z0-9_-]/g, '_');
  return `${host}-${safeId}`;
}

/**
 * Builds the video output template, e.g. "<workDir>/www.youtube.com-dQw4w9WgXcQ.%(ext)s"
 */
export function buildVideoTemplate(workDir: string, stem: string): string {
  return path.join(workDir, `${stem}.%(ext)s`);
}

/**
 * Transcribes a video's audio when no subtitles are available:
 * probe, download, extract audio, convert to PCM, transcribe.
 */
export class AudioTranscriber {
  constructor(
    private downloader: Downloader,
    private extractor: AudioExtractor,
    private api: TranscriptionApi
  ) {}

  /**
   * @param url - Video URL
   * @param maxDurationSeconds - Longer videos are rejected before download
   * @param apiKey - Transcription credential
   * @param workDir - Directory for the temporary media files
   * @returns Transcribed text, or "" on any failure
   */
  async transcribe(
    url: string,
    maxDurationSeconds: number,
    apiKey: string,
    workDir: string
  ): Promise<string> {
    const artifacts: string[] = [];
    let stem: string | null = null;

    try {
      const metadata = await this.downloader.probeMetadata(url);
      if (metadata.durationSeconds > maxDurationSeconds) {
        throw new VideoTooLongError(metadata.durationSeconds, maxDurationSeconds);
      }

      stem = buildVideoStem(url, metadata.id);
      const videoPath = await this.downloader.downloadVideo(url, buildVideoTemplate(workDir, stem));
      artifacts.push(videoPath);
      console.info(`[transcription] Downloaded video: ${videoPath}`);

      let audioPath = await this.track(artifacts, audioOutputPath(videoPath), () =>
        this.extractor.extractAudio(videoPath)
      );
      console.info(`[transcription] Extracted audio: ${audioPath}`);

      const codec = await this.extractor.probeCodec(audioPath);
      if (codec !== PCM_CODEC) {
        const source = audioPath;
        audioPath = await this.track(artifacts, pcmOutputPath(source), () =>
          this.extractor.convertToPcm(source)
        );
        console.info(`[transcription] Audio converted from ${codec} to WAV: ${audioPath}`);
      }

      const text = (await this.api.transcribe(audioPath, apiKey)).trim();
      console.info(`[transcription] Transcribed ${text.length} characters`);
      return text;
    } catch (error) {
      console.error('[transcription] Error during transcription:', error);
      return '';
    } finally {
      if (stem) {
        // Partial downloads (.part, .fNNN fragments) share the stem
        artifacts.push(...filesWithStem(workDir, stem));
      }
      this.cleanup(artifacts);
    }
  }

  /**
   * Runs a step that writes a file, tracking both the expected path (so a
   * partial output is removed when the step fails) and the returned one.
   */
  private async track(
    artifacts: string[],
    expectedPath: string,
    step: () => Promise<string>
  ): Promise<string> {
    artifacts.push(expectedPath);
    const outputPath = await step();
    if (outputPath !== expectedPath) {
      artifacts.push(outputPath);
    }
    return outputPath;
  }

  private cleanup(artifacts: string[]): void {
    for (const file of new Set(artifacts)) {
      try {
        if (fs.existsSync(file)) {
          fs.unlinkSync(file);
          console.debug(`[transcription] Removed ${file}`);
        }
      } catch (error) {
        console.warn(`[transcription] Failed to remove '${file}':`, error);
      }
    }
  }
}

function filesWithStem(dir: string, stem: string): string[] {
  if (!fs.existsSync(dir)) {
    return [];
  }
  return fs
    .readdirSync(dir)
    .filter((name) => name.startsWith(`${stem}.`))
    .map((name) => path.join(dir, name));
}
