import path from 'path';
import type { Downloader } from '../video/types';
import { findSubtitleFile, removeSubtitleFiles } from './subtitleLocator';
import { readSubtitleFile, transcriptToText } from './subtitleNormalizer';
import { AcquiredTranscript, SubtitleFile } from './types';

/** Output stems, one per attempt, so each attempt's file is predictable */
export const SUBTITLE_STEMS = {
  official_subtitle: 'subs-official',
  auto_subtitle: 'subs-auto',
} as const;

type SubtitleSource = AcquiredTranscript['source'];

/**
 * Downloads subtitles for a video, falling back from official to
 * auto-generated captions, and normalizes the first usable file.
 */
export class SubtitleAcquirer {
  constructor(private downloader: Downloader) {}

  /**
   * @param url - Video URL
   * @param language - Subtitle language code
   * @param preferAuto - Skip official subtitles and request auto-generated ones directly
   * @param workDir - Directory the subtitle files are written to
   * @returns Normalized transcript, or null when no attempt produced text
   */
  async acquire(
    url: string,
    language: string,
    preferAuto: boolean,
    workDir: string
  ): Promise<AcquiredTranscript | null> {
    try {
      const attempts: SubtitleSource[] = preferAuto
        ? ['auto_subtitle']
        : ['official_subtitle', 'auto_subtitle'];

      for (const source of attempts) {
        const file = await this.attempt(url, language, source, workDir);
        if (!file) {
          if (source === 'official_subtitle') {
            console.info('[subtitles] Official subtitles not found or empty, trying auto-generated');
          }
          continue;
        }

        const text = transcriptToText(readSubtitleFile(file));
        if (!text) {
          console.info(`[subtitles] Parsed subtitles are empty: ${file.path}`);
          return null;
        }

        console.info(`[subtitles] Using ${source} from ${path.basename(file.path)}`);
        return { source, text, file };
      }

      console.info('[subtitles] Could not locate a valid downloaded subtitle file');
      return null;
    } catch (error) {
      console.error('[subtitles] Subtitle acquisition failed:', error);
      return null;
    }
  }

  /**
   * Deletes the subtitle files written by earlier acquisitions
   * @returns Number of files removed
   */
  removeSubtitles(workDir: string): number {
    const removed =
      removeSubtitleFiles(workDir, SUBTITLE_STEMS.official_subtitle) +
      removeSubtitleFiles(workDir, SUBTITLE_STEMS.auto_subtitle);

    if (removed > 0) {
      console.info(`[subtitles] Removed ${removed} subtitle file(s)`);
    }
    return removed;
  }

  /**
   * Runs one download and locates its output
   * @returns A non-empty file, or null
   */
  private async attempt(
    url: string,
    language: string,
    source: SubtitleSource,
    workDir: string
  ): Promise<SubtitleFile | null> {
    const stem = SUBTITLE_STEMS[source];
    const auto = source === 'auto_subtitle';

    try {
      console.debug(`[subtitles] Starting subtitle download (auto=${auto}), lang='${language}'`);
      await this.downloader.fetchSubtitles({
        url,
        language,
        auto,
        outputTemplate: path.join(workDir, `${stem}.%(ext)s`),
      });
    } catch (error) {
      console.warn(
        `[subtitles] Error downloading subtitles (auto=${auto}): ${error instanceof Error ? error.message : String(error)}`
      );
      return null;
    }

    const file = findSubtitleFile(workDir, stem);
    if (file && file.sizeBytes === 0) {
      console.debug(`[subtitles] Subtitle file '${file.path}' is empty (size=0), ignoring`);
      return null;
    }
    return file;
  }
}
