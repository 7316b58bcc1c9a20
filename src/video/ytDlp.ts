import { config } from '../config';
import { CommandRunner, requireSuccess, runCommand } from './processRunner';
import { Downloader, SubtitleRequest, VideoMetadata } from './types';

export interface YtDlpOptions {
  binaryPath?: string;
  /** Netscape-format cookies file passed with --cookies */
  cookiesPath?: string;
  runner?: CommandRunner;
}

/**
 * yt-dlp wrapper implementing the Downloader capability
 */
export class YtDlpDownloader implements Downloader {
  private binaryPath: string;
  private cookiesPath: string;
  private runner: CommandRunner;

  constructor(options: YtDlpOptions = {}) {
    this.binaryPath = options.binaryPath ?? config.ytDlpPath;
    this.cookiesPath = options.cookiesPath ?? config.ytDlpCookiesPath;
    this.runner = options.runner ?? runCommand;
  }

  /**
   * Checks if yt-dlp can be started
   */
  async isAvailable(): Promise<boolean> {
    const result = await this.runner(this.binaryPath, ['--version']);
    return result.exitCode === 0;
  }

  async fetchSubtitles(request: SubtitleRequest): Promise<void> {
    const args = [
      '--no-playlist',
      '--skip-download',
      request.auto ? '--write-auto-subs' : '--write-subs',
      '--sub-format',
      'vtt',
      '--output',
      request.outputTemplate,
    ];
    if (request.language) {
      args.push('--sub-langs', request.language);
    }

    requireSuccess(await this.run(args, request.url));
  }

  async probeMetadata(url: string): Promise<VideoMetadata> {
    const stdout = requireSuccess(
      await this.run(['--no-playlist', '--dump-single-json', '--no-warnings'], url)
    );
    return parseMetadata(stdout);
  }

  async downloadVideo(url: string, outputTemplate: string): Promise<string> {
    const stdout = requireSuccess(
      await this.run(
        [
          '--no-playlist',
          '--quiet',
          '--no-simulate',
          '--print',
          'after_move:filepath',
          '--output',
          outputTemplate,
        ],
        url
      )
    );

    const filePath = stdout
      .split('\n')
      .map((line) => line.trim())
      .filter(Boolean)
      .pop();

    if (!filePath) {
      throw new Error(`yt-dlp did not report a downloaded file for ${url}`);
    }
    return filePath;
  }

  private run(args: string[], url: string) {
    const fullArgs = [...args];
    if (this.cookiesPath) {
      fullArgs.push('--cookies', this.cookiesPath);
    }
    fullArgs.push(url);
    return this.runner(this.binaryPath, fullArgs);
  }
}

/**
 * Parses the JSON written by `yt-dlp --dump-single-json`
 */
export function parseMetadata(stdout: string): VideoMetadata {
  let parsed: unknown;
  try {
    parsed = JSON.parse(stdout);
  } catch (error) {
    throw new Error(
      `Failed to parse yt-dlp metadata: ${error instanceof Error ? error.message : 'Unknown error'}`
    );
  }

  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error('yt-dlp metadata is not an object');
  }

  const id = 'id' in parsed ? parsed.id : undefined;
  const duration = 'duration' in parsed ? parsed.duration : undefined;
  const title = 'title' in parsed ? parsed.title : undefined;

  if (typeof id !== 'string' || !id) {
    throw new Error('yt-dlp metadata has no id');
  }

  return {
    id,
    durationSeconds: typeof duration === 'number' && Number.isFinite(duration) ? duration : 0,
    title: typeof title === 'string' ? title : undefined,
  };
}
