import path from 'path';
import { config } from '../config';
import { CommandRunner, requireSuccess, runCommand } from './processRunner';
import { AudioExtractor } from './types';

/** Codec the transcription endpoint receives without conversion */
export const PCM_CODEC = 'pcm_s16le';

export interface FFmpegOptions {
  ffmpegPath?: string;
  ffprobePath?: string;
  runner?: CommandRunner;
}

/**
 * Replaces the extension of a media path
 */
function withExtension(filePath: string, extension: string): string {
  const parsed = path.parse(filePath);
  return path.join(parsed.dir, `${parsed.name}${extension}`);
}

/**
 * Where extractAudio writes the audio track of a video; an .m4a input
 * (audio-only download) gets a distinct name since ffmpeg cannot write over its input
 */
export function audioOutputPath(videoPath: string): string {
  return withExtension(videoPath, path.extname(videoPath) === '.m4a' ? '.audio.m4a' : '.m4a');
}

/**
 * Where convertToPcm writes the WAV copy, never the input itself
 */
export function pcmOutputPath(audioPath: string): string {
  return withExtension(audioPath, path.extname(audioPath) === '.wav' ? '.pcm.wav' : '.wav');
}

/**
 * FFmpeg wrapper for audio extraction and conversion
 */
export class FFmpegProcessor implements AudioExtractor {
  private ffmpegPath: string;
  private ffprobePath: string;
  private runner: CommandRunner;

  constructor(options: FFmpegOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? config.ffmpegPath;
    this.ffprobePath = options.ffprobePath ?? config.ffprobePath;
    this.runner = options.runner ?? runCommand;
  }

  /**
   * Checks if FFmpeg is available in the system
   */
  async isAvailable(): Promise<boolean> {
    const result = await this.runner(this.ffmpegPath, ['-version']);
    return result.exitCode === 0;
  }

  /**
   * Gets the FFmpeg version string
   * @returns Version string or null if not available
   */
  async getVersion(): Promise<string | null> {
    const result = await this.runner(this.ffmpegPath, ['-version']);
    if (result.exitCode !== 0) return null;
    const match = result.stdout.match(/ffmpeg version ([^\s]+)/);
    return match?.[1] ?? null;
  }

  /**
   * Extracts the audio track of a video into a sibling .m4a file
   * @param videoPath - Input video path
   * @returns Path of the extracted audio
   */
  async extractAudio(videoPath: string): Promise<string> {
    const audioPath = audioOutputPath(videoPath);
    const args = ['-y', '-i', videoPath, '-vn', '-q:a', '0', '-map', 'a', audioPath];

    requireSuccess(await this.runner(this.ffmpegPath, args));
    return audioPath;
  }

  /**
   * Reads the codec name of the first audio stream
   * @param audioPath - Path to an audio file
   */
  async probeCodec(audioPath: string): Promise<string> {
    const args = [
      '-v',
      'error',
      '-select_streams',
      'a:0',
      '-show_entries',
      'stream=codec_name',
      '-of',
      'default=noprint_wrappers=1:nokey=1',
      audioPath,
    ];

    const output = requireSuccess(await this.runner(this.ffprobePath, args));
    const codec = output.trim();

    if (!codec) {
      throw new Error(`Could not determine audio codec for ${audioPath}`);
    }

    return codec;
  }

  /**
   * Converts an audio file to 16-bit PCM WAV
   * @param audioPath - Input audio path
   * @returns Path of the sibling .wav file
   */
  async convertToPcm(audioPath: string): Promise<string> {
    const wavPath = pcmOutputPath(audioPath);
    const args = ['-y', '-i', audioPath, '-acodec', PCM_CODEC, wavPath];

    requireSuccess(await this.runner(this.ffmpegPath, args));
    return wavPath;
  }
}
