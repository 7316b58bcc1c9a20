/**
 * Speech-to-text capability
 */
export interface TranscriptionApi {
  /**
   * Transcribes a local audio file
   * @param audioPath - Audio file (16-bit PCM WAV after conversion)
   * @param apiKey - Transcription credential
   * @returns Recognized text
   */
  transcribe(audioPath: string, apiKey: string): Promise<string>;
}

/**
 * Raised before download when a video exceeds the transcription bound
 */
export class VideoTooLongError extends Error {
  readonly durationSeconds: number;
  readonly maxDurationSeconds: number;

  constructor(durationSeconds: number, maxDurationSeconds: number) {
    super(`Video is ${durationSeconds}s long, longer than the allowed ${maxDurationSeconds}s`);
    this.name = 'VideoTooLongError';
    this.durationSeconds = durationSeconds;
    this.maxDurationSeconds = maxDurationSeconds;
  }
}
