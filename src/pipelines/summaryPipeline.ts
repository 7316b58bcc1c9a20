import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { config, Config } from '../config';
import { SubtitleAcquirer, TranscriptSource } from '../subtitles';
import { AudioTranscriber, WhisperClient } from '../transcription';
import { ProviderSummarizer, Summarizer } from '../llm';
import { FFmpegProcessor, YtDlpDownloader } from '../video';
import {
  CredentialName,
  CredentialSource,
  MissingCredentialError,
  credentialsFromConfig,
} from './credentials';

/**
 * States a run passes through; each is entered when its step begins
 */
export type PipelineState =
  | 'start'
  | 'subtitles_attempted'
  | 'transcription_attempted'
  | 'summarizing'
  | 'done'
  | 'failed';

export type PipelineFailureReason =
  | 'MissingCredential'
  | 'NoTranscriptAvailable'
  | 'SummarizationFailed';

export type PipelineResult =
  | {
      status: 'done';
      summary: string;
      source: TranscriptSource;
      transcript: string;
    }
  | {
      status: 'failed';
      reason: PipelineFailureReason;
      message: string;
      source: TranscriptSource;
      missingCredential?: CredentialName;
    };

export interface SummaryRequest {
  url: string;
  prompt: string;
  language: string;
  preferAutoSubtitles: boolean;
}

export interface PipelineDependencies {
  acquirer: Pick<SubtitleAcquirer, 'acquire' | 'removeSubtitles'>;
  transcriber: Pick<AudioTranscriber, 'transcribe'>;
  summarizer: Summarizer;
  credentials: CredentialSource;
}

export interface PipelineOptions {
  /** Parent of the per-run working directories */
  workRoot: string;
  maxTranscriptionDurationSeconds: number;
  /** Leave the run directory (and its subtitle files) on disk */
  keepArtifacts: boolean;
}

export type StateObserver = (state: PipelineState) => void;

/**
 * Fallback chain: official subtitles, auto subtitles, audio transcription,
 * then summarization of whichever transcript was obtained.
 */
export class SummaryPipeline {
  constructor(
    private deps: PipelineDependencies,
    private options: PipelineOptions
  ) {}

  /**
   * Runs the fallback chain once
   * @param onStateChange - Receives every state as it is entered
   */
  async run(request: SummaryRequest, onStateChange?: StateObserver): Promise<PipelineResult> {
    const enter = (state: PipelineState): void => {
      console.debug(`[pipeline] -> ${state}`);
      onStateChange?.(state);
    };
    enter('start');

    // Read before any download or child process
    const summarizationKey = this.deps.credentials.summarizationKey();
    if (!summarizationKey) {
      return this.missingCredential('summarization', enter);
    }

    const runDir = this.createRunDir();
    try {
      return await this.runInDirectory(request, summarizationKey, runDir, enter);
    } finally {
      this.releaseRunDir(runDir);
    }
  }

  private async runInDirectory(
    request: SummaryRequest,
    summarizationKey: string,
    runDir: string,
    enter: StateObserver
  ): Promise<PipelineResult> {
    enter('subtitles_attempted');
    const subtitles = await this.deps.acquirer.acquire(
      request.url,
      request.language,
      request.preferAutoSubtitles,
      runDir
    );

    let transcript = subtitles?.text ?? '';
    let source: TranscriptSource = subtitles?.source ?? 'none';

    if (!transcript) {
      console.warn('[pipeline] Failed to retrieve subtitles, falling back to audio transcription');

      const transcriptionKey = this.deps.credentials.transcriptionKey();
      if (!transcriptionKey) {
        return this.missingCredential('transcription', enter);
      }

      enter('transcription_attempted');
      transcript = await this.deps.transcriber.transcribe(
        request.url,
        this.options.maxTranscriptionDurationSeconds,
        transcriptionKey,
        runDir
      );
      source = transcript ? 'transcription' : 'none';
    }

    if (!transcript) {
      console.error('[pipeline] Failed to transcribe the video');
      enter('failed');
      return {
        status: 'failed',
        reason: 'NoTranscriptAvailable',
        message: 'No subtitles or transcription could be obtained for this video',
        source: 'none',
      };
    }

    enter('summarizing');
    try {
      const summary = await this.deps.summarizer.summarize(transcript, request.prompt, summarizationKey);
      enter('done');
      return { status: 'done', summary, source, transcript };
    } catch (error) {
      console.error('[pipeline] Error occurred during summarization:', error);
      enter('failed');
      return {
        status: 'failed',
        reason: 'SummarizationFailed',
        message: error instanceof Error ? error.message : String(error),
        source,
      };
    }
  }

  private missingCredential(credential: CredentialName, enter: StateObserver): PipelineResult {
    const error = new MissingCredentialError(credential);
    console.error(`[pipeline] ${error.message}. Please set it before running the application.`);
    enter('failed');
    return {
      status: 'failed',
      reason: 'MissingCredential',
      message: error.message,
      source: 'none',
      missingCredential: credential,
    };
  }

  private createRunDir(): string {
    const runDir = path.resolve(this.options.workRoot, `run-${uuidv4()}`);
    fs.mkdirSync(runDir, { recursive: true });
    return runDir;
  }

  private releaseRunDir(runDir: string): void {
    if (this.options.keepArtifacts) {
      console.info(`[pipeline] Keeping artifacts in ${runDir}`);
      return;
    }

    this.deps.acquirer.removeSubtitles(runDir);
    try {
      fs.rmSync(runDir, { recursive: true, force: true });
    } catch (error) {
      console.warn(`[pipeline] Failed to remove ${runDir}:`, error);
    }
  }
}

/**
 * Wires the pipeline to yt-dlp, ffmpeg, the transcription endpoint and
 * the configured summary provider
 */
export function createSummaryPipeline(cfg: Config = config): SummaryPipeline {
  const downloader = new YtDlpDownloader({
    binaryPath: cfg.ytDlpPath,
    cookiesPath: cfg.ytDlpCookiesPath,
  });
  const ffmpeg = new FFmpegProcessor({ ffmpegPath: cfg.ffmpegPath, ffprobePath: cfg.ffprobePath });
  const whisper = new WhisperClient({ apiBase: cfg.openaiApiBase, model: cfg.transcriptionModel });

  return new SummaryPipeline(
    {
      acquirer: new SubtitleAcquirer(downloader),
      transcriber: new AudioTranscriber(downloader, ffmpeg, whisper),
      summarizer: new ProviderSummarizer(cfg.summaryProvider, { cfg }),
      credentials: credentialsFromConfig(cfg),
    },
    {
      workRoot: cfg.workDir,
      maxTranscriptionDurationSeconds: cfg.maxTranscriptionDurationSeconds,
      keepArtifacts: cfg.keepArtifacts,
    }
  );
}
