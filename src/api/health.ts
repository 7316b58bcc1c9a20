import { Router, Request, Response } from 'express';
import { FFmpegProcessor, YtDlpDownloader } from '../video';
import { credentialsFromConfig } from '../pipelines/credentials';
import { config, Config } from '../config';
import { asyncHandler } from './jobs';

export interface HealthRouterDeps {
  cfg?: Config;
  ffmpeg?: Pick<FFmpegProcessor, 'isAvailable' | 'getVersion'>;
  ytDlp?: Pick<YtDlpDownloader, 'isAvailable'>;
}

export function createHealthRouter(deps: HealthRouterDeps = {}): Router {
  const router = Router();
  const cfg = deps.cfg ?? config;
  const ffmpeg = deps.ffmpeg ?? new FFmpegProcessor({ ffmpegPath: cfg.ffmpegPath, ffprobePath: cfg.ffprobePath });
  const ytDlp = deps.ytDlp ?? new YtDlpDownloader({ binaryPath: cfg.ytDlpPath });

  /**
   * GET /api/health
   * Checks external tools and which credentials are configured (no API calls)
   */
  router.get(
    '/',
    asyncHandler(async (_req: Request, res: Response) => {
      const ffmpegAvailable = await ffmpeg.isAvailable();
      const ffmpegVersion = ffmpegAvailable ? await ffmpeg.getVersion() : null;
      const ytDlpAvailable = await ytDlp.isAvailable();

      const credentials = credentialsFromConfig(cfg);
      const summarizationConfigured = credentials.summarizationKey() !== undefined;
      const transcriptionConfigured = credentials.transcriptionKey() !== undefined;

      // Transcription is only a fallback, so it does not affect the status
      const allServicesOk = ffmpegAvailable && ytDlpAvailable && summarizationConfigured;

      res.json({
        status: allServicesOk ? 'healthy' : 'degraded',
        services: {
          ffmpeg: {
            available: ffmpegAvailable,
            version: ffmpegVersion,
          },
          ytDlp: {
            available: ytDlpAvailable,
          },
          summarization: {
            provider: cfg.summaryProvider,
            configured: summarizationConfigured,
          },
          transcription: {
            model: cfg.transcriptionModel,
            configured: transcriptionConfigured,
          },
        },
        config: {
          subtitleLanguage: cfg.subtitleLanguage,
          preferAutoSubtitles: cfg.preferAutoSubtitles,
          maxTranscriptionDurationSeconds: cfg.maxTranscriptionDurationSeconds,
        },
      });
    })
  );

  return router;
}
