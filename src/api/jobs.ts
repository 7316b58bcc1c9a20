import { Router, Request, Response, NextFunction } from 'express';
import { JobStore, calculateOverallProgress, isJobRunning } from '../jobs';
import type { CreateJobRequest, JobRequest } from '../jobs';
import { runSummaryJob } from '../pipelines/jobRunner';
import type { SummaryPipeline } from '../pipelines/summaryPipeline';
import { config } from '../config';

export interface JobsRouterDeps {
  store: JobStore;
  pipeline: Pick<SummaryPipeline, 'run'>;
}

/**
 * Error handler wrapper
 */
export const asyncHandler =
  (fn: (req: Request, res: Response, next: NextFunction) => Promise<void>) =>
  (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };

const LANGUAGE_PATTERN = /^[A-Za-z]{2,3}([-_][A-Za-z0-9]{2,8})*$/;

/**
 * Validates a job creation body and fills in configured defaults
 * @returns The job request, or an error message for a 400 response
 */
export function parseCreateJobRequest(
  body: CreateJobRequest | undefined
): { ok: true; request: JobRequest } | { ok: false; error: string } {
  if (!body || typeof body !== 'object') {
    return { ok: false, error: 'Missing request body' };
  }

  const { url, prompt, language, preferAutoSubtitles } = body;

  if (typeof url !== 'string' || !/^https?:\/\//i.test(url.trim())) {
    return { ok: false, error: 'url must be an http(s) URL' };
  }

  if (typeof prompt !== 'string' || !prompt.trim()) {
    return { ok: false, error: 'prompt is required' };
  }

  let subtitleLanguage = config.subtitleLanguage;
  if (language !== undefined) {
    if (typeof language !== 'string' || !LANGUAGE_PATTERN.test(language)) {
      return { ok: false, error: 'language must be a language code such as "en" or "pt-BR"' };
    }
    subtitleLanguage = language;
  }

  let preferAuto = config.preferAutoSubtitles;
  if (preferAutoSubtitles !== undefined) {
    if (typeof preferAutoSubtitles !== 'boolean') {
      return { ok: false, error: 'preferAutoSubtitles must be a boolean' };
    }
    preferAuto = preferAutoSubtitles;
  }

  return {
    ok: true,
    request: {
      url: url.trim(),
      prompt: prompt.trim(),
      language: subtitleLanguage,
      preferAutoSubtitles: preferAuto,
    },
  };
}

export function createJobsRouter({ store, pipeline }: JobsRouterDeps): Router {
  const router = Router();

  /**
   * GET /api/jobs
   * List all jobs
   */
  router.get(
    '/',
    asyncHandler(async (_req: Request, res: Response) => {
      const jobs = await store.list();
      res.json({ jobs });
    })
  );

  /**
   * POST /api/jobs
   * Create a new job
   */
  router.post(
    '/',
    asyncHandler(async (req: Request, res: Response) => {
      const parsed = parseCreateJobRequest(req.body as CreateJobRequest | undefined);

      if (!parsed.ok) {
        res.status(400).json({ error: parsed.error });
        return;
      }

      const job = await store.create(parsed.request);
      res.status(201).json({ job });
    })
  );

  /**
   * GET /api/jobs/:id
   * Get job details
   */
  router.get(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const job = await store.get(req.params.id ?? '');

      if (!job) {
        res.status(404).json({ error: 'Job not found' });
        return;
      }

      res.json({ job, overallProgress: calculateOverallProgress(job) });
    })
  );

  /**
   * POST /api/jobs/:id/start
   * Start processing a job
   */
  router.post(
    '/:id/start',
    asyncHandler(async (req: Request, res: Response) => {
      const jobId = req.params.id ?? '';
      const job = await store.get(jobId);

      if (!job) {
        res.status(404).json({ error: 'Job not found' });
        return;
      }

      if (job.status !== 'pending') {
        res.status(400).json({ error: 'Job has already been started' });
        return;
      }

      // Start pipeline in background
      runSummaryJob(jobId, pipeline, store).catch((error) => {
        console.error(`[api] Pipeline failed for job ${jobId}:`, error);
      });

      res.status(202).json({ message: 'Job started', jobId });
    })
  );

  /**
   * DELETE /api/jobs/:id
   * Delete a job that is not running
   */
  router.delete(
    '/:id',
    asyncHandler(async (req: Request, res: Response) => {
      const jobId = req.params.id ?? '';
      const job = await store.get(jobId);

      if (!job) {
        res.status(404).json({ error: 'Job not found' });
        return;
      }

      if (isJobRunning(job)) {
        res.status(409).json({ error: 'Job is still running' });
        return;
      }

      await store.delete(jobId);

      res.json({ message: 'Job deleted' });
    })
  );

  return router;
}
