import { JobStore, jobStore, statusForState } from '../jobs';
import type { JobStatus } from '../jobs';
import type { PipelineState, SummaryPipeline } from './summaryPipeline';

const STEP_DESCRIPTIONS: Record<JobStatus, string> = {
  pending: 'Waiting to start',
  fetching_subtitles: 'Downloading subtitles',
  transcribing: 'No subtitles found, transcribing audio',
  summarizing: 'Summarizing transcript',
  completed: 'Summary complete',
  failed: 'Failed',
};

/**
 * Runs the pipeline for a stored job and records progress and outcome
 */
export async function runSummaryJob(
  jobId: string,
  pipeline: Pick<SummaryPipeline, 'run'>,
  store: JobStore = jobStore
): Promise<void> {
  const job = await store.get(jobId);
  if (!job) {
    throw new Error(`Job ${jobId} not found`);
  }

  // State callbacks are synchronous; store updates are chained, each with its own handler
  let updates: Promise<void> = Promise.resolve();
  const onStateChange = (state: PipelineState): void => {
    const status = statusForState(state);
    if (status) {
      updates = updates
        .then(() => store.updateStatus(jobId, status, STEP_DESCRIPTIONS[status]))
        .catch((error: unknown) => {
          console.warn(`[jobs] Failed to record progress for job ${jobId}:`, error);
        });
    }
  };

  try {
    const result = await pipeline.run(job.request, onStateChange);
    await updates;

    if (result.status === 'done') {
      await store.setCompleted(jobId, {
        summary: result.summary,
        transcriptSource: result.source,
        transcriptLength: result.transcript.length,
      });
      return;
    }

    await store.setFailed(jobId, {
      reason: result.reason,
      message: result.message,
      missingCredential: result.missingCredential,
    });
  } catch (error) {
    await updates;
    const message = error instanceof Error ? error.message : 'Unknown error';
    await store.setFailed(jobId, { reason: 'InternalError', message });
    throw error;
  }
}
