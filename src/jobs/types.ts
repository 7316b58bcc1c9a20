import type { PipelineFailureReason, PipelineState } from '../pipelines/summaryPipeline';
import type { CredentialName } from '../pipelines/credentials';
import type { TranscriptSource } from '../subtitles/types';

/**
 * Possible job status values
 */
export type JobStatus =
  | 'pending'
  | 'fetching_subtitles'
  | 'transcribing'
  | 'summarizing'
  | 'completed'
  | 'failed';

export type JobLogLevel = 'info' | 'error' | 'success';

export interface JobLogEntry {
  timestamp: Date;
  level: JobLogLevel;
  message: string;
  stage: JobStatus;
}

/**
 * Detailed progress information for a job
 */
export interface JobProgress {
  stage: JobStatus;
  currentStep: string;
  startedAt?: Date;
  completedStages: JobStatus[];
  errors: string[];
  logs: JobLogEntry[];
}

/**
 * What a job summarizes
 */
export interface JobRequest {
  url: string;
  prompt: string;
  language: string;
  preferAutoSubtitles: boolean;
}

/**
 * Complete job definition
 */
export interface Job {
  id: string;
  request: JobRequest;
  status: JobStatus;
  progress: JobProgress;

  // Processing results
  result?: {
    summary: string;
    transcriptSource: TranscriptSource;
    transcriptLength: number;
  };
  failure?: {
    /** InternalError covers unexpected errors outside the pipeline's own classification */
    reason: PipelineFailureReason | 'InternalError';
    message: string;
    missingCredential?: CredentialName;
  };

  // Metadata
  createdAt: Date;
  updatedAt: Date;
  completedAt?: Date;
}

/**
 * Job creation request body
 */
export interface CreateJobRequest {
  url?: unknown;
  prompt?: unknown;
  language?: unknown;
  preferAutoSubtitles?: unknown;
}

/**
 * Job list response
 */
export interface JobListItem {
  id: string;
  url: string;
  status: JobStatus;
  createdAt: Date;
  progress: number; // 0-100 overall
}

/**
 * Job status shown while the pipeline is in a given state
 * @returns null for states that do not change the job status
 */
export function statusForState(state: PipelineState): JobStatus | null {
  switch (state) {
    case 'subtitles_attempted':
      return 'fetching_subtitles';
    case 'transcription_attempted':
      return 'transcribing';
    case 'summarizing':
      return 'summarizing';
    default:
      return null;
  }
}

/**
 * Whether the pipeline is working on the job (started and not yet finished)
 */
export function isJobRunning(job: Job): boolean {
  return job.status !== 'pending' && job.status !== 'completed' && job.status !== 'failed';
}

/**
 * Calculates overall progress percentage from job status
 */
export function calculateOverallProgress(job: Job): number {
  switch (job.status) {
    case 'pending':
      return 0;
    case 'fetching_subtitles':
      return 20;
    case 'transcribing':
      return 50;
    case 'summarizing':
      return 80;
    case 'completed':
      return 100;
    case 'failed':
      return 0;
  }
}
