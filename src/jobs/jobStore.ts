import fs from 'fs';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import {
  Job,
  JobListItem,
  JobLogLevel,
  JobRequest,
  JobStatus,
  calculateOverallProgress,
} from './types';
import { config } from '../config';

const MAX_LOG_ENTRIES = 100;

/**
 * Simple file-based job store, one JSON file per job
 */
export class JobStore {
  private jobsDir: string;

  constructor(jobsDir?: string) {
    this.jobsDir = jobsDir ?? config.jobsDir;
  }

  private ensureDirectory(): void {
    if (!fs.existsSync(this.jobsDir)) {
      fs.mkdirSync(this.jobsDir, { recursive: true });
    }
  }

  private getJobPath(jobId: string): string {
    return path.join(this.jobsDir, `${path.basename(jobId)}.json`);
  }

  /**
   * Creates a new pending job
   */
  async create(request: JobRequest): Promise<Job> {
    const now = new Date();

    const job: Job = {
      id: uuidv4(),
      request,
      status: 'pending',
      progress: {
        stage: 'pending',
        currentStep: 'Waiting to start',
        completedStages: [],
        errors: [],
        logs: [],
      },
      createdAt: now,
      updatedAt: now,
    };

    await this.save(job);
    return job;
  }

  /**
   * Gets a job by ID
   */
  async get(jobId: string): Promise<Job | null> {
    const jobPath = this.getJobPath(jobId);

    if (!fs.existsSync(jobPath)) {
      return null;
    }

    try {
      const content = fs.readFileSync(jobPath, 'utf-8');
      const job = JSON.parse(content) as Job;

      // Convert date strings back to Date objects
      job.createdAt = new Date(job.createdAt);
      job.updatedAt = new Date(job.updatedAt);
      if (job.completedAt) {
        job.completedAt = new Date(job.completedAt);
      }
      if (job.progress.startedAt) {
        job.progress.startedAt = new Date(job.progress.startedAt);
      }
      for (const log of job.progress.logs) {
        log.timestamp = new Date(log.timestamp);
      }

      return job;
    } catch (error) {
      console.error(`[jobs] Failed to read job ${jobId}:`, error);
      return null;
    }
  }

  /**
   * Saves a job
   */
  async save(job: Job): Promise<void> {
    this.ensureDirectory();
    job.updatedAt = new Date();
    fs.writeFileSync(this.getJobPath(job.id), JSON.stringify(job, null, 2), 'utf-8');
  }

  private async getOrThrow(jobId: string): Promise<Job> {
    const job = await this.get(jobId);
    if (!job) {
      throw new Error(`Job ${jobId} not found`);
    }
    return job;
  }

  /**
   * Updates job status and current step
   */
  async updateStatus(jobId: string, status: JobStatus, currentStep: string): Promise<void> {
    const job = await this.getOrThrow(jobId);

    // Mark previous stage as completed if moving to a new stage
    if (job.status !== status && job.status !== 'pending' && job.status !== 'failed') {
      job.progress.completedStages.push(job.status);
    }
    if (job.status === 'pending' && status !== 'pending') {
      job.progress.startedAt = new Date();
    }

    job.status = status;
    job.progress.stage = status;
    job.progress.currentStep = currentStep;
    appendLog(job, 'info', currentStep);

    await this.save(job);
  }

  /**
   * Stores the summary and marks the job completed
   */
  async setCompleted(jobId: string, result: NonNullable<Job['result']>): Promise<void> {
    const job = await this.getOrThrow(jobId);

    if (job.status !== 'completed') {
      job.progress.completedStages.push(job.status);
    }
    job.status = 'completed';
    job.progress.stage = 'completed';
    job.progress.currentStep = 'Summary complete';
    job.result = result;
    job.completedAt = new Date();
    appendLog(job, 'success', `Summary generated from ${result.transcriptSource}`);

    await this.save(job);
  }

  /**
   * Sets job as failed with its failure classification
   */
  async setFailed(jobId: string, failure: NonNullable<Job['failure']>): Promise<void> {
    const job = await this.getOrThrow(jobId);

    job.status = 'failed';
    job.progress.stage = 'failed';
    job.progress.currentStep = failure.message;
    job.progress.errors.push(failure.message);
    job.failure = failure;
    job.completedAt = new Date();
    appendLog(job, 'error', `Pipeline failed (${failure.reason}): ${failure.message}`);

    await this.save(job);
  }

  /**
   * Lists all jobs, newest first
   */
  async list(): Promise<JobListItem[]> {
    this.ensureDirectory();
    const files = fs.readdirSync(this.jobsDir).filter((f) => f.endsWith('.json'));

    const jobs: JobListItem[] = [];

    for (const file of files) {
      const job = await this.get(file.replace(/\.json$/, ''));

      if (job) {
        jobs.push({
          id: job.id,
          url: job.request.url,
          status: job.status,
          createdAt: job.createdAt,
          progress: calculateOverallProgress(job),
        });
      }
    }

    return jobs.sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }

  /**
   * Deletes a job
   */
  async delete(jobId: string): Promise<boolean> {
    const jobPath = this.getJobPath(jobId);

    if (!fs.existsSync(jobPath)) {
      return false;
    }

    fs.unlinkSync(jobPath);
    return true;
  }
}

function appendLog(job: Job, level: JobLogLevel, message: string): void {
  job.progress.logs.push({
    timestamp: new Date(),
    level,
    message,
    stage: job.status,
  });

  if (job.progress.logs.length > MAX_LOG_ENTRIES) {
    job.progress.logs = job.progress.logs.slice(-MAX_LOG_ENTRIES);
  }
}

// Singleton instance
export const jobStore = new JobStore();
