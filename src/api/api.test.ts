import fs from 'fs';
import os from 'os';
import path from 'path';
import type { Server } from 'http';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { createApp } from '../app';
import { loadConfig } from '../config';
import { JobStore } from '../jobs';
import type { SummaryPipeline } from '../pipelines/summaryPipeline';
import { parseCreateJobRequest } from './jobs';

describe('parseCreateJobRequest', () => {
  it('should trim fields and apply defaults', () => {
    expect(parseCreateJobRequest({ url: ' https://video.example.com/v/1 ', prompt: ' Summarize ' })).toEqual({
      ok: true,
      request: {
        url: 'https://video.example.com/v/1',
        prompt: 'Summarize',
        language: 'en',
        preferAutoSubtitles: false,
      },
    });
  });

  it('should accept region-qualified languages', () => {
    const parsed = parseCreateJobRequest({
      url: 'https://video.example.com/v/1',
      prompt: 'Summarize',
      language: 'pt-BR',
      preferAutoSubtitles: true,
    });

    expect(parsed.ok && parsed.request.language).toBe('pt-BR');
    expect(parsed.ok && parsed.request.preferAutoSubtitles).toBe(true);
  });

  it('should reject invalid bodies', () => {
    expect(parseCreateJobRequest(undefined)).toEqual({ ok: false, error: 'Missing request body' });
    expect(parseCreateJobRequest({ url: 'ftp://x', prompt: 'p' })).toEqual({
      ok: false,
      error: 'url must be an http(s) URL',
    });
    expect(parseCreateJobRequest({ url: 'https://x', prompt: '   ' })).toEqual({
      ok: false,
      error: 'prompt is required',
    });
    expect(parseCreateJobRequest({ url: 'https://x', prompt: 'p', language: 'english!' })).toEqual({
      ok: false,
      error: 'language must be a language code such as "en" or "pt-BR"',
    });
    expect(parseCreateJobRequest({ url: 'https://x', prompt: 'p', preferAutoSubtitles: 'yes' })).toEqual({
      ok: false,
      error: 'preferAutoSubtitles must be a boolean',
    });
  });
});

describe('HTTP API', () => {
  let jobsDir: string;
  let store: JobStore;
  let server: Server;
  let baseUrl: string;
  let pipeline: Pick<SummaryPipeline, 'run'>;

  beforeEach(async () => {
    jobsDir = fs.mkdtempSync(path.join(os.tmpdir(), 'api-test-'));
    store = new JobStore(jobsDir);
    pipeline = {
      run: vi.fn(async () => ({
        status: 'done' as const,
        summary: 'A short summary.',
        source: 'official_subtitle' as const,
        transcript: 'caption text',
      })),
    };

    const app = createApp({
      store,
      pipeline,
      health: {
        cfg: loadConfig({ GEMINI_API_KEY: 'test-secret' }),
        ffmpeg: { isAvailable: async () => true, getVersion: async () => '6.1.1' },
        ytDlp: { isAvailable: async () => false },
      },
    });

    server = await new Promise<Server>((resolve) => {
      const listening = app.listen(0, () => resolve(listening));
    });
    const address = server.address();
    if (!address || typeof address === 'string') {
      throw new Error('Server is not listening on a TCP port');
    }
    baseUrl = `http://127.0.0.1:${address.port}/api`;
  });

  afterEach(async () => {
    await new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
    fs.rmSync(jobsDir, { recursive: true, force: true });
  });

  function post(route: string, body?: unknown) {
    if (body === undefined) {
      return fetch(`${baseUrl}${route}`, { method: 'POST' });
    }
    return fetch(`${baseUrl}${route}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(body),
    });
  }

  it('should create, start and complete a job', async () => {
    const created = await post('/jobs', { url: 'https://video.example.com/v/1', prompt: 'Summarize' });
    expect(created.status).toBe(201);
    const { job } = (await created.json()) as { job: { id: string; status: string } };
    expect(job.status).toBe('pending');

    const started = await post(`/jobs/${job.id}/start`);
    expect(started.status).toBe(202);
    expect(await started.json()).toEqual({ message: 'Job started', jobId: job.id });

    await vi.waitFor(async () => {
      expect((await store.get(job.id))?.status).toBe('completed');
    });

    const details = await fetch(`${baseUrl}/jobs/${job.id}`);
    const body = (await details.json()) as {
      job: { result: { summary: string; transcriptSource: string } };
      overallProgress: number;
    };
    expect(body.job.result.summary).toBe('A short summary.');
    expect(body.job.result.transcriptSource).toBe('official_subtitle');
    expect(body.overallProgress).toBe(100);
    expect(pipeline.run).toHaveBeenCalledTimes(1);
  });

  it('should reject starting a job twice', async () => {
    const job = await store.create({
      url: 'https://video.example.com/v/1',
      prompt: 'Summarize',
      language: 'en',
      preferAutoSubtitles: false,
    });
    await store.updateStatus(job.id, 'summarizing', 'Summarizing transcript');

    const response = await post(`/jobs/${job.id}/start`);

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Job has already been started' });
    expect(pipeline.run).not.toHaveBeenCalled();
  });

  it('should return 400 for invalid job requests', async () => {
    const response = await post('/jobs', { url: 'not a url', prompt: 'Summarize' });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'url must be an http(s) URL' });
  });

  it('should return 400 for malformed JSON', async () => {
    const response = await fetch(`${baseUrl}/jobs`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: '{"url":',
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({ error: 'Invalid JSON body' });
  });

  it('should refuse to delete a running job', async () => {
    const job = await store.create({
      url: 'https://video.example.com/v/3',
      prompt: 'Summarize',
      language: 'en',
      preferAutoSubtitles: false,
    });
    await store.updateStatus(job.id, 'transcribing', 'No subtitles found, transcribing audio');

    const response = await fetch(`${baseUrl}/jobs/${job.id}`, { method: 'DELETE' });

    expect(response.status).toBe(409);
    expect(await response.json()).toEqual({ error: 'Job is still running' });
    expect(await store.get(job.id)).not.toBeNull();
  });

  it('should return 404 for unknown jobs', async () => {
    expect((await fetch(`${baseUrl}/jobs/missing`)).status).toBe(404);
    expect((await post('/jobs/missing/start')).status).toBe(404);
    expect((await fetch(`${baseUrl}/jobs/missing`, { method: 'DELETE' })).status).toBe(404);
  });

  it('should list and delete jobs', async () => {
    const job = await store.create({
      url: 'https://video.example.com/v/2',
      prompt: 'Summarize',
      language: 'en',
      preferAutoSubtitles: false,
    });

    const list = (await (await fetch(`${baseUrl}/jobs`)).json()) as { jobs: { id: string; url: string }[] };
    expect(list.jobs.map((item) => [item.id, item.url])).toEqual([[job.id, 'https://video.example.com/v/2']]);

    const deleted = await fetch(`${baseUrl}/jobs/${job.id}`, { method: 'DELETE' });
    expect(await deleted.json()).toEqual({ message: 'Job deleted' });
    expect(await store.get(job.id)).toBeNull();
  });

  it('should report service health', async () => {
    const response = await fetch(`${baseUrl}/health`);

    expect(await response.json()).toEqual({
      status: 'degraded',
      services: {
        ffmpeg: { available: true, version: '6.1.1' },
        ytDlp: { available: false },
        summarization: { provider: 'gemini', configured: true },
        transcription: { model: 'whisper-1', configured: false },
      },
      config: {
        subtitleLanguage: 'en',
        preferAutoSubtitles: false,
        maxTranscriptionDurationSeconds: 300,
      },
    });
  });

  it('should return 404 for unknown routes', async () => {
    const response = await fetch(`${baseUrl}/nope`);

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({ error: 'Not found' });
  });
});
