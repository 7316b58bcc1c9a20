import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { Downloader, SubtitleRequest } from '../video/types';
import { SubtitleAcquirer } from './subtitleAcquirer';

const VIDEO_URL = 'https://video.example.com/watch?v=abc123';

const SAMPLE_VTT = `WEBVTT
Kind: captions
Language: en

00:00:00.000 --> 00:00:02.000
Welcome back

00:00:02.000 --> 00:00:04.000
Welcome back

00:00:04.000 --> 00:00:06.000
to the <b>show</b>`;

/**
 * Downloader that writes the given content for each kind of subtitle.
 * undefined writes nothing, an Error makes the download fail.
 */
function fakeDownloader(files: { official?: string | Error; auto?: string | Error }) {
  const requests: SubtitleRequest[] = [];

  const downloader: Downloader = {
    fetchSubtitles: vi.fn(async (request: SubtitleRequest) => {
      requests.push(request);
      const content = request.auto ? files.auto : files.official;
      if (content instanceof Error) throw content;
      if (content === undefined) return;
      fs.writeFileSync(request.outputTemplate.replace('%(ext)s', `${request.language}.vtt`), content);
    }),
    probeMetadata: vi.fn(),
    downloadVideo: vi.fn(),
  };

  return { downloader, requests };
}

describe('SubtitleAcquirer', () => {
  let workDir: string;

  beforeEach(() => {
    workDir = fs.mkdtempSync(path.join(os.tmpdir(), 'acquirer-test-'));
  });

  afterEach(() => {
    fs.rmSync(workDir, { recursive: true, force: true });
  });

  it('should use official subtitles when present', async () => {
    const { downloader, requests } = fakeDownloader({ official: SAMPLE_VTT, auto: 'WEBVTT\n\nauto text' });
    const acquirer = new SubtitleAcquirer(downloader);

    const result = await acquirer.acquire(VIDEO_URL, 'en', false, workDir);

    expect(result).toEqual({
      source: 'official_subtitle',
      text: 'Welcome back\nto the show',
      file: { path: path.join(workDir, 'subs-official.en.vtt'), sizeBytes: Buffer.byteLength(SAMPLE_VTT) },
    });
    expect(requests).toEqual([
      { url: VIDEO_URL, language: 'en', auto: false, outputTemplate: path.join(workDir, 'subs-official.%(ext)s') },
    ]);
  });

  it('should fall back to auto subtitles when official ones are missing', async () => {
    const { downloader, requests } = fakeDownloader({ auto: SAMPLE_VTT });
    const acquirer = new SubtitleAcquirer(downloader);

    const result = await acquirer.acquire(VIDEO_URL, 'en', false, workDir);

    expect(result?.source).toBe('auto_subtitle');
    expect(result?.text).toBe('Welcome back\nto the show');
    expect(requests.map((r) => r.auto)).toEqual([false, true]);
    expect(requests[1]?.outputTemplate).toBe(path.join(workDir, 'subs-auto.%(ext)s'));
  });

  it('should fall back to auto subtitles when the official file is empty', async () => {
    const { downloader } = fakeDownloader({ official: '', auto: SAMPLE_VTT });
    const acquirer = new SubtitleAcquirer(downloader);

    const result = await acquirer.acquire(VIDEO_URL, 'en', false, workDir);

    expect(result?.source).toBe('auto_subtitle');
  });

  it('should fall back to auto subtitles when the official download fails', async () => {
    const { downloader } = fakeDownloader({ official: new Error('no subtitles'), auto: SAMPLE_VTT });
    const acquirer = new SubtitleAcquirer(downloader);

    const result = await acquirer.acquire(VIDEO_URL, 'en', false, workDir);

    expect(result?.source).toBe('auto_subtitle');
  });

  it('should request only auto subtitles when preferred', async () => {
    const { downloader, requests } = fakeDownloader({ official: SAMPLE_VTT, auto: 'WEBVTT\n\nauto text' });
    const acquirer = new SubtitleAcquirer(downloader);

    const result = await acquirer.acquire(VIDEO_URL, 'en', true, workDir);

    expect(result?.source).toBe('auto_subtitle');
    expect(result?.text).toBe('auto text');
    expect(requests).toHaveLength(1);
    expect(requests[0]?.auto).toBe(true);
  });

  it('should return null when a located file normalizes to nothing', async () => {
    const { downloader, requests } = fakeDownloader({ official: 'WEBVTT\nKind: captions\n', auto: SAMPLE_VTT });
    const acquirer = new SubtitleAcquirer(downloader);

    const result = await acquirer.acquire(VIDEO_URL, 'en', false, workDir);

    expect(result).toBeNull();
    expect(requests).toHaveLength(1);
  });

  it('should return null when neither attempt produces a file', async () => {
    const { downloader } = fakeDownloader({ official: new Error('boom'), auto: new Error('boom') });
    const acquirer = new SubtitleAcquirer(downloader);

    expect(await acquirer.acquire(VIDEO_URL, 'en', false, workDir)).toBeNull();
  });

  it('should ignore files left by the other attempt', async () => {
    fs.writeFileSync(path.join(workDir, 'subs-official.en.vtt'), SAMPLE_VTT);
    const { downloader } = fakeDownloader({ auto: 'WEBVTT\n\nauto only' });
    const acquirer = new SubtitleAcquirer(downloader);

    const result = await acquirer.acquire(VIDEO_URL, 'en', true, workDir);

    expect(result?.text).toBe('auto only');
  });

  it('should remove the files of both attempts', async () => {
    const { downloader } = fakeDownloader({ official: 'WEBVTT\n', auto: SAMPLE_VTT });
    const acquirer = new SubtitleAcquirer(downloader);
    fs.writeFileSync(path.join(workDir, 'subs-auto.en.vtt'), SAMPLE_VTT);
    fs.writeFileSync(path.join(workDir, 'subs-official.en.vtt'), SAMPLE_VTT);
    fs.writeFileSync(path.join(workDir, 'notes.txt'), 'keep');

    expect(acquirer.removeSubtitles(workDir)).toBe(2);
    expect(fs.readdirSync(workDir)).toEqual(['notes.txt']);
  });
});
