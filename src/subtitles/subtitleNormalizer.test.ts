import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { normalizeSubtitleText, readSubtitleFile, transcriptToText } from './subtitleNormalizer';

describe('normalizeSubtitleText', () => {
  it('should drop headers, timestamps and markup', () => {
    const vtt = `WEBVTT
Kind: captions
Language: en

00:00:00.000 --> 00:00:02.500 align:start position:0%
Hello <c>there</c>

00:00:02.500 --> 00:00:05.000
<i>General Kenobi</i>`;

    expect(normalizeSubtitleText(vtt).lines).toEqual(['Hello there', 'General Kenobi']);
  });

  it('should collapse consecutive duplicate lines', () => {
    const vtt = `WEBVTT

00:00:01.000 --> 00:00:02.000
a

00:00:02.000 --> 00:00:03.000
a

00:00:03.000 --> 00:00:04.000
b

00:00:04.000 --> 00:00:05.000
a`;

    expect(normalizeSubtitleText(vtt).lines).toEqual(['a', 'b', 'a']);
  });

  it('should compare duplicates after markup is removed', () => {
    const vtt = `00:00:01.000 --> 00:00:02.000
<00:00:01.200><c>rolling</c> caption
00:00:02.000 --> 00:00:03.000
rolling caption`;

    expect(normalizeSubtitleText(vtt).lines).toEqual(['rolling caption']);
  });

  it('should keep SRT-style comma timestamps as text', () => {
    const srt = `1
00:00:01,000 --> 00:00:02,000
Line`;

    expect(normalizeSubtitleText(srt).lines).toEqual(['1', '00:00:01,000 --> 00:00:02,000', 'Line']);
  });

  it('should skip lines that are only markup', () => {
    expect(normalizeSubtitleText('<b></b>\n  text  \n<br/>').lines).toEqual(['text']);
  });

  it('should handle CRLF and CR line endings', () => {
    expect(normalizeSubtitleText('one\r\ntwo\rthree').lines).toEqual(['one', 'two', 'three']);
  });

  it('should return no lines for header-only content', () => {
    const result = normalizeSubtitleText('WEBVTT\nKind: captions\nLanguage: en\n\n');
    expect(result.lines).toEqual([]);
    expect(transcriptToText(result)).toBe('');
  });

  it('should collapse a line repeated by the next cue', () => {
    expect(transcriptToText(normalizeSubtitleText('Hello\nHello\nWorld'))).toBe('Hello\nWorld');
  });

  it('should give the same lines when normalizing its own output', () => {
    const vtt = `WEBVTT

00:00:00.000 --> 00:00:01.000
<c>first</c>

00:00:01.000 --> 00:00:02.000
first
second`;
    const once = transcriptToText(normalizeSubtitleText(vtt));

    expect(transcriptToText(normalizeSubtitleText(once))).toBe(once);
  });

  it('should return a frozen line list', () => {
    expect(Object.isFrozen(normalizeSubtitleText('x').lines)).toBe(true);
  });
});

describe('transcriptToText', () => {
  it('should join lines with newlines', () => {
    expect(transcriptToText({ lines: ['a', 'b'] })).toBe('a\nb');
  });
});

describe('readSubtitleFile', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'normalizer-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  it('should read and normalize a file', () => {
    const filePath = path.join(tempDir, 'subs-official.en.vtt');
    fs.writeFileSync(filePath, 'WEBVTT\n\n00:00:00.000 --> 00:00:01.000\nHi');

    expect(readSubtitleFile({ path: filePath, sizeBytes: 1 }).lines).toEqual(['Hi']);
  });

  it('should name the file when it cannot be read', () => {
    const filePath = path.join(tempDir, 'missing.vtt');

    expect(() => readSubtitleFile({ path: filePath, sizeBytes: 0 })).toThrow(
      `Error reading subtitle file '${filePath}'`
    );
  });
});
