import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { findSubtitleFile, listSubtitleFiles, removeSubtitleFiles } from './subtitleLocator';

describe('subtitleLocator', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = fs.mkdtempSync(path.join(os.tmpdir(), 'locator-test-'));
  });

  afterEach(() => {
    fs.rmSync(tempDir, { recursive: true, force: true });
  });

  function write(relativePath: string, content: string): string {
    const filePath = path.join(tempDir, relativePath);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, content);
    return filePath;
  }

  describe('listSubtitleFiles', () => {
    it('should return an empty list for a missing directory', () => {
      expect(listSubtitleFiles(path.join(tempDir, 'nope'), 'subs-official')).toEqual([]);
    });

    it('should match only files starting with the stem and a dot', () => {
      const match = write('subs-official.en.vtt', 'x');
      write('subs-officialx.en.vtt', 'x');
      write('subs-auto.en.vtt', 'x');

      expect(listSubtitleFiles(tempDir, 'subs-official')).toEqual([match]);
    });

    it('should search subdirectories in name order', () => {
      const nested = write('b/subs-auto.en.vtt', 'x');
      const top = write('a/subs-auto.de.vtt', 'x');

      expect(listSubtitleFiles(tempDir, 'subs-auto')).toEqual([top, nested]);
    });
  });

  describe('findSubtitleFile', () => {
    it('should return null when nothing matches', () => {
      expect(findSubtitleFile(tempDir, 'subs-official')).toBeNull();
    });

    it('should return the first match with its size', () => {
      const first = write('subs-official.en.vtt', 'hello');
      write('subs-official.fr.vtt', 'bonjour!');

      expect(findSubtitleFile(tempDir, 'subs-official')).toEqual({ path: first, sizeBytes: 5 });
    });
  });

  describe('removeSubtitleFiles', () => {
    it('should delete every match and report the count', () => {
      write('subs-auto.en.vtt', 'x');
      write('nested/subs-auto.en.vtt', 'x');
      const other = write('subs-official.en.vtt', 'x');

      expect(removeSubtitleFiles(tempDir, 'subs-auto')).toBe(2);
      expect(listSubtitleFiles(tempDir, 'subs-auto')).toEqual([]);
      expect(fs.existsSync(other)).toBe(true);
    });
  });
});
