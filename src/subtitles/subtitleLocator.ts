import fs from 'fs';
import path from 'path';
import { SubtitleFile } from './types';

/**
 * Collects files under a directory whose name starts with `${stem}.`
 * Traversal is depth-first with entries sorted by name, so the order is stable.
 */
function collectMatches(dir: string, stem: string, matches: string[]): void {
  const entries = fs.readdirSync(dir, { withFileTypes: true });
  entries.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));

  for (const entry of entries) {
    const entryPath = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      collectMatches(entryPath, stem, matches);
    } else if (entry.isFile() && entry.name.startsWith(`${stem}.`)) {
      matches.push(entryPath);
    }
  }
}

/**
 * Lists every subtitle file written with the given output stem
 * @param searchDir - Root of the search
 * @param stem - File name prefix used in the download template
 */
export function listSubtitleFiles(searchDir: string, stem: string): string[] {
  const resolved = path.resolve(searchDir);
  if (!fs.existsSync(resolved)) {
    return [];
  }

  const matches: string[] = [];
  collectMatches(resolved, stem, matches);
  return matches;
}

/**
 * Finds the subtitle file written with the given stem
 * When several match, the first in traversal order wins.
 * @returns The located file with its size, or null if none exists
 */
export function findSubtitleFile(searchDir: string, stem: string): SubtitleFile | null {
  const matches = listSubtitleFiles(searchDir, stem);

  if (matches.length === 0) {
    console.debug(`[subtitles] No files matching '${stem}.*' in ${path.resolve(searchDir)}`);
    return null;
  }

  if (matches.length > 1) {
    console.debug(`[subtitles] Found ${matches.length} subtitle files, using the first:`);
    for (const match of matches) {
      console.debug(`[subtitles]  - ${match}`);
    }
  }

  const first = matches[0];
  if (!first) return null;

  return { path: first, sizeBytes: fs.statSync(first).size };
}

/**
 * Deletes every subtitle file written with the given stem
 * @returns Number of files removed
 */
export function removeSubtitleFiles(searchDir: string, stem: string): number {
  let removed = 0;

  for (const file of listSubtitleFiles(searchDir, stem)) {
    try {
      fs.unlinkSync(file);
      removed++;
    } catch (error) {
      console.warn(`[subtitles] Failed to remove '${file}':`, error);
    }
  }

  return removed;
}
