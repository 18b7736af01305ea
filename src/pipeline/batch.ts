/**
 * Batch file parsing.
 *
 * One entry per line: `URL [START [END]]`, fields separated by whitespace
 * or commas. Blank lines and `#` comments are skipped.
 */
import * as fs from 'fs/promises';
import { logger } from '../utils/logger.js';
import { VideoEntry } from './entry.js';

// URL, then optional START, then END as the rest of the line
const LINE_FIELDS = /^([^\s,]+)(?:[\s,]+([^\s,]+))?(?:[\s,]+(.+))?$/;

const YOUTUBE_URL = /(https?:\/\/)?(www\.)?(youtube\.com\/(watch\?v=|shorts\/|embed\/)|youtu\.be\/)[\w-]+/;
const YOUTUBE_ID = /(?:youtube\.com\/(?:watch\?(?:.*&)?v=|shorts\/|embed\/)|youtu\.be\/)([\w-]+)/;

export function parseBatchLine(line: string): VideoEntry | null {
  const trimmed = line.trim();
  if (!trimmed || trimmed.startsWith('#')) return null;

  const match = trimmed.match(LINE_FIELDS);
  if (!match) return null;
  const url = match[1];
  if (!url || !url.startsWith('http')) return null;

  return new VideoEntry(url, match[2], match[3]);
}

export function parseBatchText(text: string): VideoEntry[] {
  const entries: VideoEntry[] = [];
  for (const line of text.split(/\r?\n/)) {
    const entry = parseBatchLine(line);
    if (entry) entries.push(entry);
  }
  return entries;
}

export async function loadBatchFile(filePath: string): Promise<VideoEntry[]> {
  const text = await fs.readFile(filePath, 'utf8');
  const entries = parseBatchText(text);
  logger.info('Batch: loaded entries', { filePath, count: entries.length });
  return entries;
}

/** Loose check that `url` looks like a YouTube video link. */
export function isYoutubeUrl(url: string): boolean {
  return YOUTUBE_URL.test(url);
}

/** Video id from watch, youtu.be, shorts or embed links; null otherwise. */
export function extractVideoId(url: string): string | null {
  return url.match(YOUTUBE_ID)?.[1] ?? null;
}
