/**
 * Locates ffmpeg, ffprobe and yt-dlp. Explicit paths from the environment
 * win; otherwise PATH is searched. ffprobe also falls back to the directory
 * ffmpeg was found in, where it usually ships.
 */
import { accessSync, constants, statSync } from 'fs';
import * as path from 'path';
import { env } from '../config.js';
import { BinaryNotFoundError } from '../errors.js';
import { logger } from '../utils/logger.js';

export interface Binaries {
  ffmpeg: string;
  ffprobe: string;
  ytDlp: string;
}

function isExecutable(candidate: string): boolean {
  try {
    if (!statSync(candidate).isFile()) return false;
    accessSync(candidate, constants.X_OK);
    return true;
  } catch {
    return false;
  }
}

function candidateNames(name: string): string[] {
  if (process.platform !== 'win32') return [name];
  const exts = (process.env['PATHEXT'] ?? '.EXE;.CMD;.BAT').split(';').filter(Boolean);
  return [name, ...exts.map((ext) => name + ext.toLowerCase())];
}

/** Absolute path of `name` on PATH (or in `searchPath`), or null. */
export function findExecutable(name: string, searchPath = process.env['PATH'] ?? ''): string | null {
  for (const dir of searchPath.split(path.delimiter)) {
    if (!dir) continue;
    for (const file of candidateNames(name)) {
      const candidate = path.join(dir, file);
      if (isExecutable(candidate)) return candidate;
    }
  }
  return null;
}

export function discoverBinaries(searchPath?: string): Binaries {
  const ffmpeg = env.FFMPEG_PATH ?? findExecutable('ffmpeg', searchPath);
  if (!ffmpeg) {
    throw new BinaryNotFoundError('ffmpeg', 'Install it from https://ffmpeg.org/download.html and add it to PATH.');
  }

  const ffprobe = env.FFPROBE_PATH
    ?? findExecutable('ffprobe', searchPath)
    ?? findExecutable('ffprobe', path.dirname(ffmpeg));
  if (!ffprobe) {
    throw new BinaryNotFoundError('ffprobe', 'It usually ships alongside ffmpeg; make sure both are on PATH.');
  }

  const ytDlp = env.YT_DLP_PATH ?? findExecutable('yt-dlp', searchPath);
  if (!ytDlp) {
    throw new BinaryNotFoundError('yt-dlp', 'Install it with `pipx install yt-dlp` or set YT_DLP_PATH.');
  }

  logger.info('Binaries: resolved', { ffmpeg, ffprobe, ytDlp });
  return { ffmpeg, ffprobe, ytDlp };
}
