/**
 * Timestamp helpers for trim points typed by users.
 */
import { logger } from './logger.js';

const NUMERIC = /^[+-]?(\d+(\.\d*)?|\.\d+)$/;
const INTEGER = /^\d+$/;

/**
 * Convert `"90"`, `"1:30"`, `"0:01:30"` or `"01:30.500"` to seconds.
 * Empty or unparseable input yields 0.
 */
export function timestampToSeconds(ts: string | undefined): number {
  if (!ts) return 0;
  const trimmed = ts.trim();
  if (NUMERIC.test(trimmed)) return Number.parseFloat(trimmed);

  const parts = trimmed.split(':');
  const secs = parts[parts.length - 1] ?? '';
  const wholeUnits = parts.slice(0, -1);
  if ((parts.length === 2 || parts.length === 3)
      && wholeUnits.every(p => INTEGER.test(p))
      && NUMERIC.test(secs)) {
    const [h, m] = parts.length === 3 ? wholeUnits.map(Number) : [0, Number(wholeUnits[0])];
    return (h ?? 0) * 3600 + (m ?? 0) * 60 + Number.parseFloat(secs);
  }

  logger.warn('Time: could not parse timestamp', { ts });
  return 0;
}

/** Format seconds as `HH:MM:SS.mmm`. */
export function secondsToTimestamp(s: number): string {
  if (!(s > 0)) return '00:00:00.000';
  // Whole milliseconds first, so 59.9996 carries into the minute
  const totalMs = Math.round(s * 1000);
  const h = Math.floor(totalMs / 3_600_000);
  const m = Math.floor((totalMs % 3_600_000) / 60_000);
  const sec = Math.floor((totalMs % 60_000) / 1000);
  const ms = totalMs % 1000;
  const pad = (n: number, width = 2): string => String(n).padStart(width, '0');
  return `${pad(h)}:${pad(m)}:${pad(sec)}.${pad(ms, 3)}`;
}

/** Seconds encoded in ffmpeg's `time=HH:MM:SS.xx` progress field, or null. */
export function parseFfmpegClock(line: string): number | null {
  const match = line.match(/time=(\d+):(\d{2}):(\d{2}(?:\.\d+)?)/);
  if (!match) return null;
  const [, h = '0', m = '0', s = '0'] = match;
  return Number(h) * 3600 + Number(m) * 60 + Number.parseFloat(s);
}
