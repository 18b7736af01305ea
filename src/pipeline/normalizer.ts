/**
 * Normalizer: re-encodes one fetched file to the run's canonical format
 * (letterboxed to the target size, 30 fps, AAC stereo 44.1 kHz, optional trim).
 *
 * Output is cached as `proc_<id>_<height>.mp4`; a cache hit starts no process.
 */
import * as fs from 'fs/promises';
import { MESSAGE_LIMITS, PROCESS_LIMITS, resolutionOf, type RunSettings } from '../config.js';
import { tail, truncate } from '../errors.js';
import type { EncoderProfile } from '../media/encoder.js';
import { buildNormalizeArgs } from '../media/ffmpeg.js';
import type { MediaProber } from '../media/ffprobe.js';
import { succeeded, type ProcessOutcome, type ProcessRunner } from '../media/process.js';
import { isFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { parseFfmpegClock, secondsToTimestamp, timestampToSeconds } from '../utils/time.js';
import type { CacheLayout } from './cache.js';
import type { VideoEntry } from './entry.js';
import { noopLogSink, type LogSink } from './types.js';

export interface NormalizerDeps {
  settings: RunSettings;
  cache: CacheLayout;
  encoder: EncoderProfile;
  ffmpegPath: string;
  runner: ProcessRunner;
  prober: MediaProber;
  isCancelled: () => boolean;
  logSink?: LogSink;
}

interface TrimWindow {
  startSeconds: number;
  /** Output length limit; undefined when no usable end point was given */
  durationSeconds: number | undefined;
}

export function trimWindow(entry: VideoEntry): TrimWindow {
  const startSeconds = entry.startTime ? timestampToSeconds(entry.startTime) : 0;
  if (!entry.endTime) return { startSeconds, durationSeconds: undefined };
  const length = timestampToSeconds(entry.endTime) - startSeconds;
  return { startSeconds, durationSeconds: length > 0 ? length : undefined };
}

function failureMessage(outcome: ProcessOutcome): string {
  if (outcome.timedOut) return 'Processing timed out';
  if (outcome.spawnError !== undefined) return `Failed to start ffmpeg: ${outcome.spawnError}`;
  if (outcome.exitCode === null) return `FFmpeg terminated by signal ${outcome.signal ?? 'unknown'}`;
  const diag = outcome.stderrTail.trim();
  return `FFmpeg exit code ${outcome.exitCode}: ${diag ? tail(diag, MESSAGE_LIMITS.diagnosticTail) : 'unknown'}`;
}

export class Normalizer {
  private readonly sink: LogSink;

  constructor(private readonly deps: NormalizerDeps) {
    this.sink = deps.logSink ?? noopLogSink;
  }

  /** Normalize `entry`; true once it is `normalized`. Never throws. */
  async normalize(entry: VideoEntry, index: number, total: number): Promise<boolean> {
    const { cache, encoder, settings } = this.deps;
    const position = `[${index + 1}/${total}]`;

    if (this.deps.isCancelled()) {
      entry.setStatus('cancelled');
      return false;
    }
    if (!entry.fetchedPath || !(await isFile(entry.fetchedPath))) {
      entry.setStatus('error', 'Source file missing');
      this.sink.log(`${position} Source file missing: ${entry.url}`);
      return false;
    }

    const outputPath = cache.normalizedPath(entry.videoId);
    if (await isFile(outputPath)) {
      entry.markNormalized(outputPath);
      this.sink.log(`${position} Cache hit: ${entry.title}`);
      return true;
    }

    entry.setStatus('normalizing');
    entry.setProgress(0);
    this.sink.log(`${position} Processing: ${entry.title}`);

    const { width, height } = resolutionOf(settings);
    const trim = trimWindow(entry);
    if (trim.startSeconds > 0 || trim.durationSeconds !== undefined) {
      const end = trim.durationSeconds === undefined ? 'end' : secondsToTimestamp(trim.startSeconds + trim.durationSeconds);
      this.sink.log(`  Trim: ${secondsToTimestamp(trim.startSeconds)} to ${end}`);
    }
    const hasAudio = await this.deps.prober.hasAudioStream(entry.fetchedPath);
    const args = buildNormalizeArgs({
      sourcePath: entry.fetchedPath,
      outputPath,
      width,
      height,
      encoder,
      startSeconds: trim.startSeconds,
      durationSeconds: trim.durationSeconds,
      silentAudio: !hasAudio,
    });

    const expected = trim.durationSeconds ?? entry.duration - trim.startSeconds;
    const outcome = await this.deps.runner.run(this.deps.ffmpegPath, args, {
      timeoutMs: PROCESS_LIMITS.normalizeTimeoutMs,
      onStderrLine: (line) => {
        const clock = parseFfmpegClock(line);
        if (clock !== null && expected > 0) entry.setProgress(clock / expected);
      },
    });

    if (!succeeded(outcome)) {
      const message = failureMessage(outcome);
      // A partial encode must not pass for a cache hit on the next run
      await fs.rm(outputPath, { force: true }).catch((err: unknown) => {
        logger.warn('Normalizer: could not remove partial output', { path: outputPath, err });
      });
      entry.setStatus('error', truncate(message, MESSAGE_LIMITS.entryError));
      this.sink.log(`  Process failed: ${truncate(message, MESSAGE_LIMITS.logExcerpt)}`);
      logger.error('Normalizer: ffmpeg failed', { url: entry.url, message });
      return false;
    }

    entry.markNormalized(outputPath);
    this.sink.log(`  Processed: ${entry.title}`);
    logger.info('Normalizer: normalized', { url: entry.url, path: outputPath, encoder: encoder.label });
    return true;
  }
}
