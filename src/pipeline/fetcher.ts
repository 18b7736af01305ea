/**
 * Fetch manager: downloads one entry into the cache with retry and backoff.
 *
 * Failures are retried with `2^attempt` second waits (2s, 4s, …). The
 * cancellation flag is checked before every attempt, and the backoff sleep
 * is cut short by the run's abort signal.
 */
import { FETCH_POLICY, MESSAGE_LIMITS, type RunSettings } from '../config.js';
import { CancelledError, TubespliceError, errorMessage, truncate } from '../errors.js';
import type { MediaProber } from '../media/ffprobe.js';
import { formatSelector, type DownloadService, type TransferProgress } from '../media/ytdlp.js';
import { logger } from '../utils/logger.js';
import { withRetry, type Sleep } from '../utils/retry.js';
import { formatRate, sanitizeFilename } from '../utils/text.js';
import { extractVideoId } from './batch.js';
import { resolveDownloadedPath, type CacheLayout } from './cache.js';
import type { VideoEntry } from './entry.js';
import { noopLogSink, type LogSink } from './types.js';

export interface FetchManagerDeps {
  settings: RunSettings;
  cache: CacheLayout;
  downloads: DownloadService;
  prober: MediaProber;
  isCancelled: () => boolean;
  signal?: AbortSignal;
  sleep?: Sleep;
  logSink?: LogSink;
}

class FetchAttemptError extends TubespliceError {
  constructor(message: string, url: string) {
    super({ message, code: 'FETCH_FAILED', context: { url } });
    this.name = 'FetchAttemptError';
  }
}

export class FetchManager {
  private readonly sink: LogSink;

  constructor(private readonly deps: FetchManagerDeps) {
    this.sink = deps.logSink ?? noopLogSink;
  }

  /** Fetch `entry`; true once it is `fetched`. Never throws. */
  async fetch(entry: VideoEntry, index: number, total: number): Promise<boolean> {
    if (this.deps.isCancelled()) {
      entry.setStatus('cancelled');
      return false;
    }

    if (this.deps.settings.reuseCachedDownloads && await this.reuseCached(entry)) {
      this.sink.log(`[${index + 1}/${total}] Cached: ${entry.title || entry.url}`);
      return true;
    }

    try {
      await withRetry((attempt) => this.attempt(entry, index, total, attempt), {
        maxAttempts: FETCH_POLICY.maxAttempts,
        baseDelayMs: FETCH_POLICY.backoffBaseMs,
        isCancelled: this.deps.isCancelled,
        signal: this.deps.signal,
        sleep: this.deps.sleep,
        onRetry: (_attempt, delayMs) => this.sink.log(`  Retrying in ${delayMs / 1000}s...`),
      });
      return true;
    } catch (err) {
      if (err instanceof CancelledError) {
        entry.setStatus('cancelled');
        return false;
      }
      entry.setStatus('error', truncate(errorMessage(err), MESSAGE_LIMITS.entryError));
      this.sink.log(`  Download failed permanently: ${entry.url}`);
      logger.error('Fetcher: giving up', { url: entry.url, error: entry.error });
      return false;
    }
  }

  private async attempt(entry: VideoEntry, index: number, total: number, attempt: number): Promise<void> {
    entry.setStatus('fetching');
    entry.setProgress(0);
    this.sink.log(
      `[${index + 1}/${total}] Downloading: ${entry.url}` + (attempt > 1 ? ` (attempt ${attempt})` : ''),
    );

    try {
      const result = await this.deps.downloads.download(
        {
          url: entry.url,
          formatSelector: formatSelector(this.deps.cache.height),
          outputTemplate: this.deps.cache.rawOutputTemplate(),
        },
        (progress) => this.onTransfer(entry, progress),
      );
      if (!result.ok) {
        throw new FetchAttemptError(result.error.message, entry.url);
      }

      const media = result.value;
      const located = await resolveDownloadedPath(media.declaredPath);
      if (!located) {
        throw new FetchAttemptError('Downloaded file could not be located on disk', entry.url);
      }

      entry.recordMetadata({
        id: media.id,
        title: sanitizeFilename(media.title || `video_${index}`),
        duration: media.duration,
        thumbnailUrl: media.thumbnailUrl,
        fetchedPath: located,
      });
      entry.setStatus('fetched');
      this.sink.log(`  Done: ${entry.title}`);
      logger.info('Fetcher: downloaded', { url: entry.url, path: located });
    } catch (err) {
      this.sink.log(`  Attempt ${attempt} failed: ${truncate(errorMessage(err), MESSAGE_LIMITS.attemptLog)}`);
      throw err;
    }
  }

  private onTransfer(entry: VideoEntry, progress: TransferProgress): void {
    if (progress.phase === 'finished') {
      entry.setProgress(1);
      return;
    }
    if (progress.totalBytes !== null && progress.totalBytes > 0) {
      entry.setProgress(progress.downloadedBytes / progress.totalBytes);
    }
    if (progress.speed !== null) {
      logger.debug('Fetcher: transfer rate', { url: entry.url, rate: formatRate(progress.speed) });
    }
  }

  /** Mark `entry` fetched from an existing raw download, if there is one. */
  private async reuseCached(entry: VideoEntry): Promise<boolean> {
    const videoId = entry.videoId || extractVideoId(entry.url);
    if (!videoId) return false;

    const cached = await this.deps.cache.findRaw(videoId);
    if (!cached) return false;

    const duration = await this.deps.prober.probeDuration(cached);
    entry.recordMetadata({
      id: videoId,
      title: entry.title || videoId,
      duration,
      thumbnailUrl: entry.thumbnailUrl,
      fetchedPath: cached,
    });
    entry.setStatus('fetched');
    logger.info('Fetcher: reusing cached download', { url: entry.url, path: cached });
    return true;
  }
}
