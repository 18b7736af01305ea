/**
 * yt-dlp download service.
 *
 * Runs one transfer per call, reports progress records parsed from a custom
 * `--progress-template`, and returns the metadata yt-dlp prints after the
 * final file has been moved into place.
 */
import { z } from 'zod';
import { FETCH_POLICY, MESSAGE_LIMITS } from '../config.js';
import { fail, succeed, tail, type Outcome } from '../errors.js';
import { logger } from '../utils/logger.js';
import { describeFailure, succeeded, type ProcessRunner } from './process.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface DownloadRequest {
  url: string;
  /** yt-dlp `-f` expression */
  formatSelector: string;
  /** yt-dlp `-o` template, e.g. `<cache>/%(id)s_1080.%(ext)s` */
  outputTemplate: string;
}

export interface TransferProgress {
  phase: 'downloading' | 'finished';
  downloadedBytes: number;
  /** Exact size, else yt-dlp's estimate, else null */
  totalBytes: number | null;
  /** Bytes per second when known */
  speed: number | null;
}

export interface DownloadedMedia {
  id: string;
  title: string;
  duration: number;
  thumbnailUrl: string;
  /** Path yt-dlp reported; may carry a pre-merge extension */
  declaredPath: string;
}

export interface DownloadService {
  download(request: DownloadRequest, onProgress: (p: TransferProgress) => void): Promise<Outcome<DownloadedMedia>>;
}

/** Prefer an mp4+m4a pair within the height ceiling, then progressively anything. */
export function formatSelector(maxHeight: number): string {
  return (
    `bestvideo[height<=${maxHeight}][ext=mp4]+bestaudio[ext=m4a]` +
    `/bestvideo[height<=${maxHeight}]+bestaudio` +
    `/best[height<=${maxHeight}]/best`
  );
}

// ── Output parsing ────────────────────────────────────────────────────────────

const PROGRESS_PREFIX = 'tubesplice-progress:';
const PROGRESS_TEMPLATE =
  `download:${PROGRESS_PREFIX}%(progress.status)s|%(progress.downloaded_bytes)s` +
  '|%(progress.total_bytes)s|%(progress.total_bytes_estimate)s|%(progress.speed)s';

const InfoSchema = z.object({
  id:         z.string().min(1),
  title:      z.string().optional(),
  duration:   z.number().nullable().optional(),
  thumbnail:  z.string().nullable().optional(),
  filepath:   z.string().optional(),
  _filename:  z.string().optional(),
});

function positiveOrNull(raw: string | undefined): number | null {
  const value = Number.parseFloat(raw ?? '');
  return Number.isFinite(value) && value > 0 ? value : null;
}

/** Parse one `--progress-template` line; other lines yield null. */
export function parseProgressLine(line: string): TransferProgress | null {
  const start = line.indexOf(PROGRESS_PREFIX);
  if (start === -1) return null;
  const [status, downloadedRaw, totalRaw, estimateRaw, speedRaw] =
    line.slice(start + PROGRESS_PREFIX.length).trim().split('|');

  if (status !== 'downloading' && status !== 'finished') return null;
  const downloaded = Number.parseFloat(downloadedRaw ?? '');
  return {
    phase: status,
    downloadedBytes: Number.isFinite(downloaded) && downloaded > 0 ? downloaded : 0,
    totalBytes: positiveOrNull(totalRaw) ?? positiveOrNull(estimateRaw),
    speed: positiveOrNull(speedRaw),
  };
}

/** Parse the `after_move:%()j` info line printed once the file is final. */
export function parseInfoLine(line: string): DownloadedMedia | null {
  const trimmed = line.trim();
  if (!trimmed.startsWith('{')) return null;
  let json: unknown;
  try {
    json = JSON.parse(trimmed);
  } catch {
    return null;
  }
  const parsed = InfoSchema.safeParse(json);
  if (!parsed.success) return null;

  const info = parsed.data;
  return {
    id: info.id,
    title: info.title ?? '',
    duration: info.duration ?? 0,
    thumbnailUrl: info.thumbnail ?? '',
    declaredPath: info.filepath ?? info._filename ?? '',
  };
}

// ── Service ───────────────────────────────────────────────────────────────────

export class YtDlpDownloadService implements DownloadService {
  constructor(
    private readonly ytDlpPath: string,
    private readonly runner: ProcessRunner,
  ) {}

  buildArgs(request: DownloadRequest): string[] {
    return [
      '-f', request.formatSelector,
      '--merge-output-format', 'mp4',
      '-o', request.outputTemplate,
      '--no-playlist',
      '--no-warnings',
      '--continue',
      '--retries', String(FETCH_POLICY.internalRetries),
      '--concurrent-fragments', String(FETCH_POLICY.concurrentFragments),
      '--newline',
      '--progress',
      '--progress-template', PROGRESS_TEMPLATE,
      '--no-simulate',
      '--print', 'after_move:%()j',
      request.url,
    ];
  }

  async download(
    request: DownloadRequest,
    onProgress: (p: TransferProgress) => void,
  ): Promise<Outcome<DownloadedMedia>> {
    // Filled in by the line callback
    const found: { media: DownloadedMedia | null } = { media: null };
    const onLine = (line: string): void => {
      const progress = parseProgressLine(line);
      if (progress) {
        onProgress(progress);
        return;
      }
      found.media = parseInfoLine(line) ?? found.media;
    };

    logger.debug('yt-dlp: starting transfer', { url: request.url });
    const outcome = await this.runner.run(this.ytDlpPath, this.buildArgs(request), {
      onStdoutLine: onLine,
      onStderrLine: onLine,
    });

    if (!succeeded(outcome)) {
      const diag = outcome.stderrTail.split('\n').filter((l) => l.startsWith('ERROR')).pop();
      const reason = diag ?? describeFailure(outcome, MESSAGE_LIMITS.diagnosticTail);
      return fail('fetch_failed', `yt-dlp failed: ${tail(reason, MESSAGE_LIMITS.diagnosticTail)}`);
    }
    if (found.media === null) {
      return fail('fetch_failed', 'yt-dlp finished without reporting media metadata');
    }
    return succeed(found.media);
  }
}
