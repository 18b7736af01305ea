/**
 * Merge engine: the four-stage pipeline over one batch.
 *
 * 1. Fetch      parallel, bounded by `maxConcurrentFetches`
 * 2. Normalize  sequential, original order (one encoder, one job at a time)
 * 3. Merge      copy / concat demuxer / crossfade re-encode with concat fallback
 * 4. Overlay    optional background music, failure keeps the merged output
 *
 * Per-entry failures never abort siblings; a stage that ends with nothing
 * usable aborts the run at that boundary. `cancel()` stops new work and cuts
 * backoff sleeps short, but never kills a process that is already running.
 */
import * as fs from 'fs/promises';
import * as path from 'path';
import {
  env, MESSAGE_LIMITS, RunSettingsSchema, resolutionOf,
  type RunSettings, type RunSettingsInput,
} from '../config.js';
import {
  InvalidSettingsError, errorMessage, fail, succeed, tail, truncate,
  type Outcome, type PipelineFailure,
} from '../errors.js';
import { discoverBinaries } from '../media/binaries.js';
import { detectEncoder, type EncoderProfile } from '../media/encoder.js';
import {
  buildConcatArgs, buildCrossfadeArgs, buildCrossfadeGraph, buildMusicOverlayArgs, concatListContent,
} from '../media/ffmpeg.js';
import { FfprobeMediaProber, type MediaProber } from '../media/ffprobe.js';
import { SpawnProcessRunner, succeeded, type ProcessRunner } from '../media/process.js';
import { YtDlpDownloadService, type DownloadService } from '../media/ytdlp.js';
import { isFile, moveFile } from '../utils/fs.js';
import { logger } from '../utils/logger.js';
import { runPool } from '../utils/pool.js';
import type { Sleep } from '../utils/retry.js';
import { CacheLayout } from './cache.js';
import type { EntrySnapshot, VideoEntry } from './entry.js';
import { FetchManager } from './fetcher.js';
import { Normalizer } from './normalizer.js';
import { noopLogSink, noopProgressSink, type LogSink, type StageProgressSink } from './types.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface MergeEngineDeps {
  ffmpegPath: string;
  encoder: EncoderProfile;
  runner: ProcessRunner;
  prober: MediaProber;
  downloads: DownloadService;
  cacheDir?: string;
  logSink?: LogSink;
  progressSink?: StageProgressSink;
  /** Backoff sleep; tests pass a recorder */
  sleep?: Sleep;
}

export interface CreateEngineOptions {
  cacheDir?: string;
  logSink?: LogSink;
  progressSink?: StageProgressSink;
}

const RULE = '━'.repeat(50);

function parseSettings(input: RunSettingsInput): RunSettings {
  const parsed = RunSettingsSchema.safeParse(input);
  if (!parsed.success) {
    throw new InvalidSettingsError(parsed.error.issues.map((i) => `${i.path.join('.') || 'settings'}: ${i.message}`));
  }
  return Object.freeze(parsed.data);
}

/** Final output path; a bare name gets the configured container extension. */
export function resolveOutputPath(settings: RunSettings): string {
  const resolved = path.resolve(settings.outputPath);
  return path.extname(resolved) ? resolved : `${resolved}.${settings.outputFormat}`;
}

// ── MergeEngine ───────────────────────────────────────────────────────────────

export class MergeEngine {
  readonly settings: RunSettings;
  readonly cache: CacheLayout;
  private readonly sink: LogSink;
  private readonly progress: StageProgressSink;
  private running = false;
  private cancelled = false;
  private abort = new AbortController();
  private failure: PipelineFailure | null = null;

  constructor(
    private readonly entries: readonly VideoEntry[],
    settings: RunSettingsInput,
    private readonly deps: MergeEngineDeps,
  ) {
    this.settings = parseSettings(settings);
    this.cache = new CacheLayout(deps.cacheDir ?? env.CACHE_DIR, resolutionOf(this.settings).height);
    this.sink = deps.logSink ?? noopLogSink;
    this.progress = deps.progressSink ?? noopProgressSink;
  }

  get isRunning(): boolean { return this.running; }
  get isCancelled(): boolean { return this.cancelled; }

  /** Why the last run failed, or null after a successful run. */
  get lastFailure(): PipelineFailure | null { return this.failure; }

  snapshots(): EntrySnapshot[] {
    return this.entries.map((e) => e.snapshot());
  }

  /** Stop starting new work. Safe to call at any time, any number of times. */
  cancel(): void {
    if (this.cancelled) return;
    this.cancelled = true;
    this.abort.abort();
    this.sink.log('Cancelling...');
    logger.warn('Engine: cancel requested');
  }

  /** Run the whole pipeline; true when an output file was produced. */
  async run(): Promise<boolean> {
    if (this.running) {
      logger.warn('Engine: run() ignored, a run is already in progress');
      return false;
    }
    this.running = true;
    this.cancelled = false;
    this.abort = new AbortController();
    this.failure = null;

    try {
      const outcome = await this.execute();
      if (!outcome.ok) {
        this.failure = outcome.error;
        logger.warn('Engine: run failed', { ...outcome.error });
        return false;
      }
      return true;
    } catch (err) {
      this.failure = { kind: 'merge_failed', message: truncate(errorMessage(err), MESSAGE_LIMITS.diagnosticTail) };
      this.sink.log(`Pipeline error: ${errorMessage(err)}`);
      logger.error('Engine: pipeline failed', { err });
      return false;
    } finally {
      this.running = false;
    }
  }

  private async execute(): Promise<Outcome<string>> {
    const total = this.entries.length;
    if (total === 0) {
      this.sink.log('No videos in queue.');
      return fail('empty_batch', 'No videos in queue');
    }

    for (const entry of this.entries) {
      if (entry.state !== 'pending') entry.reset();
    }
    await this.cache.ensure();

    this.sink.log(`Engine: ${this.deps.encoder.label} | ${total} video(s)`);
    this.sink.log(`  Resolution: ${this.settings.resolution}`);
    this.sink.log(`  Cache: ${this.cache.root}`);
    logger.info('Engine: starting run', { total, resolution: this.settings.resolution });

    const fetched = await this.stageFetch();
    if (!fetched.ok) return fetched;

    const normalized = await this.stageNormalize();
    if (!normalized.ok) return normalized;

    const merged = await this.stageMerge();
    if (!merged.ok) return merged;

    if (this.cancelled) return this.cancelledOutcome();
    await this.stageOverlay(merged.value);

    this.progress.onStage('finalize', total, total);
    this.sink.log(`SUCCESS: ${merged.value}`);
    logger.info('Engine: run complete', { output: merged.value });
    return merged;
  }

  private banner(title: string): void {
    this.sink.log(RULE);
    this.sink.log(title);
    this.sink.log(RULE);
  }

  private cancelledOutcome<T>(): Outcome<T> {
    this.sink.log('Run cancelled.');
    return fail('cancelled', 'Run cancelled');
  }

  // ── Stage 1: fetch ──────────────────────────────────────────────────────────

  private async stageFetch(): Promise<Outcome<number>> {
    this.banner('STAGE 1 / 3: Downloading');
    const total = this.entries.length;
    const fetcher = new FetchManager({
      settings: this.settings,
      cache: this.cache,
      downloads: this.deps.downloads,
      prober: this.deps.prober,
      isCancelled: () => this.cancelled,
      signal: this.abort.signal,
      sleep: this.deps.sleep,
      logSink: this.sink,
    });

    let completed = 0;
    const results = await runPool(this.entries, (entry, i) => fetcher.fetch(entry, i, total), {
      limit: this.settings.maxConcurrentFetches,
      shouldStop: () => this.cancelled,
      onSkipped: (entry) => entry.setStatus('cancelled'),
      onSettled: () => {
        completed += 1;
        this.progress.onStage('fetch', completed, total);
      },
    });

    results.forEach((result, i) => {
      const entry = this.entries[i];
      if (result?.status === 'rejected' && entry) {
        entry.setStatus('error', truncate(errorMessage(result.reason), MESSAGE_LIMITS.entryError));
      }
    });
    if (this.cancelled) return this.cancelledOutcome();

    const ok = this.entries.filter((e) => e.state === 'fetched').length;
    if (ok === 0) {
      this.sink.log('All downloads failed.');
      return fail('no_survivors', 'All downloads failed');
    }
    if (ok < total) {
      this.sink.log(`${total - ok} download(s) failed, continuing with ${ok}.`);
    }
    return succeed(ok);
  }

  // ── Stage 2: normalize ──────────────────────────────────────────────────────

  private async stageNormalize(): Promise<Outcome<number>> {
    this.banner('STAGE 2 / 3: Processing & Normalizing');
    const total = this.entries.length;
    const normalizer = new Normalizer({
      settings: this.settings,
      cache: this.cache,
      encoder: this.deps.encoder,
      ffmpegPath: this.deps.ffmpegPath,
      runner: this.deps.runner,
      prober: this.deps.prober,
      isCancelled: () => this.cancelled,
      logSink: this.sink,
    });

    for (const [i, entry] of this.entries.entries()) {
      if (this.cancelled) {
        for (const rest of this.entries.slice(i)) {
          if (rest.state === 'fetched') rest.setStatus('cancelled');
        }
        return this.cancelledOutcome();
      }
      if (entry.state === 'fetched') {
        await normalizer.normalize(entry, i, total);
      }
      this.progress.onStage('normalize', i + 1, total);
    }

    const ok = this.entries.filter((e) => e.state === 'normalized').length;
    if (ok === 0) {
      this.sink.log('No videos were processed successfully.');
      return fail('no_survivors', 'No videos were processed successfully');
    }
    return succeed(ok);
  }

  // ── Stage 3: merge ──────────────────────────────────────────────────────────

  private async stageMerge(): Promise<Outcome<string>> {
    this.banner('STAGE 3 / 3: Merging');
    if (this.cancelled) return this.cancelledOutcome();

    const merged: VideoEntry[] = [];
    for (const entry of this.entries) {
      if (entry.state === 'normalized' && await isFile(entry.normalizedPath)) merged.push(entry);
    }
    if (merged.length === 0) {
      this.sink.log('No processed files available to merge.');
      return fail('merge_failed', 'No processed files available to merge');
    }

    const files = merged.map((e) => e.normalizedPath);
    const output = resolveOutputPath(this.settings);
    await fs.mkdir(path.dirname(output), { recursive: true });

    let outcome: Outcome<string>;
    if (files.length === 1 && files[0] !== undefined) {
      await fs.copyFile(files[0], output);
      this.sink.log('  Single file copied to output.');
      outcome = succeed(output);
    } else if (this.settings.enableTransitions) {
      outcome = await this.mergeCrossfade(files, output);
    } else {
      outcome = await this.mergeConcat(files, output);
    }
    this.progress.onStage('merge', 1, 1);

    if (outcome.ok) {
      for (const entry of merged) entry.setStatus('done');
    }
    return outcome;
  }

  private async mergeConcat(files: readonly string[], output: string): Promise<Outcome<string>> {
    this.sink.log('  Fast concat (no re-encode)...');
    const listPath = this.cache.concatListPath();
    await fs.writeFile(listPath, concatListContent(files), 'utf8');

    const result = await this.deps.runner.run(this.deps.ffmpegPath, buildConcatArgs(listPath, output));
    if (!succeeded(result)) {
      const diag = tail(result.stderrTail || result.spawnError || 'unknown', MESSAGE_LIMITS.logExcerpt);
      this.sink.log(`  Concat failed: ${diag}`);
      return fail('merge_failed', `Concat failed: ${diag}`);
    }
    return succeed(output);
  }

  private async mergeCrossfade(files: readonly string[], output: string): Promise<Outcome<string>> {
    this.sink.log(`  Crossfade merge (${files.length} files, re-encoding)...`);
    const durations: number[] = [];
    for (const file of files) {
      durations.push(await this.deps.prober.probeDuration(file));
    }

    const graph = buildCrossfadeGraph(durations, this.settings.fadeDuration);
    logger.debug('Engine: crossfade graph', { filter: graph.filter, timeline: graph.timeline });

    const result = await this.deps.runner.run(
      this.deps.ffmpegPath,
      buildCrossfadeArgs(files, graph, this.deps.encoder, output),
    );
    if (!succeeded(result)) {
      this.sink.log('  Crossfade failed, falling back to fast concat.');
      this.sink.log(`    ${tail(result.stderrTail || result.spawnError || 'unknown', MESSAGE_LIMITS.logExcerpt)}`);
      logger.warn('Engine: crossfade failed, using concat', { exitCode: result.exitCode });
      if (this.cancelled) return this.cancelledOutcome();
      return this.mergeConcat(files, output);
    }
    return succeed(output);
  }

  // ── Stage 4: music overlay ──────────────────────────────────────────────────

  private async stageOverlay(output: string): Promise<Outcome<void>> {
    const music = this.settings.backgroundMusic;
    if (!music || !(await isFile(music))) return succeed(undefined);

    this.sink.log('Overlaying background music...');
    const tmp = this.cache.musicTempPath(output);
    const result = await this.deps.runner.run(
      this.deps.ffmpegPath,
      buildMusicOverlayArgs(output, music, this.settings.musicVolume, tmp),
    );

    let outcome: Outcome<void>;
    if (succeeded(result)) {
      try {
        await moveFile(tmp, output);
        outcome = succeed(undefined);
      } catch (err) {
        outcome = fail('overlay_failed', errorMessage(err), MESSAGE_LIMITS.logExcerpt);
      }
    } else {
      outcome = fail('overlay_failed', result.stderrTail || result.spawnError || 'unknown', MESSAGE_LIMITS.logExcerpt);
    }

    if (outcome.ok) {
      this.sink.log('  Music overlay applied.');
    } else {
      this.sink.log(`  Music overlay failed: ${outcome.error.message}`);
      logger.warn('Engine: music overlay failed, keeping merged output', { message: outcome.error.message });
    }
    return outcome;
  }
}

// ── Factory ───────────────────────────────────────────────────────────────────

/** Wire an engine to the real binaries found on this host. */
export async function createMergeEngine(
  entries: readonly VideoEntry[],
  settings: RunSettingsInput,
  options: CreateEngineOptions = {},
): Promise<MergeEngine> {
  const binaries = discoverBinaries();
  const runner = new SpawnProcessRunner();
  const encoder = await detectEncoder(runner);
  return new MergeEngine(entries, settings, {
    ffmpegPath: binaries.ffmpeg,
    encoder,
    runner,
    prober: new FfprobeMediaProber(binaries.ffprobe, runner),
    downloads: new YtDlpDownloadService(binaries.ytDlp, runner),
    cacheDir: options.cacheDir,
    logSink: options.logSink,
    progressSink: options.progressSink,
  });
}

export { VideoEntry, STATE_LABELS, type EntrySnapshot, type EntryState } from './entry.js';
export { parseBatchLine, parseBatchText, loadBatchFile, isYoutubeUrl, extractVideoId } from './batch.js';
export { RecordingSink, type LogSink, type StageName, type StageProgressSink } from './types.js';
