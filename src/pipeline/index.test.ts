import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import type { RunSettingsInput } from '../config.js';
import { InvalidSettingsError } from '../errors.js';
import { softwareEncoder } from '../media/encoder.js';
import type { DownloadService } from '../media/ytdlp.js';
import {
  FakeDownloadService, FakeProber, FakeProcessRunner, makeTempDir, recordingSleep, removeDir, settingsWith,
  writesOutput, type ProcessHandler, type RecordedCall,
} from '../testing/fakes.js';
import { isFile } from '../utils/fs.js';
import { MergeEngine, resolveOutputPath } from './index.js';
import { VideoEntry } from './entry.js';
import { RecordingSink } from './types.js';

const isConcat = (call: RecordedCall) => call.args.includes('concat');
const isCrossfade = (call: RecordedCall) => call.args.some((a) => a.includes('xfade='));
const isOverlay = (call: RecordedCall) => call.args.some((a) => a.includes('amix='));
const isNormalize = (call: RecordedCall) => call.args.includes('-vf');

function batch(...ids: string[]): VideoEntry[] {
  return ids.map((id) => new VideoEntry(`https://youtu.be/${id}`));
}

describe('MergeEngine', () => {
  let dir: string;
  let cacheDir: string;
  let output: string;
  let sink: RecordingSink;

  beforeEach(async () => {
    dir = await makeTempDir();
    cacheDir = path.join(dir, 'cache');
    output = path.join(dir, 'out', 'final.mp4');
    sink = new RecordingSink();
  });
  afterEach(async () => { await removeDir(dir); });

  interface Parts {
    runner?: FakeProcessRunner;
    downloads?: DownloadService;
    prober?: FakeProber;
  }

  function engineFor(entries: VideoEntry[], settings: RunSettingsInput = {}, parts: Parts = {}): MergeEngine {
    return new MergeEngine(entries, { outputPath: output, ...settings }, {
      ffmpegPath: 'ffmpeg',
      encoder: softwareEncoder(),
      runner: parts.runner ?? new FakeProcessRunner(),
      prober: parts.prober ?? new FakeProber(),
      downloads: parts.downloads ?? new FakeDownloadService(),
      cacheDir,
      logSink: sink,
      progressSink: sink,
      sleep: recordingSleep().sleep,
    });
  }

  function concatList(ids: string[]): string {
    return ids.map((id) => `file '${path.join(cacheDir, `proc_${id}_1080.mp4`)}'\n`).join('');
  }

  it('fetches, normalizes and concatenates a whole batch', async () => {
    const runner = new FakeProcessRunner();
    const entries = batch('aaa', 'bbb', 'ccc');

    expect(await engineFor(entries, {}, { runner }).run()).toBe(true);

    expect(await isFile(output)).toBe(true);
    expect(entries.map((e) => e.state)).toEqual(['done', 'done', 'done']);
    expect(runner.calls.filter(isNormalize)).toHaveLength(3);
    expect(runner.calls.filter(isConcat)).toHaveLength(1);
    expect(await fs.readFile(path.join(cacheDir, 'concat_list.txt'), 'utf8')).toBe(concatList(['aaa', 'bbb', 'ccc']));
    expect(sink.stages).toEqual([
      { stage: 'fetch', completed: 1, total: 3 },
      { stage: 'fetch', completed: 2, total: 3 },
      { stage: 'fetch', completed: 3, total: 3 },
      { stage: 'normalize', completed: 1, total: 3 },
      { stage: 'normalize', completed: 2, total: 3 },
      { stage: 'normalize', completed: 3, total: 3 },
      { stage: 'merge', completed: 1, total: 1 },
      { stage: 'finalize', completed: 3, total: 3 },
    ]);
    expect(sink.lines[sink.lines.length - 1]).toBe(`SUCCESS: ${output}`);
  });

  it('normalizes in batch order, one at a time', async () => {
    let active = 0;
    let peak = 0;
    const handler: ProcessHandler = async (call) => {
      active += 1;
      peak = Math.max(peak, active);
      await new Promise<void>((resolve) => setImmediate(resolve));
      active -= 1;
      return writesOutput(call);
    };
    const runner = new FakeProcessRunner(handler);

    await engineFor(batch('aaa', 'bbb', 'ccc'), {}, { runner }).run();

    expect(peak).toBe(1);
    expect(runner.calls.filter(isNormalize).map((c) => path.basename(c.args[c.args.length - 1] ?? ''))).toEqual([
      'proc_aaa_1080.mp4', 'proc_bbb_1080.mp4', 'proc_ccc_1080.mp4',
    ]);
  });

  it('continues with the survivors when some fetches fail', async () => {
    const downloads = new FakeDownloadService({ failWith: (url) => (url.endsWith('bbb') ? 'Video unavailable' : null) });
    const entries = batch('aaa', 'bbb', 'ccc');

    expect(await engineFor(entries, {}, { downloads }).run()).toBe(true);

    expect(entries.map((e) => e.state)).toEqual(['done', 'error', 'done']);
    expect(entries[1]?.error).toBe('Video unavailable');
    expect(sink.lines).toContain('1 download(s) failed, continuing with 2.');
    expect(await fs.readFile(path.join(cacheDir, 'concat_list.txt'), 'utf8')).toBe(concatList(['aaa', 'ccc']));
  });

  it('fails before any processing when every fetch fails', async () => {
    const runner = new FakeProcessRunner();
    const downloads = new FakeDownloadService({ failWith: () => 'network unreachable' });
    const engine = engineFor(batch('aaa', 'bbb'), {}, { runner, downloads });

    expect(await engine.run()).toBe(false);

    expect(engine.lastFailure).toEqual({ kind: 'no_survivors', message: 'All downloads failed' });
    expect(runner.calls).toHaveLength(0);
    expect(sink.stages.every((s) => s.stage === 'fetch')).toBe(true);
    expect(await isFile(output)).toBe(false);
  });

  it('fails at the normalize boundary when nothing normalizes', async () => {
    const runner = new FakeProcessRunner(() => ({ exitCode: 1, stderrTail: 'Conversion failed!' }));
    const entries = batch('aaa', 'bbb');
    const engine = engineFor(entries, {}, { runner });

    expect(await engine.run()).toBe(false);

    expect(engine.lastFailure?.kind).toBe('no_survivors');
    expect(entries.map((e) => e.error)).toEqual(['FFmpeg exit code 1: Conversion failed!', 'FFmpeg exit code 1: Conversion failed!']);
    expect(runner.calls.filter(isConcat)).toHaveLength(0);
  });

  it('copies a single clip even with transitions enabled', async () => {
    const runner = new FakeProcessRunner();
    const entries = batch('aaa');

    expect(await engineFor(entries, { enableTransitions: true }, { runner }).run()).toBe(true);

    expect(runner.calls).toHaveLength(1);
    expect(runner.calls.some(isCrossfade)).toBe(false);
    const normalized = await fs.readFile(path.join(cacheDir, 'proc_aaa_1080.mp4'), 'utf8');
    expect(await fs.readFile(output, 'utf8')).toBe(normalized);
    expect(entries[0]?.state).toBe('done');
  });

  it('crossfades with offsets on the overlapped timeline', async () => {
    const runner = new FakeProcessRunner();
    const prober = new FakeProber((file) => (file.includes('proc_aaa') ? 10 : 8));

    expect(await engineFor(batch('aaa', 'bbb', 'ccc'), { enableTransitions: true, fadeDuration: 1 }, { runner, prober }).run())
      .toBe(true);

    const crossfade = runner.calls.find(isCrossfade);
    const filter = crossfade?.args[crossfade.args.indexOf('-filter_complex') + 1] ?? '';
    expect(filter).toContain('[0:v][1:v]xfade=transition=fade:duration=1:offset=9.000[vf1]');
    expect(filter).toContain('[vf1][2:v]xfade=transition=fade:duration=1:offset=16.000[vout]');
    expect(runner.calls.some(isConcat)).toBe(false);
  });

  it('falls back to the same concat a no-transition run produces', async () => {
    const failingCrossfade: ProcessHandler = (call) =>
      isCrossfade(call) ? { exitCode: 1, stderrTail: 'xfade: invalid offset' } : writesOutput(call);
    const withTransitions = new FakeProcessRunner(failingCrossfade);

    expect(await engineFor(batch('aaa', 'bbb', 'ccc'), { enableTransitions: true }, { runner: withTransitions }).run())
      .toBe(true);
    const fallbackOutput = await fs.readFile(output, 'utf8');
    const fallbackList = await fs.readFile(path.join(cacheDir, 'concat_list.txt'), 'utf8');

    const plain = new FakeProcessRunner();
    expect(await engineFor(batch('aaa', 'bbb', 'ccc'), {}, { runner: plain }).run()).toBe(true);

    expect(sink.lines).toContain('  Crossfade failed, falling back to fast concat.');
    expect(withTransitions.calls.filter(isCrossfade)).toHaveLength(1);
    expect(withTransitions.calls.filter(isConcat).map((c) => c.args)).toEqual(plain.calls.filter(isConcat).map((c) => c.args));
    expect(await fs.readFile(path.join(cacheDir, 'concat_list.txt'), 'utf8')).toBe(fallbackList);
    expect(await fs.readFile(output, 'utf8')).toBe(fallbackOutput);
  });

  it('writes absolute clip paths to the concat list for a relative cache dir', async () => {
    const absolute = cacheDir;
    cacheDir = path.relative(process.cwd(), absolute);

    expect(await engineFor(batch('aaa', 'bbb')).run()).toBe(true);

    expect(await fs.readFile(path.join(absolute, 'concat_list.txt'), 'utf8')).toBe(
      `file '${path.join(absolute, 'proc_aaa_1080.mp4')}'\nfile '${path.join(absolute, 'proc_bbb_1080.mp4')}'\n`,
    );
  });

  it('reports a failed concat as a merge failure', async () => {
    const runner = new FakeProcessRunner((call) =>
      isConcat(call) ? { exitCode: 1, stderrTail: 'Non-monotonous DTS' } : writesOutput(call));
    const engine = engineFor(batch('aaa', 'bbb'), {}, { runner });

    expect(await engine.run()).toBe(false);
    expect(engine.lastFailure).toEqual({ kind: 'merge_failed', message: 'Concat failed: Non-monotonous DTS' });
  });

  describe('background music', () => {
    it('mixes music into the output in place', async () => {
      const music = path.join(dir, 'music.mp3');
      await fs.writeFile(music, 'music');
      const runner = new FakeProcessRunner();

      expect(await engineFor(batch('aaa', 'bbb'), { backgroundMusic: music, musicVolume: 0.3 }, { runner }).run()).toBe(true);

      const overlay = runner.calls.find(isOverlay);
      expect(overlay?.args.slice(-1)).toEqual([path.join(cacheDir, 'with_music.mp4')]);
      expect(await fs.readFile(output, 'utf8')).toContain('volume=0.3[bg]');
      expect(await isFile(path.join(cacheDir, 'with_music.mp4'))).toBe(false);
      expect(sink.lines).toContain('  Music overlay applied.');
    });

    it('keeps the merged output when the overlay fails', async () => {
      const music = path.join(dir, 'music.mp3');
      await fs.writeFile(music, 'music');
      const runner = new FakeProcessRunner((call) =>
        isOverlay(call) ? { exitCode: 1, stderrTail: 'overlay boom' } : writesOutput(call));

      const engine = engineFor(batch('aaa', 'bbb'), { backgroundMusic: music }, { runner });
      expect(await engine.run()).toBe(true);

      expect(engine.lastFailure).toBeNull();
      expect(await fs.readFile(output, 'utf8')).toContain('-f concat');
      expect(sink.lines).toContain('  Music overlay failed: overlay boom');
      expect(sink.stages[sink.stages.length - 1]).toEqual({ stage: 'finalize', completed: 2, total: 2 });
    });

    it('skips the overlay when the music file does not exist', async () => {
      const runner = new FakeProcessRunner();
      const music = path.join(dir, 'missing.mp3');

      expect(await engineFor(batch('aaa', 'bbb'), { backgroundMusic: music }, { runner }).run()).toBe(true);
      expect(runner.calls.some(isOverlay)).toBe(false);
    });
  });

  describe('run control', () => {
    it('refuses an empty batch', async () => {
      const engine = engineFor([]);
      expect(await engine.run()).toBe(false);
      expect(engine.lastFailure).toEqual({ kind: 'empty_batch', message: 'No videos in queue' });
      expect(sink.lines).toEqual(['No videos in queue.']);
    });

    it('refuses a second run while one is in progress', async () => {
      const engine = engineFor(batch('aaa'));
      const first = engine.run();
      expect(engine.isRunning).toBe(true);
      expect(await engine.run()).toBe(false);
      expect(await first).toBe(true);
      expect(engine.isRunning).toBe(false);
    });

    it('stops starting fetches once cancelled', async () => {
      const runner = new FakeProcessRunner();
      const fake = new FakeDownloadService();
      const entries = batch('aaa', 'bbb', 'ccc');
      let engine: MergeEngine | undefined;
      const downloads: DownloadService = {
        download: (request, onProgress) => {
          engine?.cancel();
          return fake.download(request, onProgress);
        },
      };
      engine = engineFor(entries, { maxConcurrentFetches: 1 }, { runner, downloads });

      expect(await engine.run()).toBe(false);

      expect(engine.lastFailure?.kind).toBe('cancelled');
      expect(entries.map((e) => e.state)).toEqual(['fetched', 'cancelled', 'cancelled']);
      expect(fake.requests).toHaveLength(1);
      expect(runner.calls).toHaveLength(0);
    });

    it('does not overlay music once cancelled during the merge', async () => {
      const music = path.join(dir, 'music.mp3');
      await fs.writeFile(music, 'music');
      let engine: MergeEngine | undefined;
      const runner = new FakeProcessRunner((call) => {
        if (isConcat(call)) engine?.cancel();
        return writesOutput(call);
      });
      engine = engineFor(batch('aaa', 'bbb'), { backgroundMusic: music }, { runner });

      expect(await engine.run()).toBe(false);

      expect(engine.lastFailure?.kind).toBe('cancelled');
      expect(runner.calls.some(isOverlay)).toBe(false);
      expect(sink.lines).not.toContain('Overlaying background music...');
    });

    it('does not fall back to concat once cancelled during a crossfade', async () => {
      let engine: MergeEngine | undefined;
      const runner = new FakeProcessRunner((call) => {
        if (!isCrossfade(call)) return writesOutput(call);
        engine?.cancel();
        return { exitCode: 1, stderrTail: 'xfade: invalid offset' };
      });
      const entries = batch('aaa', 'bbb');
      engine = engineFor(entries, { enableTransitions: true }, { runner });

      expect(await engine.run()).toBe(false);

      expect(engine.lastFailure?.kind).toBe('cancelled');
      expect(runner.calls.some(isConcat)).toBe(false);
      expect(entries.map((e) => e.state)).toEqual(['normalized', 'normalized']);
    });

    it('re-runs from the cache without downloading or encoding again', async () => {
      const runner = new FakeProcessRunner();
      const downloads = new FakeDownloadService();
      const entries = batch('aaa', 'bbb');
      const engine = engineFor(entries, {}, { runner, downloads });

      expect(await engine.run()).toBe(true);
      expect(await engine.run()).toBe(true);

      expect(downloads.requests).toHaveLength(2);
      expect(runner.calls.filter(isNormalize)).toHaveLength(2);
      expect(runner.calls.filter(isConcat)).toHaveLength(2);
      expect(entries.map((e) => e.state)).toEqual(['done', 'done']);
    });

    it('rejects invalid settings at construction', () => {
      expect(() => engineFor(batch('aaa'), { fadeDuration: -1 })).toThrow(InvalidSettingsError);
    });

    it('exposes entry snapshots', async () => {
      const engine = engineFor(batch('aaa'));
      await engine.run();
      expect(engine.snapshots()).toEqual([
        expect.objectContaining({ url: 'https://youtu.be/aaa', displayTitle: 'Clip aaa', state: 'done', progress: 1 }),
      ]);
    });
  });
});

describe('resolveOutputPath', () => {
  it('appends the container extension to a bare name', () => {
    expect(resolveOutputPath(settingsWith({ outputPath: '/videos/final', outputFormat: 'mkv' }))).toBe('/videos/final.mkv');
    expect(resolveOutputPath(settingsWith({ outputPath: '/videos/final.mp4', outputFormat: 'mkv' }))).toBe('/videos/final.mp4');
  });
});
