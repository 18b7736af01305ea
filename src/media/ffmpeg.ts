/**
 * FFmpeg argument and filter-graph builders for normalization, concat
 * demuxer joins, chained crossfades and background-music mixing.
 *
 * Everything here is pure: the functions return argv vectors (without the
 * binary itself) and filter strings; running them is the caller's job.
 */
import { AUDIO, VIDEO } from '../config.js';
import { videoEncodeArgs, type EncoderProfile } from './encoder.js';

const QUIET = ['-hide_banner', '-loglevel', 'warning'] as const;
const FASTSTART = ['-movflags', '+faststart'] as const;

const seconds = (value: number): string => value.toFixed(3);

function containerArgs(outputPath: string): readonly string[] {
  return outputPath.toLowerCase().endsWith('.mp4') ? FASTSTART : [];
}

// ── Normalization ─────────────────────────────────────────────────────────────

/** scale → pad → setsar → fps: exact target size, aspect preserved, black bars. */
export function letterboxFilter(width: number, height: number, fps: number = VIDEO.fps): string {
  return (
    `scale=${width}:${height}:force_original_aspect_ratio=decrease,` +
    `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2:black,` +
    `setsar=1,fps=${fps}`
  );
}

export function silentAudioSource(): string {
  return `anullsrc=channel_layout=stereo:sample_rate=${AUDIO.sampleRate}`;
}

export interface NormalizeCommand {
  sourcePath: string;
  outputPath: string;
  width: number;
  height: number;
  encoder: EncoderProfile;
  /** Seek applied before `-i` (fast input seeking) */
  startSeconds?: number;
  /** Output duration limit */
  durationSeconds?: number;
  /** Add a synthesized silent track because the source has no audio */
  silentAudio: boolean;
}

export function buildNormalizeArgs(cmd: NormalizeCommand): string[] {
  const args: string[] = ['-y', ...cmd.encoder.hwaccelArgs, ...QUIET];

  if (cmd.startSeconds !== undefined && cmd.startSeconds > 0) {
    args.push('-ss', seconds(cmd.startSeconds));
  }
  args.push('-i', cmd.sourcePath);

  if (cmd.silentAudio) {
    args.push('-f', 'lavfi', '-i', silentAudioSource());
  }
  if (cmd.durationSeconds !== undefined && cmd.durationSeconds > 0) {
    args.push('-t', seconds(cmd.durationSeconds));
  }

  args.push('-vf', letterboxFilter(cmd.width, cmd.height));
  args.push(...videoEncodeArgs(cmd.encoder));
  args.push(
    '-c:a', AUDIO.codec,
    '-b:a', AUDIO.bitrate,
    '-ar', String(AUDIO.sampleRate),
    '-ac', String(AUDIO.channels),
  );

  if (cmd.silentAudio) {
    args.push('-map', '0:v:0', '-map', '1:a:0', '-shortest');
  }

  args.push(...FASTSTART, cmd.outputPath);
  return args;
}

// ── Concat demuxer ────────────────────────────────────────────────────────────

/** One `file '<path>'` line per clip; backslashes become `/`, quotes are escaped. */
export function concatListContent(filePaths: readonly string[]): string {
  return filePaths
    .map((p) => `file '${p.replace(/\\/g, '/').replace(/'/g, "'\\''")}'\n`)
    .join('');
}

export function buildConcatArgs(listPath: string, outputPath: string): string[] {
  return [
    '-y', ...QUIET,
    '-f', 'concat', '-safe', '0', '-i', listPath,
    '-c', 'copy', ...containerArgs(outputPath), outputPath,
  ];
}

// ── Crossfade ─────────────────────────────────────────────────────────────────

export interface CrossfadeGraph {
  /** Complete `-filter_complex` expression, video chains before audio chains */
  filter: string;
  /** Literal `offset=` value of each xfade, one per transition */
  xfadeOffsets: number[];
  /** Running timeline length after each clip has been appended */
  timeline: number[];
}

/**
 * Chain `n` clips with xfade/acrossfade in a single graph.
 *
 * Each transition starts `fade` seconds before the end of the timeline built
 * so far, and the timeline then grows by the next clip's full duration. The
 * overlap is subtracted once per transition; summing raw durations would
 * push every later transition past the end of its input.
 */
export function buildCrossfadeGraph(
  durations: readonly number[],
  fade: number,
  fallbackSeconds: number = VIDEO.fallbackClipSeconds,
): CrossfadeGraph {
  const n = durations.length;
  if (n < 2) {
    throw new Error('buildCrossfadeGraph: at least two clips are required');
  }
  const lengthOf = (i: number): number => {
    const d = durations[i];
    return d !== undefined && Number.isFinite(d) && d > 0 ? d : fallbackSeconds;
  };

  const videoChains: string[] = [];
  const audioChains: string[] = [];
  const xfadeOffsets: number[] = [];
  let running = lengthOf(0);
  const timeline: number[] = [running];

  for (let i = 1; i < n; i++) {
    const last = i === n - 1;
    const vIn = i === 1 ? `[${i - 1}:v]` : `[vf${i - 1}]`;
    const aIn = i === 1 ? `[${i - 1}:a]` : `[af${i - 1}]`;
    const vOut = last ? '[vout]' : `[vf${i}]`;
    const aOut = last ? '[aout]' : `[af${i}]`;

    const offset = Math.max(running - fade, 0);
    xfadeOffsets.push(offset);
    videoChains.push(`${vIn}[${i}:v]xfade=transition=fade:duration=${fade}:offset=${seconds(offset)}${vOut}`);
    audioChains.push(`${aIn}[${i}:a]acrossfade=d=${fade}:c1=tri:c2=tri${aOut}`);

    running = offset + lengthOf(i);
    timeline.push(running);
  }

  return { filter: [...videoChains, ...audioChains].join(';'), xfadeOffsets, timeline };
}

export function buildCrossfadeArgs(
  inputs: readonly string[],
  graph: CrossfadeGraph,
  encoder: EncoderProfile,
  outputPath: string,
): string[] {
  const args: string[] = ['-y', ...encoder.hwaccelArgs, ...QUIET];
  for (const input of inputs) {
    args.push('-i', input);
  }
  args.push(
    '-filter_complex', graph.filter,
    '-map', '[vout]', '-map', '[aout]',
    ...videoEncodeArgs(encoder),
    '-c:a', AUDIO.codec,
    ...containerArgs(outputPath),
    outputPath,
  );
  return args;
}

// ── Background music ──────────────────────────────────────────────────────────

/** Loop the music forever, scale it, mix under the original audio for the original's length. */
export function musicMixGraph(volume: number): string {
  return (
    `[1:a]aloop=loop=-1:size=2e+09,volume=${volume}[bg];` +
    `[0:a][bg]amix=inputs=2:duration=first:dropout_transition=3[aout]`
  );
}

export function buildMusicOverlayArgs(
  videoPath: string,
  musicPath: string,
  volume: number,
  outputPath: string,
): string[] {
  return [
    '-y', ...QUIET,
    '-i', videoPath, '-i', musicPath,
    '-filter_complex', musicMixGraph(volume),
    '-map', '0:v', '-map', '[aout]',
    '-c:v', 'copy', '-c:a', AUDIO.codec,
    '-shortest', ...containerArgs(outputPath), outputPath,
  ];
}
