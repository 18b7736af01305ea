import { parseArgs } from 'util';
import { RunSettingsSchema, type RunSettings } from './config.js';
import { errorMessage } from './errors.js';

export const USAGE = `Usage: tubesplice run <batch-file> [options]

Options:
  -o, --output <path>        Output file (default: output.mp4)
  -r, --resolution <name>    480p | 720p | 1080p | 1440p (default: 1080p)
      --format <ext>         mp4 | mkv, used when --output has no extension
  -t, --transitions          Crossfade between clips (re-encodes)
      --fade <seconds>       Crossfade duration (default: 0.5)
      --music <path>         Background music mixed under the output
      --music-volume <0..1>  Background music volume (default: 0.15)
  -c, --concurrency <n>      Parallel downloads
      --no-cache-reuse       Always download, even when a cached file exists
  -h, --help                 Show this help`;

export type CliCommand =
  | { kind: 'run'; batchFile: string; settings: RunSettings }
  | { kind: 'help' }
  | { kind: 'usage-error'; message: string };

function toNumber(flag: string, raw: string | undefined): number | undefined {
  if (raw === undefined) return undefined;
  const value = Number(raw);
  if (!Number.isFinite(value)) throw new Error(`--${flag} expects a number, got "${raw}"`);
  return value;
}

function readArgs(argv: readonly string[]) {
  return parseArgs({
    args: [...argv],
    allowPositionals: true,
    options: {
      output:           { type: 'string', short: 'o' },
      resolution:       { type: 'string', short: 'r' },
      format:           { type: 'string' },
      transitions:      { type: 'boolean', short: 't' },
      fade:             { type: 'string' },
      music:            { type: 'string' },
      'music-volume':   { type: 'string' },
      concurrency:      { type: 'string', short: 'c' },
      'no-cache-reuse': { type: 'boolean' },
      help:             { type: 'boolean', short: 'h' },
    },
  });
}

/** Turn `argv` (without node and script) into a command. Never throws. */
export function parseCli(argv: readonly string[]): CliCommand {
  let parsed: ReturnType<typeof readArgs>;
  try {
    parsed = readArgs(argv);
  } catch (err) {
    return { kind: 'usage-error', message: errorMessage(err) };
  }

  const { values, positionals } = parsed;
  if (values.help) return { kind: 'help' };

  const [command, batchFile] = positionals;
  if (command !== 'run') {
    return { kind: 'usage-error', message: command ? `Unknown command "${command}"` : 'Missing command' };
  }
  if (!batchFile) return { kind: 'usage-error', message: 'Missing <batch-file>' };

  const settings: Record<string, unknown> = {};
  try {
    if (values.output !== undefined) settings['outputPath'] = values.output;
    if (values.resolution !== undefined) settings['resolution'] = values.resolution;
    if (values.format !== undefined) settings['outputFormat'] = values.format;
    if (values.transitions) settings['enableTransitions'] = true;
    if (values.music !== undefined) settings['backgroundMusic'] = values.music;
    if (values['no-cache-reuse']) settings['reuseCachedDownloads'] = false;
    const fade = toNumber('fade', values.fade);
    if (fade !== undefined) settings['fadeDuration'] = fade;
    const volume = toNumber('music-volume', values['music-volume']);
    if (volume !== undefined) settings['musicVolume'] = volume;
    const concurrency = toNumber('concurrency', values.concurrency);
    if (concurrency !== undefined) settings['maxConcurrentFetches'] = concurrency;
  } catch (err) {
    return { kind: 'usage-error', message: errorMessage(err) };
  }

  const checked = RunSettingsSchema.safeParse(settings);
  if (!checked.success) {
    const issues = checked.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    return { kind: 'usage-error', message: `Invalid options: ${issues.join('; ')}` };
  }
  return { kind: 'run', batchFile, settings: Object.freeze(checked.data) };
}
