import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { config as dotenvConfig } from 'dotenv';

dotenvConfig();

// ── Env Schema ────────────────────────────────────────────────────────────────

const EnvSchema = z.object({
  // Binaries (optional, otherwise discovered on PATH)
  FFMPEG_PATH:             z.string().min(1).optional(),
  FFPROBE_PATH:            z.string().min(1).optional(),
  YT_DLP_PATH:             z.string().min(1).optional(),

  // Local cache
  CACHE_DIR:               z.string().min(1).default(path.join(os.homedir(), '.cache', 'tubesplice')),

  // Pipeline throughput
  MAX_CONCURRENT_FETCHES:  z.coerce.number().int().min(1).default(3),
  FETCH_MAX_ATTEMPTS:      z.coerce.number().int().min(1).default(3),
  NORMALIZE_TIMEOUT_MS:    z.coerce.number().int().positive().default(600_000),

  // Encoder override (skip GPU probing)
  FORCE_SOFTWARE_ENCODER:  z.string().transform(v => v === 'true').default('false'),

  // Logging
  LOG_LEVEL:               z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT:              z.enum(['text', 'json']).default('text'),
});

const parsed = EnvSchema.safeParse(process.env);
if (!parsed.success) {
  const missing = parsed.error.issues.map(i => i.path.join('.')).join(', ');
  throw new Error(`Missing or invalid environment variables: ${missing}`);
}

export const env = parsed.data;

// ── Resolution Presets ────────────────────────────────────────────────────────

export const RESOLUTIONS = {
  '480p':  { width: 854,  height: 480 },
  '720p':  { width: 1280, height: 720 },
  '1080p': { width: 1920, height: 1080 },
  '1440p': { width: 2560, height: 1440 },
} as const;

export type ResolutionName = keyof typeof RESOLUTIONS;

const RESOLUTION_NAMES = ['480p', '720p', '1080p', '1440p'] as const satisfies readonly ResolutionName[];

// ── Media Defaults ────────────────────────────────────────────────────────────

export const VIDEO = {
  fps:                  30,
  fadeDuration:         0.5,
  fallbackClipSeconds:  5,    // stands in for clips whose duration cannot be probed
  intermediateExt:      'mp4',
} as const;

export const AUDIO = {
  codec:       'aac',
  bitrate:     '192k',
  sampleRate:  44100,
  channels:    2,
} as const;

// ── Fetch Policy ──────────────────────────────────────────────────────────────

export const FETCH_POLICY = {
  maxAttempts:          env.FETCH_MAX_ATTEMPTS,
  backoffBaseMs:        2_000,  // 2^attempt seconds: 2s, 4s, 8s …
  internalRetries:      3,
  concurrentFragments:  8,
  knownExtensions:      ['.mp4', '.mkv', '.webm', '.m4a'],
} as const;

// ── Process Limits ────────────────────────────────────────────────────────────

export const PROCESS_LIMITS = {
  normalizeTimeoutMs:   env.NORMALIZE_TIMEOUT_MS,
  probeTimeoutMs:       30_000,
  detectTimeoutMs:      5_000,
  killGraceMs:          5_000,
  stderrTailChars:      4_096,
} as const;

export const MESSAGE_LIMITS = {
  entryError:     120,
  diagnosticTail: 400,
  logExcerpt:     200,
  attemptLog:     80,
} as const;

// ── Run Settings ──────────────────────────────────────────────────────────────

export const RunSettingsSchema = z.object({
  resolution:            z.enum(RESOLUTION_NAMES).default('1080p'),
  outputPath:            z.string().min(1).default('output.mp4'),
  outputFormat:          z.enum(['mp4', 'mkv']).default('mp4'),
  enableTransitions:     z.boolean().default(false),
  fadeDuration:          z.number().positive().default(VIDEO.fadeDuration),
  backgroundMusic:       z.string().optional(),
  musicVolume:           z.number().min(0).max(1).default(0.15),
  maxConcurrentFetches:  z.number().int().min(1).default(env.MAX_CONCURRENT_FETCHES),
  reuseCachedDownloads:  z.boolean().default(true),
});

export type RunSettingsInput = z.input<typeof RunSettingsSchema>;
export type RunSettings = Readonly<z.output<typeof RunSettingsSchema>>;

export function resolutionOf(settings: RunSettings): { width: number; height: number } {
  return RESOLUTIONS[settings.resolution];
}
