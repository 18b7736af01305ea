/**
 * Encoder profile detection.
 *
 * Runs once per engine: an NVIDIA GPU (nvidia-smi present and exiting 0)
 * selects h264_nvenc, anything else falls back to libx264. The resulting
 * profile is frozen and passed into the engine, so tests can inject one.
 */
import { env, PROCESS_LIMITS } from '../config.js';
import { logger } from '../utils/logger.js';
import { findExecutable } from './binaries.js';
import { succeeded, type ProcessRunner } from './process.js';

export interface EncoderProfile {
  readonly codec: string;
  readonly hwaccelArgs: readonly string[];
  readonly qualityArgs: readonly string[];
  readonly preset: string;
  readonly isHardware: boolean;
  readonly label: string;
}

export function softwareEncoder(): EncoderProfile {
  return Object.freeze({
    codec:       'libx264',
    hwaccelArgs: Object.freeze<string[]>([]),
    qualityArgs: Object.freeze(['-crf', '23']),
    preset:      'ultrafast',
    isHardware:  false,
    label:       'libx264 (CPU)',
  });
}

export function nvencEncoder(): EncoderProfile {
  return Object.freeze({
    codec:       'h264_nvenc',
    hwaccelArgs: Object.freeze(['-hwaccel', 'cuda']),
    qualityArgs: Object.freeze(['-cq', '23', '-spatial_aq', '1']),
    preset:      'p4',
    isHardware:  true,
    label:       'h264_nvenc (GPU)',
  });
}

/** Video encoding flags shared by normalize and crossfade: codec, preset, quality. */
export function videoEncodeArgs(profile: EncoderProfile): string[] {
  return ['-c:v', profile.codec, '-preset', profile.preset, ...profile.qualityArgs];
}

export async function detectEncoder(
  runner: ProcessRunner,
  locate: (name: string) => string | null = findExecutable,
): Promise<EncoderProfile> {
  if (env.FORCE_SOFTWARE_ENCODER) {
    logger.info('Encoder: software encoder forced by FORCE_SOFTWARE_ENCODER');
    return softwareEncoder();
  }

  const smi = locate('nvidia-smi');
  if (!smi) {
    logger.info('Encoder: nvidia-smi not found, using libx264');
    return softwareEncoder();
  }

  const outcome = await runner.run(smi, [], { timeoutMs: PROCESS_LIMITS.detectTimeoutMs });
  if (!succeeded(outcome)) {
    logger.warn('Encoder: GPU detection failed, falling back to CPU', {
      exitCode: outcome.exitCode,
      timedOut: outcome.timedOut,
      spawnError: outcome.spawnError,
    });
    return softwareEncoder();
  }

  logger.info('Encoder: NVIDIA GPU detected, using h264_nvenc');
  return nvencEncoder();
}
