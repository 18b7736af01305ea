/**
 * FFprobe helpers. Probe failures never abort an entry: duration degrades
 * to 0 and audio presence to false, and callers substitute safe defaults.
 */
import { z } from 'zod';
import { PROCESS_LIMITS } from '../config.js';
import { logger } from '../utils/logger.js';
import { describeFailure, succeeded, type ProcessRunner } from './process.js';

const ProbeSchema = z.object({
  format: z.object({
    duration: z.coerce.number().optional(),
  }).partial().optional(),
  streams: z.array(z.object({
    codec_type: z.string().optional(),
  })).optional(),
});

export type ProbeResult = z.infer<typeof ProbeSchema>;

export interface MediaProber {
  probeDuration(filePath: string): Promise<number>;
  hasAudioStream(filePath: string): Promise<boolean>;
}

export class FfprobeMediaProber implements MediaProber {
  constructor(
    private readonly ffprobePath: string,
    private readonly runner: ProcessRunner,
  ) {}

  private async probe(filePath: string, extraArgs: string[]): Promise<ProbeResult | null> {
    const outcome = await this.runner.run(
      this.ffprobePath,
      ['-v', 'quiet', '-print_format', 'json', ...extraArgs, filePath],
      { timeoutMs: PROCESS_LIMITS.probeTimeoutMs },
    );
    if (!succeeded(outcome)) {
      logger.warn('FFprobe: probe failed', { filePath, reason: describeFailure(outcome, 200) });
      return null;
    }

    let json: unknown;
    try {
      json = JSON.parse(outcome.stdout);
    } catch {
      logger.warn('FFprobe: output is not JSON', { filePath });
      return null;
    }
    const parsed = ProbeSchema.safeParse(json);
    if (!parsed.success) {
      logger.warn('FFprobe: unexpected output shape', { filePath });
      return null;
    }
    return parsed.data;
  }

  /** Container duration in seconds; 0 when unavailable. */
  async probeDuration(filePath: string): Promise<number> {
    const result = await this.probe(filePath, ['-show_format']);
    const duration = result?.format?.duration;
    return duration !== undefined && Number.isFinite(duration) && duration > 0 ? duration : 0;
  }

  async hasAudioStream(filePath: string): Promise<boolean> {
    const result = await this.probe(filePath, ['-select_streams', 'a:0', '-show_streams']);
    return result?.streams?.some((s) => s.codec_type === 'audio') ?? false;
  }
}
