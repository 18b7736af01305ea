/**
 * Process runner. Spawns an argv vector (never a shell string), streams its
 * output line by line, enforces an optional wall-clock timeout and keeps only
 * a bounded tail of stderr.
 *
 * `run()` always resolves: a spawn failure, a timeout and a non-zero exit are
 * all reported in the returned `ProcessOutcome`.
 */
import { spawn, type ChildProcess } from 'child_process';
import { PROCESS_LIMITS } from '../config.js';
import { tail } from '../errors.js';
import { logger } from '../utils/logger.js';

// ── Types ─────────────────────────────────────────────────────────────────────

export interface RunOptions {
  /** Wall-clock limit in ms; the process is sent SIGTERM, then SIGKILL. */
  timeoutMs?: number;
  /** Stdout goes only to this callback and is not kept in `ProcessOutcome.stdout` */
  onStdoutLine?: (line: string) => void;
  onStderrLine?: (line: string) => void;
}

export interface ProcessOutcome {
  /** null when the process never started or was killed by a signal */
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  /** Empty when an `onStdoutLine` callback consumed the output */
  stdout: string;
  /** Last `PROCESS_LIMITS.stderrTailChars` characters of stderr */
  stderrTail: string;
  timedOut: boolean;
  /** Set when the binary could not be spawned at all */
  spawnError?: string;
  durationMs: number;
}

export interface ProcessRunner {
  run(command: string, args: readonly string[], options?: RunOptions): Promise<ProcessOutcome>;
}

export function succeeded(outcome: ProcessOutcome): boolean {
  return outcome.exitCode === 0 && !outcome.timedOut && outcome.spawnError === undefined;
}

/** One-line description of a failed outcome, for logs and entry errors. */
export function describeFailure(outcome: ProcessOutcome, tailChars: number): string {
  if (outcome.spawnError !== undefined) return `Failed to start: ${outcome.spawnError}`;
  if (outcome.timedOut) return 'Processing timed out';
  if (outcome.exitCode === null) return `Terminated by signal ${outcome.signal ?? 'unknown'}`;
  const diag = outcome.stderrTail.trim();
  return `exit code ${outcome.exitCode}: ${diag ? tail(diag, tailChars) : 'unknown'}`;
}

// ── Line splitting ────────────────────────────────────────────────────────────

// yt-dlp and ffmpeg redraw progress with \r; treat it as a line break too
function lineSplitter(onLine: ((line: string) => void) | undefined): {
  push: (chunk: string) => void;
  flush: () => void;
} {
  let buffer = '';
  return {
    push: (chunk) => {
      if (!onLine) return;
      buffer += chunk;
      const lines = buffer.split(/\r\n|\r|\n/);
      buffer = lines.pop() ?? '';
      for (const line of lines) {
        if (line) onLine(line);
      }
    },
    flush: () => {
      if (onLine && buffer) onLine(buffer);
      buffer = '';
    },
  };
}

// ── Spawn-backed implementation ───────────────────────────────────────────────

export class SpawnProcessRunner implements ProcessRunner {
  constructor(private readonly killGraceMs: number = PROCESS_LIMITS.killGraceMs) {}

  run(command: string, args: readonly string[], options: RunOptions = {}): Promise<ProcessOutcome> {
    const started = Date.now();
    logger.debug('Process: spawning', { command, args: args.join(' ') });

    return new Promise<ProcessOutcome>((resolve) => {
      let proc: ChildProcess;
      try {
        proc = spawn(command, [...args], { stdio: ['ignore', 'pipe', 'pipe'] });
      } catch (err) {
        resolve(this.notStarted(err, started));
        return;
      }

      let stdout = '';
      let stderrTail = '';
      let timedOut = false;
      let settled = false;
      let forceKill: NodeJS.Timeout | undefined;

      const timer = options.timeoutMs && options.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            proc.kill('SIGTERM');
            forceKill = setTimeout(() => proc.kill('SIGKILL'), this.killGraceMs);
          }, options.timeoutMs)
        : undefined;

      const outLines = lineSplitter(options.onStdoutLine);
      const errLines = lineSplitter(options.onStderrLine);

      proc.stdout?.setEncoding('utf8');
      proc.stdout?.on('data', (chunk: string) => {
        if (options.onStdoutLine) outLines.push(chunk);
        else stdout += chunk;
      });

      proc.stderr?.setEncoding('utf8');
      proc.stderr?.on('data', (chunk: string) => {
        stderrTail = tail(stderrTail + chunk, PROCESS_LIMITS.stderrTailChars);
        errLines.push(chunk);
      });

      const finish = (outcome: ProcessOutcome): void => {
        if (settled) return;
        settled = true;
        if (timer) clearTimeout(timer);
        if (forceKill) clearTimeout(forceKill);
        resolve(outcome);
      };

      proc.on('error', (err) => {
        finish({ ...this.notStarted(err, started), stdout, stderrTail });
      });

      proc.on('close', (code, signal) => {
        outLines.flush();
        errLines.flush();
        finish({
          exitCode: code,
          signal,
          stdout,
          stderrTail,
          timedOut,
          durationMs: Date.now() - started,
        });
      });
    });
  }

  private notStarted(err: unknown, started: number): ProcessOutcome {
    return {
      exitCode: null,
      signal: null,
      stdout: '',
      stderrTail: '',
      timedOut: false,
      spawnError: err instanceof Error ? err.message : String(err),
      durationMs: Date.now() - started,
    };
  }
}
