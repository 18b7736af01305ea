/**
 * Console reporter for the CLI: prints engine log lines and turns stage
 * progress into one aggregate percentage.
 */
import type { LogSink, StageName, StageProgressSink } from '../pipeline/types.js';

// ── Stage weights ─────────────────────────────────────────────────────────────

export const STAGE_WEIGHTS: Readonly<Record<StageName, { offset: number; span: number }>> = Object.freeze({
  fetch:     { offset: 0,    span: 0.45 },
  normalize: { offset: 0.45, span: 0.35 },
  merge:     { offset: 0.80, span: 0.15 },
  finalize:  { offset: 0.95, span: 0.05 },
});

/** Overall run progress in [0, 1] for a stage event. */
export function overallProgress(stage: StageName, completed: number, total: number): number {
  const { offset, span } = STAGE_WEIGHTS[stage];
  const fraction = total > 0 ? Math.min(1, Math.max(0, completed / total)) : 0;
  return offset + span * fraction;
}

export function formatPercent(fraction: number): string {
  return `${Math.round(fraction * 100)}%`.padStart(4, ' ');
}

// ── ConsoleReporter ───────────────────────────────────────────────────────────

export class ConsoleReporter implements LogSink, StageProgressSink {
  private last = 0;

  constructor(private readonly write: (text: string) => void = (text) => process.stdout.write(text)) {}

  log(line: string): void {
    this.write(`${line}\n`);
  }

  onStage(stage: StageName, completed: number, total: number): void {
    // Never move the bar backwards
    this.last = Math.max(this.last, overallProgress(stage, completed, total));
    this.write(`[${formatPercent(this.last)}] ${stage} ${completed}/${total}\n`);
  }

  get progress(): number {
    return this.last;
  }
}
