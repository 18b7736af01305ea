/**
 * Reporting collaborators passed into the engine at construction.
 */

export type StageName = 'fetch' | 'normalize' | 'merge' | 'finalize';

export interface LogSink {
  log(line: string): void;
}

export interface StageProgressSink {
  onStage(stage: StageName, completed: number, total: number): void;
}

export const noopLogSink: LogSink = { log: () => undefined };

export const noopProgressSink: StageProgressSink = { onStage: () => undefined };

export interface StageEvent {
  stage: StageName;
  completed: number;
  total: number;
}

/** Keeps everything it receives; used by tests and by callers that render later. */
export class RecordingSink implements LogSink, StageProgressSink {
  readonly lines: string[] = [];
  readonly stages: StageEvent[] = [];

  log(line: string): void {
    this.lines.push(line);
  }

  onStage(stage: StageName, completed: number, total: number): void {
    this.stages.push({ stage, completed, total });
  }
}
