/**
 * Error model.
 *
 * Stage work reports failures as values (`Outcome`) so that a per-entry
 * failure never unwinds across a stage boundary. Thrown errors are kept for
 * setup problems: missing binaries, invalid settings, cancellation inside
 * the retry helper.
 */

// ── Outcomes ──────────────────────────────────────────────────────────────────

export type FailureKind =
  | 'fetch_failed'
  | 'source_missing'
  | 'process_failed'
  | 'timeout'
  | 'cancelled'
  | 'merge_failed'
  | 'overlay_failed'
  | 'empty_batch'
  | 'no_survivors';

export interface PipelineFailure {
  kind: FailureKind;
  message: string;
}

export type Outcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: PipelineFailure };

export const succeed = <T>(value: T): Outcome<T> => ({ ok: true, value });

export const fail = <T = never>(kind: FailureKind, message: string, limit = 400): Outcome<T> => ({
  ok: false,
  error: { kind, message: truncate(message, limit) },
});

export function truncate(text: string, limit: number): string {
  return text.length <= limit ? text : text.slice(0, limit);
}

/** Last `limit` characters of `text`. */
export function tail(text: string, limit: number): string {
  return text.length <= limit ? text : text.slice(text.length - limit);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// ── Thrown errors ─────────────────────────────────────────────────────────────

export class TubespliceError extends Error {
  public readonly code: string;
  public readonly context: Record<string, unknown>;

  constructor(options: { message: string; code: string; context?: Record<string, unknown> }) {
    super(options.message);
    this.name = 'TubespliceError';
    this.code = options.code;
    this.context = options.context ?? {};

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

export class BinaryNotFoundError extends TubespliceError {
  constructor(binary: string, hint: string) {
    super({
      message: `${binary} was not found on PATH. ${hint}`,
      code: 'BINARY_NOT_FOUND',
      context: { binary },
    });
    this.name = 'BinaryNotFoundError';
  }
}

export class InvalidSettingsError extends TubespliceError {
  constructor(issues: string[]) {
    super({
      message: `Invalid run settings: ${issues.join('; ')}`,
      code: 'INVALID_SETTINGS',
      context: { issues },
    });
    this.name = 'InvalidSettingsError';
  }
}

export class CancelledError extends TubespliceError {
  constructor() {
    super({ message: 'Cancelled', code: 'CANCELLED' });
    this.name = 'CancelledError';
  }
}
