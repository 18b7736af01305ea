/**
 * One source video tracked through its own lifecycle.
 *
 *   pending → fetching → fetched → normalizing → normalized → done
 *                 ↘ error / cancelled (terminal for the run)
 *
 * Every mutation is a synchronous method call, so on Node's single event
 * loop a write can never interleave with another write or with a read.
 * Readers outside the pipeline get frozen snapshots, never the live object.
 */

// ── Types ─────────────────────────────────────────────────────────────────────

export type EntryState =
  | 'pending'
  | 'fetching'
  | 'fetched'
  | 'normalizing'
  | 'normalized'
  | 'done'
  | 'error'
  | 'cancelled';

export const STATE_LABELS: Readonly<Record<EntryState, string>> = Object.freeze({
  pending:     'Pending',
  fetching:    'Downloading',
  fetched:     'Downloaded',
  normalizing: 'Processing',
  normalized:  'Processed',
  done:        'Done',
  error:       'Error',
  cancelled:   'Cancelled',
});

const COMPLETE_STATES: ReadonlySet<EntryState> = new Set(['fetched', 'normalized', 'done']);

export interface EntrySnapshot {
  readonly url: string;
  /** Title once known, otherwise the URL */
  readonly displayTitle: string;
  /** Trim start as typed, or `–` */
  readonly start: string;
  readonly end: string;
  readonly state: EntryState;
  readonly label: string;
  readonly progress: number;
  readonly error: string;
}

export interface EntryMetadata {
  id: string;
  title: string;
  duration: number;
  thumbnailUrl: string;
  fetchedPath: string;
}

// ── VideoEntry ────────────────────────────────────────────────────────────────

export class VideoEntry {
  private _state: EntryState = 'pending';
  private _progress = 0;
  private _error = '';
  private _title = '';
  private _videoId = '';
  private _duration = 0;
  private _thumbnailUrl = '';
  private _fetchedPath = '';
  private _normalizedPath = '';

  constructor(
    public readonly url: string,
    public readonly startTime?: string,
    public readonly endTime?: string,
  ) {}

  get state(): EntryState { return this._state; }
  get progress(): number { return this._progress; }
  get error(): string { return this._error; }
  get title(): string { return this._title; }
  get videoId(): string { return this._videoId; }
  get duration(): number { return this._duration; }
  get thumbnailUrl(): string { return this._thumbnailUrl; }
  get fetchedPath(): string { return this._fetchedPath; }
  get normalizedPath(): string { return this._normalizedPath; }

  /**
   * Move to `state`. Completed stages pin progress to 1. Any state other
   * than `error` clears the previous error message.
   */
  setStatus(state: EntryState, error?: string): void {
    this._state = state;
    if (COMPLETE_STATES.has(state)) this._progress = 1;
    if (state === 'error') {
      this._error = error && error.length > 0 ? error : 'Unknown error';
    } else {
      this._error = '';
    }
  }

  setProgress(fraction: number): void {
    this._progress = Number.isNaN(fraction) ? 0 : Math.min(1, Math.max(0, fraction));
  }

  recordMetadata(meta: EntryMetadata): void {
    this._videoId = meta.id;
    this._title = meta.title;
    this._duration = meta.duration > 0 ? meta.duration : 0;
    this._thumbnailUrl = meta.thumbnailUrl;
    this._fetchedPath = meta.fetchedPath;
  }

  /** Record the normalized file and enter `normalized` in one step. */
  markNormalized(path: string): void {
    this._normalizedPath = path;
    this.setStatus('normalized');
  }

  /** Back to `pending` for a re-run; resolved metadata is kept for cache lookups. */
  reset(): void {
    this._state = 'pending';
    this._progress = 0;
    this._error = '';
    this._fetchedPath = '';
    this._normalizedPath = '';
  }

  snapshot(): EntrySnapshot {
    return Object.freeze({
      url: this.url,
      displayTitle: this._title || this.url,
      start: this.startTime || '–',
      end: this.endTime || '–',
      state: this._state,
      label: STATE_LABELS[this._state],
      progress: this._progress,
      error: this._error,
    });
  }
}
