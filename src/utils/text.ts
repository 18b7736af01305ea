const ILLEGAL_FILENAME_CHARS = /[<>:"/\\|?*\x00-\x1f]/g;

/** Replace characters that are illegal on Windows or Linux file systems; clamp to 150 chars. */
export function sanitizeFilename(name: string): string {
  const cleaned = name.replace(ILLEGAL_FILENAME_CHARS, '_').trim();
  return cleaned ? cleaned.slice(0, 150) : 'untitled';
}

/** Human-readable transfer rate, e.g. `1.5 MB/s`. */
export function formatRate(bytesPerSecond: number): string {
  return `${(bytesPerSecond / 1_048_576).toFixed(1)} MB/s`;
}
