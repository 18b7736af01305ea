#!/usr/bin/env tsx
/**
 * Prints what the local cache holds: raw downloads, normalized clips and
 * leftover transient files, with sizes.
 * Run: npm run cache-status
 */
import { env } from '../src/config.js';
import { listCache, type CacheFileInfo, type CacheFileKind } from '../src/pipeline/cache.js';

// ── ANSI helpers ──────────────────────────────────────────────────────────────

const BOLD  = '\x1b[1m';
const DIM   = '\x1b[2m';
const CYAN  = '\x1b[36m';
const RESET = '\x1b[0m';

function bold(s: string) { return `${BOLD}${s}${RESET}`; }
function dim(s: string)  { return `${DIM}${s}${RESET}`; }
function cyan(s: string) { return `${CYAN}${s}${RESET}`; }

function formatBytes(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1_048_576) return `${(bytes / 1024).toFixed(1)} KB`;
  if (bytes < 1_073_741_824) return `${(bytes / 1_048_576).toFixed(1)} MB`;
  return `${(bytes / 1_073_741_824).toFixed(2)} GB`;
}

const SECTIONS: Array<{ kind: CacheFileKind; title: string }> = [
  { kind: 'raw',        title: 'Raw downloads' },
  { kind: 'normalized', title: 'Normalized clips' },
  { kind: 'transient',  title: 'Transient files' },
  { kind: 'other',      title: 'Other' },
];

function printSection(title: string, files: CacheFileInfo[]): void {
  const total = files.reduce((sum, f) => sum + f.bytes, 0);
  console.log(`\n${bold(title)} ${dim(`(${files.length} files, ${formatBytes(total)})`)}`);
  for (const f of files) {
    console.log(`  ${f.name.padEnd(48)} ${formatBytes(f.bytes).padStart(10)}`);
  }
}

async function main(): Promise<void> {
  const files = await listCache(env.CACHE_DIR);
  console.log(`${bold('tubesplice cache')} ${cyan(env.CACHE_DIR)}`);
  if (files.length === 0) {
    console.log(dim('  empty'));
    return;
  }
  for (const { kind, title } of SECTIONS) {
    const group = files.filter((f) => f.kind === kind);
    if (group.length > 0) printSection(title, group);
  }
}

main().catch((err: unknown) => {
  console.error('cache-status failed:', err);
  process.exitCode = 1;
});
