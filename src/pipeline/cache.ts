/**
 * Cache directory layout.
 *
 *   <id>_<height>.<ext>        raw download (extension chosen by yt-dlp)
 *   proc_<id>_<height>.mp4     normalized clip
 *   concat_list.txt            transient concat demuxer list
 *   with_music.<ext>           transient music-overlay output
 *
 * Everything here can be re-derived; deleting the directory only costs time.
 */
import * as fs from 'fs/promises';
import * as path from 'path';
import { FETCH_POLICY, VIDEO } from '../config.js';
import { isFile } from '../utils/fs.js';

export class CacheLayout {
  /** Always absolute: concat lists are resolved against their own directory */
  readonly root: string;

  constructor(root: string, public readonly height: number) {
    this.root = path.resolve(root);
  }

  async ensure(): Promise<void> {
    await fs.mkdir(this.root, { recursive: true });
  }

  /** yt-dlp `-o` template for raw downloads. */
  rawOutputTemplate(): string {
    return path.join(this.root, `%(id)s_${this.height}.%(ext)s`);
  }

  rawPath(videoId: string, ext: string): string {
    return path.join(this.root, `${videoId}_${this.height}${ext}`);
  }

  normalizedPath(videoId: string): string {
    return path.join(this.root, `proc_${videoId}_${this.height}.${VIDEO.intermediateExt}`);
  }

  concatListPath(): string {
    return path.join(this.root, 'concat_list.txt');
  }

  musicTempPath(outputPath: string): string {
    const ext = path.extname(outputPath) || `.${VIDEO.intermediateExt}`;
    return path.join(this.root, `with_music${ext}`);
  }

  /** First raw download for `videoId` at this height, by known extension. */
  async findRaw(videoId: string): Promise<string | null> {
    for (const ext of FETCH_POLICY.knownExtensions) {
      const candidate = this.rawPath(videoId, ext);
      if (await isFile(candidate)) return candidate;
    }
    return null;
  }
}

/**
 * yt-dlp may report a pre-merge name (`x.webm` while the muxed file is
 * `x.mp4`). Try the declared path, then the same stem with each known
 * extension.
 */
export async function resolveDownloadedPath(declaredPath: string): Promise<string | null> {
  if (!declaredPath) return null;
  if (await isFile(declaredPath)) return declaredPath;

  const parsed = path.parse(declaredPath);
  const stem = path.join(parsed.dir, parsed.name);
  for (const ext of FETCH_POLICY.knownExtensions) {
    const candidate = stem + ext;
    if (await isFile(candidate)) return candidate;
  }
  return null;
}

// ── Inspection ────────────────────────────────────────────────────────────────

export type CacheFileKind = 'raw' | 'normalized' | 'transient' | 'other';

const NORMALIZED_NAME = /^proc_.+_\d+\.\w+$/;
const RAW_NAME = /^.+_\d+\.(mp4|mkv|webm|m4a)$/;
const TRANSIENT_NAME = /^(concat_list\.txt|with_music\.\w+)$/;

export function classifyCacheFile(name: string): CacheFileKind {
  if (TRANSIENT_NAME.test(name)) return 'transient';
  if (NORMALIZED_NAME.test(name)) return 'normalized';
  if (RAW_NAME.test(name)) return 'raw';
  return 'other';
}

export interface CacheFileInfo {
  name: string;
  kind: CacheFileKind;
  bytes: number;
}

/** Files directly under `root`, classified; empty when the directory does not exist. */
export async function listCache(root: string): Promise<CacheFileInfo[]> {
  const dirents = await fs.readdir(root, { withFileTypes: true }).catch(() => []);
  const files: CacheFileInfo[] = [];
  for (const dirent of dirents) {
    if (!dirent.isFile()) continue;
    const stat = await fs.stat(path.join(root, dirent.name));
    files.push({ name: dirent.name, kind: classifyCacheFile(dirent.name), bytes: stat.size });
  }
  return files.sort((a, b) => a.name.localeCompare(b.name));
}
