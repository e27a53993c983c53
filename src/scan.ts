import type { Dirent, Stats } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { extname, join, resolve } from "node:path";
import type { Config } from "./config.js";
import { FilesystemError, errorMessage } from "./errors.js";
import type { ExcludedFile, MediaAsset, MediaKind } from "./types.js";

const BYTES_PER_MB = 1024 * 1024;

export interface ScanResult {
  assets: MediaAsset[];
  excluded: ExcludedFile[];
}

export function classifyMediaKind(ext: string, config: Config): MediaKind | undefined {
  const lower = ext.toLowerCase();
  if (config.supportedFormats.images.includes(lower)) return "image";
  if (config.supportedFormats.videos.includes(lower)) return "video";
  return undefined;
}

/**
 * List media files directly inside `dir`. Dotfiles and directories are
 * skipped; unsupported or oversized files are returned in `excluded`.
 * Assets are sorted by name so plans are built in a stable order.
 */
export async function scanMedia(dir: string, config: Config): Promise<ScanResult> {
  const root = resolve(dir);
  let entries: Dirent[];
  try {
    entries = await readdir(root, { withFileTypes: true });
  } catch (err: unknown) {
    throw new FilesystemError(root, `Cannot read directory ${root}: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  const maxBytes = config.processing.maxFileSizeMb * BYTES_PER_MB;
  const assets: MediaAsset[] = [];
  const excluded: ExcludedFile[] = [];

  for (const entry of entries) {
    if (entry.name.startsWith(".")) continue;
    if (entry.isDirectory()) continue;
    const path = join(root, entry.name);

    let info: Stats;
    try {
      info = await stat(path);
    } catch {
      excluded.push({ path, reason: "not-a-file" });
      continue;
    }
    if (!info.isFile()) {
      excluded.push({ path, reason: "not-a-file" });
      continue;
    }

    const kind = classifyMediaKind(extname(entry.name), config);
    if (kind === undefined) {
      excluded.push({ path, reason: "unsupported-type", size: info.size });
      continue;
    }
    if (info.size > maxBytes) {
      excluded.push({ path, reason: "too-large", size: info.size });
      continue;
    }
    assets.push({ path, name: entry.name, size: info.size, kind, modifiedAt: info.mtime });
  }

  assets.sort((a, b) => a.name.localeCompare(b.name));
  excluded.sort((a, b) => a.path.localeCompare(b.path));
  return { assets, excluded };
}
