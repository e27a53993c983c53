/**
 * Collision resolution against the set of names already taken in a directory.
 */

import type { Stats } from "node:fs";
import { readdir, stat } from "node:fs/promises";
import { extname, join } from "node:path";
import { FilesystemError, errorMessage } from "./errors.js";

/** Names taken in one target directory: on disk plus assigned earlier in the batch. */
export class ClaimedNames {
  private readonly names = new Set<string>();
  /** `Dock.jpg` and `dock.jpg` are the same name */
  readonly caseInsensitive: boolean;

  constructor(initial: Iterable<string> = [], opts: { caseInsensitive?: boolean } = {}) {
    this.caseInsensitive = opts.caseInsensitive ?? false;
    for (const name of initial) this.claim(name);
  }

  private key(name: string): string {
    return this.caseInsensitive ? name.toLowerCase() : name;
  }

  has(name: string): boolean {
    return this.names.has(this.key(name));
  }

  claim(name: string): void {
    this.names.add(this.key(name));
  }

  get size(): number {
    return this.names.size;
  }
}

/** `name (n).ext` for a file name, with the suffix before the extension. */
export function withSuffix(name: string, n: number): string {
  const ext = extname(name);
  const stem = ext ? name.slice(0, -ext.length) : name;
  return `${stem} (${n})${ext}`;
}

/**
 * Return `candidate` if free, else the first free `candidate (n)` for n = 2, 3, ...
 * The result is claimed before returning.
 */
export function resolveCollision(candidate: string, claimed: ClaimedNames): string {
  let finalName = candidate;
  for (let n = 2; claimed.has(finalName); n++) {
    finalName = withSuffix(candidate, n);
  }
  claimed.claim(finalName);
  return finalName;
}

function swapCase(text: string): string {
  return text.replace(/\p{L}/gu, (ch) => (ch === ch.toLowerCase() ? ch.toUpperCase() : ch.toLowerCase()));
}

async function statOrUndefined(path: string): Promise<Stats | undefined> {
  try {
    return await stat(path);
  } catch {
    return undefined;
  }
}

const PLATFORM_CASE_INSENSITIVE = process.platform === "darwin" || process.platform === "win32";

/**
 * Whether names in `dir` match case-insensitively: a case-swapped spelling of
 * an existing entry resolves to the same file. Directories with no entry to
 * test fall back to the platform default.
 */
export async function isCaseInsensitiveDir(dir: string, entries: readonly string[]): Promise<boolean> {
  const probe = entries.find((name) => swapCase(name) !== name);
  if (probe === undefined) return PLATFORM_CASE_INSENSITIVE;
  const [original, swapped] = await Promise.all([
    statOrUndefined(join(dir, probe)),
    statOrUndefined(join(dir, swapCase(probe))),
  ]);
  if (original === undefined) return PLATFORM_CASE_INSENSITIVE;
  return swapped !== undefined && swapped.ino === original.ino && swapped.dev === original.dev;
}

/** Seed a claimed set with every entry currently in `dir` (a missing dir is empty). */
export async function seedClaimedNames(dir: string): Promise<ClaimedNames> {
  let entries: string[];
  try {
    entries = await readdir(dir);
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return new ClaimedNames([], { caseInsensitive: PLATFORM_CASE_INSENSITIVE });
    }
    throw new FilesystemError(dir, `Cannot list ${dir}: ${errorMessage(err)}`, { cause: err });
  }
  return new ClaimedNames(entries, { caseInsensitive: await isCaseInsensitiveDir(dir, entries) });
}
