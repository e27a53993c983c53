import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { DescriptionClient } from "../describer.js";
import type { Description, MediaAsset } from "../types.js";

export const JAN_FIRST = new Date(2024, 0, 1, 12, 0, 0);

export async function makeTmpDir(prefix: string): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), `medianame-${prefix}-`));
}

/** Write a file and pin its mtime so {date} is predictable. */
export async function writeMedia(
  dir: string,
  name: string,
  content: string,
  mtime: Date = JAN_FIRST,
): Promise<string> {
  const file = path.join(dir, name);
  await fs.writeFile(file, content);
  await fs.utimes(file, mtime, mtime);
  return file;
}

export async function listDir(dir: string): Promise<string[]> {
  return (await fs.readdir(dir)).sort();
}

export function described(text: string, extra: Partial<Description> = {}): Description {
  return { description: text, subjects: [], analyzed: true, ...extra };
}

export function asset(dir: string, name: string, extra: Partial<MediaAsset> = {}): MediaAsset {
  return {
    path: path.join(dir, name),
    name,
    size: 4,
    kind: "image",
    modifiedAt: JAN_FIRST,
    ...extra,
  };
}

/** Fake client that records calls and delegates to `reply`. */
export class FakeClient implements DescriptionClient {
  readonly calls: string[] = [];

  constructor(private readonly reply: (asset: MediaAsset, attempt: number) => Promise<Description>) {}

  async describe(asset: MediaAsset): Promise<Description> {
    this.calls.push(asset.name);
    const attempt = this.calls.filter((name) => name === asset.name).length;
    return this.reply(asset, attempt);
  }
}
