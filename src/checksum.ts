import { createHash } from "node:crypto";
import { createReadStream, createWriteStream } from "node:fs";
import { mkdir, rename, unlink } from "node:fs/promises";
import { dirname } from "node:path";
import { Transform, type TransformCallback } from "node:stream";
import { pipeline } from "node:stream/promises";

const ALGO = "sha256";

/** Pass-through stream that hashes what flows through it. */
class HashTransform extends Transform {
  private readonly hash = createHash(ALGO);

  override _transform(chunk: Buffer, _encoding: BufferEncoding, callback: TransformCallback): void {
    this.hash.update(chunk);
    callback(null, chunk);
  }

  digestHex(): string {
    return this.hash.digest("hex");
  }
}

export async function hashFile(path: string): Promise<string> {
  const hash = createHash(ALGO);
  for await (const chunk of createReadStream(path)) {
    hash.update(chunk);
  }
  return hash.digest("hex");
}

/**
 * Copy `src` to `dst` through a `.partial` file, hashing the bytes on the way.
 * The destination only appears once the copy is complete.
 */
export async function copyWithChecksum(src: string, dst: string): Promise<string> {
  const partial = `${dst}.partial`;
  await mkdir(dirname(dst), { recursive: true });
  const hasher = new HashTransform();
  try {
    await pipeline(createReadStream(src), hasher, createWriteStream(partial, { flags: "wx" }));
    await rename(partial, dst);
  } catch (err: unknown) {
    await unlink(partial).catch(() => undefined);
    throw err;
  }
  return hasher.digestHex();
}
