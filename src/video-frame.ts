/**
 * Still frames from video files through an external ffmpeg binary.
 */

import { spawn } from "node:child_process";
import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

/** Pulls one frame from a video and returns it as base64 JPEG. */
export type FrameExtractor = (videoPath: string) => Promise<string>;

/**
 * Read the duration in seconds from ffmpeg's stream banner.
 * Resolves 0 when ffmpeg cannot be run or prints no duration.
 */
export function getVideoDuration(videoPath: string, ffmpegPath: string): Promise<number> {
  return new Promise((resolve) => {
    const child = spawn(ffmpegPath, ["-hide_banner", "-i", videoPath, "-f", "null", "-t", "0", "-"]);
    let stderr = "";

    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });
    child.on("close", () => {
      const match = stderr.match(/Duration: (\d{2}):(\d{2}):(\d{2}(?:\.\d+)?)/);
      if (!match) {
        resolve(0);
        return;
      }
      const hours = Number.parseInt(match[1], 10);
      const minutes = Number.parseInt(match[2], 10);
      const seconds = Number.parseFloat(match[3]);
      resolve(hours * 3600 + minutes * 60 + seconds);
    });
    child.on("error", () => resolve(0));
  });
}

/** Write the frame at `timestamp` seconds to `outputPath`. */
export function extractFrame(
  videoPath: string,
  timestamp: number,
  outputPath: string,
  ffmpegPath: string,
): Promise<void> {
  return new Promise((resolve, reject) => {
    const child = spawn(ffmpegPath, [
      "-hide_banner",
      "-loglevel",
      "error",
      "-ss",
      timestamp.toFixed(3),
      "-i",
      videoPath,
      "-vframes",
      "1",
      "-q:v",
      "2",
      "-y",
      outputPath,
    ]);
    let stderr = "";

    child.stderr.on("data", (data: Buffer) => {
      stderr += data.toString();
    });
    child.on("close", (code) => {
      if (code === 0) resolve();
      else reject(new Error(`ffmpeg exited with code ${code}${stderr ? `: ${stderr.trim()}` : ""}`));
    });
    child.on("error", reject);
  });
}

/**
 * Frame extractor that grabs the frame halfway through the video and hands
 * it to `encodeImage`. The temporary frame file is always removed.
 */
export function middleFrameExtractor(
  ffmpegPath: string,
  encodeImage: (path: string) => Promise<string>,
): FrameExtractor {
  return async (videoPath) => {
    const duration = await getVideoDuration(videoPath, ffmpegPath);
    const dir = await mkdtemp(join(tmpdir(), "medianame-frame-"));
    try {
      const framePath = join(dir, "frame.jpg");
      await extractFrame(videoPath, duration / 2, framePath, ffmpegPath);
      return await encodeImage(framePath);
    } finally {
      await rm(dir, { recursive: true, force: true });
    }
  };
}
