/**
 * Content description clients. The pipeline only depends on `DescriptionClient`;
 * the vision adapter talks to an OpenAI-compatible chat-completions endpoint.
 */

import { basename, extname } from "node:path";
import sharp from "sharp";
import { z } from "zod";
import type { Config } from "./config.js";
import {
  PermanentServiceError,
  RateLimitedError,
  TransientServiceError,
  errorMessage,
} from "./errors.js";
import { createLogger } from "./logger.js";
import type { Description, MediaAsset } from "./types.js";
import { type FrameExtractor, middleFrameExtractor } from "./video-frame.js";

const log = createLogger("describer");

export interface DescriptionClient {
  /**
   * Describe one asset. Rejects with RateLimitedError, TransientServiceError
   * or PermanentServiceError.
   */
  describe(asset: MediaAsset, signal?: AbortSignal): Promise<Description>;
}

const MAX_IMAGE_EDGE = 1024;
const FALLBACK_WORDS = 5;

export const DEFAULT_PROMPT = `Analyze this image and reply with JSON only, using these fields:
- description: a brief summary of 2-5 words suitable for a filename
- scene_type: the type of scene (e.g. interview, b-roll, landscape, closeup)
- subjects: the main subjects or objects, as an array of short strings
- location: the location or setting if identifiable
- action: what is happening
Keep every value concise and filename-friendly.`;

/** Turn a file stem like "IMG_2041-beach" into "IMG 2041 beach". */
export function describeFromFilename(asset: Pick<MediaAsset, "name">): Description {
  const stem = basename(asset.name, extname(asset.name));
  const words = stem.replace(/[_-]+/g, " ").trim();
  return { description: words || "untitled", subjects: [], analyzed: false };
}

/** Offline client used when no API key is configured. */
export class FilenameDescriptionClient implements DescriptionClient {
  async describe(asset: MediaAsset): Promise<Description> {
    return describeFromFilename(asset);
  }
}

const structuredReplySchema = z.object({
  description: z.string().min(1),
  scene_type: z.string().optional(),
  subjects: z.union([z.array(z.string()), z.string()]).optional(),
  location: z.string().optional(),
  action: z.string().optional(),
});

const completionSchema = z.object({
  choices: z
    .array(z.object({ message: z.object({ content: z.string().nullable().optional() }) }))
    .min(1),
});

function firstWords(text: string, count: number): string {
  return text
    .replace(/[^\p{L}\p{N}\s_-]/gu, " ")
    .split(/\s+/)
    .filter(Boolean)
    .slice(0, count)
    .join(" ");
}

/**
 * Parse a model reply. JSON (optionally fenced) is read field by field;
 * anything else becomes its first few words.
 */
export function parseDescriptionResponse(text: string): Description {
  const body = text
    .trim()
    .replace(/^```(?:json)?\s*/i, "")
    .replace(/\s*```$/, "");
  if (body.startsWith("{")) {
    try {
      const parsed = structuredReplySchema.safeParse(JSON.parse(body));
      if (parsed.success) {
        const reply = parsed.data;
        const subjects =
          typeof reply.subjects === "string" ? [reply.subjects] : (reply.subjects ?? []);
        return {
          description: reply.description.trim(),
          scene: reply.scene_type,
          subjects,
          location: reply.location,
          action: reply.action,
          analyzed: true,
        };
      }
    } catch {
      // not JSON after all; fall through to plain text
    }
  }
  return {
    description: firstWords(body, FALLBACK_WORDS) || "untitled",
    subjects: [],
    analyzed: true,
  };
}

function parseRetryAfter(header: string | null): number | undefined {
  if (!header) return undefined;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds * 1000;
  const at = Date.parse(header);
  return Number.isNaN(at) ? undefined : Math.max(0, at - Date.now());
}

export async function encodeImageForUpload(path: string): Promise<string> {
  const buffer = await sharp(path)
    .rotate()
    .resize({ width: MAX_IMAGE_EDGE, height: MAX_IMAGE_EDGE, fit: "inside", withoutEnlargement: true })
    .jpeg({ quality: 85 })
    .toBuffer();
  return buffer.toString("base64");
}

export interface VisionClientOptions {
  apiKey: string;
  ai: Config["ai"];
  prompt?: string;
  fetch?: typeof fetch;
  encodeImage?: (path: string) => Promise<string>;
  /** defaults to the middle frame through ffmpeg at `ai.ffmpegPath` */
  extractFrame?: FrameExtractor;
}

export class VisionDescriptionClient implements DescriptionClient {
  private readonly apiKey: string;
  private readonly ai: Config["ai"];
  private readonly prompt: string;
  private readonly fetchImpl: typeof fetch;
  private readonly encodeImage: (path: string) => Promise<string>;
  private readonly extractFrame: FrameExtractor;

  constructor(opts: VisionClientOptions) {
    this.apiKey = opts.apiKey;
    this.ai = opts.ai;
    this.prompt = opts.prompt ?? DEFAULT_PROMPT;
    this.fetchImpl = opts.fetch ?? fetch;
    this.encodeImage = opts.encodeImage ?? encodeImageForUpload;
    this.extractFrame = opts.extractFrame ?? middleFrameExtractor(opts.ai.ffmpegPath, this.encodeImage);
  }

  // The caller's signal is not forwarded: cancellation lets an in-flight call
  // finish, and the per-call timeout bounds how long that takes.
  async describe(asset: MediaAsset): Promise<Description> {
    let image: string;
    if (asset.kind === "video") {
      try {
        image = await this.extractFrame(asset.path);
      } catch (err: unknown) {
        log.warn({ path: asset.path, err: errorMessage(err) }, "no video frame, describing from the file name");
        return describeFromFilename(asset);
      }
    } else {
      try {
        image = await this.encodeImage(asset.path);
      } catch (err: unknown) {
        throw new PermanentServiceError(`Cannot decode image ${asset.name}: ${errorMessage(err)}`, {
          cause: err,
        });
      }
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.ai.requestTimeoutMs);
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.ai.baseUrl.replace(/\/+$/, "")}/chat/completions`, {
        method: "POST",
        headers: {
          "Content-Type": "application/json",
          Authorization: `Bearer ${this.apiKey}`,
        },
        body: JSON.stringify({
          model: this.ai.model,
          max_tokens: this.ai.maxTokens,
          temperature: this.ai.temperature,
          messages: [
            {
              role: "user",
              content: [
                { type: "text", text: this.prompt },
                {
                  type: "image_url",
                  image_url: { url: `data:image/jpeg;base64,${image}`, detail: this.ai.detail },
                },
              ],
            },
          ],
        }),
        signal: controller.signal,
      });
    } catch (err: unknown) {
      if (controller.signal.aborted) {
        throw new TransientServiceError(
          `Description request for ${asset.name} timed out after ${this.ai.requestTimeoutMs}ms`,
        );
      }
      throw new TransientServiceError(`Description request failed: ${errorMessage(err)}`, {
        cause: err,
      });
    } finally {
      clearTimeout(timeout);
    }

    if (response.status === 429) {
      throw new RateLimitedError(
        `Rate limited while describing ${asset.name}`,
        parseRetryAfter(response.headers.get("retry-after")),
      );
    }
    if (response.status >= 500 || response.status === 408) {
      throw new TransientServiceError(`Description service returned ${response.status}`);
    }
    if (!response.ok) {
      const detail = await response.text().catch(() => "");
      throw new PermanentServiceError(
        `Description service rejected ${asset.name} (${response.status})${detail ? `: ${detail.slice(0, 200)}` : ""}`,
      );
    }

    let payload: unknown;
    try {
      payload = await response.json();
    } catch (err: unknown) {
      throw new PermanentServiceError(`Description service sent invalid JSON`, { cause: err });
    }
    const completion = completionSchema.safeParse(payload);
    const content = completion.success ? completion.data.choices[0].message.content : undefined;
    if (!content) {
      throw new PermanentServiceError(`Description service sent no content for ${asset.name}`);
    }
    log.debug({ path: asset.path }, "described image");
    return parseDescriptionResponse(content);
  }
}

/** Pick the vision client when an API key is present, else the filename fallback. */
export function createDescriptionClient(
  config: Config,
  apiKey: string | undefined = process.env.OPENAI_API_KEY,
): DescriptionClient {
  if (!apiKey || apiKey === "your-api-key-here") {
    log.warn("no OPENAI_API_KEY set, describing files from their names");
    return new FilenameDescriptionClient();
  }
  return new VisionDescriptionClient({ apiKey, ai: config.ai });
}
