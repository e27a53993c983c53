/**
 * Configuration: zod schema, defaults and the ~/.medianame/config.json loader.
 * The pipeline only ever sees the frozen, validated result.
 */

import { readFile } from "node:fs/promises";
import { homedir } from "node:os";
import { join } from "node:path";
import { z } from "zod";
import { ConfigError } from "./errors.js";

export const MEDIANAME_DIR = join(homedir(), ".medianame");
export const CONFIG_PATH = join(MEDIANAME_DIR, "config.json");

export const DEFAULT_NAMING_PATTERNS: Readonly<Record<string, string>> = {
  default: "{date}_{description}_{sequence}",
  documentary: "{project}_{scene}_{date}_{number}",
  location_based: "{location}_{subject}_{action}_{counter}",
};

const extensionList = z
  .array(z.string().regex(/^\.[a-z0-9]+$/i, "Extensions must look like .jpg"))
  .transform((list) => list.map((ext) => ext.toLowerCase()));

export const configSchema = z.object({
  // user patterns are merged over the built-in ones
  namingPatterns: z
    .record(z.string().min(1))
    .optional()
    .transform((patterns): Record<string, string> => ({ ...DEFAULT_NAMING_PATTERNS, ...patterns })),
  supportedFormats: z
    .object({
      images: extensionList.default([".jpg", ".jpeg", ".png", ".gif", ".bmp", ".tiff", ".webp"]),
      videos: extensionList.default([".mp4", ".mov", ".avi", ".mkv", ".wmv", ".flv", ".webm"]),
    })
    .default({}),
  ai: z
    .object({
      model: z.string().min(1).default("gpt-4o"),
      baseUrl: z.string().url().default("https://api.openai.com/v1"),
      maxTokens: z.number().int().positive().default(150),
      temperature: z.number().min(0).max(2).default(0.7),
      detail: z.enum(["auto", "low", "high"]).default("auto"),
      requestTimeoutMs: z.number().int().positive().default(30_000),
      ffmpegPath: z.string().min(1).default("ffmpeg"),
    })
    .default({}),
  processing: z
    .object({
      batchSize: z.number().int().positive().default(10),
      backupOriginals: z.boolean().default(true),
      maxFileSizeMb: z.number().positive().default(100),
      maxRetries: z.number().int().min(0).default(3),
      baseDelayMs: z.number().int().min(0).default(1_000),
      maxDelayMs: z.number().int().min(0).default(30_000),
    })
    .default({}),
  output: z
    .object({
      dateFormat: z.string().min(1).default("%Y-%m-%d"),
      sequencePadding: z.number().int().min(1).max(12).default(3),
      lowercaseNames: z.boolean().default(false),
      replaceSpaces: z.string().max(1).default("_"),
      maxDescriptionWords: z.number().int().positive().default(5),
    })
    .default({}),
  project: z.string().default("project"),
  counterStart: z.number().int().min(0).default(1),
  backupDir: z.string().default(join(MEDIANAME_DIR, "backups")),
  ledgerDir: z.string().default(join(MEDIANAME_DIR, "ledger")),
});

export type Config = Readonly<z.infer<typeof configSchema>>;
export type ConfigInput = z.input<typeof configSchema>;

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object") {
    for (const child of Object.values(value)) deepFreeze(child);
    Object.freeze(value);
  }
  return value;
}

/** Validate a partial config object and fill defaults. */
export function parseConfig(input: unknown): Config {
  const result = configSchema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new ConfigError(`Invalid configuration: ${issues}`);
  }
  return deepFreeze(result.data);
}

export function defaultConfig(): Config {
  return parseConfig({});
}

/**
 * Load config from `path` (default ~/.medianame/config.json).
 * A missing file yields defaults; unreadable or invalid JSON throws ConfigError.
 */
export async function loadConfig(path: string = CONFIG_PATH): Promise<Config> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch (err: unknown) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") {
      return defaultConfig();
    }
    throw new ConfigError(`Cannot read config file ${path}`, { cause: err });
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err: unknown) {
    throw new ConfigError(`Config file ${path} is not valid JSON`, { cause: err });
  }
  return parseConfig(data);
}
