/**
 * Naming templates: the configured presets plus the user's saved templates (~/.medianame/patterns.json).
 */

import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname, join } from "node:path";
import type { Config } from "./config.js";
import { MEDIANAME_DIR } from "./config.js";
import { ValidationError } from "./errors.js";
import { validatePattern } from "./template.js";

export interface NamedPattern {
  name: string;
  template: string;
}

export const PATTERNS_PATH = join(MEDIANAME_DIR, "patterns.json");

function isValidEntry(obj: unknown): obj is NamedPattern {
  if (obj === null || typeof obj !== "object") return false;
  if (!("name" in obj) || !("template" in obj)) return false;
  return (
    typeof obj.name === "string" &&
    obj.name.length > 0 &&
    typeof obj.template === "string" &&
    validatePattern(obj.template).length === 0
  );
}

/** Presets from config, in declaration order. */
export function configuredPatterns(config: Config): NamedPattern[] {
  return Object.entries(config.namingPatterns).map(([name, template]) => ({ name, template }));
}

/**
 * Load saved templates. Returns [] if the file is missing or not an array;
 * entries that fail validation are dropped.
 */
export async function readUserPatterns(path: string = PATTERNS_PATH): Promise<NamedPattern[]> {
  let raw: string;
  try {
    raw = await readFile(path, "utf-8");
  } catch {
    return [];
  }
  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch {
    return [];
  }
  if (!Array.isArray(data)) return [];
  return data.filter(isValidEntry);
}

/**
 * Append one template to the user file. Creates the directory if needed.
 * Throws ValidationError for an invalid template, or the write error.
 */
export async function appendUserPattern(
  name: string,
  template: string,
  path: string = PATTERNS_PATH,
): Promise<void> {
  const problems = validatePattern(template);
  if (problems.length > 0) throw new ValidationError(problems.join("; "));
  const current = await readUserPatterns(path);
  current.push({ name, template });
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, JSON.stringify(current, null, 2), "utf-8");
}

/** All selectable templates: configured presets first, then saved ones. */
export async function allPatterns(config: Config, path?: string): Promise<NamedPattern[]> {
  return [...configuredPatterns(config), ...(await readUserPatterns(path))];
}

/**
 * Resolve the template to use: an explicit template wins, then a named
 * pattern, then the "default" preset.
 */
export async function resolveTemplate(
  config: Config,
  opts: { name?: string; template?: string; patternsPath?: string },
): Promise<string> {
  if (opts.template !== undefined) return opts.template;
  const name = opts.name ?? "default";
  const match = (await allPatterns(config, opts.patternsPath)).find((p) => p.name === name);
  if (!match) throw new ValidationError(`Unknown naming pattern: ${name}`);
  return match.template;
}
