/**
 * Naming templates: `{placeholder}` tokens mixed with literal text.
 * Expansion is pure; sanitization always runs on its result before the name hits disk.
 */

import { UnknownPlaceholder, ValidationError } from "./errors.js";
import type { FieldMap, NamingPattern, PatternToken } from "./types.js";

export const KNOWN_PLACEHOLDERS: ReadonlySet<string> = new Set([
  "date",
  "description",
  "sequence",
  "number",
  "counter",
  "project",
  "scene",
  "location",
  "subject",
  "action",
  "original",
]);

// Filesystems cap names at 255 bytes; the rest is left for " (n)" and the extension.
const MAX_BASENAME_BYTES = 200;

interface Tokenized {
  tokens: PatternToken[];
  problems: string[];
}

function tokenize(source: string): Tokenized {
  const tokens: PatternToken[] = [];
  const problems: string[] = [];
  let literal = "";
  let i = 0;

  const flushLiteral = () => {
    if (literal) tokens.push({ type: "literal", text: literal });
    literal = "";
  };

  while (i < source.length) {
    const ch = source[i];
    if (ch === "}") {
      problems.push(`Unmatched "}" at position ${i}`);
      literal += ch;
      i++;
      continue;
    }
    if (ch !== "{") {
      literal += ch;
      i++;
      continue;
    }
    const close = source.indexOf("}", i + 1);
    if (close === -1) {
      problems.push(`Unclosed "{" at position ${i}`);
      literal += source.slice(i);
      break;
    }
    const name = source.slice(i + 1, close);
    if (name.includes("{")) {
      problems.push(`Nested "{" at position ${i}`);
    } else if (name === "") {
      problems.push(`Empty placeholder at position ${i}`);
    } else {
      flushLiteral();
      tokens.push({ type: "placeholder", name });
    }
    i = close + 1;
  }
  flushLiteral();
  return { tokens, problems };
}

/**
 * Check a pattern string. Returns a list of problems (empty = valid).
 */
export function validatePattern(source: string): string[] {
  if (source.trim() === "") return ["Pattern must not be empty"];
  const { tokens, problems } = tokenize(source);
  for (const token of tokens) {
    if (token.type === "placeholder" && !KNOWN_PLACEHOLDERS.has(token.name)) {
      problems.push(`Unknown placeholder: {${token.name}}`);
    }
  }
  if (!tokens.some((t) => t.type === "placeholder")) {
    problems.push("Pattern must contain at least one placeholder");
  }
  return problems;
}

/**
 * Parse and validate a pattern up front, before any asset is processed.
 * Throws UnknownPlaceholder for the first unknown name, ValidationError otherwise.
 */
export function parsePattern(source: string): NamingPattern {
  const { tokens } = tokenize(source);
  const unknown = tokens.find((t) => t.type === "placeholder" && !KNOWN_PLACEHOLDERS.has(t.name));
  if (unknown && unknown.type === "placeholder") throw new UnknownPlaceholder(unknown.name);
  const problems = validatePattern(source);
  if (problems.length > 0) {
    throw new ValidationError(`Invalid pattern "${source}": ${problems.join("; ")}`);
  }
  return { source, tokens };
}

export function placeholdersOf(pattern: NamingPattern): string[] {
  const names: string[] = [];
  for (const token of pattern.tokens) {
    if (token.type === "placeholder" && !names.includes(token.name)) names.push(token.name);
  }
  return names;
}

/**
 * Expand a pattern against a field map. Every placeholder needs a key in the
 * map; a missing one throws UnknownPlaceholder rather than expanding to "".
 */
export function expandTemplate(pattern: NamingPattern | string, fields: FieldMap): string {
  const tokens = typeof pattern === "string" ? tokenize(pattern).tokens : pattern.tokens;
  let out = "";
  for (const token of tokens) {
    if (token.type === "literal") {
      out += token.text;
      continue;
    }
    if (!Object.hasOwn(fields, token.name)) throw new UnknownPlaceholder(token.name);
    out += fields[token.name];
  }
  return out;
}

export interface SanitizeOptions {
  /** replacement for whitespace runs; "" keeps spaces */
  replaceSpaces: string;
  lowercase: boolean;
}

/**
 * Make an expanded name safe as a file basename (no extension).
 */
export function sanitizeFilename(name: string, opts: SanitizeOptions): string {
  // eslint-disable-next-line no-control-regex
  let clean = name.replace(/[\x00-\x1f\x7f]/g, "");
  clean = clean.replace(/[<>:"/\\|?*]/g, "");
  if (opts.replaceSpaces) {
    clean = clean.replace(/\s+/g, opts.replaceSpaces);
  }
  clean = clean.replace(/[_-]{2,}/g, "_");
  clean = clean.replace(/^[\s._-]+|[\s._-]+$/g, "");
  if (opts.lowercase) clean = clean.toLowerCase();
  if (Buffer.byteLength(clean, "utf8") > MAX_BASENAME_BYTES) {
    clean = truncateUtf8(clean, MAX_BASENAME_BYTES).replace(/[\s._-]+$/, "");
  }
  return clean || "untitled";
}

/** Longest prefix of whole code points that fits in `maxBytes` of UTF-8. */
export function truncateUtf8(text: string, maxBytes: number): string {
  let out = "";
  let bytes = 0;
  for (const ch of text) {
    const size = Buffer.byteLength(ch, "utf8");
    if (bytes + size > maxBytes) break;
    out += ch;
    bytes += size;
  }
  return out;
}
