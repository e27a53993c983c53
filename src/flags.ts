/**
 * CLI flag parsing and usage/version output.
 */

import { parse } from "@bomb.sh/args";

export const VERSION = "0.1.0";

export interface ParsedArgs {
  help: boolean;
  version: boolean;
  dryRun: boolean;
  dir: string | undefined;
  out: string | undefined;
  pattern: string | undefined;
  template: string | undefined;
  project: string | undefined;
  start: number | undefined;
  config: string | undefined;
  skipBackup: boolean;
  yes: boolean;
  undo: string | undefined;
  fromBackup: boolean;
  history: boolean;
}

const ARGS_CONFIG = {
  boolean: ["help", "version", "dry-run", "yes", "skip-backup", "from-backup", "history"] as const,
  string: ["dir", "out", "pattern", "template", "project", "start", "config", "undo"] as const,
  alias: { h: "help", v: "version", y: "yes", p: "pattern", t: "template" } as const,
};

export class UsageError extends Error {}

function parseStart(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number(value);
  if (!Number.isInteger(n) || n < 0) {
    throw new UsageError(`--start must be a non-negative integer, got "${value}"`);
  }
  return n;
}

export function parseArgs(argv: string[]): ParsedArgs {
  const raw = parse(argv, ARGS_CONFIG);
  return {
    help: Boolean(raw.help),
    version: Boolean(raw.version),
    dryRun: Boolean(raw["dry-run"]),
    dir: raw.dir,
    out: raw.out,
    pattern: raw.pattern,
    template: raw.template,
    project: raw.project,
    start: parseStart(raw.start),
    config: raw.config,
    skipBackup: Boolean(raw["skip-backup"]),
    yes: Boolean(raw.yes),
    undo: raw.undo,
    fromBackup: Boolean(raw["from-backup"]),
    history: Boolean(raw.history),
  };
}

export function printHelp(): void {
  const usage = `medianame – rename photos and videos from AI content descriptions

Usage:
  medianame                  Interactive mode (prompts for folder and pattern)
  medianame --help           Show this help
  medianame --version        Show version
  medianame --dry-run        Interactive mode, show preview only (no rename)
  medianame --dir <path> [options]   Script mode
  medianame --undo <batch-id> [--from-backup]
  medianame --history        List batches that can be undone

Script mode options:
  --dir <path>               Folder with the media files to rename
  --out <path>               Move renamed files here (default: same folder)
  --pattern, -p <name>       Named pattern from config (default: "default")
  --template, -t <string>    Template, e.g. "{date}_{description}_{sequence}"
  --project <name>           Value for {project}
  --start <n>                First counter value (default: 1)
  --skip-backup              Do not copy originals before renaming
  --yes, -y                  Apply renames without confirmation
  --dry-run                  Show preview only, do not rename

Other options:
  --config <file>            Config file (default: ~/.medianame/config.json)
  --from-backup              With --undo: restore changed files from backup copies

Placeholders:
  {date} {description} {sequence} {number} {counter} {project}
  {scene} {location} {subject} {action} {original}

Set OPENAI_API_KEY to describe images with the vision model; without it,
names are derived from the existing filenames.

Examples:
  medianame
  medianame --dir ./shoot --dry-run
  medianame --dir ./shoot -p documentary --project harbor --yes
  medianame --dir ./shoot -t "{location}_{description}_{counter}" --start 10 --yes
  medianame --undo 20240101T120000-a1b2c3`;
  console.log(usage);
}

export function printVersion(): void {
  console.log(VERSION);
}
