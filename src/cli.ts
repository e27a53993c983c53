#!/usr/bin/env node
/**
 * medianame – rename photos and videos from AI content descriptions.
 * Supports --help, --version, --dry-run, script mode (--dir ...), --undo and --history.
 */

import { runInteractive } from "./commands/interactive.js";
import { runScriptMode } from "./commands/script.js";
import { runHistory, runUndo } from "./commands/undo.js";
import { loadConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { parseArgs, printHelp, printVersion } from "./flags.js";
import type { ParsedArgs } from "./flags.js";

async function main(): Promise<void> {
  let args: ParsedArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (err: unknown) {
    console.error("Error:", errorMessage(err));
    process.exit(1);
  }

  if (args.help) {
    printHelp();
    process.exit(0);
  }
  if (args.version) {
    printVersion();
    process.exit(0);
  }

  const config = await loadConfig(args.config);

  if (args.history) {
    await runHistory(config);
    return;
  }
  if (args.undo !== undefined) {
    await runUndo(args.undo, args.fromBackup, config);
    return;
  }

  const scriptMode =
    args.dir !== undefined || args.pattern !== undefined || args.template !== undefined;
  if (scriptMode) {
    await runScriptMode(args, config);
    return;
  }

  await runInteractive(args.dryRun, config);
}

main().catch((err: unknown) => {
  console.error("Error:", errorMessage(err));
  process.exit(1);
});
