/**
 * Script mode: non-interactive batch via --dir plus --pattern or --template.
 */

import { existsSync, statSync } from "node:fs";
import pc from "picocolors";
import { BatchJob } from "../batch.js";
import type { Config } from "../config.js";
import { createDescriptionClient } from "../describer.js";
import { errorMessage } from "../errors.js";
import type { ParsedArgs } from "../flags.js";
import { resolveTemplate } from "../patterns-config.js";
import { PREVIEW_MAX_LINES, formatCounts, formatPreview, formatProblems } from "./common.js";

function ensureDir(dir: string): void {
  if (!existsSync(dir)) {
    console.error(`Error: Directory does not exist: ${dir}`);
    process.exit(1);
  }
  if (!statSync(dir).isDirectory()) {
    console.error(`Error: Not a directory: ${dir}`);
    process.exit(1);
  }
}

export async function runScriptMode(args: ParsedArgs, config: Config): Promise<void> {
  const { dir, dryRun, yes } = args;
  if (dir === undefined) {
    console.error("Error: Script mode requires --dir.");
    process.exit(1);
  }
  ensureDir(dir);

  let job: BatchJob;
  try {
    const template = await resolveTemplate(config, { name: args.pattern, template: args.template });
    job = new BatchJob({
      inputDir: dir,
      outputDir: args.out,
      pattern: template,
      config,
      client: createDescriptionClient(config),
      project: args.project,
      counterStart: args.start,
      backup: args.skipBackup ? false : undefined,
    });
  } catch (err: unknown) {
    console.error("Error:", errorMessage(err));
    process.exit(1);
  }

  const onSigint = () => {
    console.error("Cancelling after the current file…");
    job.cancel();
  };
  process.once("SIGINT", onSigint);

  try {
    const plans = await job.prepare();
    const pending = plans.filter((p) => p.status === "resolved");
    for (const line of formatProblems(job.summary())) console.error(line);
    if (pending.length === 0) {
      console.log("No renames to perform.");
      process.exit(0);
    }
    console.log(formatPreview(plans, PREVIEW_MAX_LINES));
    if (dryRun) {
      process.exit(0);
    }
    if (!yes) {
      console.error("Use --yes to apply renames in script mode.");
      process.exit(1);
    }

    const summary = await job.apply();
    for (const line of formatProblems(summary)) console.error(line);
    console.log(formatCounts(summary));
    if (summary.records.length > 0) {
      console.log(`Undo with: medianame --undo ${summary.batchId}`);
    }
    if (summary.status === "committed") {
      console.log(pc.green("Done."));
    } else {
      console.error(pc.yellow(`Finished with status ${summary.status}.`));
      process.exit(2);
    }
  } catch (err: unknown) {
    console.error("Error:", errorMessage(err));
    process.exit(1);
  } finally {
    process.off("SIGINT", onSigint);
  }
}
