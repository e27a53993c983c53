/**
 * Interactive mode: prompts for folder and naming pattern, describes the files,
 * then preview, confirm and apply.
 */

import { existsSync, statSync } from "node:fs";
import * as p from "@clack/prompts";
import pc from "picocolors";
import { BatchJob } from "../batch.js";
import type { Config } from "../config.js";
import { createDescriptionClient } from "../describer.js";
import { errorMessage } from "../errors.js";
import { VERSION } from "../flags.js";
import type { NamedPattern } from "../patterns-config.js";
import { allPatterns, appendUserPattern } from "../patterns-config.js";
import { parsePattern, placeholdersOf, validatePattern } from "../template.js";
import { PREVIEW_MAX_LINES, formatCounts, formatPreview, formatProblems } from "./common.js";

const INTRO_BANNER = `
  ┌┬┐┌─┐┌┬┐┬┌─┐┌┐┌┌─┐┌┬┐┌─┐
  │││├┤  │││├─┤│││├─┤│││├┤
  ┴ ┴└─┘─┴┘┴┴ ┴┘└┘┴ ┴┴ ┴└─┘
`;

function exitIfCancel(value: unknown): asserts value is string | boolean {
  if (p.isCancel(value)) {
    p.cancel("Cancelled.");
    process.exit(0);
  }
}

function checkTemplate(value: string | undefined): string | undefined {
  const problems = validatePattern(value ?? "");
  return problems.length > 0 ? problems[0] : undefined;
}

async function choosePattern(config: Config): Promise<{ template: string; isCustom: boolean }> {
  const combined: NamedPattern[] = await allPatterns(config);
  const options = combined.map((pat, i) => ({
    value: String(i),
    label: pat.name,
    hint: pat.template,
  }));
  options.push({ value: "custom", label: "Custom…", hint: "write your own template" });

  const choice = await p.select({ message: "Naming pattern", options });
  exitIfCancel(choice);
  if (choice !== "custom") {
    return { template: combined[Number.parseInt(String(choice), 10)].template, isCustom: false };
  }

  const templateResult = await p.text({
    message: "Template",
    placeholder: "{date}_{description}_{sequence}",
    validate: checkTemplate,
  });
  exitIfCancel(templateResult);
  return { template: String(templateResult), isCustom: true };
}

export async function runInteractive(dryRun: boolean, config: Config): Promise<void> {
  // Print banner directly so Clack doesn't reflow/wrap it
  console.log(pc.bold(pc.green(INTRO_BANNER)));
  p.intro(pc.bold(pc.magenta(`AI media renamer - v${VERSION}`)));

  const dirResult = await p.text({
    message: "Folder with the photos and videos",
    initialValue: process.cwd(),
    validate: (value: string | undefined) => (value ? undefined : "Enter a folder path"),
  });
  exitIfCancel(dirResult);
  const dir = String(dirResult);

  if (!existsSync(dir)) {
    p.log.error(`Directory does not exist: ${dir}`);
    process.exit(1);
  }
  if (!statSync(dir).isDirectory()) {
    p.log.error(`Not a directory: ${dir}`);
    process.exit(1);
  }

  const { template, isCustom } = await choosePattern(config);

  let project: string | undefined;
  if (placeholdersOf(parsePattern(template)).includes("project")) {
    const projectResult = await p.text({
      message: "Project name",
      placeholder: config.project,
      defaultValue: config.project,
    });
    exitIfCancel(projectResult);
    project = String(projectResult);
  }

  const s = p.spinner();
  let job: BatchJob;
  try {
    job = new BatchJob({
      inputDir: dir,
      pattern: template,
      config,
      client: createDescriptionClient(config),
      project,
      onEvent: (event) => {
        if (event.type === "describe.progress") s.message(`Describing ${event.done}/${event.total}…`);
      },
    });
  } catch (err: unknown) {
    p.log.error(errorMessage(err));
    process.exit(1);
  }

  s.start("Describing files…");
  try {
    await job.scan();
    const total = job.getAssets().length;
    if (total === 0) {
      s.stop("No media files found.");
      p.outro(pc.yellow("Nothing to rename. Exiting."));
      process.exit(0);
    }
    await job.describe();
    const described = job.getAssets().filter((a) => a.description !== undefined).length;
    await job.plan();
    s.stop(`Described ${described} of ${total} file(s).`);
  } catch (err: unknown) {
    s.stop("Failed.");
    p.log.error(errorMessage(err));
    process.exit(1);
  }

  for (const line of formatProblems(job.summary())) p.log.warn(line);

  const plans = job.getPlans();
  if (!plans.some((plan) => plan.status === "resolved")) {
    p.outro(pc.yellow("No renames to perform. Exiting."));
    process.exit(0);
  }

  p.note(formatPreview(plans, PREVIEW_MAX_LINES), "Preview");

  if (dryRun) {
    p.note("Dry run: no files were renamed.", "Done");
    p.outro(pc.green("Done."));
    process.exit(0);
  }

  const confirmResult = await p.confirm({
    message: "Rename these files?",
    initialValue: false,
  });
  exitIfCancel(confirmResult);
  if (!confirmResult) {
    p.cancel("Rename cancelled.");
    process.exit(0);
  }

  s.start("Renaming…");
  try {
    const summary = await job.apply();
    s.stop(formatCounts(summary));
    for (const line of formatProblems(summary)) p.log.warn(line);
    if (summary.records.length > 0) {
      p.log.info(`Undo with: medianame --undo ${summary.batchId}`);
    }
  } catch (err: unknown) {
    s.stop("Failed.");
    p.log.error(errorMessage(err));
    process.exit(1);
  }

  if (isCustom) {
    const saveResult = await p.confirm({
      message: "Save this template to your list?",
      initialValue: false,
    });
    if (!p.isCancel(saveResult) && saveResult) {
      const nameResult = await p.text({
        message: "Template name",
        placeholder: "e.g. Harbor shoot",
      });
      if (!p.isCancel(nameResult) && typeof nameResult === "string" && nameResult.trim()) {
        try {
          await appendUserPattern(nameResult.trim(), template);
          p.log.success(`Saved as "${nameResult.trim()}".`);
        } catch (err: unknown) {
          p.log.error(`Could not save template: ${errorMessage(err)}`);
        }
      }
    }
  }

  p.outro(pc.green(job.status === "committed" ? "Done." : `Finished with status ${job.status}.`));
}
