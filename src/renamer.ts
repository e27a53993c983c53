/**
 * Planning and applying renames: field maps, candidate names, collision
 * resolution, then the per-file backup + rename + ledger write.
 */

import { constants } from "node:fs";
import { access, copyFile, mkdir, rename, rm, stat, unlink } from "node:fs/promises";
import { basename, dirname, extname, join, resolve } from "node:path";
import { copyWithChecksum, hashFile } from "./checksum.js";
import { type ClaimedNames, resolveCollision } from "./collision.js";
import type { Config } from "./config.js";
import { FilesystemError, LedgerWriteError, errorMessage } from "./errors.js";
import type { BackupLedger } from "./ledger.js";
import { createLogger } from "./logger.js";
import { type SequenceRegistry, formatCounter } from "./sequence.js";
import { expandTemplate, sanitizeFilename } from "./template.js";
import type { BackupRecord, Description, FieldMap, MediaAsset, NamePlan, NamingPattern } from "./types.js";

const log = createLogger("renamer");

/** strftime subset: %Y %m %d %H %M %S %% (local time) */
export function formatDate(date: Date, format: string): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return format.replace(/%([YmdHMS%])/g, (_match, code: string) => {
    switch (code) {
      case "Y":
        return String(date.getFullYear());
      case "m":
        return pad(date.getMonth() + 1);
      case "d":
        return pad(date.getDate());
      case "H":
        return pad(date.getHours());
      case "M":
        return pad(date.getMinutes());
      case "S":
        return pad(date.getSeconds());
      default:
        return "%";
    }
  });
}

/** Truncate to the configured word count, then apply case and space rules. */
export function normalizeText(text: string, output: Config["output"]): string {
  let words = text.trim().split(/\s+/).filter(Boolean).slice(0, output.maxDescriptionWords).join(" ");
  if (output.lowercaseNames) words = words.toLowerCase();
  if (output.replaceSpaces) words = words.replaceAll(" ", output.replaceSpaces);
  return words;
}

export interface FieldContext {
  config: Config;
  project: string;
  counter: number;
}

export function buildFieldMap(asset: MediaAsset, description: Description, ctx: FieldContext): FieldMap {
  const { output } = ctx.config;
  const norm = (value: string | undefined, fallback: string) =>
    normalizeText(value && value.trim() ? value : fallback, output);
  const counter = formatCounter(ctx.counter, output.sequencePadding);

  return Object.freeze({
    date: formatDate(asset.modifiedAt, output.dateFormat),
    description: norm(description.description, "untitled"),
    sequence: counter,
    number: counter,
    counter,
    project: norm(ctx.project, "project"),
    scene: norm(description.scene, "scene"),
    location: norm(description.location, "location"),
    subject: norm(description.subjects.slice(0, 2).join(" "), "subject"),
    action: norm(description.action, "action"),
    original: basename(asset.name, extname(asset.name)),
  });
}

export interface PlanOptions {
  outputDir: string;
  pattern: NamingPattern;
  config: Config;
  project: string;
  registry: SequenceRegistry;
  scopeKey: string;
  claimed: ClaimedNames;
}

/**
 * Build one plan per described asset, in the order given. Counter issuance and
 * name claiming happen here, sequentially, so the result is deterministic.
 */
export function planNames(assets: readonly MediaAsset[], opts: PlanOptions): NamePlan[] {
  const outputDir = resolve(opts.outputDir);
  const { output } = opts.config;
  const plans: NamePlan[] = [];

  for (const asset of assets) {
    if (asset.description === undefined) {
      throw new Error(`Asset ${asset.path} has no description to plan from`);
    }
    const fields = buildFieldMap(asset, asset.description, {
      config: opts.config,
      project: opts.project,
      counter: opts.registry.next(opts.scopeKey),
    });
    const base = sanitizeFilename(expandTemplate(opts.pattern, fields), {
      replaceSpaces: output.replaceSpaces,
      lowercase: output.lowercaseNames,
    });
    const proposedName = `${base}${extname(asset.name).toLowerCase()}`;

    // already named this way in place: nothing to do
    if (dirname(asset.path) === outputDir && proposedName === asset.name) {
      plans.push({
        asset,
        proposedName,
        finalName: proposedName,
        targetPath: asset.path,
        status: "unchanged",
      });
      continue;
    }

    const finalName = resolveCollision(proposedName, opts.claimed);
    plans.push({
      asset,
      proposedName,
      finalName,
      targetPath: join(outputDir, finalName),
      status: "resolved",
    });
  }
  return plans;
}

async function pathExists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

async function moveFile(from: string, to: string): Promise<void> {
  try {
    await rename(from, to);
  } catch (err: unknown) {
    if (!(err instanceof Error && "code" in err && err.code === "EXDEV")) throw err;
    // different filesystem: copy without clobbering, then drop the source
    await copyFile(from, to, constants.COPYFILE_EXCL);
    await unlink(from);
  }
}

export interface ApplyOptions {
  batchId: string;
  ledger: BackupLedger;
  /** when set, originals are copied to <backupDir>/<batchId>/ first */
  backupDir?: string;
  signal?: AbortSignal;
  onRecorded?: (record: BackupRecord) => void;
  onApplied?: (plan: NamePlan, index: number) => void;
}

/**
 * Apply resolved plans one at a time. A failing plan is marked `failed` and the
 * rest are still attempted. A ledger write failure reverses that rename, drops
 * its backup copy and aborts with LedgerWriteError. If the reversal fails too,
 * the plan is still marked failed and the error names both failures.
 */
export async function applyPlans(plans: NamePlan[], opts: ApplyOptions): Promise<BackupRecord[]> {
  const records: BackupRecord[] = [];

  for (const [index, plan] of plans.entries()) {
    if (plan.status !== "resolved") continue;
    if (opts.signal?.aborted) break;

    const { asset, targetPath } = plan;
    let renamed = false;
    let backupPath: string | undefined;
    try {
      if (await pathExists(targetPath)) {
        throw new FilesystemError(targetPath, `Target already exists: ${targetPath}`);
      }

      const { size } = await stat(asset.path);
      let checksum: string;
      if (opts.backupDir !== undefined) {
        backupPath = join(opts.backupDir, opts.batchId, asset.name);
        checksum = await copyWithChecksum(asset.path, backupPath);
      } else {
        checksum = await hashFile(asset.path);
      }

      await mkdir(dirname(targetPath), { recursive: true });
      await moveFile(asset.path, targetPath);
      renamed = true;

      const record: BackupRecord = {
        batchId: opts.batchId,
        originalPath: asset.path,
        newPath: targetPath,
        timestamp: new Date().toISOString(),
        backedUp: backupPath !== undefined,
        backupPath,
        size,
        checksum,
      };
      await opts.ledger.record(record);
      records.push(record);
      opts.onRecorded?.(record);
      plan.status = "applied";
      log.info({ from: asset.path, to: targetPath }, "renamed");
      opts.onApplied?.(plan, index);
    } catch (err: unknown) {
      if (err instanceof LedgerWriteError) {
        plan.status = "failed";
        plan.error = err.message;
        if (!renamed) throw err;
        try {
          await moveFile(targetPath, asset.path);
        } catch (revertErr: unknown) {
          const kept = backupPath !== undefined ? ` (backup kept at ${backupPath})` : "";
          plan.error = `${err.message}; could not move ${targetPath} back to ${asset.path}: ${errorMessage(revertErr)}${kept}`;
          log.error({ path: asset.path, err: plan.error }, "rename left without a ledger entry");
          throw new LedgerWriteError(plan.error, { cause: revertErr });
        }
        if (backupPath !== undefined) {
          const orphan = backupPath;
          await rm(orphan, { force: true }).catch((rmErr: unknown) => {
            log.warn({ path: orphan, err: errorMessage(rmErr) }, "could not remove backup copy");
          });
        }
        throw err;
      }
      plan.status = "failed";
      plan.error = err instanceof FilesystemError ? err.message : `Rename failed: ${errorMessage(err)}`;
      log.warn({ path: asset.path, err: plan.error }, "rename failed");
      opts.onApplied?.(plan, index);
    }
  }
  return records;
}
