/**
 * Backup/undo ledger: one append-only JSON Lines file per batch.
 *
 * Each applied rename is written (and fsynced) before the rename is reported
 * as applied. Undo replays the file newest-first and appends a `reverted`
 * entry per reversal, so a partially undone batch can be resumed.
 */

import { constants } from "node:fs";
import { access, copyFile, mkdir, open, readFile, readdir, rename, stat } from "node:fs/promises";
import { dirname, join } from "node:path";
import { z } from "zod";
import { hashFile } from "./checksum.js";
import { LedgerWriteError, UndoConflict, errorMessage } from "./errors.js";
import { createLogger } from "./logger.js";
import type { BackupRecord } from "./types.js";

const log = createLogger("ledger");

const LEDGER_EXT = ".jsonl";

const recordSchema = z.object({
  batchId: z.string(),
  originalPath: z.string(),
  newPath: z.string(),
  timestamp: z.string(),
  backedUp: z.boolean(),
  backupPath: z.string().optional(),
  size: z.number(),
  checksum: z.string(),
});

const entrySchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("applied"), record: recordSchema }),
  z.object({
    kind: z.literal("reverted"),
    newPath: z.string(),
    originalPath: z.string(),
    timestamp: z.string(),
    via: z.enum(["rename", "backup"]),
  }),
]);

type LedgerEntry = z.infer<typeof entrySchema>;

export type RestoreMethod = "rename" | "backup";

export interface LedgerState {
  /** applied records, oldest first */
  records: BackupRecord[];
  /** newPaths already reverted */
  reverted: Set<string>;
}

export interface BatchListing {
  batchId: string;
  applied: number;
  reverted: number;
  firstAt?: string;
  lastAt?: string;
}

export interface UndoOptions {
  /** restore changed or deleted files from their verified backup copy */
  restoreFromBackup?: boolean;
  onReverted?: (record: BackupRecord, via: RestoreMethod) => void;
}

export interface UndoResult {
  restored: Array<{ record: BackupRecord; via: RestoreMethod }>;
  alreadyReverted: number;
}

const BATCH_ID_RE = /^[A-Za-z0-9._-]+$/;

async function exists(path: string): Promise<boolean> {
  try {
    await access(path, constants.F_OK);
    return true;
  } catch {
    return false;
  }
}

export class BackupLedger {
  readonly dir: string;

  constructor(dir: string) {
    this.dir = dir;
  }

  pathFor(batchId: string): string {
    if (!BATCH_ID_RE.test(batchId)) {
      throw new LedgerWriteError(`Invalid batch id: ${batchId}`);
    }
    return join(this.dir, `${batchId}${LEDGER_EXT}`);
  }

  private async append(batchId: string, entry: LedgerEntry): Promise<void> {
    const file = this.pathFor(batchId);
    try {
      await mkdir(this.dir, { recursive: true });
      const handle = await open(file, "a");
      try {
        await handle.appendFile(`${JSON.stringify(entry)}\n`, "utf-8");
        await handle.datasync();
      } finally {
        await handle.close();
      }
    } catch (err: unknown) {
      throw new LedgerWriteError(`Cannot write ledger ${file}: ${errorMessage(err)}`, {
        cause: err,
      });
    }
  }

  /** Durably append one applied rename. */
  async record(record: BackupRecord): Promise<void> {
    await this.append(record.batchId, { kind: "applied", record });
  }

  async markReverted(record: BackupRecord, via: RestoreMethod): Promise<void> {
    await this.append(record.batchId, {
      kind: "reverted",
      newPath: record.newPath,
      originalPath: record.originalPath,
      timestamp: new Date().toISOString(),
      via,
    });
  }

  async read(batchId: string): Promise<LedgerState> {
    const file = this.pathFor(batchId);
    let raw: string;
    try {
      raw = await readFile(file, "utf-8");
    } catch (err: unknown) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") {
        return { records: [], reverted: new Set() };
      }
      throw err;
    }

    const records: BackupRecord[] = [];
    const reverted = new Set<string>();
    const lines = raw.split("\n");
    for (const [index, line] of lines.entries()) {
      if (line.trim() === "") continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        // a torn final line from a crash mid-append carries no committed rename
        if (index === lines.length - 1) break;
        throw new LedgerWriteError(`Corrupt ledger ${file} at line ${index + 1}`);
      }
      const entry = entrySchema.safeParse(parsed);
      if (!entry.success) {
        throw new LedgerWriteError(`Corrupt ledger ${file} at line ${index + 1}`);
      }
      if (entry.data.kind === "applied") records.push(entry.data.record);
      else reverted.add(entry.data.newPath);
    }
    return { records, reverted };
  }

  async list(): Promise<BatchListing[]> {
    let names: string[];
    try {
      names = await readdir(this.dir);
    } catch (err: unknown) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return [];
      throw err;
    }
    const listings: BatchListing[] = [];
    for (const name of names.filter((n) => n.endsWith(LEDGER_EXT)).sort()) {
      const batchId = name.slice(0, -LEDGER_EXT.length);
      const { records, reverted } = await this.read(batchId);
      listings.push({
        batchId,
        applied: records.length,
        reverted: reverted.size,
        firstAt: records[0]?.timestamp,
        lastAt: records.at(-1)?.timestamp,
      });
    }
    return listings;
  }

  /**
   * Reverse a batch newest-first. Stops at the first record whose renamed file
   * no longer matches what was recorded, throwing UndoConflict; reversals made
   * before that point stay in place and are marked in the ledger.
   */
  async undo(batchId: string, opts: UndoOptions = {}): Promise<UndoResult> {
    const { records, reverted } = await this.read(batchId);
    const result: UndoResult = { restored: [], alreadyReverted: 0 };

    for (const record of records.toReversed()) {
      if (reverted.has(record.newPath)) {
        result.alreadyReverted++;
        continue;
      }
      const via = await this.reverseOne(record, opts.restoreFromBackup ?? false);
      await this.markReverted(record, via);
      result.restored.push({ record, via });
      opts.onReverted?.(record, via);
      log.info({ batchId, from: record.newPath, to: record.originalPath, via }, "reverted rename");
    }
    return result;
  }

  private async reverseOne(record: BackupRecord, allowBackup: boolean): Promise<RestoreMethod> {
    if (await exists(record.originalPath)) {
      throw new UndoConflict(record.originalPath, "original path is occupied");
    }

    const mismatch = await this.identityMismatch(record);
    if (mismatch === undefined) {
      await mkdir(dirname(record.originalPath), { recursive: true });
      await rename(record.newPath, record.originalPath);
      return "rename";
    }

    if (!allowBackup || !record.backedUp || record.backupPath === undefined) {
      throw new UndoConflict(record.newPath, mismatch);
    }
    let backupChecksum: string;
    try {
      backupChecksum = await hashFile(record.backupPath);
    } catch (err: unknown) {
      throw new UndoConflict(record.newPath, `${mismatch}; backup unreadable: ${errorMessage(err)}`);
    }
    if (backupChecksum !== record.checksum) {
      throw new UndoConflict(record.newPath, `${mismatch}; backup copy failed verification`);
    }
    await mkdir(dirname(record.originalPath), { recursive: true });
    await copyFile(record.backupPath, record.originalPath, constants.COPYFILE_EXCL);
    return "backup";
  }

  /** undefined when the file at newPath is the one that was renamed */
  private async identityMismatch(record: BackupRecord): Promise<string | undefined> {
    let size: number;
    try {
      size = (await stat(record.newPath)).size;
    } catch {
      return "renamed file is missing";
    }
    if (size !== record.size) return "renamed file was modified (size differs)";
    if ((await hashFile(record.newPath)) !== record.checksum) {
      return "renamed file was modified (checksum differs)";
    }
    return undefined;
  }
}
