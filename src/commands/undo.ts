/**
 * Undo and history: reverse a batch from its ledger, or list batches.
 */

import pc from "picocolors";
import type { Config } from "../config.js";
import { UndoConflict, errorMessage } from "../errors.js";
import { BackupLedger } from "../ledger.js";

export async function runHistory(config: Config): Promise<void> {
  const ledger = new BackupLedger(config.ledgerDir);
  const batches = await ledger.list();
  if (batches.length === 0) {
    console.log("No batches recorded.");
    return;
  }
  for (const b of batches) {
    const state = b.reverted >= b.applied ? pc.dim("undone") : pc.green(`${b.applied - b.reverted} undoable`);
    console.log(`${b.batchId}  ${b.applied} renamed, ${state}${b.lastAt ? `  ${b.lastAt}` : ""}`);
  }
}

export async function runUndo(batchId: string, fromBackup: boolean, config: Config): Promise<void> {
  const ledger = new BackupLedger(config.ledgerDir);
  try {
    const { records } = await ledger.read(batchId);
    if (records.length === 0) {
      console.error(`Error: No ledger entries for batch ${batchId}.`);
      process.exit(1);
    }
    const result = await ledger.undo(batchId, {
      restoreFromBackup: fromBackup,
      onReverted: (record, via) => {
        const note = via === "backup" ? pc.dim(" (from backup)") : "";
        console.log(`${record.newPath} → ${record.originalPath}${note}`);
      },
    });
    console.log(
      pc.green(`Restored ${result.restored.length} file(s)`) +
        (result.alreadyReverted > 0 ? `, ${result.alreadyReverted} already restored` : ""),
    );
  } catch (err: unknown) {
    if (err instanceof UndoConflict) {
      console.error(pc.red(`Undo stopped: ${err.message}`));
      console.error("Files restored before this point stay restored. Resolve the conflict and run undo again.");
      process.exit(2);
    }
    console.error("Error:", errorMessage(err));
    process.exit(1);
  }
}
