/**
 * Shared utilities for script, interactive and undo commands.
 */

import { basename } from "node:path";
import pc from "picocolors";
import type { AssetOutcome, BatchSummary, NamePlan } from "../types.js";

export const PREVIEW_MAX_LINES = 20;

export function formatPreview(plans: readonly NamePlan[], maxLines: number): string {
  const pending = plans.filter((p) => p.status === "resolved");
  const lines = pending.slice(0, maxLines).map((p) => {
    const suffixed = p.finalName !== p.proposedName ? pc.dim(" (renamed to avoid a clash)") : "";
    return `${p.asset.name} → ${p.finalName}${suffixed}`;
  });
  if (pending.length > maxLines) {
    lines.push(`… and ${pending.length - maxLines} more`);
  }
  return lines.join("\n");
}

const OUTCOME_COLORS: Record<AssetOutcome, (s: string) => string> = {
  excluded: pc.dim,
  "description-failed": pc.red,
  planned: pc.cyan,
  unchanged: pc.dim,
  applied: pc.green,
  failed: pc.red,
  "rolled-back": pc.yellow,
  cancelled: pc.yellow,
};

/** Counts line, e.g. "applied: 4, description-failed: 1". Zero counts are left out. */
export function formatCounts(summary: BatchSummary): string {
  const parts: string[] = [];
  for (const [outcome, count] of Object.entries(summary.counts)) {
    if (count > 0) parts.push(`${outcome}: ${count}`);
  }
  return parts.join(", ") || "nothing to do";
}

/** One line per asset that did not end up renamed, so no failure goes unreported. */
export function formatProblems(summary: BatchSummary): string[] {
  return summary.assets
    .filter((a) => a.outcome !== "applied" && a.outcome !== "planned" && a.outcome !== "unchanged")
    .map((a) => {
      const color = OUTCOME_COLORS[a.outcome];
      return `${color(a.outcome)} ${basename(a.path)}${a.detail ? `: ${a.detail}` : ""}`;
    });
}
