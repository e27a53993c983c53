/**
 * Batch orchestrator. One BatchJob owns its counters, claimed names and plans:
 *
 *   pending → scanning → describing → planning → awaiting-confirmation
 *           → applying → committed | partially-failed   (→ rolled-back)
 *
 * Any stage may end in `cancelled` once cancellation is observed.
 */

import { randomBytes } from "node:crypto";
import { resolve } from "node:path";
import { seedClaimedNames } from "./collision.js";
import type { Config } from "./config.js";
import type { DescriptionClient } from "./describer.js";
import {
  CancelledError,
  LedgerWriteError,
  TransientServiceError,
  ValidationError,
  errorMessage,
} from "./errors.js";
import { BackupLedger, type UndoResult } from "./ledger.js";
import { createLogger } from "./logger.js";
import { runPool } from "./pool.js";
import { applyPlans, planNames } from "./renamer.js";
import { type Sleep, withRetry } from "./retry.js";
import { scanMedia } from "./scan.js";
import { SequenceRegistry, scopeKeyFor } from "./sequence.js";
import { parsePattern } from "./template.js";
import type {
  AssetOutcome,
  AssetReport,
  BackupRecord,
  BatchStatus,
  BatchSummary,
  Description,
  ExcludedFile,
  MediaAsset,
  NamePlan,
  NamingPattern,
  OnBatchEvent,
} from "./types.js";

const log = createLogger("batch");

export interface BatchOptions {
  inputDir: string;
  /** defaults to inputDir (rename in place) */
  outputDir?: string;
  /** pattern source, e.g. "{date}_{description}_{sequence}" */
  pattern: string;
  config: Config;
  client: DescriptionClient;
  ledger?: BackupLedger;
  project?: string;
  counterStart?: number;
  backup?: boolean;
  concurrency?: number;
  batchId?: string;
  signal?: AbortSignal;
  sleep?: Sleep;
  onEvent?: OnBatchEvent;
}

export function createBatchId(now = new Date()): string {
  const stamp = now.toISOString().replace(/[-:]/g, "").replace(/\..+$/, "");
  return `${stamp}-${randomBytes(3).toString("hex")}`;
}

function emptyCounts(): Record<AssetOutcome, number> {
  return {
    excluded: 0,
    "description-failed": 0,
    planned: 0,
    unchanged: 0,
    applied: 0,
    failed: 0,
    "rolled-back": 0,
    cancelled: 0,
  };
}

async function withTimeout<T>(work: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(
      () => reject(new TransientServiceError(`${label} timed out after ${ms}ms`)),
      ms,
    );
  });
  try {
    return await Promise.race([work, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class BatchJob {
  readonly id: string;
  readonly inputDir: string;
  readonly outputDir: string;
  readonly pattern: NamingPattern;
  readonly backup: boolean;

  private readonly config: Config;
  private readonly client: DescriptionClient;
  private readonly ledger: BackupLedger;
  private readonly project: string;
  private readonly concurrency: number;
  private readonly registry: SequenceRegistry;
  private readonly scopeKey: string;
  private readonly sleep: Sleep | undefined;
  private readonly onEvent: OnBatchEvent | undefined;
  private readonly controller = new AbortController();

  private current: BatchStatus = "pending";
  private assets: MediaAsset[] = [];
  private excluded: ExcludedFile[] = [];
  private readonly describeFailures = new Map<string, string>();
  private readonly notReached = new Set<string>();
  private plans: NamePlan[] = [];
  private records: BackupRecord[] = [];
  private applyStarted = false;

  constructor(opts: BatchOptions) {
    // rejected here, before anything touches the disk or the network
    this.pattern = parsePattern(opts.pattern);
    const counterStart = opts.counterStart ?? opts.config.counterStart;
    if (!Number.isInteger(counterStart) || counterStart < 0) {
      throw new ValidationError(`Counter start must be a non-negative integer, got ${counterStart}`);
    }

    this.id = opts.batchId ?? createBatchId();
    this.inputDir = resolve(opts.inputDir);
    this.outputDir = resolve(opts.outputDir ?? opts.inputDir);
    this.config = opts.config;
    this.client = opts.client;
    this.ledger = opts.ledger ?? new BackupLedger(opts.config.ledgerDir);
    this.project = opts.project ?? opts.config.project;
    this.backup = opts.backup ?? opts.config.processing.backupOriginals;
    this.concurrency = opts.concurrency ?? opts.config.processing.batchSize;
    this.registry = new SequenceRegistry(counterStart);
    this.scopeKey = scopeKeyFor(this.outputDir, this.pattern.source);
    this.sleep = opts.sleep;
    this.onEvent = opts.onEvent;

    if (opts.signal) {
      if (opts.signal.aborted) this.controller.abort();
      else opts.signal.addEventListener("abort", () => this.controller.abort(), { once: true });
    }
  }

  get status(): BatchStatus {
    return this.current;
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /** Stop issuing description calls and renames at the next asset boundary. */
  cancel(): void {
    this.controller.abort();
  }

  getAssets(): readonly MediaAsset[] {
    return this.assets;
  }

  getExcluded(): readonly ExcludedFile[] {
    return this.excluded;
  }

  getPlans(): readonly NamePlan[] {
    return this.plans;
  }

  getRecords(): readonly BackupRecord[] {
    return this.records;
  }

  private setStatus(status: BatchStatus): void {
    this.current = status;
    log.debug({ batchId: this.id, status }, "status");
    this.onEvent?.({ type: "status", status });
  }

  private enter(stage: BatchStatus, allowed: readonly BatchStatus[]): void {
    if (!allowed.includes(this.current)) {
      throw new Error(`Cannot start ${stage} while batch is ${this.current}`);
    }
    if (this.cancelled) {
      this.setStatus("cancelled");
      throw new CancelledError();
    }
    this.setStatus(stage);
  }

  async scan(): Promise<readonly MediaAsset[]> {
    this.enter("scanning", ["pending"]);
    const result = await scanMedia(this.inputDir, this.config);
    this.assets = result.assets;
    this.excluded = result.excluded;
    for (const file of result.excluded) {
      log.info({ path: file.path, reason: file.reason }, "excluded");
    }
    return this.assets;
  }

  async describe(): Promise<void> {
    this.enter("describing", ["scanning"]);
    const { processing, ai } = this.config;
    const policy = {
      maxRetries: processing.maxRetries,
      baseDelayMs: processing.baseDelayMs,
      maxDelayMs: processing.maxDelayMs,
    };
    const signal = this.controller.signal;
    let done = 0;

    const skipped = await runPool(
      this.assets,
      this.concurrency,
      async (asset) => {
        if (asset.description === undefined) {
          try {
            const description = await withRetry(
              () => withTimeout(this.client.describe(asset, signal), ai.requestTimeoutMs, `Describing ${asset.name}`),
              policy,
              {
                signal,
                sleep: this.sleep,
                onRetry: ({ attempt, delayMs, error }) => {
                  log.warn({ path: asset.path, attempt, delayMs, err: errorMessage(error) }, "retrying");
                  this.onEvent?.({ type: "describe.retry", path: asset.path, attempt, delayMs });
                },
              },
            );
            this.setDescription(asset, description);
          } catch (err: unknown) {
            if (err instanceof CancelledError) {
              this.notReached.add(asset.path);
            } else {
              this.describeFailures.set(asset.path, errorMessage(err));
              log.warn({ path: asset.path, err: errorMessage(err) }, "description failed");
            }
          }
        }
        done++;
        this.onEvent?.({ type: "describe.progress", done, total: this.assets.length, path: asset.path });
      },
      signal,
    );

    for (const index of skipped) this.notReached.add(this.assets[index].path);
    if (this.cancelled) this.setStatus("cancelled");
  }

  private setDescription(asset: MediaAsset, description: Description): void {
    if (asset.description !== undefined) {
      throw new Error(`Description for ${asset.path} is already set`);
    }
    asset.description = description;
  }

  async plan(): Promise<readonly NamePlan[]> {
    this.enter("planning", ["describing"]);
    const claimed = await seedClaimedNames(this.outputDir);
    const described = this.assets.filter(
      (a) => a.description !== undefined && !this.describeFailures.has(a.path),
    );
    this.plans = planNames(described, {
      outputDir: this.outputDir,
      pattern: this.pattern,
      config: this.config,
      project: this.project,
      registry: this.registry,
      scopeKey: this.scopeKey,
      claimed,
    });
    this.setStatus("awaiting-confirmation");
    return this.plans;
  }

  /** Scan, describe and plan. Nothing on disk has changed when this returns. */
  async prepare(): Promise<readonly NamePlan[]> {
    await this.scan();
    await this.describe();
    if (this.cancelled) return this.plans;
    return this.plan();
  }

  async apply(): Promise<BatchSummary> {
    this.enter("applying", ["awaiting-confirmation"]);
    this.applyStarted = true;
    const total = this.plans.filter((p) => p.status === "resolved").length;
    let done = 0;

    try {
      await applyPlans(this.plans, {
        batchId: this.id,
        ledger: this.ledger,
        backupDir: this.backup ? this.config.backupDir : undefined,
        signal: this.controller.signal,
        onRecorded: (record) => this.records.push(record),
        onApplied: (plan) => {
          done++;
          this.onEvent?.({ type: "apply.progress", done, total, path: plan.asset.path });
        },
      });
    } catch (err: unknown) {
      if (err instanceof LedgerWriteError) {
        this.setStatus("partially-failed");
        log.error({ batchId: this.id, err: err.message }, "ledger write failed, batch aborted");
      }
      throw err;
    }

    if (this.plans.some((p) => p.status === "resolved")) this.setStatus("cancelled");
    else if (this.plans.some((p) => p.status === "failed")) this.setStatus("partially-failed");
    else this.setStatus("committed");

    log.info({ batchId: this.id, status: this.current, applied: this.records.length }, "batch applied");
    return this.summary();
  }

  /** Reverse every applied rename through the ledger, newest first. */
  async rollback(opts: { restoreFromBackup?: boolean } = {}): Promise<UndoResult> {
    if (!["committed", "partially-failed", "cancelled"].includes(this.current) || !this.applyStarted) {
      throw new Error(`Cannot roll back while batch is ${this.current}`);
    }
    const byTarget = new Map(this.plans.map((p) => [p.targetPath, p]));
    const result = await this.ledger.undo(this.id, {
      restoreFromBackup: opts.restoreFromBackup,
      onReverted: (record) => {
        const plan = byTarget.get(record.newPath);
        if (plan) plan.status = "rolled-back";
      },
    });
    this.setStatus("rolled-back");
    return result;
  }

  private outcomeOf(asset: MediaAsset): AssetReport {
    const failure = this.describeFailures.get(asset.path);
    if (failure !== undefined) {
      return { path: asset.path, outcome: "description-failed", detail: failure };
    }
    const plan = this.plans.find((p) => p.asset === asset);
    if (!plan) {
      const outcome = this.notReached.has(asset.path) || this.cancelled ? "cancelled" : "planned";
      return { path: asset.path, outcome };
    }
    switch (plan.status) {
      case "proposed":
      case "resolved":
        return {
          path: asset.path,
          outcome: this.applyStarted && this.cancelled ? "cancelled" : "planned",
          finalName: plan.finalName,
        };
      default:
        return { path: asset.path, outcome: plan.status, finalName: plan.finalName, detail: plan.error };
    }
  }

  summary(): BatchSummary {
    const assets: AssetReport[] = [
      ...this.excluded.map(
        (file): AssetReport => ({ path: file.path, outcome: "excluded", detail: file.reason }),
      ),
      ...this.assets.map((asset) => this.outcomeOf(asset)),
    ];
    const counts = emptyCounts();
    for (const report of assets) counts[report.outcome]++;
    return {
      batchId: this.id,
      status: this.current,
      outputDir: this.outputDir,
      pattern: this.pattern.source,
      counts,
      assets,
      records: this.records,
    };
  }
}
