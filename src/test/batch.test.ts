import fs from "node:fs/promises";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { BatchJob, createBatchId } from "../batch.js";
import type { BatchOptions } from "../batch.js";
import { formatCounts } from "../commands/common.js";
import { type ConfigInput, parseConfig } from "../config.js";
import {
  LedgerWriteError,
  PermanentServiceError,
  RateLimitedError,
  TransientServiceError,
  UnknownPlaceholder,
} from "../errors.js";
import type { BatchEvent, Description } from "../types.js";
import { FakeClient, described, listDir, makeTmpDir, writeMedia } from "./helpers.js";

const noSleep = async () => undefined;

describe("BatchJob", () => {
  let tmpDir: string;
  let media: string;

  beforeEach(async () => {
    tmpDir = await makeTmpDir("batch");
    media = path.join(tmpDir, "media");
    await fs.mkdir(media);
  });

  afterEach(async () => {
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  function configWith(extra: ConfigInput = {}) {
    return parseConfig({
      ledgerDir: path.join(tmpDir, "ledger"),
      backupDir: path.join(tmpDir, "backups"),
      ...extra,
    });
  }

  async function addFiles(names: string[]): Promise<void> {
    for (const name of names) await writeMedia(media, name, `content of ${name}`);
  }

  const always = (text: string) => new FakeClient(async () => described(text));

  function job(opts: Partial<BatchOptions> & Pick<BatchOptions, "client">): BatchJob {
    return new BatchJob({
      inputDir: media,
      pattern: "{date}_{description}_{sequence}",
      config: configWith(),
      batchId: "batch-1",
      sleep: noSleep,
      ...opts,
    });
  }

  it("names equal descriptions apart through the sequence field", async () => {
    await addFiles(["a.jpg", "b.jpg"]);
    const batch = job({ client: always("forest path") });

    const plans = await batch.prepare();
    expect(plans.map((p) => p.finalName)).toEqual([
      "2024-01-01_forest_path_001.jpg",
      "2024-01-01_forest_path_002.jpg",
    ]);
    expect(batch.status).toBe("awaiting-confirmation");
    expect(await listDir(media)).toEqual(["a.jpg", "b.jpg"]);

    const summary = await batch.apply();
    expect(summary.status).toBe("committed");
    expect(summary.counts.applied).toBe(2);
    expect(await listDir(media)).toEqual([
      "2024-01-01_forest_path_001.jpg",
      "2024-01-01_forest_path_002.jpg",
    ]);
    expect(await listDir(path.join(tmpDir, "backups", "batch-1"))).toEqual(["a.jpg", "b.jpg"]);
  });

  it("suffixes names that collide with each other and with the output folder", async () => {
    await addFiles(["a.jpg", "b.jpg"]);
    const out = path.join(tmpDir, "out");
    await fs.mkdir(out);
    await fs.writeFile(path.join(out, "forest_path.jpg"), "already here");
    const batch = job({ client: always("forest path"), pattern: "{description}", outputDir: out });

    await batch.prepare();
    await batch.apply();

    expect(await listDir(out)).toEqual(["forest_path (2).jpg", "forest_path (3).jpg", "forest_path.jpg"]);
    expect(await listDir(media)).toEqual([]);
    expect(await fs.readFile(path.join(out, "forest_path.jpg"), "utf-8")).toBe("already here");
  });

  it("leaves a permanently failed description out and applies the rest", async () => {
    await addFiles(["a.jpg", "b.jpg", "c.jpg", "d.jpg", "e.jpg"]);
    const client = new FakeClient(async (asset) => {
      if (asset.name === "c.jpg") throw new PermanentServiceError("unsupported image");
      return described("shot");
    });
    const batch = job({ client, pattern: "{description}_{counter}" });

    await batch.prepare();
    const summary = await batch.apply();

    expect(summary.status).toBe("committed");
    expect(formatCounts(summary)).toBe("description-failed: 1, applied: 4");
    expect(summary.assets.find((a) => a.path === path.join(media, "c.jpg"))).toEqual({
      path: path.join(media, "c.jpg"),
      outcome: "description-failed",
      detail: "unsupported image",
    });
    expect(client.calls.filter((name) => name === "c.jpg")).toHaveLength(1);
    expect(await listDir(media)).toEqual([
      "c.jpg",
      "shot_001.jpg",
      "shot_002.jpg",
      "shot_003.jpg",
      "shot_004.jpg",
    ]);
  });

  it("retries transient failures with backoff", async () => {
    await addFiles(["a.jpg"]);
    const client = new FakeClient(async (_asset, attempt) => {
      if (attempt < 3) throw new TransientServiceError("503");
      return described("pier");
    });
    const sleeps: number[] = [];
    const events: BatchEvent[] = [];
    const batch = job({
      client,
      pattern: "{description}",
      config: configWith({ processing: { maxRetries: 3, baseDelayMs: 10, maxDelayMs: 40 } }),
      sleep: async (ms) => void sleeps.push(ms),
      onEvent: (event) => events.push(event),
    });

    const plans = await batch.prepare();

    expect(plans.map((p) => p.finalName)).toEqual(["pier.jpg"]);
    expect(client.calls).toEqual(["a.jpg", "a.jpg", "a.jpg"]);
    expect(sleeps).toEqual([10, 20]);
    expect(events.filter((e) => e.type === "describe.retry")).toEqual([
      { type: "describe.retry", path: path.join(media, "a.jpg"), attempt: 1, delayMs: 10 },
      { type: "describe.retry", path: path.join(media, "a.jpg"), attempt: 2, delayMs: 20 },
    ]);
  });

  it("gives up after maxRetries when rate limited", async () => {
    await addFiles(["a.jpg"]);
    const client = new FakeClient(async () => {
      throw new RateLimitedError("Rate limited while describing a.jpg");
    });
    const batch = job({
      client,
      config: configWith({ processing: { maxRetries: 2, baseDelayMs: 1, maxDelayMs: 1 } }),
    });

    await batch.prepare();

    expect(client.calls).toHaveLength(3);
    expect(batch.summary().assets).toEqual([
      {
        path: path.join(media, "a.jpg"),
        outcome: "description-failed",
        detail: "Rate limited while describing a.jpg",
      },
    ]);
  });

  it("fails a call that hangs past the timeout", async () => {
    await addFiles(["a.jpg"]);
    const client = new FakeClient(() => new Promise<Description>(() => undefined));
    const batch = job({
      client,
      config: configWith({ ai: { requestTimeoutMs: 20 }, processing: { maxRetries: 0 } }),
    });

    await batch.prepare();

    expect(batch.summary().assets[0]).toMatchObject({
      outcome: "description-failed",
      detail: "Describing a.jpg timed out after 20ms",
    });
  });

  it("keeps applying after a rename fails and reports partially-failed", async () => {
    await addFiles(["a.jpg", "b.jpg", "c.jpg"]);
    const batch = job({ client: always("dock"), pattern: "{description}_{counter}" });
    await batch.prepare();
    await fs.rm(path.join(media, "b.jpg"));

    const summary = await batch.apply();

    expect(summary.status).toBe("partially-failed");
    expect(summary.assets.map((a) => a.outcome)).toEqual(["applied", "failed", "applied"]);
    expect(summary.assets[1].detail).toMatch(/^Rename failed: ENOENT/);
    expect(summary.records.map((r) => path.basename(r.newPath))).toEqual(["dock_001.jpg", "dock_003.jpg"]);
    expect(await listDir(media)).toEqual(["dock_001.jpg", "dock_003.jpg"]);
  });

  it("rolls a committed batch back through the ledger", async () => {
    await addFiles(["a.jpg", "b.jpg"]);
    const batch = job({ client: always("dock"), pattern: "{description}" });
    await batch.prepare();
    await batch.apply();

    const result = await batch.rollback();

    expect(result.restored).toHaveLength(2);
    expect(batch.status).toBe("rolled-back");
    expect(batch.summary().counts["rolled-back"]).toBe(2);
    expect(await listDir(media)).toEqual(["a.jpg", "b.jpg"]);
    expect(await fs.readFile(path.join(media, "b.jpg"), "utf-8")).toBe("content of b.jpg");
  });

  it("restores a deleted file from backup on rollback", async () => {
    await addFiles(["a.jpg"]);
    const batch = job({ client: always("dock"), pattern: "{description}" });
    await batch.prepare();
    await batch.apply();
    await fs.rm(path.join(media, "dock.jpg"));

    const result = await batch.rollback({ restoreFromBackup: true });

    expect(result.restored.map((r) => r.via)).toEqual(["backup"]);
    expect(await fs.readFile(path.join(media, "a.jpg"), "utf-8")).toBe("content of a.jpg");
  });

  it("keeps names from long non-Latin descriptions within the filesystem limit", async () => {
    await addFiles(["a.jpg"]);
    const words = Array.from({ length: 5 }, () => "森".repeat(30)).join(" ");
    const batch = job({ client: always(words), pattern: "{description}" });

    const plans = await batch.prepare();
    const expected = `${"森".repeat(30)}_${"森".repeat(30)}_${"森".repeat(6)}.jpg`;
    expect(plans.map((p) => p.finalName)).toEqual([expected]);

    const summary = await batch.apply();
    expect(summary.status).toBe("committed");
    expect(await listDir(media)).toEqual([expected]);
  });

  it("stops renaming once cancelled during apply and can roll back", async () => {
    await addFiles(["a.jpg", "b.jpg", "c.jpg"]);
    const controller = new AbortController();
    const batch = job({
      client: always("dock"),
      pattern: "{description}_{counter}",
      signal: controller.signal,
      onEvent: (event) => {
        if (event.type === "apply.progress") controller.abort();
      },
    });
    await batch.prepare();

    const summary = await batch.apply();

    expect(summary.status).toBe("cancelled");
    expect(formatCounts(summary)).toBe("applied: 1, cancelled: 2");
    expect(summary.assets.map((a) => a.outcome)).toEqual(["applied", "cancelled", "cancelled"]);
    expect(await listDir(media)).toEqual(["b.jpg", "c.jpg", "dock_001.jpg"]);

    const result = await batch.rollback();
    expect(result.restored).toHaveLength(1);
    expect(batch.status).toBe("rolled-back");
    expect(await listDir(media)).toEqual(["a.jpg", "b.jpg", "c.jpg"]);
  });

  it("rejects an unknown placeholder before touching anything", async () => {
    await addFiles(["a.jpg"]);
    const client = always("dock");
    expect(() => job({ client, pattern: "{date}_{mood}" })).toThrow(UnknownPlaceholder);
    expect(client.calls).toEqual([]);
    expect(await listDir(media)).toEqual(["a.jpg"]);
  });

  it("stops issuing calls once cancelled", async () => {
    await addFiles(["a.jpg", "b.jpg", "c.jpg"]);
    const controller = new AbortController();
    const client = new FakeClient(async () => {
      controller.abort();
      return described("dock");
    });
    const batch = job({ client, signal: controller.signal, concurrency: 1 });

    const plans = await batch.prepare();

    expect(plans).toEqual([]);
    expect(client.calls).toEqual(["a.jpg"]);
    expect(batch.status).toBe("cancelled");
    expect(batch.summary().counts.cancelled).toBe(3);
    expect(await listDir(media)).toEqual(["a.jpg", "b.jpg", "c.jpg"]);
  });

  it("undoes the current rename and aborts when the ledger cannot be written", async () => {
    await addFiles(["a.jpg", "b.jpg"]);
    const blocker = path.join(tmpDir, "blocker");
    await fs.writeFile(blocker, "not a directory");
    const batch = job({
      client: always("dock"),
      pattern: "{description}",
      backup: false,
      config: configWith({ ledgerDir: path.join(blocker, "ledger") }),
    });
    await batch.prepare();

    await expect(batch.apply()).rejects.toBeInstanceOf(LedgerWriteError);

    expect(batch.status).toBe("partially-failed");
    expect(batch.getPlans().map((p) => p.status)).toEqual(["failed", "resolved"]);
    expect(await listDir(media)).toEqual(["a.jpg", "b.jpg"]);
  });

  it("counts excluded and unchanged files", async () => {
    await addFiles(["dock.jpg", "notes.txt"]);
    const batch = job({ client: always("dock"), pattern: "{description}" });

    await batch.prepare();
    const summary = await batch.apply();

    expect(summary.status).toBe("committed");
    expect(formatCounts(summary)).toBe("excluded: 1, unchanged: 1");
    expect(summary.records).toEqual([]);
  });

  it("starts the counter where asked", async () => {
    await addFiles(["a.jpg"]);
    const batch = job({ client: always("dock"), pattern: "{description}_{counter}", counterStart: 10 });
    const plans = await batch.prepare();
    expect(plans.map((p) => p.finalName)).toEqual(["dock_010.jpg"]);
  });

  it("walks the states in order", async () => {
    await addFiles(["a.jpg"]);
    const statuses: string[] = [];
    const batch = job({
      client: always("dock"),
      pattern: "{description}",
      onEvent: (event) => {
        if (event.type === "status") statuses.push(event.status);
      },
    });

    await expect(batch.apply()).rejects.toThrow("Cannot start applying while batch is pending");
    await batch.prepare();
    await batch.apply();

    expect(statuses).toEqual([
      "scanning",
      "describing",
      "planning",
      "awaiting-confirmation",
      "applying",
      "committed",
    ]);
  });
});

describe("createBatchId", () => {
  it("is a sortable timestamp with a random tail", () => {
    expect(createBatchId(new Date(Date.UTC(2024, 0, 2, 3, 4, 5)))).toMatch(/^20240102T030405-[0-9a-f]{6}$/);
  });
});
