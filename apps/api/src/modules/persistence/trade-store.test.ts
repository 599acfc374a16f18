import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, describe, expect, it } from "vitest";

import { RecordNotFoundError } from "../common/errors";
import { makeCandidate, makeSnapshot, silentLogger } from "../../testing/fixtures";

import { FileTradeStore } from "./file-trade-store";
import { MemoryTradeStore } from "./memory-trade-store";

describe("MemoryTradeStore", () => {
  it("ignores a repeated snapshot write and keeps the first value", async () => {
    const store = new MemoryTradeStore();

    const first = await store.writeSnapshots([makeSnapshot("c1", 0, "pm_volatility_pct", 0.22)]);
    const second = await store.writeSnapshots([makeSnapshot("c1", 0, "pm_volatility_pct", 0.9)]);

    expect(first).toEqual(["inserted"]);
    expect(second).toEqual(["duplicate"]);
    const rows = await store.listSnapshots(["c1"]);
    expect(rows).toHaveLength(1);
    expect(rows[0]?.value).toBe(0.22);
  });

  it("treats a repeated candidate id as a duplicate", async () => {
    const store = new MemoryTradeStore();

    expect(await store.insertCandidate(makeCandidate())).toBe("inserted");
    expect(await store.insertCandidate(makeCandidate({ entryPrice: 55 }))).toBe("duplicate");
    expect((await store.getCandidate("cand-1"))?.entryPrice).toBe(100);
  });

  it("serializes concurrent updates of the same candidate", async () => {
    const store = new MemoryTradeStore();
    await store.insertCandidate(makeCandidate());

    const closers = ["closed", "cancelled"] as const;
    await Promise.all(
      closers.map((status) =>
        store.updateCandidate("cand-1", (current) => (current.status === "open" ? { ...current, status } : current))
      )
    );

    expect((await store.getCandidate("cand-1"))?.status).toBe("closed");
  });

  it("rejects updates to an unknown candidate", async () => {
    const store = new MemoryTradeStore();

    await expect(store.updateCandidate("missing", (c) => c)).rejects.toBeInstanceOf(RecordNotFoundError);
  });

  it("filters candidates by status and signal window, newest first", async () => {
    const store = new MemoryTradeStore();
    await store.insertCandidate(makeCandidate({ id: "a", signalTs: "2026-03-01T10:00:00.000Z", status: "closed" }));
    await store.insertCandidate(makeCandidate({ id: "b", signalTs: "2026-03-02T10:00:00.000Z", status: "missed" }));
    await store.insertCandidate(makeCandidate({ id: "c", signalTs: "2026-03-02T11:00:00.000Z", status: "open" }));

    const rows = await store.listCandidates({
      statuses: ["closed", "missed"],
      signalFrom: "2026-03-01T00:00:00.000Z",
      signalTo: "2026-03-03T00:00:00.000Z"
    });

    expect(rows.map((c) => c.id)).toEqual(["b", "a"]);
  });

  it("returns copies that callers cannot mutate", async () => {
    const store = new MemoryTradeStore();
    await store.insertCandidate(makeCandidate());

    const copy = await store.getCandidate("cand-1");
    if (copy) copy.entryPrice = 1;

    expect((await store.getCandidate("cand-1"))?.entryPrice).toBe(100);
  });
});

describe("FileTradeStore", () => {
  const dirs: string[] = [];

  afterEach(() => {
    for (const dir of dirs.splice(0)) fs.rmSync(dir, { recursive: true, force: true });
  });

  function tempDir(): string {
    const dir = fs.mkdtempSync(path.join(os.tmpdir(), "tradegate-store-"));
    dirs.push(dir);
    return dir;
  }

  it("reloads tables and appended rows after a restart", async () => {
    const dir = tempDir();
    const store = FileTradeStore.open(dir, silentLogger);
    await store.insertCandidate(makeCandidate());
    await store.writeSnapshots([makeSnapshot("cand-1", 0, "ob_spread_bps", 3.5), makeSnapshot("cand-1", 1, "ob_spread_bps", null)]);
    await store.updateCandidate("cand-1", (c) => ({ ...c, status: "closed", realizedGainPct: 0.8 }));

    const reopened = FileTradeStore.open(dir, silentLogger);

    expect((await reopened.getCandidate("cand-1"))?.realizedGainPct).toBe(0.8);
    const rows = await reopened.listSnapshots(["cand-1"]);
    expect(rows.map((r) => [r.minuteOffset, r.value])).toEqual([
      [0, 3.5],
      [1, null]
    ]);
  });

  it("skips a torn trailing line in an append-only table", async () => {
    const dir = tempDir();
    const store = FileTradeStore.open(dir, silentLogger);
    await store.writeSnapshots([makeSnapshot("cand-1", 0, "pm_volatility_pct", 0.4)]);
    fs.appendFileSync(path.join(dir, "trail-snapshots.jsonl"), '{"candidateId":"cand-1","minu');

    const reopened = FileTradeStore.open(dir, silentLogger);

    expect(await reopened.listSnapshots(["cand-1"])).toHaveLength(1);
  });
});
