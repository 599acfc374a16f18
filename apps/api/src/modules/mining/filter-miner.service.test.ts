import type { EngineConfig, MiningRun, TrailSnapshot } from "@tradegate/shared";
import { EngineConfigSchema } from "@tradegate/shared";
import { beforeEach, describe, expect, it } from "vitest";

import type { ConfigService } from "../config/config.service";
import { MemoryTradeStore } from "../persistence/memory-trade-store";
import { RuleSetsService } from "../rules/rule-sets.service";
import { makeCandidate, makeSnapshot, silentLogger } from "../../testing/fixtures";

import { FilterMinerService } from "./filter-miner.service";

function configWith(patch: object = {}): ConfigService {
  const config: EngineConfig = EngineConfigSchema.parse(patch);
  return { load: () => config } as unknown as ConfigService;
}

function minutesAgo(minutes: number): string {
  return new Date(Date.now() - minutes * 60_000).toISOString();
}

async function seedTrades(store: MemoryTradeStore): Promise<void> {
  const rows: TrailSnapshot[] = [];
  for (let i = 1; i <= 20; i += 1) {
    const good = `g${i}`;
    const bad = `b${i}`;
    await store.insertCandidate(makeCandidate({ id: good, status: "closed", realizedGainPct: 0.8, signalTs: minutesAgo(60 + i) }));
    await store.insertCandidate(makeCandidate({ id: bad, status: "missed", realizedGainPct: -0.4, signalTs: minutesAgo(120 + i) }));
    rows.push(
      makeSnapshot(good, 0, "pm_alpha", i),
      makeSnapshot(good, 0, "ob_beta", i),
      makeSnapshot(bad, 0, "pm_alpha", i <= 10 ? 100 : 10),
      makeSnapshot(bad, 0, "ob_beta", i <= 10 ? 10 : 100)
    );
  }
  await store.writeSnapshots(rows);
}

class BrokenSnapshotStore extends MemoryTradeStore {
  override async listSnapshots(): Promise<TrailSnapshot[]> {
    throw new Error("snapshot table unreadable");
  }
}

class UnsavableCompletionStore extends MemoryTradeStore {
  override async saveMiningRun(run: MiningRun): Promise<void> {
    if (run.status === "completed") throw new Error("mining_runs write failed");
    await super.saveMiningRun(run);
  }
}

describe("FilterMinerService", () => {
  let store: MemoryTradeStore;
  let ruleSets: RuleSetsService;

  beforeEach(() => {
    store = new MemoryTradeStore();
    ruleSets = new RuleSetsService(store, silentLogger);
  });

  function miner(target: MemoryTradeStore = store, rules: RuleSetsService = ruleSets): FilterMinerService {
    return new FilterMinerService(target, configWith(), rules, silentLogger);
  }

  it("completes a run and points the automatic rule set at the best combination", async () => {
    await seedTrades(store);
    await store.insertCandidate(makeCandidate({ id: "old", status: "closed", realizedGainPct: 2, signalTs: minutesAgo(30 * 60) }));
    await store.insertCandidate(makeCandidate({ id: "live", status: "open", signalTs: minutesAgo(5) }));

    const run = await miner().runMiningCycle();

    expect(run).toMatchObject({
      status: "completed",
      candidatesAnalyzed: 40,
      totalFiltersAnalyzed: 2,
      suggestionsCount: 2,
      combinationsCount: 2,
      bestColumns: ["ob_beta", "pm_alpha"]
    });
    expect(run.trainedThrough).toBe((await store.getCandidate("g1"))?.signalTs);

    const [auto] = await ruleSets.list();
    expect(auto).toMatchObject({
      name: "AutoFilters",
      kind: "mined",
      active: true,
      followMiner: true,
      version: 1,
      combinationId: run.bestCombinationId
    });

    const combos = await store.listCombinations({ runId: run.id });
    const best = combos.find((c) => c.id === run.bestCombinationId);
    expect(best).toMatchObject({ goodKeptPct: 90, badRemovedPct: 100, badTradesAfter: 0 });
    expect(best?.filterIds).toHaveLength(2);
  });

  it("bumps the followed rule set version on the next run", async () => {
    await seedTrades(store);
    const service = miner();

    await service.runMiningCycle();
    const second = await service.runMiningCycle();

    const [auto] = await ruleSets.list();
    expect(auto?.version).toBe(2);
    expect(auto?.combinationId).toBe(second.bestCombinationId);
    expect(await service.latestCompletedRunId()).toBe(second.id);
  });

  it("reports full consistency for columns in every winning combination", async () => {
    await seedTrades(store);
    const service = miner();
    await service.runMiningCycle();
    await service.runMiningCycle();

    const rows = await service.getConsistency();

    expect(rows.map((r) => [r.columnName, r.consistencyPct, r.totalRuns])).toEqual([
      ["ob_beta", 100, 2],
      ["pm_alpha", 100, 2]
    ]);
  });

  it("marks the run failed and leaves rule sets untouched when mining throws", async () => {
    const broken = new BrokenSnapshotStore();
    const brokenRules = new RuleSetsService(broken, silentLogger);

    const run = await miner(broken, brokenRules).runMiningCycle();

    expect(run.status).toBe("failed");
    expect(run.error).toBe("snapshot table unreadable");
    expect(await brokenRules.list()).toEqual([]);
    const [stored] = await broken.listMiningRuns();
    expect(stored?.status).toBe("failed");
  });

  it("leaves rule sets alone when the completed run cannot be recorded", async () => {
    const flaky = new UnsavableCompletionStore();
    await seedTrades(flaky);
    const flakyRules = new RuleSetsService(flaky, silentLogger);

    const run = await miner(flaky, flakyRules).runMiningCycle();

    expect(run).toMatchObject({ status: "failed", error: "mining_runs write failed" });
    expect(await flakyRules.list()).toEqual([]);
  });

  it("joins a run that is already in flight", async () => {
    await seedTrades(store);
    const service = miner();

    const [a, b] = await Promise.all([service.runMiningCycle(), service.runMiningCycle()]);

    expect(a.id).toBe(b.id);
    expect(await store.listMiningRuns()).toHaveLength(1);
  });

  it("completes without a combination when there is nothing to learn from", async () => {
    const run = await miner().runMiningCycle();

    expect(run).toMatchObject({ status: "completed", candidatesAnalyzed: 0, combinationsCount: 0, bestCombinationId: null });
    expect(await ruleSets.list()).toEqual([]);
  });

  it("starts and stops its schedule", () => {
    const service = miner();

    expect(service.start()).toMatchObject({ running: true, intervalMinutes: 15 });
    expect(service.stop()).toMatchObject({ running: false, intervalMinutes: null });
  });
});
