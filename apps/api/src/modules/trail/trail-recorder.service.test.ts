import type { EngineConfig, TrailSection } from "@tradegate/shared";
import { EngineConfigSchema } from "@tradegate/shared";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import type { ConfigService } from "../config/config.service";
import { MemoryTradeStore } from "../persistence/memory-trade-store";
import { makeCandidate, silentLogger } from "../../testing/fixtures";

import type { FeatureSection, SampleContext, SectionReading } from "./feature-section";
import { TrailRecorderService } from "./trail-recorder.service";

const SIGNAL = Date.parse("2026-03-02T10:00:00.000Z");

class ScriptedSection implements FeatureSection {
  readonly reads: number[] = [];

  constructor(
    readonly section: TrailSection,
    readonly columns: readonly string[],
    private readonly script: (context: SampleContext) => SectionReading | Promise<SectionReading>
  ) {}

  read(context: SampleContext): SectionReading | Promise<SectionReading> {
    this.reads.push(context.minuteOffset);
    return this.script(context);
  }
}

function configWith(patch: object): ConfigService {
  const config: EngineConfig = EngineConfigSchema.parse(patch);
  return { load: () => config } as unknown as ConfigService;
}

describe("TrailRecorderService", () => {
  const closes = [100, 100.9, 100.4];
  let store: MemoryTradeStore;
  let prices: ScriptedSection;
  let book: ScriptedSection;

  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(SIGNAL);
    store = new MemoryTradeStore();
    prices = new ScriptedSection("price_movements", ["pm_close_price", "pm_volatility_pct"], ({ minuteOffset }) => ({
      pm_close_price: closes[minuteOffset] ?? null,
      pm_volatility_pct: 0.22
    }));
    book = new ScriptedSection("order_book", ["ob_spread_bps", "ob_mid_price"], () => {
      throw new Error("book feed down");
    });
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  function recorder(sections: FeatureSection[] = [prices, book], patch: object = { trail: { windowMinutes: 3 } }) {
    return new TrailRecorderService(store, sections, configWith(patch), silentLogger);
  }

  it("samples offset 0 at once and nulls only the failing section", async () => {
    const candidate = makeCandidate();
    await store.insertCandidate(candidate);

    const report = await recorder().beginTracking(candidate);

    expect(report).toEqual({ candidateId: "cand-1", minuteOffset: 0, written: 4, duplicates: 0, failedSections: ["order_book"] });
    const rows = await store.listSnapshots(["cand-1"]);
    expect(rows.map((r) => [r.columnName, r.value])).toEqual([
      ["ob_mid_price", null],
      ["ob_spread_bps", null],
      ["pm_close_price", 100],
      ["pm_volatility_pct", 0.22]
    ]);
  });

  it("persists the gate momentum metrics under the pre_entry section", async () => {
    const candidate = makeCandidate();
    await store.insertCandidate(candidate);

    await recorder([prices]).beginTracking(candidate, {
      preEntryMetrics: {
        priceBefore: { "1m": 99.9, "3m": 99.75 },
        changePct: { "1m": 0.1001, "3m": 0.2506 },
        lookbackChangePct: 0.2506,
        trend: "rising"
      }
    });

    const pre = (await store.listSnapshots(["cand-1"])).filter((r) => r.section === "pre_entry");
    expect(pre.map((r) => [r.columnName, r.value])).toEqual([
      ["pre_change_1m", 0.1001],
      ["pre_change_3m", 0.2506],
      ["pre_trend_code", 1]
    ]);
  });

  it("samples every offset on schedule and expires the candidate as missed", async () => {
    const candidate = makeCandidate();
    await store.insertCandidate(candidate);
    const service = recorder();

    await service.beginTracking(candidate);
    await vi.advanceTimersByTimeAsync(60_000);
    expect(prices.reads).toEqual([0, 1]);

    await vi.advanceTimersByTimeAsync(120_000);

    expect(prices.reads).toEqual([0, 1, 2]);
    const stored = await store.getCandidate("cand-1");
    expect(stored).toMatchObject({
      status: "missed",
      realizedGainPct: 0.4,
      maxFavorablePct: 0.9,
      label: "good",
      labelThresholdPct: 0.3
    });
    expect(service.isTracking("cand-1")).toBe(false);
  });

  it("stops sampling once the candidate is finalized and ignores a second close", async () => {
    const candidate = makeCandidate();
    await store.insertCandidate(candidate);
    const service = recorder();
    await service.beginTracking(candidate);

    const first = await service.finalize("cand-1", { realizedGainPct: 0.8, maxFavorablePct: 1.1 }, "closed");
    const second = await service.finalize("cand-1", { realizedGainPct: -2, maxFavorablePct: 0 }, "closed");
    await vi.advanceTimersByTimeAsync(5 * 60_000);

    expect(first.changed).toBe(true);
    expect(first.candidate).toMatchObject({ status: "closed", realizedGainPct: 0.8, label: "good" });
    expect(second.changed).toBe(false);
    expect(second.candidate.realizedGainPct).toBe(0.8);
    expect(prices.reads).toEqual([0]);
  });

  it("labels a closed loser bad", async () => {
    await store.insertCandidate(makeCandidate());

    const result = await recorder().finalize("cand-1", { realizedGainPct: 0.29, maxFavorablePct: 0.5 }, "closed");

    expect(result.candidate.label).toBe("bad");
  });

  it("rejects offsets outside the window", async () => {
    await expect(recorder().sample(makeCandidate(), 3)).rejects.toThrow(RangeError);
  });

  it("does not track a candidate that is already terminal", async () => {
    const report = await recorder().beginTracking(makeCandidate({ status: "cancelled" }));

    expect(report).toBeNull();
    expect(prices.reads).toEqual([]);
  });

  it("resumes open candidates after a restart", async () => {
    await store.insertCandidate(makeCandidate({ id: "fresh" }));
    await store.insertCandidate(makeCandidate({ id: "stale", signalTs: new Date(SIGNAL - 10 * 60_000).toISOString() }));
    const service = recorder();

    const resumed = await service.resumeOpenCandidates();

    expect(resumed).toBe(1);
    expect(service.isTracking("fresh")).toBe(true);
    expect((await store.getCandidate("stale"))?.status).toBe("missed");
    service.onModuleDestroy();
  });
});

describe("TrailRecorderService section timeouts", () => {
  it("nulls a section that stalls past its budget", async () => {
    const store = new MemoryTradeStore();
    const stalled = new ScriptedSection("whale_activity", ["wh_move_count"], () => new Promise<SectionReading>(() => undefined));
    const service = new TrailRecorderService(
      store,
      [stalled],
      configWith({ trail: { windowMinutes: 1, sectionTimeoutMs: 10 } }),
      silentLogger
    );

    const report = await service.sample(makeCandidate(), 0);

    expect(report.failedSections).toEqual(["whale_activity"]);
    expect((await store.listSnapshots(["cand-1"]))[0]?.value).toBeNull();
  });
});
