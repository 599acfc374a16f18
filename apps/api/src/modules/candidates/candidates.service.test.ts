import type { EngineConfig, GateResult } from "@tradegate/shared";
import { EngineConfigSchema } from "@tradegate/shared";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { InvalidTransitionError, RecordNotFoundError } from "../common/errors";
import type { ConfigService } from "../config/config.service";
import type { Gate } from "../gate/pre-entry-gate.service";
import { MemoryTradeStore } from "../persistence/memory-trade-store";
import { RuleSetsService } from "../rules/rule-sets.service";
import type { FeatureSection } from "../trail/feature-section";
import { TrailRecorderService } from "../trail/trail-recorder.service";
import { CombinedValidatorService } from "../validator/combined-validator.service";
import { silentLogger } from "../../testing/fixtures";

import { CandidatesService } from "./candidates.service";

const config: EngineConfig = EngineConfigSchema.parse({ validator: { emptyRuleSetPolicy: "ALLOW" } });
const configService = { load: () => config } as unknown as ConfigService;

const priceSection: FeatureSection = {
  section: "price_movements",
  columns: ["pm_close_price"],
  read: () => ({ pm_close_price: 101 })
};

class ScriptedGate implements Gate {
  calls = 0;

  constructor(private readonly decision: GateResult["decision"]) {}

  async evaluate(): Promise<GateResult> {
    this.calls += 1;
    const lookback = this.decision === "GO" ? 0.3 : -0.4;
    return {
      decision: this.decision,
      reason: this.decision === "GO" ? "PASS" : "FALLING_OR_WEAK_MOMENTUM",
      metrics: { priceBefore: { "3m": 100 }, changePct: { "3m": lookback }, lookbackChangePct: lookback, trend: "unknown" },
      evaluatedAt: new Date().toISOString(),
      durationMs: 0
    };
  }
}

describe("CandidatesService", () => {
  let store: MemoryTradeStore;
  let recorder: TrailRecorderService;

  beforeEach(() => {
    store = new MemoryTradeStore();
    recorder = new TrailRecorderService(store, [priceSection], configService, silentLogger);
  });

  afterEach(() => {
    recorder.onModuleDestroy();
  });

  function service(gate: Gate): CandidatesService {
    const ruleSets = new RuleSetsService(store, silentLogger);
    const validator = new CombinedValidatorService(gate, recorder, ruleSets, store, configService, silentLogger);
    return new CandidatesService(store, validator, recorder, silentLogger);
  }

  it("persists and decides a new signal", async () => {
    const result = await service(new ScriptedGate("GO")).submitSignal({
      id: "sig-1",
      signalTs: new Date().toISOString(),
      entryPrice: 101,
      strategyId: "breakout"
    });

    expect(result.duplicate).toBe(false);
    expect(result.candidate).toMatchObject({
      id: "sig-1",
      status: "open",
      decision: "GO",
      decisionReason: "NO_ACTIVE_RULE_SETS",
      strategyId: "breakout"
    });
    expect(recorder.isTracking("sig-1")).toBe(true);
  });

  it("runs the gate once when the same signal arrives twice at the same moment", async () => {
    const gate = new ScriptedGate("GO");
    const candidates = service(gate);
    const signal = { id: "dup", signalTs: new Date().toISOString(), entryPrice: 100 };

    const [first, second] = await Promise.all([candidates.submitSignal(signal), candidates.submitSignal(signal)]);

    expect(gate.calls).toBe(1);
    expect([first.duplicate, second.duplicate]).toEqual([false, true]);
    expect(second.candidate).toEqual(first.candidate);
  });

  it("returns the stored decision for a resubmitted signal", async () => {
    const gate = new ScriptedGate("GO");
    const candidates = service(gate);
    const signalTs = new Date().toISOString();

    await candidates.submitSignal({ id: "sig-1", signalTs, entryPrice: 101 });
    const again = await candidates.submitSignal({ id: "sig-1", signalTs, entryPrice: 250 });

    expect(again.duplicate).toBe(true);
    expect(again.candidate.entryPrice).toBe(101);
    expect(gate.calls).toBe(1);
  });

  it("assigns an id and signal time when the caller leaves them out", async () => {
    const { candidate } = await service(new ScriptedGate("GO")).submitSignal({ entryPrice: 101 });

    expect(candidate.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(candidate.signalTs).toBe(candidate.createdAt);
  });

  it("closes an open candidate once", async () => {
    const candidates = service(new ScriptedGate("GO"));
    await candidates.submitSignal({ id: "sig-1", signalTs: new Date().toISOString(), entryPrice: 101 });

    const closed = await candidates.close("sig-1", { realizedGainPct: 0.8, maxFavorablePct: 1.2 });

    expect(closed).toMatchObject({ status: "closed", realizedGainPct: 0.8, label: "good", labelThresholdPct: 0.3 });
    expect(recorder.isTracking("sig-1")).toBe(false);
    await expect(candidates.close("sig-1", { realizedGainPct: 1, maxFavorablePct: 1 })).rejects.toBeInstanceOf(
      InvalidTransitionError
    );
    await expect(candidates.cancel("sig-1")).rejects.toThrow("Candidate sig-1 is already closed");
  });

  it("cancels gate rejections at decision time", async () => {
    const candidates = service(new ScriptedGate("NO_GO"));

    const { candidate } = await candidates.submitSignal({ id: "sig-2", signalTs: new Date().toISOString(), entryPrice: 99 });

    expect(candidate).toMatchObject({ status: "cancelled", decision: "NO_GO", decisionReason: "FALLING_OR_WEAK_MOMENTUM" });
    expect(await candidates.trail("sig-2")).toEqual([]);
    await expect(candidates.close("sig-2", { realizedGainPct: 1, maxFavorablePct: 1 })).rejects.toBeInstanceOf(
      InvalidTransitionError
    );
  });

  it("exposes the recorded trail of a tracked candidate", async () => {
    const candidates = service(new ScriptedGate("GO"));
    await candidates.submitSignal({ id: "sig-3", signalTs: new Date().toISOString(), entryPrice: 101 });

    const trail = await candidates.trail("sig-3");

    expect(trail.find((row) => row.columnName === "pm_close_price")).toMatchObject({ minuteOffset: 0, value: 101 });
    expect(trail.find((row) => row.columnName === "pre_change_3m")).toMatchObject({ value: 0.3 });
  });

  it("reports unknown candidates", async () => {
    const candidates = service(new ScriptedGate("GO"));

    await expect(candidates.get("nope")).rejects.toBeInstanceOf(RecordNotFoundError);
    await expect(candidates.cancel("nope")).rejects.toBeInstanceOf(RecordNotFoundError);
  });

  it("lists candidates by status", async () => {
    const candidates = service(new ScriptedGate("GO"));
    await candidates.submitSignal({ id: "a", signalTs: new Date(Date.now() - 1000).toISOString(), entryPrice: 101 });
    await candidates.submitSignal({ id: "b", signalTs: new Date().toISOString(), entryPrice: 101 });
    await candidates.cancel("a");

    expect((await candidates.list({ limit: 10 })).map((c) => c.id)).toEqual(["b", "a"]);
    expect((await candidates.list({ status: "cancelled", limit: 10 })).map((c) => c.id)).toEqual(["a"]);
  });
});
