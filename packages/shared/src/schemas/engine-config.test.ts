import { describe, expect, it } from "vitest";

import { EngineConfigSchema, defaultEngineConfig, mergeEngineConfig } from "./engine-config";

describe("defaultEngineConfig", () => {
  it("fills the documented defaults", () => {
    const config = defaultEngineConfig();

    expect(config.gate.lookbackMinutes).toBe(3);
    expect(config.gate.minChangePct).toBe(0.2);
    expect(config.gate.noDataPolicy).toBe("REJECT");
    expect(config.trail.windowMinutes).toBe(15);
    expect(config.mining.goodTradeThresholdPct).toBe(0.3);
    expect(config.mining.analysisWindowHours).toBe(24);
    expect(config.mining.minFiltersInCombo).toBe(1);
    expect(config.validator.decisionOffset).toBe(0);
  });
});

describe("EngineConfigSchema", () => {
  it("rejects values outside their ranges", () => {
    expect(EngineConfigSchema.safeParse({ gate: { lookbackMinutes: 0 } }).success).toBe(false);
    expect(EngineConfigSchema.safeParse({ mining: { goodTradeThresholdPct: 9 } }).success).toBe(false);
    expect(EngineConfigSchema.safeParse({ trail: { windowMinutes: 120 } }).success).toBe(false);
  });

  it("rejects a combo ceiling below the floor", () => {
    const result = EngineConfigSchema.safeParse({ mining: { minFiltersInCombo: 4, maxFiltersInCombo: 2 } });
    expect(result.success).toBe(false);
  });

  it("keeps the decision offset inside the trail window", () => {
    const result = EngineConfigSchema.safeParse({ trail: { windowMinutes: 15 }, validator: { decisionOffset: 20 } });
    expect(result.success).toBe(false);
    expect(result.success ? [] : result.error.issues.map((issue) => issue.path.join("."))).toEqual(["validator.decisionOffset"]);
    expect(EngineConfigSchema.safeParse({ trail: { windowMinutes: 15 }, validator: { decisionOffset: 14 } }).success).toBe(true);
  });
});

describe("mergeEngineConfig", () => {
  it("applies nested patches without dropping siblings", () => {
    const next = mergeEngineConfig(defaultEngineConfig(), {
      gate: { minChangePct: 0.1, noDataPolicy: "ALLOW" },
      mining: { minFiltersInCombo: 2 }
    });

    expect(next.gate.minChangePct).toBe(0.1);
    expect(next.gate.noDataPolicy).toBe("ALLOW");
    expect(next.gate.lookbackMinutes).toBe(3);
    expect(next.mining.minFiltersInCombo).toBe(2);
    expect(next.mining.maxFiltersInCombo).toBe(6);
  });
});
