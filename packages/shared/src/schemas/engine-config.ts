import { z } from "zod";

export const CONFIG_VERSION = 1 as const;

export const NoDataPolicySchema = z.enum(["ALLOW", "REJECT"]);
export type NoDataPolicy = z.infer<typeof NoDataPolicySchema>;

export const EmptyRuleSetPolicySchema = z.enum(["ALLOW", "REJECT"]);
export type EmptyRuleSetPolicy = z.infer<typeof EmptyRuleSetPolicySchema>;

export const GateSettingsSchema = z.object({
  asset: z.string().min(1).default("SOL"),
  lookbackMinutes: z.number().int().min(1).max(30).default(3),
  minChangePct: z.number().min(-10).max(10).default(0.2),
  // Missing lookback price: ALLOW keeps the historical pass-through, REJECT fails closed.
  noDataPolicy: NoDataPolicySchema.default("REJECT"),
  timeoutMs: z.number().int().min(10).max(10_000).default(500),
  priceWindowSeconds: z.number().int().min(2).max(300).default(30)
});
export type GateSettings = z.infer<typeof GateSettingsSchema>;

export const TrailSettingsSchema = z.object({
  windowMinutes: z.number().int().min(1).max(60).default(15),
  sectionTimeoutMs: z.number().int().min(10).max(30_000).default(2000),
  persistPreEntryMetrics: z.boolean().default(true)
});
export type TrailSettings = z.infer<typeof TrailSettingsSchema>;

export const MiningSettingsSchema = z
  .object({
    analysisWindowHours: z.number().int().min(1).max(168).default(24),
    goodTradeThresholdPct: z.number().min(0.1).max(5).default(0.3),
    minFiltersInCombo: z.number().int().min(1).max(10).default(1),
    maxFiltersInCombo: z.number().int().min(1).max(15).default(6),
    minGoodKeptPct: z.number().min(10).max(100).default(50),
    minBadRemovedPct: z.number().min(0).max(100).default(10),
    comboMinGoodKeptPct: z.number().min(5).max(100).default(25),
    comboMinImprovementPct: z.number().min(0.1).max(10).default(1),
    topK: z.number().int().min(1).max(200).default(20),
    minGoodSamples: z.number().int().min(1).max(1000).default(10),
    minTotalSamples: z.number().int().min(2).max(5000).default(20),
    maxNullPct: z.number().min(0).max(100).default(90),
    consistencyRuns: z.number().int().min(1).max(100).default(10),
    trendBandPct: z.number().min(0).max(100).default(5),
    intervalMinutes: z.number().int().min(1).max(1440).default(15),
    autoRuleSetName: z.string().min(1).default("AutoFilters"),
    skipColumns: z.array(z.string().min(1)).default([])
  })
  .superRefine((value, ctx) => {
    if (value.maxFiltersInCombo < value.minFiltersInCombo) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "maxFiltersInCombo must be >= minFiltersInCombo",
        path: ["maxFiltersInCombo"]
      });
    }
  });
export type MiningSettings = z.infer<typeof MiningSettingsSchema>;

export const ValidatorSettingsSchema = z.object({
  decisionOffset: z.number().int().min(0).max(59).default(0),
  timeoutMs: z.number().int().min(10).max(30_000).default(1500),
  emptyRuleSetPolicy: EmptyRuleSetPolicySchema.default("REJECT")
});
export type ValidatorSettings = z.infer<typeof ValidatorSettingsSchema>;

export const EngineConfigSchema = z
  .object({
    version: z.literal(CONFIG_VERSION).default(CONFIG_VERSION),
    apiKey: z.string().min(16).optional(),
    gate: GateSettingsSchema.default({}),
    trail: TrailSettingsSchema.default({}),
    mining: MiningSettingsSchema.default({}),
    validator: ValidatorSettingsSchema.default({})
  })
  .superRefine((value, ctx) => {
    // The validator waits for this offset's snapshot, so it must fall inside the trail.
    if (value.validator.decisionOffset >= value.trail.windowMinutes) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "validator.decisionOffset must be < trail.windowMinutes",
        path: ["validator", "decisionOffset"]
      });
    }
  });
export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export const EngineConfigPatchSchema = z.object({
  gate: GateSettingsSchema.partial().optional(),
  trail: TrailSettingsSchema.partial().optional(),
  mining: z
    .object({
      analysisWindowHours: z.number().int().min(1).max(168),
      goodTradeThresholdPct: z.number().min(0.1).max(5),
      minFiltersInCombo: z.number().int().min(1).max(10),
      maxFiltersInCombo: z.number().int().min(1).max(15),
      minGoodKeptPct: z.number().min(10).max(100),
      minBadRemovedPct: z.number().min(0).max(100),
      comboMinGoodKeptPct: z.number().min(5).max(100),
      comboMinImprovementPct: z.number().min(0.1).max(10),
      topK: z.number().int().min(1).max(200),
      consistencyRuns: z.number().int().min(1).max(100),
      trendBandPct: z.number().min(0).max(100),
      intervalMinutes: z.number().int().min(1).max(1440),
      skipColumns: z.array(z.string().min(1))
    })
    .partial()
    .optional(),
  validator: ValidatorSettingsSchema.partial().optional()
});
export type EngineConfigPatch = z.infer<typeof EngineConfigPatchSchema>;

export function defaultEngineConfig(): EngineConfig {
  return EngineConfigSchema.parse({});
}

export function mergeEngineConfig(current: EngineConfig, patch: EngineConfigPatch): EngineConfig {
  return EngineConfigSchema.parse({
    ...current,
    gate: { ...current.gate, ...patch.gate },
    trail: { ...current.trail, ...patch.trail },
    mining: { ...current.mining, ...patch.mining },
    validator: { ...current.validator, ...patch.validator }
  });
}
