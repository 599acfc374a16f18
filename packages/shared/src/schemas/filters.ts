import { z } from "zod";

import { TrailSectionSchema } from "./trail";

export const FilterSourceSchema = z.enum(["mined", "override"]);
export type FilterSource = z.infer<typeof FilterSourceSchema>;

export const FilterSuggestionSchema = z.object({
  id: z.string().min(1),
  runId: z.string().min(1).nullable(),
  columnName: z.string().min(1),
  section: TrailSectionSchema.nullable(),
  minuteOffset: z.number().int(),
  fromValue: z.number().nullable(),
  toValue: z.number().nullable(),
  goodKeptPct: z.number().min(0).max(100),
  badRemovedPct: z.number().min(0).max(100),
  score: z.number(),
  goodBefore: z.number().int().min(0),
  badBefore: z.number().int().min(0),
  goodAfter: z.number().int().min(0),
  badAfter: z.number().int().min(0),
  discoveredAt: z.string().min(1),
  source: FilterSourceSchema
});
export type FilterSuggestion = z.infer<typeof FilterSuggestionSchema>;

export const FilterCombinationSchema = z.object({
  id: z.string().min(1),
  runId: z.string().min(1),
  filterIds: z.array(z.string().min(1)).min(1),
  columns: z.array(z.string().min(1)).min(1),
  minuteOffset: z.number().int(),
  goodKeptPct: z.number().min(0).max(100),
  badRemovedPct: z.number().min(0).max(100),
  badTradesAfter: z.number().int().min(0),
  improvementOverSingle: z.number(),
  createdAt: z.string().min(1)
});
export type FilterCombination = z.infer<typeof FilterCombinationSchema>;

export const MiningRunStatusSchema = z.enum(["running", "completed", "failed"]);
export type MiningRunStatus = z.infer<typeof MiningRunStatusSchema>;

export const MiningRunSchema = z.object({
  id: z.string().min(1),
  startedAt: z.string().min(1),
  completedAt: z.string().nullable(),
  status: MiningRunStatusSchema,
  analysisWindowHours: z.number().int().min(1),
  goodTradeThresholdPct: z.number(),
  minFiltersInCombo: z.number().int().min(1),
  candidatesAnalyzed: z.number().int().min(0),
  totalFiltersAnalyzed: z.number().int().min(0),
  suggestionsCount: z.number().int().min(0),
  combinationsCount: z.number().int().min(0),
  bestCombinationId: z.string().nullable(),
  bestColumns: z.array(z.string().min(1)),
  trainedThrough: z.string().nullable(),
  durationMs: z.number().min(0).nullable(),
  error: z.string().optional()
});
export type MiningRun = z.infer<typeof MiningRunSchema>;

export const ManualFilterSchema = z
  .object({
    columnName: z.string().min(1),
    minuteOffset: z.number().int().min(0).default(0),
    fromValue: z.number().nullable().default(null),
    toValue: z.number().nullable().default(null)
  })
  .superRefine((value, ctx) => {
    if (value.fromValue === null && value.toValue === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "At least one of fromValue/toValue is required",
        path: ["fromValue"]
      });
    }
    if (value.fromValue !== null && value.toValue !== null && value.fromValue > value.toValue) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: "fromValue must be <= toValue",
        path: ["toValue"]
      });
    }
  });
export type ManualFilter = z.infer<typeof ManualFilterSchema>;

export const RuleSetKindSchema = z.enum(["mined", "manual"]);
export type RuleSetKind = z.infer<typeof RuleSetKindSchema>;

export const RuleSetSchema = z.object({
  id: z.string().min(1),
  name: z.string().min(1),
  kind: RuleSetKindSchema,
  combinationId: z.string().min(1).nullable(),
  filters: z.array(ManualFilterSchema).default([]),
  active: z.boolean(),
  followMiner: z.boolean(),
  version: z.number().int().min(0),
  updatedAt: z.string().min(1)
});
export type RuleSet = z.infer<typeof RuleSetSchema>;

export const RuleSetCreateSchema = z.object({
  name: z.string().min(1),
  filters: z.array(ManualFilterSchema).min(1),
  active: z.boolean().default(true)
});
export type RuleSetCreate = z.infer<typeof RuleSetCreateSchema>;

export const RuleSetUpdateSchema = z.object({
  name: z.string().min(1).optional(),
  active: z.boolean().optional(),
  followMiner: z.boolean().optional(),
  filters: z.array(ManualFilterSchema).min(1).optional()
});
export type RuleSetUpdate = z.infer<typeof RuleSetUpdateSchema>;

export const TrendSchema = z.enum(["improving", "declining", "stable"]);
export type Trend = z.infer<typeof TrendSchema>;

export const FilterConsistencySchema = z.object({
  columnName: z.string().min(1),
  totalRuns: z.number().int().min(0),
  timesInBestCombo: z.number().int().min(0),
  consistencyPct: z.number().min(0).max(100),
  avgBadRemovedPct: z.number().nullable(),
  avgGoodKeptPct: z.number().nullable(),
  latestBadRemovedPct: z.number().nullable(),
  latestGoodKeptPct: z.number().nullable(),
  badRemovedTrend: TrendSchema,
  goodKeptTrend: TrendSchema
});
export type FilterConsistency = z.infer<typeof FilterConsistencySchema>;
