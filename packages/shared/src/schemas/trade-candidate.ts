import { z } from "zod";

export const TradeDecisionSchema = z.enum(["GO", "NO_GO"]);
export type TradeDecision = z.infer<typeof TradeDecisionSchema>;

export const CandidateStatusSchema = z.enum(["open", "closed", "cancelled", "missed"]);
export type CandidateStatus = z.infer<typeof CandidateStatusSchema>;

export const TERMINAL_STATUSES: readonly CandidateStatus[] = ["closed", "cancelled", "missed"];

export const OutcomeLabelSchema = z.enum(["good", "bad"]);
export type OutcomeLabel = z.infer<typeof OutcomeLabelSchema>;

export const GateReasonSchema = z.enum(["PASS", "FALLING_OR_WEAK_MOMENTUM", "NO_PRICE_DATA", "GATE_ERROR"]);
export type GateReason = z.infer<typeof GateReasonSchema>;

export const PriceTrendSchema = z.enum(["rising", "falling", "flat", "unknown"]);
export type PriceTrend = z.infer<typeof PriceTrendSchema>;

export const PreEntryMetricsSchema = z.object({
  priceBefore: z.record(z.number().nullable()),
  changePct: z.record(z.number().nullable()),
  lookbackChangePct: z.number().nullable(),
  trend: PriceTrendSchema
});
export type PreEntryMetrics = z.infer<typeof PreEntryMetricsSchema>;

export const GateResultSchema = z.object({
  decision: TradeDecisionSchema,
  reason: GateReasonSchema,
  metrics: PreEntryMetricsSchema,
  evaluatedAt: z.string().min(1),
  durationMs: z.number().min(0),
  error: z.string().optional()
});
export type GateResult = z.infer<typeof GateResultSchema>;

export const FilterCheckSchema = z.object({
  filterId: z.string().min(1),
  columnName: z.string().min(1),
  minuteOffset: z.number().int(),
  fromValue: z.number().nullable(),
  toValue: z.number().nullable(),
  actualValue: z.number().nullable(),
  passed: z.boolean(),
  error: z.enum(["no_minute_data", "null_value"]).optional()
});
export type FilterCheck = z.infer<typeof FilterCheckSchema>;

export const RuleSetResultSchema = z.object({
  ruleSetId: z.string().min(1),
  ruleSetName: z.string().min(1),
  version: z.number().int().min(0),
  passed: z.boolean(),
  filtersPassed: z.number().int().min(0),
  filtersFailed: z.number().int().min(0),
  checks: z.array(FilterCheckSchema)
});
export type RuleSetResult = z.infer<typeof RuleSetResultSchema>;

export const ValidatorReasonSchema = z.enum([
  "RULE_SET_PASSED",
  "ALL_RULE_SETS_FAILED",
  "NO_ACTIVE_RULE_SETS",
  "VALIDATOR_ERROR"
]);
export type ValidatorReason = z.infer<typeof ValidatorReasonSchema>;

export const DecisionRationaleSchema = z.object({
  gate: GateResultSchema,
  ruleSets: z.array(RuleSetResultSchema).default([]),
  winningRuleSetId: z.string().nullable().default(null),
  trainedThrough: z.string().nullable().default(null),
  outOfSample: z.boolean().nullable().default(null),
  error: z.string().optional()
});
export type DecisionRationale = z.infer<typeof DecisionRationaleSchema>;

export const TradeCandidateSchema = z.object({
  id: z.string().min(1),
  signalTs: z.string().min(1),
  entryPrice: z.number().positive(),
  walletAddress: z.string().min(1).optional(),
  strategyId: z.string().min(1).optional(),
  decision: TradeDecisionSchema.nullable(),
  decisionReason: z.string().nullable(),
  rationale: DecisionRationaleSchema.nullable(),
  ruleSetVersion: z.string().nullable(),
  status: CandidateStatusSchema,
  realizedGainPct: z.number().nullable(),
  maxFavorablePct: z.number().nullable(),
  // Computed at labelThresholdPct; mining reuses it only when that matches the run threshold.
  label: OutcomeLabelSchema.nullable(),
  labelThresholdPct: z.number().nullable(),
  closedAt: z.string().nullable(),
  createdAt: z.string().min(1),
  updatedAt: z.string().min(1)
});
export type TradeCandidate = z.infer<typeof TradeCandidateSchema>;

export const SignalRequestSchema = z.object({
  id: z.string().min(1).optional(),
  signalTs: z.string().datetime({ offset: true }).optional(),
  entryPrice: z.number().positive(),
  walletAddress: z.string().min(1).optional(),
  strategyId: z.string().min(1).optional()
});
export type SignalRequest = z.infer<typeof SignalRequestSchema>;

export const TradeOutcomeSchema = z.object({
  realizedGainPct: z.number(),
  maxFavorablePct: z.number()
});
export type TradeOutcome = z.infer<typeof TradeOutcomeSchema>;

export function isTerminalStatus(status: CandidateStatus): boolean {
  return TERMINAL_STATUSES.includes(status);
}

export function labelOutcome(realizedGainPct: number, goodTradeThresholdPct: number): OutcomeLabel {
  return realizedGainPct >= goodTradeThresholdPct ? "good" : "bad";
}
