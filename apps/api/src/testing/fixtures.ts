import type { MiningRun, TradeCandidate, TrailSnapshot } from "@tradegate/shared";
import { sectionForColumn } from "@tradegate/shared";
import pino from "pino";

export const silentLogger = pino({ level: "silent" });

export function makeCandidate(overrides: Partial<TradeCandidate> = {}): TradeCandidate {
  const signalTs = overrides.signalTs ?? "2026-03-02T10:00:00.000Z";
  return {
    id: "cand-1",
    signalTs,
    entryPrice: 100,
    decision: null,
    decisionReason: null,
    rationale: null,
    ruleSetVersion: null,
    status: "open",
    realizedGainPct: null,
    maxFavorablePct: null,
    label: null,
    labelThresholdPct: null,
    closedAt: null,
    createdAt: signalTs,
    updatedAt: signalTs,
    ...overrides
  };
}

export function makeSnapshot(
  candidateId: string,
  minuteOffset: number,
  columnName: string,
  value: number | null
): TrailSnapshot {
  return {
    candidateId,
    minuteOffset,
    columnName,
    value,
    section: sectionForColumn(columnName) ?? "price_movements",
    capturedAt: "2026-03-02T10:00:00.000Z"
  };
}

export function makeRun(overrides: Partial<MiningRun> = {}): MiningRun {
  return {
    id: "run-1",
    startedAt: "2026-03-02T12:00:00.000Z",
    completedAt: "2026-03-02T12:00:01.000Z",
    status: "completed",
    analysisWindowHours: 24,
    goodTradeThresholdPct: 0.3,
    minFiltersInCombo: 1,
    candidatesAnalyzed: 0,
    totalFiltersAnalyzed: 0,
    suggestionsCount: 0,
    combinationsCount: 0,
    bestCombinationId: null,
    bestColumns: [],
    trainedThrough: null,
    durationMs: 1000,
    ...overrides
  };
}
