import type { GateReason, GateSettings, PreEntryMetrics, PriceTrend, PricePoint, TradeDecision } from "@tradegate/shared";

import { GateComputationError } from "../common/errors";
import { pctChange, round } from "../market/price-math";

export const MOMENTUM_WINDOWS_MINUTES = [1, 2, 3, 5, 10] as const;

const RISING_1M_PCT = 0.05;
const RISING_5M_PCT = 0.1;
// Absorbs binary float noise in the percent change (100 -> 100.2 is not exactly 0.2).
const FLOAT_TOLERANCE_PCT = 1e-9;

export type GateVerdict = {
  decision: TradeDecision;
  reason: GateReason;
  metrics: PreEntryMetrics;
};

export function windowKey(minutes: number): string {
  return `${minutes}m`;
}

export function windowsFor(settings: Pick<GateSettings, "lookbackMinutes">): number[] {
  return [...new Set<number>([...MOMENTUM_WINDOWS_MINUTES, settings.lookbackMinutes])].sort((a, b) => a - b);
}

/**
 * First tick inside `target ± windowSeconds/2`. Taking the earliest tick keeps
 * the reference price independent of how densely the feed was sampled.
 */
export function priceNear(series: readonly PricePoint[], targetMs: number, windowSeconds: number): number | null {
  const halfMs = (windowSeconds / 2) * 1000;
  let best: PricePoint | null = null;
  for (const point of series) {
    if (point.ts < targetMs - halfMs || point.ts > targetMs + halfMs) continue;
    if (!best || point.ts < best.ts) best = point;
  }
  return best ? best.price : null;
}

export function classifyTrend(change1m: number | null, change5m: number | null): PriceTrend {
  if (change1m === null || change5m === null) return "unknown";
  if (change1m > RISING_1M_PCT && change5m > RISING_5M_PCT) return "rising";
  if (change1m < -RISING_1M_PCT && change5m < -RISING_5M_PCT) return "falling";
  return "flat";
}

export function computePreEntryMetrics(
  signalMs: number,
  entryPrice: number,
  series: readonly PricePoint[],
  settings: Pick<GateSettings, "lookbackMinutes" | "priceWindowSeconds">
): PreEntryMetrics {
  if (!Number.isFinite(entryPrice) || entryPrice <= 0) {
    throw new GateComputationError(`Entry price must be a positive number, got ${entryPrice}`);
  }
  if (!Number.isFinite(signalMs)) {
    throw new GateComputationError("Signal time is not a valid timestamp");
  }

  const priceBefore: Record<string, number | null> = {};
  const changePct: Record<string, number | null> = {};
  for (const minutes of windowsFor(settings)) {
    const before = priceNear(series, signalMs - minutes * 60_000, settings.priceWindowSeconds);
    const key = windowKey(minutes);
    priceBefore[key] = before;
    changePct[key] = before === null ? null : round(pctChange(before, entryPrice));
  }

  return {
    priceBefore,
    changePct,
    lookbackChangePct: changePct[windowKey(settings.lookbackMinutes)] ?? null,
    trend: classifyTrend(changePct["1m"] ?? null, changePct["5m"] ?? null)
  };
}

/**
 * Momentum gate over the recent price series. Pure: the same inputs give the
 * same verdict. Throws GateComputationError on unusable inputs.
 */
export function evaluatePreEntry(
  signalTime: string | number,
  entryPrice: number,
  series: readonly PricePoint[],
  settings: GateSettings
): GateVerdict {
  const signalMs = typeof signalTime === "number" ? signalTime : Date.parse(signalTime);
  const metrics = computePreEntryMetrics(signalMs, entryPrice, series, settings);

  if (metrics.lookbackChangePct === null) {
    return {
      decision: settings.noDataPolicy === "ALLOW" ? "GO" : "NO_GO",
      reason: "NO_PRICE_DATA",
      metrics
    };
  }
  // Compare the unrounded change; the metrics record carries the rounded one.
  const lookbackPrice = metrics.priceBefore[windowKey(settings.lookbackMinutes)] ?? null;
  const lookbackChange = lookbackPrice === null ? metrics.lookbackChangePct : pctChange(lookbackPrice, entryPrice);
  if (lookbackChange < settings.minChangePct - FLOAT_TOLERANCE_PCT) {
    return { decision: "NO_GO", reason: "FALLING_OR_WEAK_MOMENTUM", metrics };
  }
  return { decision: "GO", reason: "PASS", metrics };
}

export function emptyMetrics(settings: Pick<GateSettings, "lookbackMinutes">): PreEntryMetrics {
  const nulls = Object.fromEntries(windowsFor(settings).map((m) => [windowKey(m), null]));
  return { priceBefore: { ...nulls }, changePct: { ...nulls }, lookbackChangePct: null, trend: "unknown" };
}
