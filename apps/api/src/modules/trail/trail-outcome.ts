import type { PreEntryMetrics, PriceTrend, TradeOutcome, TrailSnapshot } from "@tradegate/shared";

import { pctChange, round } from "../market/price-math";

/** Column whose samples price a candidate that expires without an executor close. */
export const OUTCOME_PRICE_COLUMN = "pm_close_price";

const TREND_CODES: Record<PriceTrend, number | null> = {
  rising: 1,
  flat: 0,
  falling: -1,
  unknown: null
};

export function outcomeFromSamples(entryPrice: number, rows: readonly TrailSnapshot[]): TradeOutcome | null {
  const prices = rows
    .filter((row) => row.columnName === OUTCOME_PRICE_COLUMN && row.value !== null)
    .sort((a, b) => a.minuteOffset - b.minuteOffset)
    .map((row) => row.value)
    .filter((value): value is number => value !== null);

  const last = prices[prices.length - 1];
  if (last === undefined) return null;

  return {
    realizedGainPct: round(pctChange(entryPrice, last)),
    maxFavorablePct: round(Math.max(...prices.map((p) => pctChange(entryPrice, p))))
  };
}

export function preEntryColumns(metrics: PreEntryMetrics): Record<string, number | null> {
  const columns: Record<string, number | null> = {};
  for (const [window, change] of Object.entries(metrics.changePct)) {
    columns[`pre_change_${window}`] = change;
  }
  columns.pre_trend_code = TREND_CODES[metrics.trend];
  return columns;
}
