import type { PricePoint } from "@tradegate/shared";

import { DataUnavailableError } from "../../common/errors";
import { pctChange, round } from "../../market/price-math";
import type { FeatureSection, SampleContext, SectionReading } from "../feature-section";

import type { PriceFeed } from "./feeds";

const MINUTE_MS = 60_000;

function minuteLows(series: readonly PricePoint[], atMs: number, minutes: number): Array<number | null> {
  const lows: Array<number | null> = [];
  for (let m = minutes; m >= 1; m -= 1) {
    const from = atMs - m * MINUTE_MS;
    const prices = series.filter((p) => p.ts > from && p.ts <= from + MINUTE_MS).map((p) => p.price);
    lows.push(prices.length > 0 ? Math.min(...prices) : null);
  }
  return lows;
}

/** Shape scores over the last ten minutes of the traded asset. */
export class PatternSection implements FeatureSection {
  readonly section = "patterns" as const;
  readonly columns = ["pat_higher_lows_5m", "pat_breakout_10m_pct", "pat_range_position_pct"] as const;

  constructor(
    private readonly feed: PriceFeed,
    private readonly asset: string
  ) {}

  read({ atMs }: SampleContext): SectionReading {
    const close = this.feed.priceAt(this.asset, atMs);
    const series = this.feed.series(this.asset, atMs - 10 * MINUTE_MS, atMs);
    if (close === null || series.length === 0) {
      throw new DataUnavailableError(`No ${this.asset} prices in the last ten minutes`);
    }

    // Streak of rising per-minute lows ending at the most recent minute.
    const lows = minuteLows(series, atMs, 5);
    let higherLows = 0;
    for (let i = lows.length - 1; i > 0; i -= 1) {
      const current = lows[i];
      const previous = lows[i - 1];
      if (current === null || current === undefined || previous === null || previous === undefined || current <= previous) break;
      higherLows += 1;
    }

    const prior = series.filter((p) => p.ts <= atMs - MINUTE_MS).map((p) => p.price);
    const all = series.map((p) => p.price);
    const high = Math.max(...all);
    const low = Math.min(...all);

    return {
      pat_higher_lows_5m: higherLows,
      pat_breakout_10m_pct: prior.length > 0 ? round(pctChange(Math.max(...prior), close)) : null,
      pat_range_position_pct: high > low ? round(((close - low) / (high - low)) * 100, 2) : null
    };
  }
}
