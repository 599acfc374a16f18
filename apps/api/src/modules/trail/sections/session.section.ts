import { DataUnavailableError } from "../../common/errors";
import { pctChange, round } from "../../market/price-math";
import type { FeatureSection, SampleContext, SectionReading } from "../feature-section";

import type { PriceFeed } from "./feeds";

const CYCLE_WINDOW_MS = 60 * 60_000;

/**
 * Time of day plus where the price sits inside its last-hour cycle: gain from
 * the cycle low, drawdown from the cycle high.
 */
export class SessionSection implements FeatureSection {
  readonly section = "session" as const;
  readonly columns = [
    "ss_hour_utc",
    "ss_weekday",
    "ss_cycle_gain_pct",
    "ss_cycle_drawdown_pct",
    "ss_minutes_since_cycle_low",
    "ss_minutes_since_cycle_high"
  ] as const;

  constructor(
    private readonly feed: PriceFeed,
    private readonly asset: string
  ) {}

  read({ atMs }: SampleContext): SectionReading {
    const at = new Date(atMs);
    const series = this.feed.series(this.asset, atMs - CYCLE_WINDOW_MS, atMs);
    const close = this.feed.priceAt(this.asset, atMs);
    if (close === null || series.length === 0) {
      throw new DataUnavailableError(`No ${this.asset} prices in the last hour`);
    }

    let low = series[0];
    let high = series[0];
    for (const point of series) {
      if (low && point.price <= low.price) low = point;
      if (high && point.price >= high.price) high = point;
    }
    if (!low || !high) {
      throw new DataUnavailableError(`No ${this.asset} prices in the last hour`);
    }

    return {
      ss_hour_utc: at.getUTCHours(),
      ss_weekday: at.getUTCDay(),
      ss_cycle_gain_pct: round(pctChange(low.price, close)),
      ss_cycle_drawdown_pct: round(pctChange(high.price, close)),
      ss_minutes_since_cycle_low: round((atMs - low.ts) / 60_000, 2),
      ss_minutes_since_cycle_high: round((atMs - high.ts) / 60_000, 2)
    };
  }
}
