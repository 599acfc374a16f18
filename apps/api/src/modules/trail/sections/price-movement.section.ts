import type { TrailSection } from "@tradegate/shared";

import { DataUnavailableError } from "../../common/errors";
import { mean, pctChange, round } from "../../market/price-math";
import type { FeatureSection, SampleContext, SectionReading } from "../feature-section";

import type { PriceFeed } from "./feeds";
import { finiteOrNull } from "./feeds";

const MINUTE_MS = 60_000;

export const PRICE_MOVEMENT_FIELDS = [
  "price_change_1m",
  "price_change_5m",
  "price_change_10m",
  "volatility_pct",
  "momentum_acceleration_1m",
  "price_vs_ma5_pct",
  "close_price",
  "high_price",
  "low_price"
] as const;

export type PriceMovementField = (typeof PRICE_MOVEMENT_FIELDS)[number];

export type PriceMovementOptions = {
  asset: string;
  prefix: string;
  section: TrailSection;
  fields?: readonly PriceMovementField[];
};

function changeOrNull(from: number | null, to: number | null): number | null {
  return from === null || to === null ? null : round(pctChange(from, to));
}

/** Per-minute movement of one asset: the traded one under `pm_`, BTC and ETH for correlation. */
export class PriceMovementSection implements FeatureSection {
  readonly section: TrailSection;
  readonly columns: readonly string[];
  private readonly fields: readonly PriceMovementField[];

  constructor(
    private readonly feed: PriceFeed,
    private readonly options: PriceMovementOptions
  ) {
    this.section = options.section;
    this.fields = options.fields ?? PRICE_MOVEMENT_FIELDS;
    this.columns = this.fields.map((f) => `${options.prefix}${f}`);
  }

  read({ atMs }: SampleContext): SectionReading {
    const { asset, prefix } = this.options;
    const close = this.feed.priceAt(asset, atMs);
    if (close === null) {
      throw new DataUnavailableError(`No ${asset} quote at ${new Date(atMs).toISOString()}`);
    }

    const ago = (minutes: number): number | null => this.feed.priceAt(asset, atMs - minutes * MINUTE_MS);
    const lastMinute = this.feed.series(asset, atMs - MINUTE_MS, atMs).map((p) => p.price);
    const high = Math.max(close, ...lastMinute);
    const low = Math.min(close, ...lastMinute);

    const change1m = changeOrNull(ago(1), close);
    const previousChange1m = changeOrNull(ago(2), ago(1));
    const ma5 = mean([0, 1, 2, 3, 4].map(ago).filter((p): p is number => p !== null));

    const values: Record<PriceMovementField, number | null> = {
      price_change_1m: change1m,
      price_change_5m: changeOrNull(ago(5), close),
      price_change_10m: changeOrNull(ago(10), close),
      volatility_pct: round(((high - low) / low) * 100),
      momentum_acceleration_1m: change1m !== null && previousChange1m !== null ? round(change1m - previousChange1m) : null,
      price_vs_ma5_pct: ma5 === null ? null : round(pctChange(ma5, close)),
      close_price: close,
      high_price: high,
      low_price: low
    };

    const reading: SectionReading = {};
    for (const field of this.fields) {
      reading[`${prefix}${field}`] = finiteOrNull(values[field]);
    }
    return reading;
  }
}
