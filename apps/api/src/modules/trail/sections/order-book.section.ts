import type { OrderBookSnapshot } from "@tradegate/shared";

import { DataUnavailableError } from "../../common/errors";
import { round } from "../../market/price-math";
import type { FeatureSection, SampleContext, SectionReading } from "../feature-section";

import type { OrderBookFeed } from "./feeds";
import { finiteOrNull } from "./feeds";

const MAX_BOOK_AGE_MS = 2 * 60_000;

function imbalance(book: OrderBookSnapshot): number | null {
  const total = book.bidVolume + book.askVolume;
  return total > 0 ? (book.bidVolume - book.askVolume) / total : null;
}

export class OrderBookSection implements FeatureSection {
  readonly section = "order_book" as const;
  readonly columns = [
    "ob_mid_price",
    "ob_spread_bps",
    "ob_volume_imbalance",
    "ob_depth_ratio",
    "ob_bid_liquidity_share_pct",
    "ob_total_liquidity",
    "ob_imbalance_shift_1m",
    "ob_snapshot_count_1m"
  ] as const;

  constructor(
    private readonly feed: OrderBookFeed,
    private readonly symbol: string
  ) {}

  read({ atMs }: SampleContext): SectionReading {
    const history = this.feed.orderBooks(this.symbol, atMs - MAX_BOOK_AGE_MS, atMs);
    const latest = history[history.length - 1];
    if (!latest) {
      throw new DataUnavailableError(`No ${this.symbol} order book in the last ${MAX_BOOK_AGE_MS / 1000}s`);
    }

    const mid = (latest.bestBid + latest.bestAsk) / 2;
    const totalVolume = latest.bidVolume + latest.askVolume;
    const current = imbalance(latest);
    const minuteAgo = [...history].reverse().find((b) => b.ts <= atMs - 60_000);
    const previous = minuteAgo ? imbalance(minuteAgo) : null;
    const depthRatio =
      latest.bidDepth !== undefined && latest.askDepth !== undefined && latest.askDepth > 0
        ? latest.bidDepth / latest.askDepth
        : null;

    return {
      ob_mid_price: mid,
      ob_spread_bps: round(((latest.bestAsk - latest.bestBid) / mid) * 10_000),
      ob_volume_imbalance: current === null ? null : round(current),
      ob_depth_ratio: finiteOrNull(depthRatio === null ? null : round(depthRatio)),
      ob_bid_liquidity_share_pct: totalVolume > 0 ? round((latest.bidVolume / totalVolume) * 100) : null,
      ob_total_liquidity: totalVolume,
      ob_imbalance_shift_1m: current !== null && previous !== null ? round(current - previous) : null,
      ob_snapshot_count_1m: history.filter((b) => b.ts > atMs - 60_000).length
    };
  }
}
