import { round } from "../../market/price-math";
import { tradeFlowStats, whaleFlowStats } from "../../onchain/onchain-stats";
import type { FeatureSection, SampleContext, SectionReading } from "../feature-section";

import type { OnchainFeed } from "./feeds";

const TRADE_WINDOW_MS = 60_000;
const WHALE_WINDOW_MS = 5 * 60_000;

function roundOrNull(value: number | null): number | null {
  return value === null ? null : round(value);
}

/** Confirmed swaps delivered by the webhook during the last minute. */
export class TransactionsSection implements FeatureSection {
  readonly section = "transactions" as const;
  readonly columns = [
    "tx_trade_count",
    "tx_buy_count",
    "tx_sell_count",
    "tx_buy_volume_sol",
    "tx_sell_volume_sol",
    "tx_buy_sell_ratio",
    "tx_net_flow_sol",
    "tx_long_short_ratio",
    "tx_unique_wallets"
  ] as const;

  constructor(private readonly feed: OnchainFeed) {}

  read({ atMs }: SampleContext): SectionReading {
    const stats = tradeFlowStats(this.feed.eventsBetween(atMs - TRADE_WINDOW_MS, atMs));
    return {
      tx_trade_count: stats.tradeCount,
      tx_buy_count: stats.buyCount,
      tx_sell_count: stats.sellCount,
      tx_buy_volume_sol: round(stats.buyVolumeSol),
      tx_sell_volume_sol: round(stats.sellVolumeSol),
      tx_buy_sell_ratio: roundOrNull(stats.buySellRatio),
      tx_net_flow_sol: round(stats.netFlowSol),
      tx_long_short_ratio: roundOrNull(stats.longShortRatio),
      tx_unique_wallets: stats.uniqueWallets
    };
  }
}

/** Whale wallet movements over the last five minutes; they are sparse, so the window is wider. */
export class WhaleActivitySection implements FeatureSection {
  readonly section = "whale_activity" as const;
  readonly columns = [
    "wh_move_count",
    "wh_inflow_sol",
    "wh_outflow_sol",
    "wh_net_flow_sol",
    "wh_largest_move_sol",
    "wh_unique_wallets"
  ] as const;

  constructor(private readonly feed: OnchainFeed) {}

  read({ atMs }: SampleContext): SectionReading {
    const stats = whaleFlowStats(this.feed.eventsBetween(atMs - WHALE_WINDOW_MS, atMs));
    return {
      wh_move_count: stats.moveCount,
      wh_inflow_sol: round(stats.inflowSol),
      wh_outflow_sol: round(stats.outflowSol),
      wh_net_flow_sol: round(stats.netFlowSol),
      wh_largest_move_sol: roundOrNull(stats.largestMoveSol),
      wh_unique_wallets: stats.uniqueWallets
    };
  }
}
