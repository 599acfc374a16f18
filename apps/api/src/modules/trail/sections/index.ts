import type { FeatureSection } from "../feature-section";

import type { OnchainFeed, OrderBookFeed, PriceFeed } from "./feeds";
import { OrderBookSection } from "./order-book.section";
import { TransactionsSection, WhaleActivitySection } from "./onchain.sections";
import { PatternSection } from "./pattern.section";
import { PriceMovementSection } from "./price-movement.section";
import { SessionSection } from "./session.section";

const CROSS_ASSET_FIELDS = ["price_change_1m", "price_change_5m", "price_change_10m", "volatility_pct", "close_price"] as const;

export function buildDefaultSections(market: PriceFeed & OrderBookFeed, onchain: OnchainFeed, asset: string): FeatureSection[] {
  return [
    new PriceMovementSection(market, { asset, prefix: "pm_", section: "price_movements" }),
    new PriceMovementSection(market, { asset: "BTC", prefix: "btc_", section: "btc_correlation", fields: CROSS_ASSET_FIELDS }),
    new PriceMovementSection(market, { asset: "ETH", prefix: "eth_", section: "eth_correlation", fields: CROSS_ASSET_FIELDS }),
    new OrderBookSection(market, asset),
    new TransactionsSection(onchain),
    new WhaleActivitySection(onchain),
    new SessionSection(market, asset),
    new PatternSection(market, asset)
  ];
}
