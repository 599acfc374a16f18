import { Inject, Injectable } from "@nestjs/common";
import type { Logger } from "pino";
import type { OrderBookSnapshot, PricePoint, PriceTickBatch } from "@tradegate/shared";

import { APP_LOGGER } from "../logging/pino-logger";

import { lastIndexAtOrBefore, priceAtOrBefore, slice } from "./price-math";
import type { PriceSource } from "./price-source";

const RETENTION_MS = 2 * 60 * 60_000;
const MAX_QUOTE_AGE_MS = 2 * 60_000;

/**
 * In-process view of the spot feeds pushed through /market. Ticks and book
 * snapshots are kept per symbol for a rolling two hours.
 */
@Injectable()
export class MarketStateService implements PriceSource {
  private readonly ticks = new Map<string, PricePoint[]>();
  private readonly books = new Map<string, OrderBookSnapshot[]>();

  constructor(@Inject(APP_LOGGER) private readonly logger: Logger) {}

  recordTicks(batch: PriceTickBatch): { accepted: number; total: number } {
    const byTs = new Map<number, PricePoint>();
    for (const p of this.ticks.get(batch.asset) ?? []) byTs.set(p.ts, p);
    for (const p of batch.ticks) byTs.set(p.ts, { ts: p.ts, price: p.price });

    const sorted = [...byTs.values()].sort((a, b) => a.ts - b.ts);
    const newest = sorted[sorted.length - 1]?.ts ?? 0;
    const kept = sorted.filter((p) => p.ts >= newest - RETENTION_MS);
    this.ticks.set(batch.asset, kept);

    this.logger.debug({ asset: batch.asset, accepted: batch.ticks.length, total: kept.length }, "Price ticks recorded");
    return { accepted: batch.ticks.length, total: kept.length };
  }

  recordOrderBook(snapshot: OrderBookSnapshot): void {
    const history = (this.books.get(snapshot.symbol) ?? []).filter((s) => s.ts !== snapshot.ts);
    history.push(snapshot);
    history.sort((a, b) => a.ts - b.ts);
    const newest = history[history.length - 1]?.ts ?? snapshot.ts;
    this.books.set(
      snapshot.symbol,
      history.filter((s) => s.ts >= newest - RETENTION_MS)
    );
  }

  series(asset: string, fromMs: number, toMs: number): PricePoint[] {
    return slice(this.ticks.get(asset.toUpperCase()) ?? [], fromMs, toMs);
  }

  priceAt(asset: string, atMs: number, maxAgeMs = MAX_QUOTE_AGE_MS): number | null {
    return priceAtOrBefore(this.ticks.get(asset.toUpperCase()) ?? [], atMs, maxAgeMs);
  }

  orderBooks(symbol: string, fromMs: number, toMs: number): OrderBookSnapshot[] {
    return (this.books.get(symbol.toUpperCase()) ?? []).filter((s) => s.ts >= fromMs && s.ts <= toMs);
  }

  latestTickTs(asset: string): number | null {
    const series = this.ticks.get(asset.toUpperCase()) ?? [];
    const idx = lastIndexAtOrBefore(series, Number.POSITIVE_INFINITY);
    return series[idx]?.ts ?? null;
  }

  async getSeries(asset: string, fromMs: number, toMs: number): Promise<PricePoint[]> {
    return this.series(asset, fromMs, toMs);
  }

  async latestPrice(asset: string, atMs: number): Promise<number | null> {
    return this.priceAt(asset, atMs);
  }
}
