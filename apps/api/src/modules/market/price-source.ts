import type { PricePoint } from "@tradegate/shared";

export const PRICE_SOURCE = Symbol("PRICE_SOURCE");

export interface PriceSource {
  /** Ticks with `fromMs <= ts <= toMs`, oldest first. */
  getSeries(asset: string, fromMs: number, toMs: number): Promise<PricePoint[]>;
  /** Latest tick at or before `atMs` that is not older than the source's staleness limit. */
  latestPrice(asset: string, atMs: number): Promise<number | null>;
}
