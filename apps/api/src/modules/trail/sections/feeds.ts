import type { OnchainEvent, OrderBookSnapshot, PricePoint } from "@tradegate/shared";

export interface PriceFeed {
  series(asset: string, fromMs: number, toMs: number): PricePoint[];
  priceAt(asset: string, atMs: number): number | null;
}

export interface OrderBookFeed {
  orderBooks(symbol: string, fromMs: number, toMs: number): OrderBookSnapshot[];
}

export interface OnchainFeed {
  eventsBetween(fromMs: number, toMs: number): OnchainEvent[];
}

export function finiteOrNull(value: number | null | undefined): number | null {
  return value !== null && value !== undefined && Number.isFinite(value) ? value : null;
}
