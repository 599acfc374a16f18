import type { PricePoint } from "@tradegate/shared";

export function pctChange(from: number, to: number): number {
  return ((to - from) / from) * 100;
}

export function round(value: number, digits = 4): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** Binary search over a series sorted by ts; returns the index of the last tick with ts <= atMs, or -1. */
export function lastIndexAtOrBefore(series: readonly PricePoint[], atMs: number): number {
  let lo = 0;
  let hi = series.length - 1;
  let found = -1;
  while (lo <= hi) {
    const mid = (lo + hi) >> 1;
    const point = series[mid];
    if (point && point.ts <= atMs) {
      found = mid;
      lo = mid + 1;
    } else {
      hi = mid - 1;
    }
  }
  return found;
}

export function priceAtOrBefore(series: readonly PricePoint[], atMs: number, maxAgeMs: number): number | null {
  const point = series[lastIndexAtOrBefore(series, atMs)];
  if (!point || atMs - point.ts > maxAgeMs) return null;
  return point.price;
}

export function slice(series: readonly PricePoint[], fromMs: number, toMs: number): PricePoint[] {
  return series.filter((p) => p.ts >= fromMs && p.ts <= toMs);
}

export function mean(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, v) => sum + v, 0) / values.length;
}
