import { z } from "zod";

export const PricePointSchema = z.object({
  ts: z.number().int().positive(),
  price: z.number().positive()
});
export type PricePoint = z.infer<typeof PricePointSchema>;

export const PriceTickBatchSchema = z.object({
  asset: z.string().min(1).transform((v) => v.trim().toUpperCase()),
  ticks: z.array(PricePointSchema).min(1).max(10_000)
});
export type PriceTickBatch = z.infer<typeof PriceTickBatchSchema>;

export const OrderBookSnapshotSchema = z.object({
  symbol: z.string().min(1).transform((v) => v.trim().toUpperCase()),
  ts: z.number().int().positive(),
  bestBid: z.number().positive(),
  bestAsk: z.number().positive(),
  bidVolume: z.number().nonnegative(),
  askVolume: z.number().nonnegative(),
  bidDepth: z.number().nonnegative().optional(),
  askDepth: z.number().nonnegative().optional()
});
export type OrderBookSnapshot = z.infer<typeof OrderBookSnapshotSchema>;
