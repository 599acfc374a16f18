import { z } from "zod";

const optionalNumber = z.preprocess(
  (v) => (typeof v === "string" && v.trim() !== "" ? Number(v) : v),
  z.number().finite().optional()
);

export const OnchainEventKindSchema = z.enum(["trade", "whale"]);
export type OnchainEventKind = z.infer<typeof OnchainEventKindSchema>;

export const OnchainEventSchema = z.object({
  signature: z.string().min(1),
  kind: OnchainEventKindSchema,
  walletAddress: z.string().min(1),
  direction: z.enum(["buy", "sell", "in", "out"]).nullable(),
  solAmount: z.number().nullable(),
  stablecoinAmount: z.number().nullable(),
  price: z.number().nullable(),
  perpDirection: z.enum(["long", "short"]).nullable(),
  ts: z.number().int().positive(),
  receivedAt: z.string().min(1)
});
export type OnchainEvent = z.infer<typeof OnchainEventSchema>;

// Providers name the same field several ways; the first alias present wins.
export const RawOnchainItemSchema = z
  .object({
    signature: z.string().min(1).optional(),
    tx_signature: z.string().min(1).optional(),
    transaction: z.string().min(1).optional(),
    wallet_address: z.string().min(1).optional(),
    wallet: z.string().min(1).optional(),
    owner: z.string().min(1).optional(),
    walletAddress: z.string().min(1).optional(),
    direction: z.string().optional(),
    side: z.string().optional(),
    action: z.string().optional(),
    sol_amount: optionalNumber,
    sol_change: optionalNumber,
    stablecoin_amount: optionalNumber,
    usdc_amount: optionalNumber,
    price: optionalNumber,
    perp_direction: z.string().optional(),
    timestamp: z.union([z.string(), z.number()]).optional(),
    trade_timestamp: z.union([z.string(), z.number()]).optional(),
    block_time: z.number().optional()
  })
  .passthrough();
export type RawOnchainItem = z.infer<typeof RawOnchainItemSchema>;
