import type { OnchainEvent, OnchainEventKind, RawOnchainItem } from "@tradegate/shared";
import { RawOnchainItemSchema } from "@tradegate/shared";

const DIRECTION_ALIASES: Record<string, NonNullable<OnchainEvent["direction"]>> = {
  buy: "buy",
  sell: "sell",
  in: "in",
  out: "out",
  deposit: "in",
  inflow: "in",
  withdraw: "out",
  withdrawal: "out",
  outflow: "out"
};

/** Webhook bodies arrive as one event, a list, or a provider wrapper around a list. */
export function extractItems(body: unknown): unknown[] {
  if (Array.isArray(body)) return body;
  if (body && typeof body === "object") {
    for (const key of ["matchedTransactions", "whaleMovements", "events"]) {
      const nested: unknown = Reflect.get(body, key);
      if (Array.isArray(nested)) return nested;
    }
    return [body];
  }
  return [];
}

function toEpochMs(value: string | number | undefined): number | null {
  if (value === undefined) return null;
  const numeric = typeof value === "number" ? value : /^\d+(\.\d+)?$/.test(value.trim()) ? Number(value) : Number.NaN;
  if (Number.isFinite(numeric)) {
    // Block times come in seconds, provider timestamps in milliseconds.
    return Math.round(numeric < 1e12 ? numeric * 1000 : numeric);
  }
  const parsed = typeof value === "string" ? Date.parse(value) : Number.NaN;
  return Number.isFinite(parsed) ? parsed : null;
}

function pickDirection(item: RawOnchainItem): OnchainEvent["direction"] {
  const raw = item.direction ?? item.side ?? item.action;
  if (!raw) return null;
  return DIRECTION_ALIASES[raw.trim().toLowerCase()] ?? null;
}

function pickPerpDirection(item: RawOnchainItem): OnchainEvent["perpDirection"] {
  const raw = item.perp_direction?.trim().toLowerCase();
  return raw === "long" || raw === "short" ? raw : null;
}

/** Returns null when the item lacks a signature or wallet and cannot be keyed. */
export function normalizeOnchainItem(input: unknown, kind: OnchainEventKind, receivedAt: Date): OnchainEvent | null {
  const parsed = RawOnchainItemSchema.safeParse(input);
  if (!parsed.success) return null;
  const item = parsed.data;

  const signature = item.signature ?? item.tx_signature ?? item.transaction;
  const walletAddress = item.wallet_address ?? item.wallet ?? item.owner ?? item.walletAddress;
  if (!signature || !walletAddress) return null;

  const ts =
    toEpochMs(item.timestamp) ?? toEpochMs(item.trade_timestamp) ?? toEpochMs(item.block_time) ?? receivedAt.getTime();

  return {
    signature,
    kind,
    walletAddress,
    direction: pickDirection(item),
    solAmount: item.sol_amount ?? item.sol_change ?? null,
    stablecoinAmount: item.stablecoin_amount ?? item.usdc_amount ?? null,
    price: item.price ?? null,
    perpDirection: pickPerpDirection(item),
    ts,
    receivedAt: receivedAt.toISOString()
  };
}
