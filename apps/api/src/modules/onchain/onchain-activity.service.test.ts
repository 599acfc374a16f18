import { describe, expect, it } from "vitest";

import { MemoryTradeStore } from "../persistence/memory-trade-store";
import { silentLogger } from "../../testing/fixtures";

import { OnchainActivityService } from "./onchain-activity.service";
import { extractItems, normalizeOnchainItem } from "./onchain-normalizer";
import { tradeFlowStats, whaleFlowStats } from "./onchain-stats";

const RECEIVED = new Date("2026-03-02T10:00:00.000Z");

describe("normalizeOnchainItem", () => {
  it("reads aliased fields and converts block time seconds", () => {
    const event = normalizeOnchainItem(
      { tx_signature: "sig-1", owner: "wallet-a", side: "BUY", sol_change: "-12.5", usdc_amount: 2000, block_time: 1_772_445_600 },
      "trade",
      RECEIVED
    );

    expect(event).toEqual({
      signature: "sig-1",
      kind: "trade",
      walletAddress: "wallet-a",
      direction: "buy",
      solAmount: -12.5,
      stablecoinAmount: 2000,
      price: null,
      perpDirection: null,
      ts: 1_772_445_600_000,
      receivedAt: "2026-03-02T10:00:00.000Z"
    });
  });

  it("skips items that cannot be keyed", () => {
    expect(normalizeOnchainItem({ wallet: "wallet-a" }, "trade", RECEIVED)).toBeNull();
    expect(normalizeOnchainItem({ signature: "sig-2" }, "whale", RECEIVED)).toBeNull();
    expect(normalizeOnchainItem("not-an-object", "whale", RECEIVED)).toBeNull();
  });

  it("falls back to the receive time when no timestamp is usable", () => {
    const event = normalizeOnchainItem({ signature: "s", wallet: "w", timestamp: "yesterday-ish" }, "whale", RECEIVED);
    expect(event?.ts).toBe(RECEIVED.getTime());
  });
});

describe("extractItems", () => {
  it("unwraps provider envelopes", () => {
    expect(extractItems({ matchedTransactions: [{ a: 1 }, { a: 2 }] })).toHaveLength(2);
    expect(extractItems({ whaleMovements: [{ a: 1 }] })).toHaveLength(1);
    expect(extractItems([{ a: 1 }])).toHaveLength(1);
    expect(extractItems({ signature: "x" })).toEqual([{ signature: "x" }]);
    expect(extractItems(null)).toEqual([]);
  });
});

describe("OnchainActivityService", () => {
  it("treats a redelivered signature as a no-op", async () => {
    const store = new MemoryTradeStore();
    const service = new OnchainActivityService(store, silentLogger);
    const payload = {
      matchedTransactions: [
        { signature: "sig-1", wallet: "w1", direction: "buy", sol_amount: 10, timestamp: RECEIVED.getTime() },
        { signature: "sig-2", wallet: "w2", direction: "sell", sol_amount: 4, timestamp: RECEIVED.getTime() }
      ]
    };

    const first = await service.ingest(payload, "trade", RECEIVED);
    const second = await service.ingest(payload, "trade", RECEIVED);

    expect(first).toEqual({ received: 2, inserted: 2, duplicates: 0, skipped: 0 });
    expect(second).toEqual({ received: 2, inserted: 0, duplicates: 2, skipped: 0 });
    expect(service.eventsBetween(RECEIVED.getTime() - 1, RECEIVED.getTime() + 1)).toHaveLength(2);
    expect(await store.listOnchainEvents(0, Number.MAX_SAFE_INTEGER)).toHaveLength(2);
  });
});

describe("flow stats", () => {
  const base = { stablecoinAmount: null, price: null, receivedAt: RECEIVED.toISOString(), ts: RECEIVED.getTime() };

  it("aggregates trade pressure", () => {
    const stats = tradeFlowStats([
      { ...base, signature: "1", kind: "trade", walletAddress: "a", direction: "buy", solAmount: 6, perpDirection: "long" },
      { ...base, signature: "2", kind: "trade", walletAddress: "b", direction: "sell", solAmount: -2, perpDirection: "short" },
      { ...base, signature: "3", kind: "trade", walletAddress: "a", direction: "buy", solAmount: 2, perpDirection: "long" },
      { ...base, signature: "4", kind: "whale", walletAddress: "c", direction: "in", solAmount: 500, perpDirection: null }
    ]);

    expect(stats).toEqual({
      tradeCount: 3,
      buyCount: 2,
      sellCount: 1,
      buyVolumeSol: 8,
      sellVolumeSol: 2,
      buySellRatio: 4,
      netFlowSol: 6,
      longShortRatio: 2,
      uniqueWallets: 2
    });
  });

  it("aggregates whale movements", () => {
    const stats = whaleFlowStats([
      { ...base, signature: "1", kind: "whale", walletAddress: "a", direction: "in", solAmount: 500, perpDirection: null },
      { ...base, signature: "2", kind: "whale", walletAddress: "b", direction: "out", solAmount: 1200, perpDirection: null }
    ]);

    expect(stats).toEqual({
      moveCount: 2,
      inflowSol: 500,
      outflowSol: 1200,
      netFlowSol: -700,
      largestMoveSol: 1200,
      uniqueWallets: 2
    });
    expect(whaleFlowStats([]).largestMoveSol).toBeNull();
  });
});
