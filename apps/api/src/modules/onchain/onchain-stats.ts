import type { OnchainEvent } from "@tradegate/shared";

export type TradeFlowStats = {
  tradeCount: number;
  buyCount: number;
  sellCount: number;
  buyVolumeSol: number;
  sellVolumeSol: number;
  buySellRatio: number | null;
  netFlowSol: number;
  longShortRatio: number | null;
  uniqueWallets: number;
};

export type WhaleFlowStats = {
  moveCount: number;
  inflowSol: number;
  outflowSol: number;
  netFlowSol: number;
  largestMoveSol: number | null;
  uniqueWallets: number;
};

function absSol(e: OnchainEvent): number {
  return Math.abs(e.solAmount ?? 0);
}

export function tradeFlowStats(events: readonly OnchainEvent[]): TradeFlowStats {
  const trades = events.filter((e) => e.kind === "trade");
  const buys = trades.filter((e) => e.direction === "buy");
  const sells = trades.filter((e) => e.direction === "sell");
  const buyVolumeSol = buys.reduce((sum, e) => sum + absSol(e), 0);
  const sellVolumeSol = sells.reduce((sum, e) => sum + absSol(e), 0);
  const longs = trades.filter((e) => e.perpDirection === "long").length;
  const shorts = trades.filter((e) => e.perpDirection === "short").length;

  return {
    tradeCount: trades.length,
    buyCount: buys.length,
    sellCount: sells.length,
    buyVolumeSol,
    sellVolumeSol,
    buySellRatio: sellVolumeSol > 0 ? buyVolumeSol / sellVolumeSol : null,
    netFlowSol: buyVolumeSol - sellVolumeSol,
    longShortRatio: shorts > 0 ? longs / shorts : null,
    uniqueWallets: new Set(trades.map((e) => e.walletAddress)).size
  };
}

export function whaleFlowStats(events: readonly OnchainEvent[]): WhaleFlowStats {
  const moves = events.filter((e) => e.kind === "whale");
  const inflowSol = moves.filter((e) => e.direction === "in").reduce((sum, e) => sum + absSol(e), 0);
  const outflowSol = moves.filter((e) => e.direction === "out").reduce((sum, e) => sum + absSol(e), 0);
  const sizes = moves.map(absSol);

  return {
    moveCount: moves.length,
    inflowSol,
    outflowSol,
    netFlowSol: inflowSol - outflowSol,
    largestMoveSol: sizes.length > 0 ? Math.max(...sizes) : null,
    uniqueWallets: new Set(moves.map((e) => e.walletAddress)).size
  };
}
