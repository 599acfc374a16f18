import { Body, Controller, Post } from "@nestjs/common";
import { OrderBookSnapshotSchema, PriceTickBatchSchema } from "@tradegate/shared";

import { parseBody } from "../common/parse-body";

import { MarketStateService } from "./market-state.service";

@Controller("market")
export class MarketController {
  constructor(private readonly marketState: MarketStateService) {}

  @Post("ticks")
  recordTicks(@Body() body: unknown): { ok: true; accepted: number; total: number } {
    const batch = parseBody(PriceTickBatchSchema, body);
    return { ok: true, ...this.marketState.recordTicks(batch) };
  }

  @Post("order-book")
  recordOrderBook(@Body() body: unknown): { ok: true } {
    this.marketState.recordOrderBook(parseBody(OrderBookSnapshotSchema, body));
    return { ok: true };
  }
}
