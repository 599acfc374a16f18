import { Module } from "@nestjs/common";

import { MarketController } from "./market.controller";
import { MarketStateService } from "./market-state.service";
import { PRICE_SOURCE } from "./price-source";

@Module({
  controllers: [MarketController],
  providers: [MarketStateService, { provide: PRICE_SOURCE, useExisting: MarketStateService }],
  exports: [MarketStateService, PRICE_SOURCE]
})
export class MarketModule {}
