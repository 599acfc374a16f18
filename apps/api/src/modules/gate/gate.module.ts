import { Module } from "@nestjs/common";

import { MarketModule } from "../market/market.module";

import { PreEntryGateService } from "./pre-entry-gate.service";

@Module({
  imports: [MarketModule],
  providers: [PreEntryGateService],
  exports: [PreEntryGateService]
})
export class GateModule {}
