import { Module } from "@nestjs/common";

import { ConfigModule } from "../config/config.module";
import { ConfigService } from "../config/config.service";
import { MarketModule } from "../market/market.module";
import { MarketStateService } from "../market/market-state.service";
import { OnchainActivityService } from "../onchain/onchain-activity.service";
import { OnchainModule } from "../onchain/onchain.module";
import { PersistenceModule } from "../persistence/persistence.module";

import { FEATURE_SECTIONS } from "./feature-section";
import { buildDefaultSections } from "./sections";
import { TrailRecorderService } from "./trail-recorder.service";

@Module({
  imports: [ConfigModule, PersistenceModule, MarketModule, OnchainModule],
  providers: [
    {
      provide: FEATURE_SECTIONS,
      inject: [MarketStateService, OnchainActivityService, ConfigService],
      useFactory: (market: MarketStateService, onchain: OnchainActivityService, configService: ConfigService) =>
        buildDefaultSections(market, onchain, configService.load().gate.asset)
    },
    TrailRecorderService
  ],
  exports: [TrailRecorderService]
})
export class TrailModule {}
