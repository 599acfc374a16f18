import { Module } from "@nestjs/common";
import { APP_GUARD } from "@nestjs/core";

import { CandidatesModule } from "./candidates/candidates.module";
import { ConfigModule } from "./config/config.module";
import { GateModule } from "./gate/gate.module";
import { HealthModule } from "./health/health.module";
import { LoggingModule } from "./logging/logging.module";
import { MarketModule } from "./market/market.module";
import { MiningModule } from "./mining/mining.module";
import { OnchainModule } from "./onchain/onchain.module";
import { RulesModule } from "./rules/rules.module";
import { ApiKeyGuard } from "./security/api-key.guard";
import { TrailModule } from "./trail/trail.module";
import { ValidatorModule } from "./validator/validator.module";

@Module({
  imports: [
    LoggingModule,
    ConfigModule,
    HealthModule,
    MarketModule,
    OnchainModule,
    GateModule,
    TrailModule,
    RulesModule,
    MiningModule,
    ValidatorModule,
    CandidatesModule
  ],
  providers: [{ provide: APP_GUARD, useClass: ApiKeyGuard }]
})
export class AppModule {}
