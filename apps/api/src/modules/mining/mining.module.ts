import { Module } from "@nestjs/common";

import { ConfigModule } from "../config/config.module";
import { PersistenceModule } from "../persistence/persistence.module";
import { RulesModule } from "../rules/rules.module";

import { FilterMinerService } from "./filter-miner.service";
import { MiningController } from "./mining.controller";

@Module({
  imports: [ConfigModule, PersistenceModule, RulesModule],
  controllers: [MiningController],
  providers: [FilterMinerService],
  exports: [FilterMinerService]
})
export class MiningModule {}
