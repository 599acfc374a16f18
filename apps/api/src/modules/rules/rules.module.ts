import { Module } from "@nestjs/common";

import { PersistenceModule } from "../persistence/persistence.module";

import { RuleSetsController } from "./rule-sets.controller";
import { RuleSetsService } from "./rule-sets.service";

@Module({
  imports: [PersistenceModule],
  controllers: [RuleSetsController],
  providers: [RuleSetsService],
  exports: [RuleSetsService]
})
export class RulesModule {}
