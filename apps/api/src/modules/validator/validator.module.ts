import { Module } from "@nestjs/common";

import { ConfigModule } from "../config/config.module";
import { GateModule } from "../gate/gate.module";
import { PersistenceModule } from "../persistence/persistence.module";
import { RulesModule } from "../rules/rules.module";
import { TrailModule } from "../trail/trail.module";

import { CombinedValidatorService } from "./combined-validator.service";

@Module({
  imports: [ConfigModule, PersistenceModule, GateModule, TrailModule, RulesModule],
  providers: [CombinedValidatorService],
  exports: [CombinedValidatorService]
})
export class ValidatorModule {}
