import { Module } from "@nestjs/common";

import { PersistenceModule } from "../persistence/persistence.module";
import { TrailModule } from "../trail/trail.module";
import { ValidatorModule } from "../validator/validator.module";

import { CandidatesController } from "./candidates.controller";
import { CandidatesService } from "./candidates.service";

@Module({
  imports: [PersistenceModule, TrailModule, ValidatorModule],
  controllers: [CandidatesController],
  providers: [CandidatesService]
})
export class CandidatesModule {}
