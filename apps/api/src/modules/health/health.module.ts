import { Module } from "@nestjs/common";

import { MiningModule } from "../mining/mining.module";

import { HealthController } from "./health.controller";

@Module({
  imports: [MiningModule],
  controllers: [HealthController]
})
export class HealthModule {}
