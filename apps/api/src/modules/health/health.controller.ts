import { Controller, Get } from "@nestjs/common";

import { FilterMinerService } from "../mining/filter-miner.service";
import type { MinerStatus } from "../mining/filter-miner.service";

type HealthReport = {
  ok: true;
  ts: string;
  uptimeSec: number;
  miner: MinerStatus;
};

@Controller("health")
export class HealthController {
  constructor(private readonly miner: FilterMinerService) {}

  @Get()
  getHealth(): HealthReport {
    return {
      ok: true,
      ts: new Date().toISOString(),
      uptimeSec: Math.round(process.uptime()),
      miner: this.miner.getStatus()
    };
  }
}
