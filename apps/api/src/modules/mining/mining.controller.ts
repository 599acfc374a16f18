import { Body, Controller, Get, Post, Query } from "@nestjs/common";
import { z } from "zod";
import type { FilterCombination, FilterConsistency, FilterSuggestion, MiningRun } from "@tradegate/shared";

import { parseBody } from "../common/parse-body";

import { FilterMinerService } from "./filter-miner.service";
import type { MinerStatus } from "./filter-miner.service";

const RunRequestSchema = z
  .object({
    analysisWindowHours: z.number().int().min(1).max(168),
    goodTradeThresholdPct: z.number().min(0.1).max(5),
    minFiltersInCombo: z.number().int().min(1).max(10)
  })
  .partial()
  .default({});

const LimitSchema = z.coerce.number().int().min(1).max(500).default(20);

@Controller()
export class MiningController {
  constructor(private readonly miner: FilterMinerService) {}

  @Get("mining/runs")
  async listRuns(@Query("limit") limit?: string): Promise<{ runs: MiningRun[]; status: MinerStatus }> {
    const runs = await this.miner.listRuns(parseBody(LimitSchema, limit));
    return { runs, status: this.miner.getStatus() };
  }

  @Post("mining/run")
  async runNow(@Body() body: unknown): Promise<MiningRun> {
    return await this.miner.runMiningCycle(parseBody(RunRequestSchema, body ?? {}));
  }

  @Post("mining/start")
  start(): MinerStatus {
    return this.miner.start();
  }

  @Post("mining/stop")
  stop(): MinerStatus {
    return this.miner.stop();
  }

  @Get("filters/suggestions")
  async suggestions(@Query("runId") runId?: string): Promise<{ runId: string | null; suggestions: FilterSuggestion[] }> {
    const resolved = runId ?? (await this.miner.latestCompletedRunId());
    return { runId: resolved, suggestions: resolved ? await this.miner.listSuggestions(resolved) : [] };
  }

  @Get("filters/combinations")
  async combinations(@Query("runId") runId?: string): Promise<{ runId: string | null; combinations: FilterCombination[] }> {
    const resolved = runId ?? (await this.miner.latestCompletedRunId());
    return { runId: resolved, combinations: resolved ? await this.miner.listCombinations(resolved) : [] };
  }

  @Get("filters/consistency")
  async consistency(): Promise<{ columns: FilterConsistency[] }> {
    return { columns: await this.miner.getConsistency() };
  }
}
