import crypto from "node:crypto";

import { Inject, Injectable, OnApplicationBootstrap, OnModuleDestroy } from "@nestjs/common";
import type { Logger } from "pino";
import type { FilterCombination, FilterConsistency, FilterSuggestion, MiningRun, MiningSettings } from "@tradegate/shared";
import { MiningSettingsSchema, sectionForColumn } from "@tradegate/shared";

import { MiningFailureError, errorMessage } from "../common/errors";
import { ConfigService } from "../config/config.service";
import { APP_LOGGER } from "../logging/pino-logger";
import { TRADE_STORE } from "../persistence/trade-store";
import type { TradeStore } from "../persistence/trade-store";
import { RuleSetsService } from "../rules/rule-sets.service";

import { computeConsistency } from "./consistency";
import { mineFilters } from "./filter-mining";
import type { MinedFilter, MiningOutcome } from "./filter-mining";

export type MiningOverrides = Partial<Pick<MiningSettings, "analysisWindowHours" | "goodTradeThresholdPct" | "minFiltersInCombo">>;

export type MinerStatus = {
  running: boolean;
  inFlight: boolean;
  intervalMinutes: number | null;
  lastRunId: string | null;
};

function filterKey(filter: Pick<MinedFilter, "columnName" | "minuteOffset">): string {
  return `${filter.columnName}@${filter.minuteOffset}`;
}

@Injectable()
export class FilterMinerService implements OnApplicationBootstrap, OnModuleDestroy {
  private loopTimer: NodeJS.Timeout | null = null;
  private loopIntervalMinutes: number | null = null;
  private inFlight: Promise<MiningRun> | null = null;
  private lastRunId: string | null = null;

  constructor(
    @Inject(TRADE_STORE) private readonly store: TradeStore,
    private readonly configService: ConfigService,
    private readonly ruleSets: RuleSetsService,
    @Inject(APP_LOGGER) private readonly logger: Logger
  ) {}

  onApplicationBootstrap(): void {
    if (process.env.MINING_AUTOSTART !== "false") this.start();
  }

  onModuleDestroy(): void {
    this.stop();
  }

  getStatus(): MinerStatus {
    return {
      running: this.loopTimer !== null,
      inFlight: this.inFlight !== null,
      intervalMinutes: this.loopIntervalMinutes,
      lastRunId: this.lastRunId
    };
  }

  start(): MinerStatus {
    if (this.loopTimer) return this.getStatus();
    const intervalMinutes = this.configService.load().mining.intervalMinutes;
    this.loopIntervalMinutes = intervalMinutes;
    this.loopTimer = setInterval(() => void this.runScheduled(), intervalMinutes * 60_000);
    this.logger.info({ intervalMinutes }, "Filter miner scheduled");
    return this.getStatus();
  }

  stop(): MinerStatus {
    if (this.loopTimer) {
      clearInterval(this.loopTimer);
      this.loopTimer = null;
      this.loopIntervalMinutes = null;
      this.logger.info("Filter miner stopped");
    }
    return this.getStatus();
  }

  /** Joins the run already in flight instead of starting a second one. */
  async runMiningCycle(overrides: MiningOverrides = {}): Promise<MiningRun> {
    if (this.inFlight) return await this.inFlight;
    const run = this.runNow(overrides).finally(() => {
      this.inFlight = null;
    });
    this.inFlight = run;
    return await run;
  }

  async listRuns(limit: number): Promise<MiningRun[]> {
    return await this.store.listMiningRuns(limit);
  }

  async latestCompletedRunId(): Promise<string | null> {
    const latest = (await this.store.listMiningRuns()).find((run) => run.status === "completed");
    return latest ? latest.id : null;
  }

  async listSuggestions(runId: string): Promise<FilterSuggestion[]> {
    return await this.store.listSuggestions({ runId });
  }

  async listCombinations(runId: string): Promise<FilterCombination[]> {
    return await this.store.listCombinations({ runId });
  }

  async getConsistency(): Promise<FilterConsistency[]> {
    const { consistencyRuns, trendBandPct } = this.configService.load().mining;
    const runs = (await this.store.listMiningRuns())
      .filter((run) => run.status === "completed")
      .slice(0, consistencyRuns);
    const suggestions = (await Promise.all(runs.map((run) => this.store.listSuggestions({ runId: run.id })))).flat();
    return computeConsistency(runs, suggestions, trendBandPct);
  }

  private async runScheduled(): Promise<void> {
    try {
      await this.runMiningCycle();
    } catch (err) {
      this.logger.error({ err: errorMessage(err) }, "Scheduled mining cycle failed");
    }
  }

  private async runNow(overrides: MiningOverrides): Promise<MiningRun> {
    const config = this.configService.load();
    const settings = MiningSettingsSchema.parse({ ...config.mining, ...overrides });
    const combinationOffsets = [config.validator.decisionOffset];
    const startedMs = Date.now();

    const run: MiningRun = {
      id: crypto.randomUUID(),
      startedAt: new Date(startedMs).toISOString(),
      completedAt: null,
      status: "running",
      analysisWindowHours: settings.analysisWindowHours,
      goodTradeThresholdPct: settings.goodTradeThresholdPct,
      minFiltersInCombo: settings.minFiltersInCombo,
      candidatesAnalyzed: 0,
      totalFiltersAnalyzed: 0,
      suggestionsCount: 0,
      combinationsCount: 0,
      bestCombinationId: null,
      bestColumns: [],
      trainedThrough: null,
      durationMs: null
    };
    await this.store.saveMiningRun(run);
    this.lastRunId = run.id;
    this.logger.info({ runId: run.id, analysisWindowHours: settings.analysisWindowHours }, "Mining run started");

    try {
      const candidates = await this.store.listCandidates({
        statuses: ["closed", "missed"],
        signalFrom: new Date(startedMs - settings.analysisWindowHours * 60 * 60_000).toISOString(),
        signalTo: run.startedAt
      });
      const resolved = candidates.filter((c) => c.realizedGainPct !== null);
      const snapshots = await this.store.listSnapshots(resolved.map((c) => c.id));
      const outcome = mineFilters(resolved, snapshots, settings, combinationOffsets);

      const { suggestions, combinations } = this.toRecords(run.id, outcome);
      await this.store.saveMiningResults(suggestions, combinations);

      const best = combinations[combinations.length - 1] ?? null;

      const completed: MiningRun = {
        ...run,
        status: "completed",
        completedAt: new Date().toISOString(),
        candidatesAnalyzed: outcome.candidatesAnalyzed,
        totalFiltersAnalyzed: outcome.totalFiltersAnalyzed,
        suggestionsCount: suggestions.length,
        combinationsCount: combinations.length,
        bestCombinationId: best ? best.id : null,
        bestColumns: best ? best.columns : [],
        trainedThrough: outcome.trainedThrough,
        durationMs: Date.now() - startedMs
      };
      await this.store.saveMiningRun(completed);
      // Rule sets only move once the run is durably recorded as completed.
      if (best) {
        await this.ruleSets.followBestCombination(best, settings.autoRuleSetName);
      }
      this.logger.info(
        {
          runId: run.id,
          candidates: outcome.candidatesAnalyzed,
          good: outcome.goodCount,
          bad: outcome.badCount,
          suggestions: suggestions.length,
          combinations: combinations.length,
          bestColumns: completed.bestColumns,
          bestBadRemovedPct: best ? best.badRemovedPct : null,
          bestGoodKeptPct: best ? best.goodKeptPct : null,
          durationMs: completed.durationMs
        },
        "Mining run completed"
      );
      return completed;
    } catch (err) {
      const failure = new MiningFailureError(errorMessage(err));
      const failed: MiningRun = {
        ...run,
        status: "failed",
        completedAt: new Date().toISOString(),
        durationMs: Date.now() - startedMs,
        error: failure.message
      };
      this.logger.error({ runId: run.id, err: failure.message }, "Mining run failed; active rule sets unchanged");
      await this.store.saveMiningRun(failed);
      return failed;
    }
  }

  private toRecords(runId: string, outcome: MiningOutcome): { suggestions: FilterSuggestion[]; combinations: FilterCombination[] } {
    const discoveredAt = new Date().toISOString();
    const suggestionsByKey = new Map<string, FilterSuggestion>();
    const record = (filter: MinedFilter): FilterSuggestion => {
      const key = filterKey(filter);
      const existing = suggestionsByKey.get(key);
      if (existing) return existing;
      const suggestion: FilterSuggestion = {
        id: crypto.randomUUID(),
        runId,
        columnName: filter.columnName,
        section: sectionForColumn(filter.columnName),
        minuteOffset: filter.minuteOffset,
        fromValue: filter.fromValue,
        toValue: filter.toValue,
        goodKeptPct: filter.goodKeptPct,
        badRemovedPct: filter.badRemovedPct,
        score: filter.score,
        goodBefore: filter.goodBefore,
        badBefore: filter.badBefore,
        goodAfter: filter.goodAfter,
        badAfter: filter.badAfter,
        discoveredAt,
        source: "mined"
      };
      suggestionsByKey.set(key, suggestion);
      return suggestion;
    };

    outcome.singles.forEach(record);
    const combinations: FilterCombination[] = (outcome.best?.steps ?? []).map((step) => {
      const members = step.filters.map(record);
      return {
        id: crypto.randomUUID(),
        runId,
        filterIds: members.map((s) => s.id),
        columns: members.map((s) => s.columnName),
        minuteOffset: outcome.best?.minuteOffset ?? 0,
        goodKeptPct: step.goodKeptPct,
        badRemovedPct: step.badRemovedPct,
        badTradesAfter: step.badAfter,
        improvementOverSingle: step.improvementOverSingle,
        createdAt: discoveredAt
      };
    });

    return { suggestions: [...suggestionsByKey.values()], combinations };
  }
}
