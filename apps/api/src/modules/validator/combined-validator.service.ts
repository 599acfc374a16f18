import { Inject, Injectable } from "@nestjs/common";
import type { Logger } from "pino";
import type {
  DecisionRationale,
  EngineConfig,
  GateResult,
  RuleSetResult,
  TradeCandidate,
  TradeDecision,
  ValidatorReason
} from "@tradegate/shared";

import { errorMessage } from "../common/errors";
import { KeyedMutex } from "../common/keyed-mutex";
import { withTimeout } from "../common/timeout";
import { ConfigService } from "../config/config.service";
import { PreEntryGateService } from "../gate/pre-entry-gate.service";
import type { Gate } from "../gate/pre-entry-gate.service";
import { APP_LOGGER } from "../logging/pino-logger";
import { TRADE_STORE } from "../persistence/trade-store";
import type { TradeStore } from "../persistence/trade-store";
import { trailView } from "../rules/conditional-filter-set";
import { RuleSetsService } from "../rules/rule-sets.service";
import { TrailRecorderService } from "../trail/trail-recorder.service";

export type Decision = {
  decision: TradeDecision;
  reason: string;
  rationale: DecisionRationale;
  ruleSetVersion: string | null;
};

type RuleSetVerdict = {
  decision: TradeDecision;
  reason: ValidatorReason;
  ruleSets: RuleSetResult[];
  winningRuleSetId: string | null;
  ruleSetVersion: string | null;
};

function existingDecision(candidate: TradeCandidate): Decision | null {
  if (candidate.decision === null || candidate.rationale === null) return null;
  return {
    decision: candidate.decision,
    reason: candidate.decisionReason ?? "",
    rationale: candidate.rationale,
    ruleSetVersion: candidate.ruleSetVersion
  };
}

/**
 * Two-step entry decision: the momentum gate first, then the active rule sets
 * against the candidate's decision-time trail. Every failure path ends in NO_GO.
 */
@Injectable()
export class CombinedValidatorService {
  private readonly decisions = new KeyedMutex();

  constructor(
    @Inject(PreEntryGateService) private readonly gate: Gate,
    private readonly recorder: TrailRecorderService,
    private readonly ruleSets: RuleSetsService,
    @Inject(TRADE_STORE) private readonly store: TradeStore,
    private readonly configService: ConfigService,
    @Inject(APP_LOGGER) private readonly logger: Logger
  ) {}

  /**
   * Decides once per candidate; a candidate that already carries a decision gets
   * it back unchanged. Calls for the same id are serialized, so a redelivered
   * signal waits for the first decision instead of running the gate again.
   */
  async decide(candidate: TradeCandidate): Promise<Decision> {
    return await this.decisions.run(candidate.id, async () => {
      const current = (await this.store.getCandidate(candidate.id)) ?? candidate;
      return existingDecision(current) ?? (await this.decideOnce(current));
    });
  }

  private async decideOnce(candidate: TradeCandidate): Promise<Decision> {
    const config = this.configService.load();
    const gate = await this.gate.evaluate(
      { candidateId: candidate.id, signalTs: candidate.signalTs, entryPrice: candidate.entryPrice },
      config.gate
    );

    if (gate.decision === "NO_GO") {
      const decision: Decision = {
        decision: "NO_GO",
        reason: gate.reason,
        rationale: { gate, ruleSets: [], winningRuleSetId: null, trainedThrough: null, outOfSample: null },
        ruleSetVersion: null
      };
      return await this.persist(candidate, decision, gate, true);
    }

    let trainedThrough: string | null = null;
    let outOfSample: boolean | null = null;
    let decision: Decision;
    try {
      ({ trainedThrough, outOfSample } = await this.trainingWindow(candidate));
      await this.recorder.beginTracking(candidate, { preEntryMetrics: gate.metrics });
      await this.awaitDecisionOffset(candidate, config.validator.decisionOffset);
      const verdict = await withTimeout(() => this.evaluateRuleSets(candidate, config), config.validator.timeoutMs, "combined validator");
      decision = {
        decision: verdict.decision,
        reason: verdict.reason,
        rationale: {
          gate,
          ruleSets: verdict.ruleSets,
          winningRuleSetId: verdict.winningRuleSetId,
          trainedThrough,
          outOfSample
        },
        ruleSetVersion: verdict.ruleSetVersion
      };
    } catch (err) {
      decision = {
        decision: "NO_GO",
        reason: "VALIDATOR_ERROR",
        rationale: { gate, ruleSets: [], winningRuleSetId: null, trainedThrough, outOfSample, error: errorMessage(err) },
        ruleSetVersion: null
      };
    }
    return await this.persist(candidate, decision, gate, false);
  }

  /** Rule sets mined at a later offset need that minute's snapshot before they can be judged. */
  private async awaitDecisionOffset(candidate: TradeCandidate, minuteOffset: number): Promise<void> {
    if (minuteOffset === 0) return;
    const waitMs = Date.parse(candidate.signalTs) + minuteOffset * 60_000 - Date.now();
    if (waitMs > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, waitMs));
    }
    await this.recorder.sample(candidate, minuteOffset);
  }

  private async evaluateRuleSets(candidate: TradeCandidate, config: EngineConfig): Promise<RuleSetVerdict> {
    const sets = await this.ruleSets.loadActiveFilterSets();
    if (sets.length === 0) {
      return {
        decision: config.validator.emptyRuleSetPolicy === "ALLOW" ? "GO" : "NO_GO",
        reason: "NO_ACTIVE_RULE_SETS",
        ruleSets: [],
        winningRuleSetId: null,
        ruleSetVersion: null
      };
    }

    const trail = trailView(await this.store.listSnapshots([candidate.id]));
    const results = sets.map((set) => set.evaluate(trail));
    const winner = results.find((r) => r.passed) ?? null;
    return {
      decision: winner ? "GO" : "NO_GO",
      reason: winner ? "RULE_SET_PASSED" : "ALL_RULE_SETS_FAILED",
      ruleSets: results,
      winningRuleSetId: winner ? winner.ruleSetId : null,
      ruleSetVersion: sets.map((set) => `${set.id}@${set.version}`).join(",")
    };
  }

  private async trainingWindow(candidate: TradeCandidate): Promise<{ trainedThrough: string | null; outOfSample: boolean | null }> {
    const latest = (await this.store.listMiningRuns()).find((run) => run.status === "completed") ?? null;
    const trainedThrough = latest ? latest.trainedThrough : null;
    return {
      trainedThrough,
      outOfSample: trainedThrough === null ? null : Date.parse(candidate.signalTs) > Date.parse(trainedThrough)
    };
  }

  /** A gate rejection cancels the candidate: it was never tracked, so it has no outcome to mine. */
  private async persist(candidate: TradeCandidate, decision: Decision, gate: GateResult, cancel: boolean): Promise<Decision> {
    const stored = await this.store.updateCandidate(candidate.id, (current) => {
      if (current.decision !== null) return current;
      const now = new Date().toISOString();
      return {
        ...current,
        decision: decision.decision,
        decisionReason: decision.reason,
        rationale: decision.rationale,
        ruleSetVersion: decision.ruleSetVersion,
        status: cancel && current.status === "open" ? "cancelled" : current.status,
        closedAt: cancel && current.status === "open" ? now : current.closedAt,
        updatedAt: now
      };
    });

    const level = decision.reason === "GATE_ERROR" || decision.reason === "VALIDATOR_ERROR" ? "error" : "info";
    this.logger[level](
      {
        candidateId: candidate.id,
        decision: decision.decision,
        reason: decision.reason,
        gateReason: gate.reason,
        lookbackChangePct: gate.metrics.lookbackChangePct,
        trend: gate.metrics.trend,
        ruleSetVersion: decision.ruleSetVersion,
        winningRuleSetId: decision.rationale.winningRuleSetId,
        filtersFailed: decision.rationale.ruleSets.map((r) => ({ ruleSetId: r.ruleSetId, failed: r.filtersFailed })),
        outOfSample: decision.rationale.outOfSample,
        error: decision.rationale.error ?? gate.error
      },
      "Trade decision"
    );
    return existingDecision(stored) ?? decision;
  }
}
