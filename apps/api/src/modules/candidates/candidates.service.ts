import crypto from "node:crypto";

import { Inject, Injectable } from "@nestjs/common";
import type { Logger } from "pino";
import type { CandidateStatus, SignalRequest, TradeCandidate, TradeOutcome, TrailSnapshot } from "@tradegate/shared";

import { InvalidTransitionError, RecordNotFoundError } from "../common/errors";
import { APP_LOGGER } from "../logging/pino-logger";
import { TRADE_STORE } from "../persistence/trade-store";
import type { TradeStore } from "../persistence/trade-store";
import { TrailRecorderService } from "../trail/trail-recorder.service";
import type { TerminalStatus } from "../trail/trail-recorder.service";
import { CombinedValidatorService } from "../validator/combined-validator.service";

export type SubmitResult = {
  candidate: TradeCandidate;
  duplicate: boolean;
};

export type CandidateListQuery = {
  status?: CandidateStatus;
  limit: number;
};

@Injectable()
export class CandidatesService {
  constructor(
    @Inject(TRADE_STORE) private readonly store: TradeStore,
    private readonly validator: CombinedValidatorService,
    private readonly recorder: TrailRecorderService,
    @Inject(APP_LOGGER) private readonly logger: Logger
  ) {}

  /**
   * Persists the signal as an open candidate and decides it. Resubmitting a
   * known id returns the stored candidate; one left undecided is decided now.
   */
  async submitSignal(request: SignalRequest): Promise<SubmitResult> {
    const now = new Date().toISOString();
    const candidate: TradeCandidate = {
      id: request.id ?? crypto.randomUUID(),
      signalTs: request.signalTs ? new Date(request.signalTs).toISOString() : now,
      entryPrice: request.entryPrice,
      walletAddress: request.walletAddress,
      strategyId: request.strategyId,
      decision: null,
      decisionReason: null,
      rationale: null,
      ruleSetVersion: null,
      status: "open",
      realizedGainPct: null,
      maxFavorablePct: null,
      label: null,
      labelThresholdPct: null,
      closedAt: null,
      createdAt: now,
      updatedAt: now
    };

    const inserted = await this.store.insertCandidate(candidate);
    const duplicate = inserted === "duplicate";
    const current = duplicate ? await this.get(candidate.id) : candidate;
    if (duplicate) {
      this.logger.info({ candidateId: candidate.id }, "Duplicate signal");
    }
    if (current.decision === null && current.status === "open") {
      await this.validator.decide(current);
    }
    return { candidate: await this.get(candidate.id), duplicate };
  }

  async list(query: CandidateListQuery): Promise<TradeCandidate[]> {
    return await this.store.listCandidates({
      statuses: query.status ? [query.status] : undefined,
      limit: query.limit
    });
  }

  async get(id: string): Promise<TradeCandidate> {
    const candidate = await this.store.getCandidate(id);
    if (!candidate) throw new RecordNotFoundError("trade_candidates", id);
    return candidate;
  }

  async trail(id: string): Promise<TrailSnapshot[]> {
    await this.get(id);
    return await this.store.listSnapshots([id]);
  }

  /** Executor reported the position closed. */
  async close(id: string, outcome: TradeOutcome): Promise<TradeCandidate> {
    return await this.transition(id, outcome, "closed");
  }

  /** Executor never opened the position. */
  async cancel(id: string): Promise<TradeCandidate> {
    return await this.transition(id, null, "cancelled");
  }

  private async transition(id: string, outcome: TradeOutcome | null, status: TerminalStatus): Promise<TradeCandidate> {
    const current = await this.get(id);
    if (current.status !== "open") {
      throw new InvalidTransitionError(`Candidate ${id} is already ${current.status}`);
    }
    const result = await this.recorder.finalize(id, outcome, status);
    if (!result.changed) {
      throw new InvalidTransitionError(`Candidate ${id} is already ${result.candidate.status}`);
    }
    return result.candidate;
  }
}
