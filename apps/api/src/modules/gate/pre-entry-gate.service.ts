import { Inject, Injectable } from "@nestjs/common";
import type { Logger } from "pino";
import type { GateResult, GateSettings } from "@tradegate/shared";

import { errorMessage } from "../common/errors";
import { withTimeout } from "../common/timeout";
import { APP_LOGGER } from "../logging/pino-logger";
import { PRICE_SOURCE } from "../market/price-source";
import type { PriceSource } from "../market/price-source";

import { emptyMetrics, evaluatePreEntry, windowsFor } from "./pre-entry-gate";

export type GateInput = {
  candidateId: string;
  signalTs: string;
  entryPrice: number;
};

export interface Gate {
  evaluate(input: GateInput, settings: GateSettings): Promise<GateResult>;
}

@Injectable()
export class PreEntryGateService implements Gate {
  constructor(
    @Inject(PRICE_SOURCE) private readonly prices: PriceSource,
    @Inject(APP_LOGGER) private readonly logger: Logger
  ) {}

  /** Never rejects: a thrown error or an expired budget comes back as NO_GO / GATE_ERROR. */
  async evaluate(input: GateInput, settings: GateSettings): Promise<GateResult> {
    const startedAt = Date.now();

    let result: GateResult;
    try {
      const verdict = await withTimeout(
        async () => {
          const signalMs = Date.parse(input.signalTs);
          const furthestMs = Math.max(...windowsFor(settings)) * 60_000 + settings.priceWindowSeconds * 1000;
          const series = await this.prices.getSeries(settings.asset, signalMs - furthestMs, signalMs);
          return evaluatePreEntry(signalMs, input.entryPrice, series, settings);
        },
        settings.timeoutMs,
        "pre-entry gate"
      );
      result = { ...verdict, evaluatedAt: new Date().toISOString(), durationMs: Date.now() - startedAt };
    } catch (err) {
      result = {
        decision: "NO_GO",
        reason: "GATE_ERROR",
        metrics: emptyMetrics(settings),
        evaluatedAt: new Date().toISOString(),
        durationMs: Date.now() - startedAt,
        error: errorMessage(err)
      };
    }

    const level = result.reason === "GATE_ERROR" ? "error" : "info";
    this.logger[level](
      {
        candidateId: input.candidateId,
        decision: result.decision,
        reason: result.reason,
        lookbackChangePct: result.metrics.lookbackChangePct,
        changePct: result.metrics.changePct,
        trend: result.metrics.trend,
        durationMs: result.durationMs,
        error: result.error
      },
      "Pre-entry gate evaluated"
    );
    return result;
  }
}
