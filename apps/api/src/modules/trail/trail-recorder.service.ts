import { Inject, Injectable, OnApplicationBootstrap, OnModuleDestroy } from "@nestjs/common";
import type { Logger } from "pino";
import type {
  CandidateStatus,
  PreEntryMetrics,
  TradeCandidate,
  TradeOutcome,
  TrailSettings,
  TrailSnapshot
} from "@tradegate/shared";
import { isTerminalStatus, labelOutcome, sectionForColumn } from "@tradegate/shared";

import { errorMessage } from "../common/errors";
import { withTimeout } from "../common/timeout";
import { ConfigService } from "../config/config.service";
import { APP_LOGGER } from "../logging/pino-logger";
import { TRADE_STORE } from "../persistence/trade-store";
import type { TradeStore } from "../persistence/trade-store";

import { FEATURE_SECTIONS } from "./feature-section";
import type { FeatureSection, SectionReading } from "./feature-section";
import { finiteOrNull } from "./sections/feeds";
import { outcomeFromSamples, preEntryColumns } from "./trail-outcome";

const MINUTE_MS = 60_000;

type Tracking = {
  settings: TrailSettings;
  timers: NodeJS.Timeout[];
};

export type TerminalStatus = Exclude<CandidateStatus, "open">;

export type SampleReport = {
  candidateId: string;
  minuteOffset: number;
  written: number;
  duplicates: number;
  failedSections: string[];
};

export type FinalizeResult = {
  candidate: TradeCandidate;
  changed: boolean;
};

@Injectable()
export class TrailRecorderService implements OnApplicationBootstrap, OnModuleDestroy {
  private readonly tracking = new Map<string, Tracking>();

  constructor(
    @Inject(TRADE_STORE) private readonly store: TradeStore,
    @Inject(FEATURE_SECTIONS) private readonly sections: FeatureSection[],
    private readonly configService: ConfigService,
    @Inject(APP_LOGGER) private readonly logger: Logger
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    await this.resumeOpenCandidates();
  }

  onModuleDestroy(): void {
    for (const id of [...this.tracking.keys()]) this.stop(id);
  }

  isTracking(candidateId: string): boolean {
    return this.tracking.has(candidateId);
  }

  /**
   * Samples offset 0 before returning, so the decision-time snapshot exists for
   * the validator, then schedules the remaining offsets against the signal time.
   */
  async beginTracking(
    candidate: TradeCandidate,
    options: { preEntryMetrics?: PreEntryMetrics } = {}
  ): Promise<SampleReport | null> {
    if (isTerminalStatus(candidate.status) || this.tracking.has(candidate.id)) {
      return null;
    }

    const settings = this.configService.load().trail;
    this.tracking.set(candidate.id, { settings, timers: [] });
    this.schedule(candidate, settings, 1);
    this.logger.info({ candidateId: candidate.id, windowMinutes: settings.windowMinutes }, "Trail tracking started");

    if (options.preEntryMetrics && settings.persistPreEntryMetrics) {
      await this.store.writeSnapshots(this.toRows(candidate.id, 0, preEntryColumns(options.preEntryMetrics)));
    }
    return await this.sample(candidate, 0);
  }

  async sample(candidate: TradeCandidate, minuteOffset: number): Promise<SampleReport> {
    const settings = this.tracking.get(candidate.id)?.settings ?? this.configService.load().trail;
    if (!Number.isInteger(minuteOffset) || minuteOffset < 0 || minuteOffset >= settings.windowMinutes) {
      throw new RangeError(`Minute offset ${minuteOffset} is outside 0..${settings.windowMinutes - 1}`);
    }

    const context = { candidate, minuteOffset, atMs: Date.now() };
    const readings = await Promise.all(
      this.sections.map(async (section) => {
        try {
          const values = await withTimeout(() => section.read(context), settings.sectionTimeoutMs, `${section.section} section`);
          return { section, values, error: null };
        } catch (err) {
          return { section, values: null, error: errorMessage(err) };
        }
      })
    );

    const rows: TrailSnapshot[] = [];
    const failedSections: string[] = [];
    for (const { section, values, error } of readings) {
      if (error !== null) {
        failedSections.push(section.section);
        this.logger.warn({ candidateId: candidate.id, minuteOffset, section: section.section, err: error }, "Trail section unavailable");
      }
      const reading: SectionReading = {};
      for (const column of section.columns) {
        reading[column] = values ? finiteOrNull(values[column]) : null;
      }
      rows.push(...this.toRows(candidate.id, minuteOffset, reading, section.section));
    }

    const results = await this.store.writeSnapshots(rows);
    const report: SampleReport = {
      candidateId: candidate.id,
      minuteOffset,
      written: results.filter((r) => r === "inserted").length,
      duplicates: results.filter((r) => r === "duplicate").length,
      failedSections
    };
    this.logger.debug(report, "Trail sample written");
    return report;
  }

  /**
   * Attaches the outcome and label and moves the candidate to a terminal
   * status. A candidate that is already terminal is returned unchanged.
   */
  async finalize(candidateId: string, outcome: TradeOutcome | null, status: TerminalStatus): Promise<FinalizeResult> {
    this.stop(candidateId);
    const threshold = this.configService.load().mining.goodTradeThresholdPct;
    const result = { changed: false };

    const candidate = await this.store.updateCandidate(candidateId, (current) => {
      if (isTerminalStatus(current.status)) return current;
      result.changed = true;
      const now = new Date().toISOString();
      return {
        ...current,
        status,
        realizedGainPct: outcome ? outcome.realizedGainPct : null,
        maxFavorablePct: outcome ? outcome.maxFavorablePct : null,
        label: outcome ? labelOutcome(outcome.realizedGainPct, threshold) : null,
        labelThresholdPct: outcome ? threshold : null,
        closedAt: now,
        updatedAt: now
      };
    });

    if (result.changed) {
      this.logger.info(
        { candidateId, status, realizedGainPct: candidate.realizedGainPct, label: candidate.label },
        "Candidate finalized"
      );
    }
    return { candidate, changed: result.changed };
  }

  /** Window elapsed without an executor close: price the outcome from the sampled quotes. */
  async expire(candidateId: string): Promise<FinalizeResult | null> {
    const candidate = await this.store.getCandidate(candidateId);
    if (!candidate || isTerminalStatus(candidate.status)) {
      this.stop(candidateId);
      return null;
    }
    const outcome = outcomeFromSamples(candidate.entryPrice, await this.store.listSnapshots([candidateId]));
    return await this.finalize(candidateId, outcome, "missed");
  }

  async resumeOpenCandidates(): Promise<number> {
    const settings = this.configService.load().trail;
    const open = await this.store.listCandidates({ statuses: ["open"] });
    let resumed = 0;
    for (const candidate of open) {
      if (this.tracking.has(candidate.id)) continue;
      const elapsedMs = Date.now() - Date.parse(candidate.signalTs);
      if (elapsedMs >= settings.windowMinutes * MINUTE_MS) {
        await this.expire(candidate.id);
        continue;
      }
      this.tracking.set(candidate.id, { settings, timers: [] });
      this.schedule(candidate, settings, Math.floor(elapsedMs / MINUTE_MS) + 1);
      resumed += 1;
    }
    if (open.length > 0) {
      this.logger.info({ open: open.length, resumed }, "Open candidates resumed");
    }
    return resumed;
  }

  private schedule(candidate: TradeCandidate, settings: TrailSettings, fromOffset: number): void {
    const tracking = this.tracking.get(candidate.id);
    if (!tracking) return;

    const signalMs = Date.parse(candidate.signalTs);
    const now = Date.now();
    for (let offset = fromOffset; offset < settings.windowMinutes; offset += 1) {
      const delay = Math.max(0, signalMs + offset * MINUTE_MS - now);
      tracking.timers.push(setTimeout(() => void this.runScheduledSample(candidate.id, offset), delay));
    }
    const expiresIn = Math.max(0, signalMs + settings.windowMinutes * MINUTE_MS - now);
    tracking.timers.push(setTimeout(() => void this.runExpiry(candidate.id), expiresIn));
  }

  private async runScheduledSample(candidateId: string, minuteOffset: number): Promise<void> {
    try {
      const candidate = await this.store.getCandidate(candidateId);
      if (!candidate || isTerminalStatus(candidate.status)) {
        this.stop(candidateId);
        return;
      }
      await this.sample(candidate, minuteOffset);
    } catch (err) {
      this.logger.error({ candidateId, minuteOffset, err: errorMessage(err) }, "Scheduled trail sample failed");
    }
  }

  private async runExpiry(candidateId: string): Promise<void> {
    try {
      await this.expire(candidateId);
    } catch (err) {
      this.logger.error({ candidateId, err: errorMessage(err) }, "Trail expiry failed");
    }
  }

  private stop(candidateId: string): void {
    const tracking = this.tracking.get(candidateId);
    if (!tracking) return;
    for (const timer of tracking.timers) clearTimeout(timer);
    this.tracking.delete(candidateId);
  }

  private toRows(
    candidateId: string,
    minuteOffset: number,
    values: Record<string, number | null>,
    section?: TrailSnapshot["section"]
  ): TrailSnapshot[] {
    const capturedAt = new Date().toISOString();
    const rows: TrailSnapshot[] = [];
    for (const [columnName, value] of Object.entries(values)) {
      const resolved = section ?? sectionForColumn(columnName);
      if (!resolved) continue;
      rows.push({ candidateId, minuteOffset, columnName, value, section: resolved, capturedAt });
    }
    return rows;
  }
}
