import { Inject, Injectable, OnApplicationBootstrap } from "@nestjs/common";
import type { Logger } from "pino";
import type { OnchainEvent, OnchainEventKind } from "@tradegate/shared";

import { APP_LOGGER } from "../logging/pino-logger";
import { TRADE_STORE } from "../persistence/trade-store";
import type { TradeStore } from "../persistence/trade-store";

import { extractItems, normalizeOnchainItem } from "./onchain-normalizer";

const RECENT_WINDOW_MS = 2 * 60 * 60_000;

export type IngestReport = {
  received: number;
  inserted: number;
  duplicates: number;
  skipped: number;
};

@Injectable()
export class OnchainActivityService implements OnApplicationBootstrap {
  private recent: OnchainEvent[] = [];

  constructor(
    @Inject(TRADE_STORE) private readonly store: TradeStore,
    @Inject(APP_LOGGER) private readonly logger: Logger
  ) {}

  async onApplicationBootstrap(): Promise<void> {
    const now = Date.now();
    this.recent = await this.store.listOnchainEvents(now - RECENT_WINDOW_MS, now);
  }

  /** Delivery is at-least-once; an already-seen signature is counted and dropped. */
  async ingest(body: unknown, kind: OnchainEventKind, receivedAt = new Date()): Promise<IngestReport> {
    const items = extractItems(body);
    const report: IngestReport = { received: items.length, inserted: 0, duplicates: 0, skipped: 0 };

    for (const item of items) {
      const event = normalizeOnchainItem(item, kind, receivedAt);
      if (!event) {
        report.skipped += 1;
        continue;
      }
      const result = await this.store.recordOnchainEvent(event);
      if (result === "duplicate") {
        report.duplicates += 1;
        continue;
      }
      report.inserted += 1;
      this.remember(event);
    }

    this.logger.info({ kind, ...report }, "Webhook events ingested");
    return report;
  }

  eventsBetween(fromMs: number, toMs: number): OnchainEvent[] {
    return this.recent.filter((e) => e.ts >= fromMs && e.ts <= toMs);
  }

  private remember(event: OnchainEvent): void {
    this.recent.push(event);
    this.recent.sort((a, b) => a.ts - b.ts);
    const cutoff = (this.recent[this.recent.length - 1]?.ts ?? event.ts) - RECENT_WINDOW_MS;
    if ((this.recent[0]?.ts ?? cutoff) < cutoff) {
      this.recent = this.recent.filter((e) => e.ts >= cutoff);
    }
  }
}
