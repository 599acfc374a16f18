import fs from "node:fs";
import path from "node:path";

import type { Logger } from "pino";
import type { z } from "zod";
import {
  FilterCombinationSchema,
  FilterSuggestionSchema,
  MiningRunSchema,
  OnchainEventSchema,
  RuleSetSchema,
  TradeCandidateSchema,
  TrailSnapshotSchema,
  snapshotKey
} from "@tradegate/shared";

import { atomicWriteFile } from "../common/atomic-write";

import type { StoreChange, StoreTable } from "./memory-trade-store";
import { MemoryTradeStore } from "./memory-trade-store";

type RowSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

const TABLE_FILES: Record<StoreTable, string> = {
  candidates: "trade-candidates.json",
  miningRuns: "mining-runs.json",
  suggestions: "filter-suggestions.json",
  combinations: "filter-combinations.json",
  ruleSets: "rule-sets.json"
};

const SNAPSHOTS_FILE = "trail-snapshots.jsonl";
const ONCHAIN_EVENTS_FILE = "onchain-events.jsonl";

/**
 * Keeps every table in memory and mirrors it to `dir`: whole tables are
 * rewritten atomically, append-only tables grow one JSON line per row.
 */
export class FileTradeStore extends MemoryTradeStore {
  private constructor(
    private readonly dir: string,
    private readonly logger: Logger
  ) {
    super();
  }

  static open(dir: string, logger: Logger): FileTradeStore {
    fs.mkdirSync(dir, { recursive: true });
    const store = new FileTradeStore(dir, logger);
    store.loadAll();
    return store;
  }

  protected override async afterWrite(change: StoreChange): Promise<void> {
    if (change.table === "snapshots" || change.table === "onchainEvents") {
      const file = change.table === "snapshots" ? SNAPSHOTS_FILE : ONCHAIN_EVENTS_FILE;
      const lines = change.rows.map((row) => `${JSON.stringify(row)}\n`).join("");
      fs.appendFileSync(path.join(this.dir, file), lines, { encoding: "utf-8" });
      return;
    }
    atomicWriteFile(path.join(this.dir, TABLE_FILES[change.table]), JSON.stringify(this.rowsOf(change.table), null, 2));
  }

  private rowsOf(table: StoreTable): unknown[] {
    switch (table) {
      case "candidates":
        return [...this.candidates.values()];
      case "miningRuns":
        return [...this.miningRuns.values()];
      case "suggestions":
        return [...this.suggestions.values()];
      case "combinations":
        return [...this.combinations.values()];
      case "ruleSets":
        return [...this.ruleSets.values()];
    }
  }

  private loadAll(): void {
    this.loadTable(TABLE_FILES.candidates, TradeCandidateSchema, (row) => row.id, this.candidates);
    this.loadTable(TABLE_FILES.miningRuns, MiningRunSchema, (row) => row.id, this.miningRuns);
    this.loadTable(TABLE_FILES.suggestions, FilterSuggestionSchema, (row) => row.id, this.suggestions);
    this.loadTable(TABLE_FILES.combinations, FilterCombinationSchema, (row) => row.id, this.combinations);
    this.loadTable(TABLE_FILES.ruleSets, RuleSetSchema, (row) => row.id, this.ruleSets);
    this.loadLines(SNAPSHOTS_FILE, TrailSnapshotSchema, snapshotKey, this.snapshots);
    this.loadLines(ONCHAIN_EVENTS_FILE, OnchainEventSchema, (row) => row.signature, this.onchainEvents);
  }

  private loadTable<T>(file: string, schema: RowSchema<T>, keyOf: (row: T) => string, target: Map<string, T>): void {
    const filePath = path.join(this.dir, file);
    if (!fs.existsSync(filePath)) return;

    const raw: unknown = JSON.parse(fs.readFileSync(filePath, "utf-8"));
    if (!Array.isArray(raw)) {
      throw new Error(`${filePath} must contain a JSON array`);
    }
    for (const item of raw) {
      const row = schema.parse(item);
      target.set(keyOf(row), row);
    }
  }

  // A crash can leave a torn last line; skip what does not parse and keep the rest.
  private loadLines<T>(file: string, schema: RowSchema<T>, keyOf: (row: T) => string, target: Map<string, T>): void {
    const filePath = path.join(this.dir, file);
    if (!fs.existsSync(filePath)) return;

    let skipped = 0;
    for (const line of fs.readFileSync(filePath, "utf-8").split("\n")) {
      if (!line.trim()) continue;
      let parsed: unknown;
      try {
        parsed = JSON.parse(line);
      } catch {
        skipped += 1;
        continue;
      }
      const result = schema.safeParse(parsed);
      if (!result.success) {
        skipped += 1;
        continue;
      }
      const key = keyOf(result.data);
      if (!target.has(key)) target.set(key, result.data);
    }
    if (skipped > 0) {
      this.logger.warn({ file, skipped }, "Skipped unreadable rows while loading store");
    }
  }
}
