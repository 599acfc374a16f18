import type {
  FilterCombination,
  FilterSuggestion,
  MiningRun,
  OnchainEvent,
  RuleSet,
  TradeCandidate,
  TrailSnapshot
} from "@tradegate/shared";
import { snapshotKey } from "@tradegate/shared";

import { RecordNotFoundError } from "../common/errors";
import { KeyedMutex } from "../common/keyed-mutex";

import type { CandidateQuery, SuggestionQuery, TradeStore, WriteResult } from "./trade-store";

export type StoreTable = "candidates" | "miningRuns" | "suggestions" | "combinations" | "ruleSets";

export type StoreChange =
  | { table: StoreTable }
  | { table: "snapshots"; rows: TrailSnapshot[] }
  | { table: "onchainEvents"; rows: OnchainEvent[] };

function clone<T>(value: T): T {
  return structuredClone(value);
}

export class MemoryTradeStore implements TradeStore {
  protected readonly candidates = new Map<string, TradeCandidate>();
  protected readonly snapshots = new Map<string, TrailSnapshot>();
  protected readonly miningRuns = new Map<string, MiningRun>();
  protected readonly suggestions = new Map<string, FilterSuggestion>();
  protected readonly combinations = new Map<string, FilterCombination>();
  protected readonly ruleSets = new Map<string, RuleSet>();
  protected readonly onchainEvents = new Map<string, OnchainEvent>();

  private readonly candidateLocks = new KeyedMutex();

  /** Hook for durable subclasses; called after every committed change. */
  protected async afterWrite(_change: StoreChange): Promise<void> {}

  async insertCandidate(candidate: TradeCandidate): Promise<WriteResult> {
    return await this.candidateLocks.run(candidate.id, async () => {
      if (this.candidates.has(candidate.id)) return "duplicate";
      this.candidates.set(candidate.id, clone(candidate));
      await this.afterWrite({ table: "candidates" });
      return "inserted";
    });
  }

  async getCandidate(id: string): Promise<TradeCandidate | null> {
    const found = this.candidates.get(id);
    return found ? clone(found) : null;
  }

  async listCandidates(query: CandidateQuery = {}): Promise<TradeCandidate[]> {
    const fromMs = query.signalFrom ? Date.parse(query.signalFrom) : Number.NEGATIVE_INFINITY;
    const toMs = query.signalTo ? Date.parse(query.signalTo) : Number.POSITIVE_INFINITY;
    const rows = [...this.candidates.values()]
      .filter((c) => !query.statuses || query.statuses.includes(c.status))
      .filter((c) => {
        const ts = Date.parse(c.signalTs);
        return ts >= fromMs && ts <= toMs;
      })
      .sort((a, b) => Date.parse(b.signalTs) - Date.parse(a.signalTs));
    const limited = query.limit !== undefined ? rows.slice(0, query.limit) : rows;
    return limited.map(clone);
  }

  async updateCandidate(id: string, mutate: (current: TradeCandidate) => TradeCandidate): Promise<TradeCandidate> {
    return await this.candidateLocks.run(id, async () => {
      const current = this.candidates.get(id);
      if (!current) throw new RecordNotFoundError("trade_candidates", id);

      const next = mutate(clone(current));
      if (next.id !== id) {
        throw new Error(`Candidate update may not change the id (${id} -> ${next.id})`);
      }
      this.candidates.set(id, clone(next));
      await this.afterWrite({ table: "candidates" });
      return clone(next);
    });
  }

  async writeSnapshots(rows: readonly TrailSnapshot[]): Promise<WriteResult[]> {
    const inserted: TrailSnapshot[] = [];
    const results = rows.map((row): WriteResult => {
      const key = snapshotKey(row);
      if (this.snapshots.has(key)) return "duplicate";
      const stored = clone(row);
      this.snapshots.set(key, stored);
      inserted.push(stored);
      return "inserted";
    });
    if (inserted.length > 0) {
      await this.afterWrite({ table: "snapshots", rows: inserted });
    }
    return results;
  }

  async listSnapshots(candidateIds: readonly string[]): Promise<TrailSnapshot[]> {
    const wanted = new Set(candidateIds);
    return [...this.snapshots.values()]
      .filter((row) => wanted.has(row.candidateId))
      .sort((a, b) => a.minuteOffset - b.minuteOffset || a.columnName.localeCompare(b.columnName))
      .map(clone);
  }

  async saveMiningRun(run: MiningRun): Promise<void> {
    this.miningRuns.set(run.id, clone(run));
    await this.afterWrite({ table: "miningRuns" });
  }

  async listMiningRuns(limit?: number): Promise<MiningRun[]> {
    // Reversed first so runs started in the same millisecond list newest first.
    const rows = [...this.miningRuns.values()].reverse().sort((a, b) => Date.parse(b.startedAt) - Date.parse(a.startedAt));
    return (limit !== undefined ? rows.slice(0, limit) : rows).map(clone);
  }

  async saveMiningResults(
    suggestions: readonly FilterSuggestion[],
    combinations: readonly FilterCombination[]
  ): Promise<void> {
    for (const s of suggestions) this.suggestions.set(s.id, clone(s));
    for (const c of combinations) this.combinations.set(c.id, clone(c));
    await this.afterWrite({ table: "suggestions" });
    await this.afterWrite({ table: "combinations" });
  }

  async listSuggestions(query: SuggestionQuery = {}): Promise<FilterSuggestion[]> {
    const ids = query.ids ? new Set(query.ids) : null;
    return [...this.suggestions.values()]
      .filter((s) => query.runId === undefined || s.runId === query.runId)
      .filter((s) => !ids || ids.has(s.id))
      .sort((a, b) => b.score - a.score || a.columnName.localeCompare(b.columnName))
      .map(clone);
  }

  async listCombinations(query: { runId?: string } = {}): Promise<FilterCombination[]> {
    return [...this.combinations.values()]
      .filter((c) => query.runId === undefined || c.runId === query.runId)
      .sort((a, b) => Date.parse(b.createdAt) - Date.parse(a.createdAt) || a.filterIds.length - b.filterIds.length)
      .map(clone);
  }

  async getCombination(id: string): Promise<FilterCombination | null> {
    const found = this.combinations.get(id);
    return found ? clone(found) : null;
  }

  async listRuleSets(): Promise<RuleSet[]> {
    return [...this.ruleSets.values()].sort((a, b) => a.name.localeCompare(b.name)).map(clone);
  }

  async saveRuleSet(ruleSet: RuleSet): Promise<void> {
    this.ruleSets.set(ruleSet.id, clone(ruleSet));
    await this.afterWrite({ table: "ruleSets" });
  }

  async recordOnchainEvent(event: OnchainEvent): Promise<WriteResult> {
    if (this.onchainEvents.has(event.signature)) return "duplicate";
    const stored = clone(event);
    this.onchainEvents.set(event.signature, stored);
    await this.afterWrite({ table: "onchainEvents", rows: [stored] });
    return "inserted";
  }

  async listOnchainEvents(fromMs: number, toMs: number): Promise<OnchainEvent[]> {
    return [...this.onchainEvents.values()]
      .filter((e) => e.ts >= fromMs && e.ts <= toMs)
      .sort((a, b) => a.ts - b.ts)
      .map(clone);
  }
}
