import type {
  CandidateStatus,
  FilterCombination,
  FilterSuggestion,
  MiningRun,
  OnchainEvent,
  RuleSet,
  SnapshotWriteResult,
  TradeCandidate,
  TrailSnapshot
} from "@tradegate/shared";

export const TRADE_STORE = Symbol("TRADE_STORE");

export type WriteResult = SnapshotWriteResult;

export type CandidateQuery = {
  statuses?: readonly CandidateStatus[];
  signalFrom?: string;
  signalTo?: string;
  limit?: number;
};

export type SuggestionQuery = {
  runId?: string;
  ids?: readonly string[];
};

/**
 * Every component coordinates through this store and nothing else.
 *
 * Candidate updates are serialized per id, so `mutate` always sees the latest
 * committed record. Snapshot and on-chain event writes are keyed; repeating a
 * key returns `"duplicate"` and leaves the stored row untouched.
 */
export interface TradeStore {
  insertCandidate(candidate: TradeCandidate): Promise<WriteResult>;
  getCandidate(id: string): Promise<TradeCandidate | null>;
  /** Newest signal first. */
  listCandidates(query?: CandidateQuery): Promise<TradeCandidate[]>;
  updateCandidate(id: string, mutate: (current: TradeCandidate) => TradeCandidate): Promise<TradeCandidate>;

  writeSnapshots(rows: readonly TrailSnapshot[]): Promise<WriteResult[]>;
  listSnapshots(candidateIds: readonly string[]): Promise<TrailSnapshot[]>;

  saveMiningRun(run: MiningRun): Promise<void>;
  /** Newest first. */
  listMiningRuns(limit?: number): Promise<MiningRun[]>;
  saveMiningResults(suggestions: readonly FilterSuggestion[], combinations: readonly FilterCombination[]): Promise<void>;
  listSuggestions(query?: SuggestionQuery): Promise<FilterSuggestion[]>;
  listCombinations(query?: { runId?: string }): Promise<FilterCombination[]>;
  getCombination(id: string): Promise<FilterCombination | null>;

  listRuleSets(): Promise<RuleSet[]>;
  saveRuleSet(ruleSet: RuleSet): Promise<void>;

  recordOnchainEvent(event: OnchainEvent): Promise<WriteResult>;
  listOnchainEvents(fromMs: number, toMs: number): Promise<OnchainEvent[]>;
}
