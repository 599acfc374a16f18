import type { MiningSettings, TradeCandidate, TrailSnapshot } from "@tradegate/shared";
import { labelOutcome } from "@tradegate/shared";

import { round } from "../market/price-math";

/** Percentile pairs of the good trades' values tried as candidate ranges, in order. */
export const PERCENTILE_PAIRS: ReadonlyArray<readonly [number, number]> = [
  [10, 90],
  [5, 95],
  [15, 85],
  [20, 80],
  [25, 75]
];

export type MiningParams = Pick<
  MiningSettings,
  | "goodTradeThresholdPct"
  | "minFiltersInCombo"
  | "maxFiltersInCombo"
  | "minGoodKeptPct"
  | "minBadRemovedPct"
  | "comboMinGoodKeptPct"
  | "comboMinImprovementPct"
  | "topK"
  | "minGoodSamples"
  | "minTotalSamples"
  | "maxNullPct"
  | "skipColumns"
>;

export type RangeStats = {
  goodBefore: number;
  badBefore: number;
  goodAfter: number;
  badAfter: number;
  goodKeptPct: number;
  badRemovedPct: number;
};

export type MinedFilter = RangeStats & {
  columnName: string;
  minuteOffset: number;
  fromValue: number;
  toValue: number;
  score: number;
};

export type ComboStep = RangeStats & {
  filters: MinedFilter[];
  score: number;
  improvementOverSingle: number;
};

export type BestCombination = {
  minuteOffset: number;
  steps: ComboStep[];
};

export type MiningDataset = {
  /** candidate id -> good */
  labels: Map<string, boolean>;
  /** minute offset -> candidate id -> column -> value */
  rowsByOffset: Map<number, Map<string, Map<string, number | null>>>;
  columns: string[];
  trainedThrough: string | null;
};

export type MiningOutcome = {
  candidatesAnalyzed: number;
  goodCount: number;
  badCount: number;
  totalFiltersAnalyzed: number;
  /** Best offset per column, ranked. */
  singles: MinedFilter[];
  best: BestCombination | null;
  trainedThrough: string | null;
};

export function inRange(value: number | null, fromValue: number | null, toValue: number | null): boolean {
  if (value === null) return false;
  if (fromValue !== null && value < fromValue) return false;
  if (toValue !== null && value > toValue) return false;
  return true;
}

export function effectivenessScore(badRemovedPct: number, goodKeptPct: number): number {
  return round((badRemovedPct * goodKeptPct) / 100);
}

/** Linear interpolation between closest ranks over an ascending array. */
export function percentile(sorted: readonly number[], p: number): number {
  if (sorted.length === 0) throw new RangeError("percentile of an empty series");
  const rank = ((sorted.length - 1) * p) / 100;
  const lo = Math.floor(rank);
  const hi = Math.ceil(rank);
  const low = sorted[lo] ?? 0;
  const high = sorted[hi] ?? low;
  return low + (high - low) * (rank - lo);
}

export function statsFor(goodFlags: readonly boolean[], passes: readonly boolean[]): RangeStats {
  let goodBefore = 0;
  let badBefore = 0;
  let goodAfter = 0;
  let badAfter = 0;
  goodFlags.forEach((good, i) => {
    const kept = passes[i] === true;
    if (good) {
      goodBefore += 1;
      if (kept) goodAfter += 1;
    } else {
      badBefore += 1;
      if (kept) badAfter += 1;
    }
  });
  return {
    goodBefore,
    badBefore,
    goodAfter,
    badAfter,
    goodKeptPct: goodBefore > 0 ? round((goodAfter / goodBefore) * 100, 2) : 0,
    badRemovedPct: badBefore > 0 ? round(((badBefore - badAfter) / badBefore) * 100, 2) : 0
  };
}

/** Ranking used everywhere a single winner is picked: score, then bad removed, then earlier offset. */
export function compareRanked(
  a: { score: number; badRemovedPct: number; minuteOffset: number; columnName?: string },
  b: { score: number; badRemovedPct: number; minuteOffset: number; columnName?: string }
): number {
  return (
    b.score - a.score ||
    b.badRemovedPct - a.badRemovedPct ||
    a.minuteOffset - b.minuteOffset ||
    (a.columnName ?? "").localeCompare(b.columnName ?? "")
  );
}

export function buildDataset(
  candidates: readonly TradeCandidate[],
  snapshots: readonly TrailSnapshot[],
  params: Pick<MiningParams, "goodTradeThresholdPct" | "skipColumns">
): MiningDataset {
  const labels = new Map<string, boolean>();
  let trainedThroughMs = Number.NEGATIVE_INFINITY;
  for (const candidate of candidates) {
    if (candidate.realizedGainPct === null) continue;
    // The label written at close stands when it was set under this run's threshold.
    const label =
      candidate.label !== null && candidate.labelThresholdPct === params.goodTradeThresholdPct
        ? candidate.label
        : labelOutcome(candidate.realizedGainPct, params.goodTradeThresholdPct);
    labels.set(candidate.id, label === "good");
    trainedThroughMs = Math.max(trainedThroughMs, Date.parse(candidate.signalTs));
  }

  const skip = new Set(params.skipColumns);
  const columns = new Set<string>();
  const rowsByOffset = new Map<number, Map<string, Map<string, number | null>>>();
  for (const row of snapshots) {
    if (!labels.has(row.candidateId) || skip.has(row.columnName)) continue;
    columns.add(row.columnName);
    let byCandidate = rowsByOffset.get(row.minuteOffset);
    if (!byCandidate) {
      byCandidate = new Map();
      rowsByOffset.set(row.minuteOffset, byCandidate);
    }
    let values = byCandidate.get(row.candidateId);
    if (!values) {
      values = new Map();
      byCandidate.set(row.candidateId, values);
    }
    values.set(row.columnName, row.value);
  }

  return {
    labels,
    rowsByOffset,
    columns: [...columns].sort(),
    trainedThrough: Number.isFinite(trainedThroughMs) ? new Date(trainedThroughMs).toISOString() : null
  };
}

type OffsetFrame = {
  ids: string[];
  goodFlags: boolean[];
  valuesOf(column: string): Array<number | null>;
};

function frameFor(dataset: MiningDataset, minuteOffset: number): OffsetFrame {
  const rows = dataset.rowsByOffset.get(minuteOffset) ?? new Map<string, Map<string, number | null>>();
  const ids = [...rows.keys()].sort();
  return {
    ids,
    goodFlags: ids.map((id) => dataset.labels.get(id) === true),
    valuesOf: (column) => ids.map((id) => rows.get(id)?.get(column) ?? null)
  };
}

export function findBestRange(
  columnName: string,
  minuteOffset: number,
  values: readonly (number | null)[],
  goodFlags: readonly boolean[],
  params: MiningParams
): MinedFilter | null {
  if (values.length === 0) return null;
  const present = values.filter((v): v is number => v !== null);
  const nullPct = ((values.length - present.length) / values.length) * 100;
  if (nullPct > params.maxNullPct || present.length < params.minTotalSamples) return null;

  const goodValues = values
    .filter((v, i): v is number => v !== null && goodFlags[i] === true)
    .sort((a, b) => a - b);
  if (goodValues.length < params.minGoodSamples) return null;
  if (!goodFlags.some((good) => !good)) return null;

  let best: MinedFilter | null = null;
  for (const [lo, hi] of PERCENTILE_PAIRS) {
    const fromValue = round(percentile(goodValues, lo), 6);
    const toValue = round(percentile(goodValues, hi), 6);
    // Good trades without spread give no usable range.
    if (fromValue >= toValue) continue;
    const stats = statsFor(
      goodFlags,
      values.map((v) => inRange(v, fromValue, toValue))
    );
    if (stats.goodKeptPct < params.minGoodKeptPct || stats.badRemovedPct < params.minBadRemovedPct) continue;

    const candidate: MinedFilter = {
      ...stats,
      columnName,
      minuteOffset,
      fromValue,
      toValue,
      score: effectivenessScore(stats.badRemovedPct, stats.goodKeptPct)
    };
    if (!best || compareRanked(candidate, best) < 0) best = candidate;
  }
  return best;
}

export function mineSingleFilters(dataset: MiningDataset, params: MiningParams): { filters: MinedFilter[]; analyzed: number } {
  const filters: MinedFilter[] = [];
  let analyzed = 0;
  const offsets = [...dataset.rowsByOffset.keys()].sort((a, b) => a - b);
  for (const offset of offsets) {
    const frame = frameFor(dataset, offset);
    for (const column of dataset.columns) {
      analyzed += 1;
      const mined = findBestRange(column, offset, frame.valuesOf(column), frame.goodFlags, params);
      if (mined) filters.push(mined);
    }
  }
  return { filters: filters.sort(compareRanked), analyzed };
}

export function bestPerColumn(filters: readonly MinedFilter[]): MinedFilter[] {
  const best = new Map<string, MinedFilter>();
  for (const filter of filters) {
    const current = best.get(filter.columnName);
    if (!current || compareRanked(filter, current) < 0) best.set(filter.columnName, filter);
  }
  return [...best.values()].sort(compareRanked);
}

/**
 * Greedy conjunction at one offset. Starts from the pool member removing the
 * most bad trades while keeping the good-kept floor, then adds whichever filter
 * improves bad removal the most, until no addition clears the improvement bar.
 * Adding a filter can only shrink the kept set, so good kept never rises and
 * bad removed never falls along the chain.
 */
export function growCombination(
  dataset: MiningDataset,
  minuteOffset: number,
  pool: readonly MinedFilter[],
  params: MiningParams
): ComboStep[] {
  const frame = frameFor(dataset, minuteOffset);
  const ranked = pool
    .filter((f) => f.minuteOffset === minuteOffset)
    .sort(compareRanked)
    .slice(0, params.topK);
  const passesOf = new Map<MinedFilter, boolean[]>(
    ranked.map((f) => [f, frame.valuesOf(f.columnName).map((v) => inRange(v, f.fromValue, f.toValue))])
  );

  let start: { filter: MinedFilter; stats: RangeStats } | null = null;
  for (const filter of ranked) {
    const stats = statsFor(frame.goodFlags, passesOf.get(filter) ?? []);
    if (stats.goodKeptPct < params.comboMinGoodKeptPct) continue;
    if (!start || stats.badRemovedPct > start.stats.badRemovedPct) start = { filter, stats };
  }
  if (!start) return [];

  const toStep = (filters: MinedFilter[], stats: RangeStats, baseline: number): ComboStep => ({
    ...stats,
    filters,
    score: effectivenessScore(stats.badRemovedPct, stats.goodKeptPct),
    improvementOverSingle: round(stats.badRemovedPct - baseline, 2)
  });

  const baseline = start.stats.badRemovedPct;
  const chain: ComboStep[] = [toStep([start.filter], start.stats, baseline)];
  let mask = passesOf.get(start.filter) ?? [];

  while (chain.length < params.maxFiltersInCombo) {
    const current = chain[chain.length - 1];
    if (!current) break;
    const usedColumns = new Set(current.filters.map((f) => f.columnName));

    let next: { filter: MinedFilter; stats: RangeStats; mask: boolean[]; improvement: number } | null = null;
    for (const filter of ranked) {
      if (usedColumns.has(filter.columnName)) continue;
      const passes = passesOf.get(filter) ?? [];
      const combined = mask.map((kept, i) => kept && passes[i] === true);
      const stats = statsFor(frame.goodFlags, combined);
      if (stats.goodKeptPct < params.comboMinGoodKeptPct) continue;
      const improvement = stats.badRemovedPct - current.badRemovedPct;
      if (improvement < params.comboMinImprovementPct) continue;
      if (!next || improvement > next.improvement) next = { filter, stats, mask: combined, improvement };
    }
    if (!next) break;

    chain.push(toStep([...current.filters, next.filter], next.stats, baseline));
    mask = next.mask;
  }
  return chain;
}

export function selectBestCombination(
  dataset: MiningDataset,
  filters: readonly MinedFilter[],
  offsets: readonly number[],
  params: MiningParams
): BestCombination | null {
  let best: { combination: BestCombination; last: ComboStep } | null = null;
  for (const minuteOffset of [...offsets].sort((a, b) => a - b)) {
    const steps = growCombination(dataset, minuteOffset, filters, params).filter(
      (step) => step.filters.length >= params.minFiltersInCombo
    );
    const last = steps[steps.length - 1];
    if (!last) continue;
    const challenger = { combination: { minuteOffset, steps }, last };
    if (
      !best ||
      compareRanked({ ...last, minuteOffset }, { ...best.last, minuteOffset: best.combination.minuteOffset }) < 0
    ) {
      best = challenger;
    }
  }
  return best ? best.combination : null;
}

/** Whole mining pass as a pure function of resolved candidates and their trails. */
export function mineFilters(
  candidates: readonly TradeCandidate[],
  snapshots: readonly TrailSnapshot[],
  params: MiningParams,
  combinationOffsets: readonly number[]
): MiningOutcome {
  const dataset = buildDataset(candidates, snapshots, params);
  const { filters, analyzed } = mineSingleFilters(dataset, params);
  const goodCount = [...dataset.labels.values()].filter(Boolean).length;

  return {
    candidatesAnalyzed: dataset.labels.size,
    goodCount,
    badCount: dataset.labels.size - goodCount,
    totalFiltersAnalyzed: analyzed,
    singles: bestPerColumn(filters),
    best: selectBestCombination(dataset, filters, combinationOffsets, params),
    trainedThrough: dataset.trainedThrough
  };
}
