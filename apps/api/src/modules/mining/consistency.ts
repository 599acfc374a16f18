import type { FilterConsistency, FilterSuggestion, MiningRun, Trend } from "@tradegate/shared";

import { mean, round } from "../market/price-math";

export function classifyTrend(latest: number | null, baseline: number | null, bandPct: number): Trend {
  if (latest === null || baseline === null) return "stable";
  if (latest > baseline + bandPct) return "improving";
  if (latest < baseline - bandPct) return "declining";
  return "stable";
}

function roundOrNull(value: number | null): number | null {
  return value === null ? null : round(value, 2);
}

/**
 * How often each column made the winning combination over `runs` (newest
 * first), with rolling averages of its single-filter metrics. Trends compare
 * the newest run against the average of the runs before it.
 */
export function computeConsistency(
  runs: readonly MiningRun[],
  suggestions: readonly FilterSuggestion[],
  trendBandPct: number
): FilterConsistency[] {
  const bestByRunAndColumn = new Map<string, FilterSuggestion>();
  for (const s of suggestions) {
    if (s.runId === null) continue;
    const key = `${s.runId}|${s.columnName}`;
    const current = bestByRunAndColumn.get(key);
    if (!current || s.score > current.score) bestByRunAndColumn.set(key, s);
  }

  const columns = new Set<string>();
  for (const run of runs) for (const column of run.bestColumns) columns.add(column);
  for (const s of bestByRunAndColumn.values()) {
    if (runs.some((run) => run.id === s.runId)) columns.add(s.columnName);
  }

  const rows: FilterConsistency[] = [];
  for (const columnName of columns) {
    const perRun = runs.map((run) => bestByRunAndColumn.get(`${run.id}|${columnName}`) ?? null);
    const present = perRun.filter((s): s is FilterSuggestion => s !== null);
    const prior = perRun.slice(1).filter((s): s is FilterSuggestion => s !== null);
    const latest = perRun[0] ?? null;
    const timesInBestCombo = runs.filter((run) => run.bestColumns.includes(columnName)).length;

    rows.push({
      columnName,
      totalRuns: runs.length,
      timesInBestCombo,
      consistencyPct: runs.length > 0 ? round((timesInBestCombo / runs.length) * 100, 2) : 0,
      avgBadRemovedPct: roundOrNull(mean(present.map((s) => s.badRemovedPct))),
      avgGoodKeptPct: roundOrNull(mean(present.map((s) => s.goodKeptPct))),
      latestBadRemovedPct: latest ? latest.badRemovedPct : null,
      latestGoodKeptPct: latest ? latest.goodKeptPct : null,
      badRemovedTrend: classifyTrend(latest ? latest.badRemovedPct : null, mean(prior.map((s) => s.badRemovedPct)), trendBandPct),
      goodKeptTrend: classifyTrend(latest ? latest.goodKeptPct : null, mean(prior.map((s) => s.goodKeptPct)), trendBandPct)
    });
  }

  return rows.sort((a, b) => b.consistencyPct - a.consistencyPct || a.columnName.localeCompare(b.columnName));
}
