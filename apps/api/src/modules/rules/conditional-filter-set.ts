import type {
  FilterCheck,
  FilterCombination,
  FilterSuggestion,
  RuleSet,
  RuleSetKind,
  RuleSetResult,
  TrailSnapshot
} from "@tradegate/shared";

import { inRange } from "../mining/filter-mining";

export type RangeFilter = {
  id: string;
  columnName: string;
  minuteOffset: number;
  fromValue: number | null;
  toValue: number | null;
};

/** minute offset -> column -> value */
export type TrailView = ReadonlyMap<number, ReadonlyMap<string, number | null>>;

export function trailView(rows: readonly TrailSnapshot[]): TrailView {
  const view = new Map<number, Map<string, number | null>>();
  for (const row of rows) {
    let columns = view.get(row.minuteOffset);
    if (!columns) {
      columns = new Map();
      view.set(row.minuteOffset, columns);
    }
    columns.set(row.columnName, row.value);
  }
  return view;
}

export function checkFilter(filter: RangeFilter, trail: TrailView): FilterCheck {
  const base = {
    filterId: filter.id,
    columnName: filter.columnName,
    minuteOffset: filter.minuteOffset,
    fromValue: filter.fromValue,
    toValue: filter.toValue
  };
  const minute = trail.get(filter.minuteOffset);
  if (!minute) {
    return { ...base, actualValue: null, passed: false, error: "no_minute_data" };
  }
  const actualValue = minute.get(filter.columnName) ?? null;
  if (actualValue === null) {
    return { ...base, actualValue, passed: false, error: "null_value" };
  }
  return { ...base, actualValue, passed: inRange(actualValue, filter.fromValue, filter.toValue) };
}

/** One named rule set: passes only when every member filter holds. */
export interface ConditionalFilterSet {
  readonly id: string;
  readonly name: string;
  readonly kind: RuleSetKind;
  readonly version: number;
  readonly filters: readonly RangeFilter[];
  evaluate(trail: TrailView): RuleSetResult;
}

abstract class RangeFilterSet implements ConditionalFilterSet {
  abstract readonly filters: readonly RangeFilter[];

  protected constructor(protected readonly ruleSet: RuleSet) {}

  get id(): string {
    return this.ruleSet.id;
  }

  get name(): string {
    return this.ruleSet.name;
  }

  get kind(): RuleSetKind {
    return this.ruleSet.kind;
  }

  get version(): number {
    return this.ruleSet.version;
  }

  evaluate(trail: TrailView): RuleSetResult {
    const checks = this.filters.map((filter) => checkFilter(filter, trail));
    const filtersPassed = checks.filter((c) => c.passed).length;
    return {
      ruleSetId: this.id,
      ruleSetName: this.name,
      version: this.version,
      // An empty rule set never passes.
      passed: checks.length > 0 && filtersPassed === checks.length,
      filtersPassed,
      filtersFailed: checks.length - filtersPassed,
      checks
    };
  }
}

/** Tracks a miner combination; its filters are the combination's member suggestions. */
export class MinedFilterSet extends RangeFilterSet {
  readonly filters: readonly RangeFilter[];

  constructor(ruleSet: RuleSet, combination: FilterCombination, suggestions: readonly FilterSuggestion[]) {
    super(ruleSet);
    const byId = new Map(suggestions.map((s) => [s.id, s]));
    this.filters = combination.filterIds.map((id) => {
      const suggestion = byId.get(id);
      if (!suggestion) {
        throw new Error(`Combination ${combination.id} references unknown suggestion ${id}`);
      }
      return {
        id: suggestion.id,
        columnName: suggestion.columnName,
        minuteOffset: suggestion.minuteOffset,
        fromValue: suggestion.fromValue,
        toValue: suggestion.toValue
      };
    });
  }
}

/** Operator-authored ranges; open bounds allowed. */
export class ManualFilterSet extends RangeFilterSet {
  readonly filters: readonly RangeFilter[];

  constructor(ruleSet: RuleSet) {
    super(ruleSet);
    this.filters = ruleSet.filters.map((f, i) => ({
      id: `${ruleSet.id}#${i}`,
      columnName: f.columnName,
      minuteOffset: f.minuteOffset,
      fromValue: f.fromValue,
      toValue: f.toValue
    }));
  }
}
