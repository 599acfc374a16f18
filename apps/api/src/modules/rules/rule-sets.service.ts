import crypto from "node:crypto";

import { BadRequestException, Inject, Injectable } from "@nestjs/common";
import type { Logger } from "pino";
import type { FilterCombination, RuleSet, RuleSetCreate, RuleSetUpdate } from "@tradegate/shared";

import { RecordNotFoundError } from "../common/errors";
import { KeyedMutex } from "../common/keyed-mutex";
import { APP_LOGGER } from "../logging/pino-logger";
import { TRADE_STORE } from "../persistence/trade-store";
import type { TradeStore } from "../persistence/trade-store";

import { ManualFilterSet, MinedFilterSet } from "./conditional-filter-set";
import type { ConditionalFilterSet } from "./conditional-filter-set";

const LOCK_KEY = "rule-sets";

@Injectable()
export class RuleSetsService {
  private readonly lock = new KeyedMutex();

  constructor(
    @Inject(TRADE_STORE) private readonly store: TradeStore,
    @Inject(APP_LOGGER) private readonly logger: Logger
  ) {}

  async list(): Promise<RuleSet[]> {
    return await this.store.listRuleSets();
  }

  async create(request: RuleSetCreate): Promise<RuleSet> {
    const ruleSet: RuleSet = {
      id: crypto.randomUUID(),
      name: request.name,
      kind: "manual",
      combinationId: null,
      filters: request.filters,
      active: request.active,
      followMiner: false,
      version: 1,
      updatedAt: new Date().toISOString()
    };
    await this.lock.run(LOCK_KEY, () => this.store.saveRuleSet(ruleSet));
    this.logger.info({ ruleSetId: ruleSet.id, name: ruleSet.name, filters: ruleSet.filters.length }, "Manual rule set created");
    return ruleSet;
  }

  async update(id: string, patch: RuleSetUpdate): Promise<RuleSet> {
    return await this.lock.run(LOCK_KEY, async () => {
      const current = (await this.store.listRuleSets()).find((rs) => rs.id === id);
      if (!current) throw new RecordNotFoundError("rule_sets", id);
      if (patch.followMiner && current.kind !== "mined") {
        throw new BadRequestException("Only mined rule sets can follow the miner.");
      }
      if (patch.filters && current.kind !== "manual") {
        throw new BadRequestException("Filters of a mined rule set come from its combination.");
      }

      const next: RuleSet = {
        ...current,
        name: patch.name ?? current.name,
        active: patch.active ?? current.active,
        followMiner: patch.followMiner ?? current.followMiner,
        filters: patch.filters ?? current.filters,
        version: current.version + 1,
        updatedAt: new Date().toISOString()
      };
      await this.store.saveRuleSet(next);
      this.logger.info({ ruleSetId: id, version: next.version }, "Rule set updated");
      return next;
    });
  }

  /**
   * Re-points every rule set that follows the miner at `combination`, creating
   * the automatic rule set the first time a run produces a winner.
   */
  async followBestCombination(combination: FilterCombination, autoRuleSetName: string): Promise<RuleSet[]> {
    return await this.lock.run(LOCK_KEY, async () => {
      const now = new Date().toISOString();
      const followers = (await this.store.listRuleSets()).filter((rs) => rs.kind === "mined" && rs.followMiner);
      const updated: RuleSet[] =
        followers.length > 0
          ? followers.map((rs) => ({ ...rs, combinationId: combination.id, version: rs.version + 1, updatedAt: now }))
          : [
              {
                id: crypto.randomUUID(),
                name: autoRuleSetName,
                kind: "mined",
                combinationId: combination.id,
                filters: [],
                active: true,
                followMiner: true,
                version: 1,
                updatedAt: now
              }
            ];

      for (const ruleSet of updated) {
        await this.store.saveRuleSet(ruleSet);
      }
      this.logger.info(
        { combinationId: combination.id, columns: combination.columns, ruleSets: updated.map((rs) => rs.name) },
        "Rule sets re-pointed to new best combination"
      );
      return updated;
    });
  }

  /** Active rule sets ready to evaluate. A mined rule set without a combination yet is skipped. */
  async loadActiveFilterSets(): Promise<ConditionalFilterSet[]> {
    const active = (await this.store.listRuleSets()).filter((rs) => rs.active);
    const sets: ConditionalFilterSet[] = [];
    for (const ruleSet of active) {
      if (ruleSet.kind === "manual") {
        sets.push(new ManualFilterSet(ruleSet));
        continue;
      }
      if (!ruleSet.combinationId) continue;
      const combination = await this.store.getCombination(ruleSet.combinationId);
      if (!combination) {
        throw new RecordNotFoundError("filter_combinations", ruleSet.combinationId);
      }
      const suggestions = await this.store.listSuggestions({ ids: combination.filterIds });
      sets.push(new MinedFilterSet(ruleSet, combination, suggestions));
    }
    return sets;
  }
}
