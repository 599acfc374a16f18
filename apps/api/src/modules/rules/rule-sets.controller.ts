import { Body, Controller, Get, NotFoundException, Param, Post, Put } from "@nestjs/common";
import type { RuleSet } from "@tradegate/shared";
import { RuleSetCreateSchema, RuleSetUpdateSchema } from "@tradegate/shared";

import { RecordNotFoundError } from "../common/errors";
import { parseBody } from "../common/parse-body";

import { RuleSetsService } from "./rule-sets.service";

@Controller("rule-sets")
export class RuleSetsController {
  constructor(private readonly ruleSets: RuleSetsService) {}

  @Get()
  async list(): Promise<{ ruleSets: RuleSet[] }> {
    return { ruleSets: await this.ruleSets.list() };
  }

  @Post()
  async create(@Body() body: unknown): Promise<RuleSet> {
    return await this.ruleSets.create(parseBody(RuleSetCreateSchema, body));
  }

  @Put(":id")
  async update(@Param("id") id: string, @Body() body: unknown): Promise<RuleSet> {
    const patch = parseBody(RuleSetUpdateSchema, body);
    try {
      return await this.ruleSets.update(id, patch);
    } catch (err) {
      if (err instanceof RecordNotFoundError) throw new NotFoundException(err.message);
      throw err;
    }
  }
}
