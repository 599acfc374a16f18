import { BadRequestException, Body, Controller, Get, NotFoundException, Param, Post, Query } from "@nestjs/common";
import { z } from "zod";
import type { TradeCandidate, TrailSnapshot } from "@tradegate/shared";
import { CandidateStatusSchema, SignalRequestSchema, TradeOutcomeSchema } from "@tradegate/shared";

import { InvalidTransitionError, RecordNotFoundError } from "../common/errors";
import { parseBody } from "../common/parse-body";

import { CandidatesService } from "./candidates.service";
import type { SubmitResult } from "./candidates.service";

const ListQuerySchema = z.object({
  status: CandidateStatusSchema.optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100)
});

function toHttpError(err: unknown): unknown {
  if (err instanceof RecordNotFoundError) return new NotFoundException(err.message);
  if (err instanceof InvalidTransitionError) return new BadRequestException(err.message);
  return err;
}

@Controller()
export class CandidatesController {
  constructor(private readonly candidates: CandidatesService) {}

  @Post("signals")
  async submit(@Body() body: unknown): Promise<SubmitResult> {
    return await this.candidates.submitSignal(parseBody(SignalRequestSchema, body));
  }

  @Get("candidates")
  async list(@Query("status") status?: string, @Query("limit") limit?: string): Promise<{ candidates: TradeCandidate[] }> {
    const query = parseBody(ListQuerySchema, { status, limit });
    return { candidates: await this.candidates.list(query) };
  }

  @Get("candidates/:id")
  async get(@Param("id") id: string): Promise<TradeCandidate> {
    try {
      return await this.candidates.get(id);
    } catch (err) {
      throw toHttpError(err);
    }
  }

  @Get("candidates/:id/trail")
  async trail(@Param("id") id: string): Promise<{ candidateId: string; snapshots: TrailSnapshot[] }> {
    try {
      return { candidateId: id, snapshots: await this.candidates.trail(id) };
    } catch (err) {
      throw toHttpError(err);
    }
  }

  @Post("candidates/:id/close")
  async close(@Param("id") id: string, @Body() body: unknown): Promise<TradeCandidate> {
    const outcome = parseBody(TradeOutcomeSchema, body);
    try {
      return await this.candidates.close(id, outcome);
    } catch (err) {
      throw toHttpError(err);
    }
  }

  @Post("candidates/:id/cancel")
  async cancel(@Param("id") id: string): Promise<TradeCandidate> {
    try {
      return await this.candidates.cancel(id);
    } catch (err) {
      throw toHttpError(err);
    }
  }
}
