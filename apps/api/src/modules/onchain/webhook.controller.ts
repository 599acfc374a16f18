import { Body, Controller, HttpCode, Post } from "@nestjs/common";

import { OnchainActivityService } from "./onchain-activity.service";
import type { IngestReport } from "./onchain-activity.service";

@Controller("webhook")
export class WebhookController {
  constructor(private readonly onchain: OnchainActivityService) {}

  @Post()
  @HttpCode(200)
  async receiveTrades(@Body() body: unknown): Promise<{ ok: true } & IngestReport> {
    return { ok: true, ...(await this.onchain.ingest(body, "trade")) };
  }

  @Post("whale-activity")
  @HttpCode(200)
  async receiveWhaleActivity(@Body() body: unknown): Promise<{ ok: true } & IngestReport> {
    return { ok: true, ...(await this.onchain.ingest(body, "whale")) };
  }
}
