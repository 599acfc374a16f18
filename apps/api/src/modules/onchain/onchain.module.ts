import { Module } from "@nestjs/common";

import { PersistenceModule } from "../persistence/persistence.module";

import { OnchainActivityService } from "./onchain-activity.service";
import { WebhookController } from "./webhook.controller";

@Module({
  imports: [PersistenceModule],
  controllers: [WebhookController],
  providers: [OnchainActivityService],
  exports: [OnchainActivityService]
})
export class OnchainModule {}
