import path from "node:path";

import { Module } from "@nestjs/common";
import type { Logger } from "pino";

import { ConfigModule } from "../config/config.module";
import { ConfigService } from "../config/config.service";
import { APP_LOGGER } from "../logging/pino-logger";

import { FileTradeStore } from "./file-trade-store";
import { TRADE_STORE } from "./trade-store";

@Module({
  imports: [ConfigModule],
  providers: [
    {
      provide: TRADE_STORE,
      inject: [ConfigService, APP_LOGGER],
      useFactory: (configService: ConfigService, logger: Logger) =>
        FileTradeStore.open(path.join(configService.dataDir, "store"), logger)
    }
  ],
  exports: [TRADE_STORE]
})
export class PersistenceModule {}
