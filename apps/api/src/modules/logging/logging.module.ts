import { Global, Module } from "@nestjs/common";

import { APP_LOGGER, createLogger } from "./pino-logger";

@Global()
@Module({
  providers: [{ provide: APP_LOGGER, useFactory: () => createLogger() }],
  exports: [APP_LOGGER]
})
export class LoggingModule {}
