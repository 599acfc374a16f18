import { Body, Controller, Get, Put } from "@nestjs/common";
import type { EngineConfig } from "@tradegate/shared";
import { EngineConfigPatchSchema } from "@tradegate/shared";

import { parseBody } from "../common/parse-body";

import { ConfigService } from "./config.service";

type PublicConfig = Omit<EngineConfig, "apiKey"> & { apiKeyHint: string | null };

@Controller("config")
export class ConfigController {
  constructor(private readonly configService: ConfigService) {}

  @Get()
  getConfig(): PublicConfig {
    const { apiKey, ...rest } = this.configService.load();
    return { ...rest, apiKeyHint: apiKey ? apiKey.slice(-6) : null };
  }

  @Put()
  updateConfig(@Body() body: unknown): { ok: true } {
    const patch = parseBody(EngineConfigPatchSchema, body);
    this.configService.update(patch);
    return { ok: true };
  }
}
