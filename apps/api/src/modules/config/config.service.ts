import fs from "node:fs";
import path from "node:path";

import { Injectable } from "@nestjs/common";
import type { EngineConfig, EngineConfigPatch } from "@tradegate/shared";
import { EngineConfigSchema, defaultEngineConfig, mergeEngineConfig } from "@tradegate/shared";

import { atomicWriteFile } from "../common/atomic-write";

/**
 * Owns `DATA_DIR/config.json`. Callers take one snapshot per gate evaluation or
 * mining run; the returned object is frozen so nothing mutates it mid-flight.
 */
@Injectable()
export class ConfigService {
  private cachedConfig: EngineConfig | null = null;
  private cachedMtimeMs: number | null = null;

  get dataDir(): string {
    return process.env.DATA_DIR ?? path.resolve(process.cwd(), "../../data");
  }

  private get configPath(): string {
    return path.join(this.dataDir, "config.json");
  }

  migrateOnStartup(): { migrated: boolean; reason: "created" | "up_to_date" | "normalized" } {
    if (!fs.existsSync(this.configPath)) {
      this.save(defaultEngineConfig());
      return { migrated: true, reason: "created" };
    }

    const raw = fs.readFileSync(this.configPath, "utf-8");
    const normalized = EngineConfigSchema.parse(JSON.parse(raw));
    const nextJson = JSON.stringify(normalized, null, 2);
    if (raw.trim() === nextJson.trim()) {
      this.remember(normalized);
      return { migrated: false, reason: "up_to_date" };
    }

    this.save(normalized);
    return { migrated: true, reason: "normalized" };
  }

  load(): EngineConfig {
    if (!fs.existsSync(this.configPath)) {
      if (!this.cachedConfig || this.cachedMtimeMs !== null) {
        this.cachedConfig = deepFreeze(defaultEngineConfig());
        this.cachedMtimeMs = null;
      }
      return this.cachedConfig;
    }

    const stat = fs.statSync(this.configPath);
    if (this.cachedConfig && this.cachedMtimeMs === stat.mtimeMs) {
      return this.cachedConfig;
    }

    const raw = fs.readFileSync(this.configPath, "utf-8");
    return this.remember(EngineConfigSchema.parse(JSON.parse(raw)));
  }

  save(config: EngineConfig): EngineConfig {
    const parsed = EngineConfigSchema.parse(config);
    fs.mkdirSync(this.dataDir, { recursive: true });
    atomicWriteFile(this.configPath, JSON.stringify(parsed, null, 2));
    return this.remember(parsed);
  }

  update(patch: EngineConfigPatch): EngineConfig {
    return this.save(mergeEngineConfig(this.load(), patch));
  }

  private remember(config: EngineConfig): EngineConfig {
    const frozen = deepFreeze(config);
    this.cachedConfig = frozen;
    this.cachedMtimeMs = fs.existsSync(this.configPath) ? fs.statSync(this.configPath).mtimeMs : null;
    return frozen;
  }
}

function deepFreeze<T>(value: T): T {
  if (value && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
