import fs from "node:fs";
import os from "node:os";
import path from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ConfigService } from "./config.service";

describe("ConfigService", () => {
  let dataDir: string;
  const previousDataDir = process.env.DATA_DIR;

  beforeEach(() => {
    dataDir = fs.mkdtempSync(path.join(os.tmpdir(), "tradegate-config-"));
    process.env.DATA_DIR = dataDir;
  });

  afterEach(() => {
    if (previousDataDir === undefined) {
      delete process.env.DATA_DIR;
    } else {
      process.env.DATA_DIR = previousDataDir;
    }
    fs.rmSync(dataDir, { recursive: true, force: true });
  });

  it("returns defaults when no config file exists", () => {
    const service = new ConfigService();
    const config = service.load();

    expect(config.gate.minChangePct).toBe(0.2);
    expect(fs.existsSync(path.join(dataDir, "config.json"))).toBe(false);
  });

  it("writes the defaults on first startup", () => {
    const service = new ConfigService();

    expect(service.migrateOnStartup()).toEqual({ migrated: true, reason: "created" });
    expect(service.migrateOnStartup()).toEqual({ migrated: false, reason: "up_to_date" });
  });

  it("normalizes a partial config file", () => {
    fs.writeFileSync(path.join(dataDir, "config.json"), JSON.stringify({ gate: { minChangePct: 0.1 } }));
    const service = new ConfigService();

    expect(service.migrateOnStartup()).toEqual({ migrated: true, reason: "normalized" });
    const stored = JSON.parse(fs.readFileSync(path.join(dataDir, "config.json"), "utf-8"));
    expect(stored.gate.minChangePct).toBe(0.1);
    expect(stored.gate.lookbackMinutes).toBe(3);
  });

  it("hands out frozen snapshots that updates do not touch", () => {
    const service = new ConfigService();
    const before = service.load();

    const after = service.update({ gate: { minChangePct: 0.35 } });

    expect(Object.isFrozen(before.gate)).toBe(true);
    expect(before.gate.minChangePct).toBe(0.2);
    expect(after.gate.minChangePct).toBe(0.35);
    expect(service.load().gate.minChangePct).toBe(0.35);
  });
});
