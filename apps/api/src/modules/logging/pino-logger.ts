import fs from "node:fs";
import path from "node:path";

import pino from "pino";

export const APP_LOGGER = Symbol("APP_LOGGER");

function ensureDir(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

/** JSON lines to stdout and to `engine.log`; request API keys never reach either. */
export function createLogger(): pino.Logger {
  const dataDir = process.env.DATA_DIR ?? path.resolve(process.cwd(), "../../data");
  const logDir = process.env.LOG_DIR ?? path.join(dataDir, "logs");
  ensureDir(logDir);

  const destination = pino.destination({
    dest: path.join(logDir, "engine.log"),
    sync: false
  });

  return pino(
    {
      name: "tradegate",
      level: process.env.LOG_LEVEL ?? "info",
      base: undefined,
      redact: { paths: ['req.headers["x-api-key"]'], censor: "[redacted]" },
      timestamp: pino.stdTimeFunctions.isoTime
    },
    pino.multistream([{ stream: process.stdout }, { stream: destination }])
  );
}
