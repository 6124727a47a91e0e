import pino, { type Logger } from "pino";
import type { BackendConfig } from "./config";

export function createLogger(config: Pick<BackendConfig, "logLevel" | "prettyLogs">): Logger {
  return pino({
    level: config.logLevel,
    ...(config.prettyLogs ? { transport: { target: "pino-pretty" } } : {}),
  });
}
