import pino from "pino";
import type { PipelineConfig } from "./config";

export type Logger = pino.Logger;

export function createLogger(
  config: Pick<PipelineConfig, "logLevel">,
  opts: { pretty?: boolean } = {}
): Logger {
  if (!opts.pretty) {
    return pino({ level: config.logLevel, base: { service: "testforge" } });
  }

  return pino({
    level: config.logLevel,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "HH:MM:ss",
        ignore: "pid,hostname",
      },
    },
  });
}

// For tests and library callers that do not want output.
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
