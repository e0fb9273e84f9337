import { mkdirSync } from "node:fs";
import { dirname } from "node:path";
import pino, { type Logger } from "pino";
import pretty from "pino-pretty";

export const LOG_LEVELS = ["debug", "info", "warn", "error", "fatal"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export type LogFormat = "json" | "text";

export type LoggingConfig = {
  level: LogLevel;
  format: LogFormat;
  file?: string | null;
};

export type { Logger };

// Logs go to stderr so `--json` output on stdout stays machine-readable.
export function createLogger(config: LoggingConfig, name = "irr-watch"): Logger {
  const options = { name, level: config.level };
  const stderr =
    config.format === "text"
      ? pretty({ sync: true, colorize: false, destination: 2, translateTime: "SYS:yyyy-mm-dd HH:MM:ss" })
      : pino.destination({ dest: 2, sync: true });

  if (!config.file) {
    return pino(options, stderr);
  }

  mkdirSync(dirname(config.file), { recursive: true });
  const file = pino.destination({ dest: config.file, sync: true });
  return pino(
    options,
    pino.multistream([
      { level: config.level, stream: stderr },
      { level: config.level, stream: file },
    ]),
  );
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
