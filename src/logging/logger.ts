import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

const REDACTED_PATHS = [
  "accessToken",
  "access_token",
  "password",
  "apiKey",
  "*.accessToken",
  "*.apiKey",
];

export function createLogger(config?: Partial<LoggingConfig>): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const transport = isJson
    ? undefined
    : {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss" },
      };

  const base: pino.LoggerOptions = {
    name: "versebot",
    level,
    redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
  };

  // pino rejects a transport combined with an explicit destination stream
  if (config?.file) {
    return pino(base, pino.destination({ dest: config.file, mkdir: true }));
  }

  return pino({ ...base, ...(transport ? { transport } : {}) });
}
