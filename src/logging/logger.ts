import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

export interface LoggerOptions {
  /** Write to stderr so an interactive session keeps stdout to itself. */
  readonly stderr?: boolean;
}

export function createLogger(config?: Partial<LoggingConfig>, opts?: LoggerOptions): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  const transport = isJson || config?.file
    ? undefined
    : {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          destination: opts?.stderr ? 2 : 1,
        },
      };

  const options: pino.LoggerOptions = {
    name: "ponder",
    level,
    ...(transport ? { transport } : {}),
  };

  if (config?.file) {
    return pino(options, pino.destination(config.file));
  }
  if (isJson && opts?.stderr) {
    return pino(options, pino.destination(2));
  }

  return pino(options);
}
