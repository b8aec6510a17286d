import { Config } from "../config";
import pino, { stdTimeFunctions, type Logger, type LoggerOptions } from "pino";

export function loggerOptions(format: string): LoggerOptions {
  const level = process.env.LOG_LEVEL ?? "info";
  if (format === "simple") {
    return {
      level,
      base: undefined,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: false,
          translateTime: "SYS:standard",
          singleLine: true,
          ignore: "pid,hostname,file",
          messageFormat: "{file} {msg}",
        },
      },
    };
  }
  return {
    level,
    timestamp: stdTimeFunctions.isoTime,
    base: undefined,
    formatters: {
      level(label) {
        return { level: label.toUpperCase() };
      },
    },
  };
}

function build(): Logger {
  return pino(loggerOptions(Config.LOG_FORMAT));
}

type GlobalWithLogger = typeof globalThis & { __CONDASH_LOGGER__?: Logger };
const g = globalThis as GlobalWithLogger;

export const logger: Logger = g.__CONDASH_LOGGER__ ?? (g.__CONDASH_LOGGER__ = build());
export const createLogger = (bindings: Record<string, unknown>): Logger => logger.child(bindings);
