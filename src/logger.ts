import pino, { type Logger } from "pino";
import { LOG_LEVEL } from "./constants";

export type { Logger };

const pretty = process.env.NODE_ENV !== "production" && process.env.NODE_ENV !== "test";

const baseLogger = pino({
  level: LOG_LEVEL,
  transport: pretty
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      }
    : undefined,
});

export function createLogger(component: string): Logger {
  return baseLogger.child({ component });
}
