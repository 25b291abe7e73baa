/* Tiny logger with leveled output */
import { describeError } from "./errors";

export type LogLevel = "info" | "warn" | "error" | "debug";

const levelOrder: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in levelOrder;
}

const envLevel = process.env.LOG_LEVEL?.trim().toLowerCase() ?? "";
const currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : "info";

function shouldLog(level: LogLevel): boolean {
  return levelOrder[level] <= levelOrder[currentLevel];
}

function format(level: LogLevel, message: string): string {
  const timestamp = new Date().toISOString();
  return `[${timestamp}] [${level.toUpperCase()}] ${message}`;
}

const MAX_CAUSE_DEPTH = 5;

/** "message: reason (cause: reason)", following the cause chain. */
export function formatFailure(message: string, error: unknown): string {
  let text = `${message}: ${describeError(error)}`;
  let cause = error instanceof Error ? error.cause : undefined;
  for (let depth = 0; cause !== undefined && depth < MAX_CAUSE_DEPTH; depth++) {
    text += ` (cause: ${describeError(cause)})`;
    cause = cause instanceof Error ? cause.cause : undefined;
  }
  return text;
}

export const logger = {
  info: (message: string): void => {
    if (shouldLog("info")) {
      console.log(format("info", message));
    }
  },
  warn: (message: string): void => {
    if (shouldLog("warn")) {
      console.warn(format("warn", message));
    }
  },
  error: (message: string, error?: unknown): void => {
    if (shouldLog("error")) {
      console.error(
        format("error", error === undefined ? message : formatFailure(message, error))
      );
      if (error instanceof Error && currentLevel === "debug") {
        console.error(error.stack);
      }
    }
  },
  debug: (message: string): void => {
    if (shouldLog("debug")) {
      console.debug(format("debug", message));
    }
  },
};
