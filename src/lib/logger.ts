import type { LogLevel } from "./config/env";

interface LogContext {
  bank?: string;
  file?: string;
  [key: string]: unknown;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[threshold];
}

function formatLog(level: LogLevel, message: string, context?: LogContext): string {
  const timestamp = new Date().toISOString();
  const contextStr = context ? ` ${JSON.stringify(context)}` : "";
  return `[${timestamp}] [${level.toUpperCase()}] ${message}${contextStr}`;
}

export const logger = {
  debug(message: string, context?: LogContext): void {
    if (enabled("debug")) console.debug(formatLog("debug", message, context));
  },
  info(message: string, context?: LogContext): void {
    if (enabled("info")) console.info(formatLog("info", message, context));
  },
  warn(message: string, context?: LogContext): void {
    if (enabled("warn")) console.warn(formatLog("warn", message, context));
  },
  error(message: string, context?: LogContext): void {
    if (enabled("error")) console.error(formatLog("error", message, context));
  },
};

export type { LogContext };
