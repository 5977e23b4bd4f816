/**
 * Relay Logger
 *
 * stdout belongs to the debugger protocol, so every log line goes to stderr
 * (which editors show as adapter output) and optionally to a log file.
 */

import { createWriteStream, type WriteStream } from "node:fs";
import { format } from "node:util";

export type LogLevel = "error" | "warn" | "info" | "debug";

export interface Logger {
  error(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  debug(message: string, ...details: unknown[]): void;
}

export interface LoggerOptions {
  /** Include debug lines (message traffic) */
  verbose?: boolean;
  /** Append every line to this file as well */
  file?: string;
  /** Line prefix, defaults to the program name */
  prefix?: string;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const verbose = options.verbose || Boolean(process.env.DEBUG_RELAY);
  const threshold = verbose ? LEVEL_ORDER.debug : LEVEL_ORDER.info;
  const prefix = options.prefix ?? "maya-debug-relay";

  let fileStream: WriteStream | null = null;
  if (options.file) {
    fileStream = createWriteStream(options.file, { flags: "a" });
    fileStream.on("error", (error) => {
      console.error(`[${prefix}] Log file unavailable: ${error.message}`);
      fileStream = null;
    });
  }

  const write = (level: LogLevel, message: string, details: unknown[]): void => {
    if (LEVEL_ORDER[level] > threshold) return;

    const line = `[${prefix}] ${level.toUpperCase()} ${format(message, ...details)}`;
    console.error(line);
    fileStream?.write(`${new Date().toISOString()} ${line}\n`);
  };

  return {
    error: (message, ...details) => write("error", message, details),
    warn: (message, ...details) => write("warn", message, details),
    info: (message, ...details) => write("info", message, details),
    debug: (message, ...details) => write("debug", message, details),
  };
}

export const silentLogger: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
};
