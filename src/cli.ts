/**
 * CLI Interface
 *
 * Argument parsing using Commander. The editor launches the relay as its
 * debug adapter, so every option has a default and stdout is left to DAP.
 */

import { Command } from "commander";
import { DebuggerChannel } from "./dap/stdio-channel.js";
import { Relay } from "./relay/relay.js";
import { createLogger } from "./util/logger.js";

export interface CliOptions {
  hostTimeout: string;
  engineTimeout: string;
  debugpyPath?: string;
  logFile?: string;
  verbose: boolean;
}

const DURATION_UNITS_MS: Record<string, number> = { ms: 1, s: 1000, m: 60_000 };

/**
 * Parse a duration option ("500ms", "3s", "1m"; a bare number is
 * milliseconds) into milliseconds.
 */
export function parseTimeout(value: string): number {
  const match = /^(\d+)(ms|s|m)?$/.exec(value);
  if (!match) {
    throw new Error(`Invalid duration: ${value}. Use a whole number of ms, s or m, like "500ms" or "3s"`);
  }
  return Number(match[1]) * DURATION_UNITS_MS[match[2] ?? "ms"];
}

export function createCli(): Command {
  const program = new Command();

  program
    .name("maya-debug-relay")
    .description("Debug adapter that injects debugpy into a running Maya and relays DAP traffic to it")
    .version("0.1.0")
    .option("--host-timeout <duration>", "Timeout for connecting to Maya's command port (e.g., 3s, 500ms)", "3s")
    .option("--engine-timeout <duration>", "How long to keep retrying the connection to debugpy", "10s")
    .option("--debugpy-path <dir>", "Directory containing debugpy, added to Maya's sys.path")
    .option("--log-file <path>", "Append log output to this file")
    .option("-v, --verbose", "Log every relayed message", false)
    .action(async (options: CliOptions) => {
      await runRelay(options);
    });

  return program;
}

async function runRelay(options: CliOptions): Promise<void> {
  let hostTimeoutMs: number;
  let engineConnectWindowMs: number;
  try {
    hostTimeoutMs = parseTimeout(options.hostTimeout);
    engineConnectWindowMs = parseTimeout(options.engineTimeout);
  } catch (error) {
    console.error(`Error: ${error instanceof Error ? error.message : error}`);
    process.exit(1);
  }

  const logger = createLogger({ verbose: options.verbose, file: options.logFile });

  process.on("uncaughtException", (error) => {
    logger.error("Uncaught exception:", error);
  });
  process.on("unhandledRejection", (reason) => {
    logger.error("Unhandled rejection:", reason);
  });

  const channel = new DebuggerChannel(process.stdin, process.stdout, logger);
  const relay = new Relay({
    channel,
    logger,
    terminate: (exitCode) => process.exit(exitCode),
    hostTimeoutMs,
    engineConnectWindowMs,
    debugpyPath: options.debugpyPath,
  });

  logger.info("Relay started, waiting for the debugger");
  await relay.run();
}
