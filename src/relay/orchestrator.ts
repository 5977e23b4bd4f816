/**
 * Attach Orchestrator
 *
 * Bootstraps a session: connect to Maya, inject debugpy, connect to debugpy,
 * start relaying. Runs alongside the debugger reader and reports how it went
 * as a value; it never throws.
 */

import { formatInjectionCode, formatRemediation, formatRunDirective } from "../host/templates.js";
import type { Logger } from "../util/logger.js";
import type { SessionConfig } from "./config.js";
import type { RelaySession } from "./session.js";

export type AttachOutcome =
  | { kind: "attached" }
  /** Maya could not be reached; nothing else can work */
  | { kind: "fatal"; remediation: string; error: Error }
  /** Maya was reached but the engine side did not come up */
  | { kind: "failed"; error: Error };

export interface AttachOrchestratorOptions {
  logger: Logger;
  /** Bound on connecting to Maya's command port (default 3s) */
  hostTimeoutMs?: number;
  /** Directory holding debugpy, added to Maya's sys.path */
  debugpyPath?: string;
  /** Receives every message debugpy sends once relaying */
  onEngineMessage: (text: string) => void;
}

const DEFAULT_HOST_TIMEOUT_MS = 3000;

export class AttachOrchestrator {
  private session: RelaySession;
  private options: AttachOrchestratorOptions;
  private hostTimeoutMs: number;

  constructor(session: RelaySession, options: AttachOrchestratorOptions) {
    this.session = session;
    this.options = options;
    this.hostTimeoutMs = options.hostTimeoutMs ?? DEFAULT_HOST_TIMEOUT_MS;
  }

  async run(config: SessionConfig): Promise<AttachOutcome> {
    const { logger } = this.options;
    const { engine, host } = this.session;

    const injection = formatInjectionCode(config.engineAddress, this.options.debugpyPath);
    const runDirective = formatRunDirective(config.program);
    this.session.storeRunDirective(runDirective);
    logger.debug("Run directive:\n" + runDirective);

    try {
      await host.connect(config.hostAddress, this.hostTimeoutMs);
    } catch (error) {
      return {
        kind: "fatal",
        remediation: formatRemediation(config.hostAddress),
        error: toError(error),
      };
    }

    try {
      logger.info("Sending attach code to Maya");
      await host.submit(injection);

      await engine.connect(config.engineAddress);
      engine.startRelaying(this.options.onEngineMessage);
      logger.info("Successfully attached to Maya");
      return { kind: "attached" };
    } catch (error) {
      logger.error("Attaching to Maya failed:", error);
      return { kind: "failed", error: toError(error) };
    }
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
