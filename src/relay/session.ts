/**
 * Relay Session
 *
 * Everything one debugging session shares between the debugger handler, the
 * attach orchestrator and the engine loops. There is one per process, and it
 * binds to a single attach configuration.
 */

import type { EngineSession } from "../engine/engine-session.js";
import type { HostCommandChannel } from "../host/command-channel.js";
import type { SessionConfig } from "./config.js";

export class RelaySession {
  readonly engine: EngineSession;
  readonly host: HostCommandChannel;
  /** Request seqs the relay answered itself; the engine's answers to them are dropped */
  readonly pendingAnswers = new Set<number>();

  private _config: SessionConfig | null = null;
  private runDirective: string | null = null;
  private seq: number = 1;

  constructor(engine: EngineSession, host: HostCommandChannel) {
    this.engine = engine;
    this.host = host;
  }

  get config(): SessionConfig | null {
    return this._config;
  }

  /**
   * Attach the session to its configuration. Returns false if it already has
   * one; a session never switches targets.
   */
  bind(config: SessionConfig): boolean {
    if (this._config) return false;
    this._config = config;
    return true;
  }

  storeRunDirective(code: string): void {
    this.runDirective = code;
  }

  /** Hand out the run directive; later calls get null */
  takeRunDirective(): string | null {
    const code = this.runDirective;
    this.runDirective = null;
    return code;
  }

  /** Sequence numbers for messages the relay writes to the debugger */
  nextSeq(): number {
    return this.seq++;
  }
}
