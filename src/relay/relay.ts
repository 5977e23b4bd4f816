/**
 * Relay
 *
 * Wires the debugger channel, the interceptor, the attach orchestrator and
 * the session together, and decides when the process ends:
 * - the debugger closes its channel: shut down, exit 0
 * - the debugger's stream cannot be decoded: shut down, exit 1
 * - Maya's command port cannot be reached: tell the debugger how to open it,
 *   exit 1
 */

import { createOutputEvent } from "../dap/protocol.js";
import type { DebuggerChannel } from "../dap/stdio-channel.js";
import { EngineSession } from "../engine/engine-session.js";
import { HostCommandChannel } from "../host/command-channel.js";
import type { Logger } from "../util/logger.js";
import type { Connector } from "../util/net.js";
import type { SessionConfig } from "./config.js";
import { MessageInterceptor } from "./interceptor.js";
import { AttachOrchestrator, type AttachOutcome } from "./orchestrator.js";
import { RelaySession } from "./session.js";

export interface RelayOptions {
  channel: DebuggerChannel;
  logger: Logger;
  /** Ends the process; the CLI passes process.exit */
  terminate: (exitCode: number) => void;
  hostTimeoutMs?: number;
  engineConnectWindowMs?: number;
  debugpyPath?: string;
  /** Connector for Maya's command port */
  hostConnector?: Connector;
  /** Connector for debugpy */
  engineConnector?: Connector;
  tempDir?: string;
}

export class Relay {
  readonly session: RelaySession;
  private channel: DebuggerChannel;
  private logger: Logger;
  private terminate: (exitCode: number) => void;
  private interceptor: MessageInterceptor;
  private orchestrator: AttachOrchestrator;
  private finished: boolean = false;

  constructor(options: RelayOptions) {
    this.channel = options.channel;
    this.logger = options.logger;
    this.terminate = options.terminate;

    const engine = new EngineSession({
      logger: options.logger,
      connector: options.engineConnector,
      connectWindowMs: options.engineConnectWindowMs,
    });
    const host = new HostCommandChannel({
      logger: options.logger,
      connector: options.hostConnector,
      tempDir: options.tempDir,
    });
    this.session = new RelaySession(engine, host);

    this.interceptor = new MessageInterceptor({
      session: this.session,
      debuggerChannel: this.channel,
      logger: options.logger,
      beginAttach: (config) => this.beginAttach(config),
    });

    this.orchestrator = new AttachOrchestrator(this.session, {
      logger: options.logger,
      hostTimeoutMs: options.hostTimeoutMs,
      debugpyPath: options.debugpyPath,
      onEngineMessage: (text) => this.interceptor.handleEngineMessage(text),
    });
  }

  /**
   * Relay until the debugger goes away. A debugger stream that can no longer
   * be decoded ends the relay with exit code 1.
   */
  async run(): Promise<void> {
    try {
      await this.channel.listen((text) => this.interceptor.handleDebuggerMessage(text));
    } catch (error) {
      this.logger.error("Failure reading from the debugger:", error);
      await this.finish(1);
      return;
    }
    this.logger.info("Debugger channel closed");
    await this.finish(0);
  }

  private beginAttach(config: SessionConfig): void {
    void this.orchestrator
      .run(config)
      .then((outcome) => this.handleOutcome(outcome))
      .catch((error: unknown) => {
        this.logger.error("Attach orchestration crashed:", error);
      });
  }

  private async handleOutcome(outcome: AttachOutcome): Promise<void> {
    switch (outcome.kind) {
      case "attached":
        return;
      case "failed":
        // Already logged; the debugger connection stays up but the session is inert
        return;
      case "fatal": {
        this.logger.error(outcome.error.message);
        this.logger.error(outcome.remediation);
        const event = createOutputEvent(this.session.nextSeq(), {
          category: "stderr",
          output: `${outcome.remediation}\n`,
        });
        this.channel.send(JSON.stringify(event));
        await this.finish(1);
        return;
      }
    }
  }

  private async finish(exitCode: number): Promise<void> {
    if (this.finished) return;
    this.finished = true;

    this.session.engine.close();
    await this.session.host.close();
    await this.channel.close();
    this.terminate(exitCode);
  }
}
