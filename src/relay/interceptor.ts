/**
 * Message Interceptor
 *
 * The one place that knows what individual commands mean. Two debugger
 * requests are handled specially while debugpy is being set up:
 *
 * - initialize: answered here straight away, since debugpy is not running
 *   yet. It is still queued so debugpy initializes too, and its own answer is
 *   dropped later.
 * - attach: starts the attach orchestration and is rewritten into the attach
 *   request debugpy understands.
 *
 * Everything else passes through untouched, in both directions.
 */

import {
  ENGINE_CAPABILITIES,
  createResponse,
  inspectMessage,
  type InspectedMessage,
} from "../dap/protocol.js";
import type { DebuggerSink } from "../dap/stdio-channel.js";
import type { Logger } from "../util/logger.js";
import { AttachConfigError, parseSessionConfig, toEngineAttachArguments, type SessionConfig } from "./config.js";
import type { RelaySession } from "./session.js";

export interface MessageInterceptorOptions {
  session: RelaySession;
  debuggerChannel: DebuggerSink;
  logger: Logger;
  /** Start bootstrapping the session; must not block */
  beginAttach: (config: SessionConfig) => void;
}

export class MessageInterceptor {
  private session: RelaySession;
  private debuggerChannel: DebuggerSink;
  private logger: Logger;
  private beginAttach: (config: SessionConfig) => void;

  constructor(options: MessageInterceptorOptions) {
    this.session = options.session;
    this.debuggerChannel = options.debuggerChannel;
    this.logger = options.logger;
    this.beginAttach = options.beginAttach;
  }

  /**
   * A message from the debugger, on its way to debugpy.
   */
  handleDebuggerMessage(text: string): void {
    const message = inspectMessage(text);
    if (!message || message.seq === undefined || message.command === undefined) {
      this.session.engine.enqueue(text);
      return;
    }

    const request = { ...message, seq: message.seq, command: message.command };
    switch (request.command) {
      case "initialize":
        this.answerInitialize(request);
        break;
      case "attach":
        this.handleAttach(request);
        return;
    }

    this.session.engine.enqueue(text);
  }

  /**
   * A message from debugpy, on its way to the debugger.
   */
  handleEngineMessage(text: string): void {
    const message = inspectMessage(text);
    if (!message) {
      this.logger.warn("Dropping unreadable message from debugpy:", text);
      return;
    }

    if (message.command === "configurationDone") {
      // Debugger and debugpy are both configured: time to run the program
      this.submitRunDirective();
    }

    if (message.request_seq !== undefined && this.session.pendingAnswers.has(message.request_seq)) {
      this.logger.debug("Already answered, dropping debugpy response:", text);
      return;
    }

    this.debuggerChannel.send(text);
  }

  private answerInitialize(request: InspectedMessage & { seq: number; command: string }): void {
    const response = createResponse(this.session.nextSeq(), request, true, { body: ENGINE_CAPABILITIES });
    this.debuggerChannel.send(JSON.stringify(response));
    this.session.pendingAnswers.add(request.seq);
  }

  private handleAttach(request: InspectedMessage & { seq: number; command: string }): void {
    let config: SessionConfig;
    try {
      config = parseSessionConfig(request.arguments);
    } catch (error) {
      if (!(error instanceof AttachConfigError)) throw error;
      this.logger.error(error.message);
      this.reject(request, error.message);
      return;
    }

    if (!this.session.bind(config)) {
      this.reject(request, "A Maya debugging session is already attached");
      return;
    }

    this.beginAttach(config);

    const rewritten = { ...request, arguments: toEngineAttachArguments(config) };
    this.logger.debug("New attach arguments loaded:", JSON.stringify(rewritten.arguments));
    this.session.engine.enqueue(JSON.stringify(rewritten));
  }

  private reject(request: { seq: number; command: string }, reason: string): void {
    const response = createResponse(this.session.nextSeq(), request, false, { message: reason });
    this.debuggerChannel.send(JSON.stringify(response));
  }

  private submitRunDirective(): void {
    const code = this.session.takeRunDirective();
    if (code === null) {
      this.logger.warn("configurationDone received with no program to run");
      return;
    }

    this.logger.info("Sending program to Maya");
    this.session.host.submit(code).catch((error: unknown) => {
      this.logger.error("Failed to send program to Maya:", error);
    });
  }
}
