/**
 * Debugger Channel
 *
 * The editor starts the relay as its debug adapter and talks DAP to it over
 * stdin/stdout. Message text is passed through exactly as framed.
 */

import type { Readable, Writable } from "node:stream";
import { encodeFrame, readFrames } from "./framing.js";
import type { Logger } from "../util/logger.js";

export interface DebuggerSink {
  send(text: string): void;
}

export class DebuggerChannel implements DebuggerSink {
  private input: Readable;
  private output: Writable;
  private logger: Logger;
  private closed: boolean = false;

  constructor(input: Readable, output: Writable, logger: Logger) {
    this.input = input;
    this.output = output;
    this.logger = logger;
  }

  /**
   * Read messages until the debugger closes its end. A handler that throws is
   * logged; reading carries on with the next message.
   */
  async listen(onMessage: (text: string) => void): Promise<void> {
    for await (const body of readFrames(this.input)) {
      this.logger.debug("Received from debugger:", body);
      try {
        onMessage(body);
      } catch (error) {
        this.logger.error("Failed to handle debugger message:", error);
      }
    }
  }

  send(text: string): void {
    if (this.closed || !this.output.writable) {
      return;
    }
    this.logger.debug("Sending to debugger:", text);
    this.output.write(encodeFrame(text));
  }

  /**
   * Stop accepting messages and wait until what was written has been flushed.
   * stdout cannot be ended, so this only drains it.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    if (!this.output.writable) return;
    await new Promise<void>((resolve) => {
      this.output.write("", () => resolve());
    });
  }
}
