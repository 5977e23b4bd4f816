/**
 * Debug Engine Session
 *
 * Owns the socket to the debugpy instance injected into Maya:
 * - Receive loop: decodes frames and hands each body to the interceptor
 * - Send loop: drains the outbound queue in order, one write at a time
 *
 * The two loops fail independently. A dead receive loop closes the socket,
 * after which the send loop ends on its next write.
 */

import type { Duplex } from "node:stream";
import { encodeFrame, readFrames } from "../dap/framing.js";
import type { Logger } from "../util/logger.js";
import { connectTcp, formatAddress, type Connector, type HostAddress } from "../util/net.js";
import { OutboundQueue, STOP } from "./outbound-queue.js";

export type EngineSessionState = "disconnected" | "connected" | "relaying" | "closed";

export interface EngineSessionOptions {
  logger: Logger;
  connector?: Connector;
  /** How long to keep retrying while debugpy starts listening */
  connectWindowMs?: number;
}

export class EngineSession {
  private socket: Duplex | null = null;
  private queue = new OutboundQueue();
  private _state: EngineSessionState = "disconnected";
  private loops: Promise<void>[] = [];
  private logger: Logger;
  private connector: Connector;
  private connectWindowMs: number;

  constructor(options: EngineSessionOptions) {
    this.logger = options.logger;
    this.connector = options.connector ?? connectTcp;
    this.connectWindowMs = options.connectWindowMs ?? 0;
  }

  get state(): EngineSessionState {
    return this._state;
  }

  async connect(address: HostAddress): Promise<void> {
    if (this._state !== "disconnected") {
      throw new Error(`Cannot connect to the debug engine while ${this._state}`);
    }

    this.logger.info(`Connecting to debugpy at ${formatAddress(address)}`);
    const socket = await this.connector(address, { retryWindowMs: this.connectWindowMs });
    if (this._state !== "disconnected") {
      // Closed while the connection was being made
      socket.destroy();
      throw new Error("Debug engine session closed during connect");
    }

    socket.on("error", (error) => {
      this.logger.debug("debugpy socket error:", error);
    });
    this.socket = socket;
    this._state = "connected";
    this.logger.info("Connected to debugpy");
  }

  /**
   * Start both loops. Messages queued before this point go out first, in
   * the order they were queued.
   */
  startRelaying(onMessage: (text: string) => void): void {
    if (this._state !== "connected" || !this.socket) {
      throw new Error(`Cannot start relaying while ${this._state}`);
    }

    this._state = "relaying";
    this.loops = [this.receiveLoop(this.socket, onMessage), this.sendLoop(this.socket)];
  }

  /**
   * Queue a serialized message for the engine. Safe in every state.
   */
  enqueue(message: string): void {
    this.queue.push(message);
  }

  /** Ask the send loop to finish after the messages already queued */
  stop(): void {
    this.queue.stop();
  }

  close(): void {
    this.stop();
    this.socket?.destroy();
    this._state = "closed";
  }

  /** Resolves once both loops have ended */
  async settled(): Promise<void> {
    await Promise.all(this.loops);
  }

  private async receiveLoop(socket: Duplex, onMessage: (text: string) => void): Promise<void> {
    try {
      for await (const body of readFrames(socket)) {
        this.logger.debug("Received from debugpy:", body);
        try {
          onMessage(body);
        } catch (error) {
          this.logger.error("Failed to handle debugpy message:", error);
        }
      }
      this.logger.info("debugpy closed the connection");
    } catch (error) {
      this.logger.error("Failure reading debugpy output:", error);
    }

    socket.destroy();
    this._state = "closed";
    this.queue.stop();
  }

  private async sendLoop(socket: Duplex): Promise<void> {
    while (true) {
      const message = await this.queue.take();
      if (message === STOP) {
        return;
      }

      try {
        await writeFrame(socket, message);
        this.logger.debug("Sent to debugpy:", message);
      } catch (error) {
        this.logger.error("Debug socket closed, dropping outbound traffic:", error);
        return;
      }
    }
  }
}

function writeFrame(socket: Duplex, message: string): Promise<void> {
  if (!socket.writable) {
    return Promise.reject(new Error("Socket is not writable"));
  }
  return new Promise((resolve, reject) => {
    socket.write(encodeFrame(message), (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}
