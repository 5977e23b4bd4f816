/**
 * Maya Command Port Channel
 *
 * Sends Python into a running Maya through its MEL command port. Submissions
 * are fire-and-forget: Maya's replies are read and discarded.
 */

import { rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import * as path from "node:path";
import type { Duplex } from "node:stream";
import type { Logger } from "../util/logger.js";
import { connectTcp, formatAddress, type Connector, type HostAddress } from "../util/net.js";
import { formatExecCommand } from "./templates.js";

export class HostConnectionError extends Error {
  readonly address: HostAddress;

  constructor(address: HostAddress, cause: unknown) {
    const reason = cause instanceof Error ? cause.message : String(cause);
    super(`Could not connect to Maya at ${formatAddress(address)}: ${reason}`, { cause });
    this.name = "HostConnectionError";
    this.address = address;
  }
}

export interface HostCommandChannelOptions {
  logger: Logger;
  connector?: Connector;
  /** Where snippet files are written, defaults to the OS temp directory */
  tempDir?: string;
}

export class HostCommandChannel {
  private socket: Duplex | null = null;
  private logger: Logger;
  private connector: Connector;
  private tempDir: string;
  /** Tail of the submission chain; each submission starts after the previous one */
  private tail: Promise<void> = Promise.resolve();
  private submissions: number = 0;
  /** Snippet files written so far; removed on close */
  private snippetFiles: string[] = [];

  constructor(options: HostCommandChannelOptions) {
    this.logger = options.logger;
    this.connector = options.connector ?? connectTcp;
    this.tempDir = options.tempDir ?? tmpdir();
  }

  async connect(address: HostAddress, timeoutMs: number): Promise<void> {
    if (this.socket) {
      throw new Error("Already connected to Maya");
    }

    let socket: Duplex;
    try {
      socket = await this.connector(address, { timeoutMs });
    } catch (error) {
      throw new HostConnectionError(address, error);
    }

    socket.on("error", (error) => {
      this.logger.error("Maya command port error:", error);
    });
    // Command results come back on the port; nobody reads them
    socket.resume();

    this.socket = socket;
    this.logger.info(`Connected to Maya command port at ${formatAddress(address)}`);
  }

  /**
   * Have Maya execute `code`. Resolves once the command has been written; a
   * failed submission rejects its own promise without blocking later ones.
   */
  submit(code: string): Promise<void> {
    const submission = this.tail.then(() => this.deliver(code));
    this.tail = submission.catch(() => undefined);
    return submission;
  }

  /**
   * Disconnect and delete the snippet files. Submissions still in flight
   * are waited for first.
   */
  async close(): Promise<void> {
    await this.tail;
    this.socket?.destroy();
    this.socket = null;

    const files = this.snippetFiles;
    this.snippetFiles = [];
    await Promise.all(files.map((file) => rm(file, { force: true })));
  }

  private async deliver(code: string): Promise<void> {
    const socket = this.socket;
    if (!socket || socket.destroyed) {
      throw new Error("Not connected to Maya");
    }

    this.submissions++;
    const filePath = path.join(this.tempDir, `maya-debug-relay-${process.pid}-${this.submissions}.py`);
    this.snippetFiles.push(filePath);
    await writeFile(filePath, code, "utf-8");

    const command = formatExecCommand(filePath);
    this.logger.debug(`Sending ${command} to Maya`);

    await new Promise<void>((resolve, reject) => {
      socket.write(command, "utf-8", (error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }
}
