import { Socket } from "node:net";
import type { Duplex } from "node:stream";

export interface HostAddress {
  host: string;
  port: number;
}

export interface ConnectOptions {
  /** Give up on a single attempt after this long */
  timeoutMs?: number;
  /** Keep retrying refused attempts until this much time has passed */
  retryWindowMs?: number;
}

/**
 * Opens a byte stream to an address. Tests swap in an in-memory duplex.
 */
export type Connector = (address: HostAddress, options?: ConnectOptions) => Promise<Duplex>;

const RETRY_DELAY_MS = 100;

export function formatAddress(address: HostAddress): string {
  return `${address.host}:${address.port}`;
}

/** Connect over TCP, retrying inside the retry window if one is given. */
export const connectTcp: Connector = async (address, options = {}) => {
  const deadline = Date.now() + (options.retryWindowMs ?? 0);
  let lastError: Error | null = null;

  do {
    try {
      return await tryConnect(address, options.timeoutMs);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      if (Date.now() + RETRY_DELAY_MS >= deadline) break;
      await sleep(RETRY_DELAY_MS);
    }
  } while (Date.now() < deadline);

  throw lastError ?? new Error(`Could not connect to ${formatAddress(address)}`);
};

function tryConnect(address: HostAddress, timeoutMs?: number): Promise<Socket> {
  return new Promise((resolve, reject) => {
    const socket = new Socket();
    const timer =
      timeoutMs === undefined
        ? null
        : setTimeout(() => {
            socket.destroy();
            reject(new Error(`Connection to ${formatAddress(address)} timed out after ${timeoutMs}ms`));
          }, timeoutMs);

    socket.once("connect", () => {
      if (timer) clearTimeout(timer);
      socket.removeListener("error", onError);
      resolve(socket);
    });

    const onError = (error: Error) => {
      if (timer) clearTimeout(timer);
      socket.destroy();
      reject(error);
    };
    socket.once("error", onError);

    socket.connect(address.port, address.host);
  });
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
