/**
 * Outbound Queue
 *
 * FIFO of serialized messages waiting for the engine socket. Any number of
 * producers may push; a single consumer awaits `take()`, which stays pending
 * while the queue is empty.
 */

/** Tells the consumer to stop. Never equal to a message. */
export const STOP: unique symbol = Symbol("stop");

export type QueueItem = string | typeof STOP;

export class OutboundQueue {
  private items: QueueItem[] = [];
  private waiters: Array<(item: QueueItem) => void> = [];

  push(item: QueueItem): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.items.push(item);
    }
  }

  stop(): void {
    this.push(STOP);
  }

  take(): Promise<QueueItem> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }
}
