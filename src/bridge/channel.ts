/**
 * Unbounded single-producer/single-consumer queue.
 *
 * The producer pushes with `send` and signals the end with `closeSender`; the
 * consumer polls with `tryRecv` or waits with `recv`. There is no backpressure:
 * the queue grows as long as the producer outpaces the consumer.
 */

export type TryRecvResult<T extends object> =
  | { kind: "empty" }
  | { kind: "disconnected" }
  | { kind: "ready"; value: T };

export type RecvResult<T extends object> =
  | { kind: "timeout" }
  | { kind: "disconnected" }
  | { kind: "ready"; value: T };

export class Channel<T extends object> {
  private readonly queue: T[] = [];
  private senderClosed = false;
  private receiverClosed = false;
  private waiter?: () => void;

  get size(): number {
    return this.queue.length;
  }

  get isSenderClosed(): boolean {
    return this.senderClosed;
  }

  /** Returns false when the value was not queued (receiver gone or sender closed). */
  send(value: T): boolean {
    if (this.receiverClosed || this.senderClosed) return false;
    this.queue.push(value);
    this.wake();
    return true;
  }

  closeSender(): void {
    if (this.senderClosed) return;
    this.senderClosed = true;
    this.wake();
  }

  /** Drops queued values; further sends fail. */
  closeReceiver(): void {
    this.receiverClosed = true;
    this.queue.length = 0;
  }

  tryRecv(): TryRecvResult<T> {
    const value = this.queue.shift();
    if (value !== undefined) return { kind: "ready", value };
    if (this.senderClosed || this.receiverClosed) return { kind: "disconnected" };
    return { kind: "empty" };
  }

  /** Wait up to `timeoutMs` for a value; null waits indefinitely. */
  recv(timeoutMs: number | null): Promise<RecvResult<T>> {
    const immediate = this.tryRecv();
    if (immediate.kind !== "empty") return Promise.resolve(immediate);
    if (this.waiter) {
      return Promise.reject(new Error("Channel already has a waiting receiver"));
    }
    return new Promise((resolve) => {
      const timer =
        timeoutMs === null
          ? undefined
          : setTimeout(() => {
              this.waiter = undefined;
              resolve({ kind: "timeout" });
            }, timeoutMs);
      this.waiter = () => {
        clearTimeout(timer);
        this.waiter = undefined;
        const next = this.tryRecv();
        resolve(next.kind === "empty" ? { kind: "timeout" } : next);
      };
    });
  }

  private wake(): void {
    this.waiter?.();
  }
}
