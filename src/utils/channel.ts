/**
 * Bounded FIFO channel with async send/receive.
 *
 * `send` waits while the buffer is full, which is how producers feel
 * backpressure. After `close()` nothing new is accepted, but receivers still
 * drain whatever was buffered.
 */

export type ReceiveResult<T> = { done: false; value: T } | { done: true };

interface PendingSender<T> {
  item: T;
  resolve: (accepted: boolean) => void;
}

type PendingReceiver<T> = (result: ReceiveResult<T>) => void;

export class Channel<T> implements AsyncIterable<T> {
  // Boxed so an undefined item is distinguishable from an empty buffer
  private items: Array<{ value: T }> = [];
  private senders: PendingSender<T>[] = [];
  private receivers: PendingReceiver<T>[] = [];
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Resolves true once the item is buffered, false if the channel is closed
   */
  send(item: T): Promise<boolean> {
    if (this.trySend(item)) {
      return Promise.resolve(true);
    }
    if (this.closed) {
      return Promise.resolve(false);
    }
    return new Promise((resolve) => {
      this.senders.push({ item, resolve });
    });
  }

  /**
   * Buffer without waiting. False when full or closed.
   */
  trySend(item: T): boolean {
    if (this.closed) {
      return false;
    }
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ done: false, value: item });
      return true;
    }
    if (this.items.length < this.capacity) {
      this.items.push({ value: item });
      return true;
    }
    return false;
  }

  /**
   * Next item, or `{ done: true }` once closed and drained or when `signal` aborts
   */
  receive(signal?: AbortSignal): Promise<ReceiveResult<T>> {
    const item = this.take();
    if (item) {
      return Promise.resolve(item);
    }
    if (this.closed || signal?.aborted) {
      return Promise.resolve({ done: true });
    }

    return new Promise((resolve) => {
      const onAbort = (): void => {
        const index = this.receivers.indexOf(receiver);
        if (index !== -1) {
          this.receivers.splice(index, 1);
        }
        resolve({ done: true });
      };
      const receiver: PendingReceiver<T> = (result) => {
        signal?.removeEventListener('abort', onAbort);
        resolve(result);
      };
      this.receivers.push(receiver);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Stop accepting items. Blocked senders get false; idle receivers get done.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const sender of this.senders.splice(0)) {
      sender.resolve(false);
    }
    for (const receiver of this.receivers.splice(0)) {
      receiver({ done: true });
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const result = await this.receive();
      if (result.done) {
        return;
      }
      yield result.value;
    }
  }

  private take(): ReceiveResult<T> | null {
    const slot = this.items.shift();
    if (!slot) {
      return null;
    }
    // One slot freed: admit the oldest blocked sender
    const sender = this.senders.shift();
    if (sender) {
      this.items.push({ value: sender.item });
      sender.resolve(true);
    }
    return { done: false, value: slot.value };
  }
}
