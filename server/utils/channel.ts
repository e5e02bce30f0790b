/**
 * Bounded FIFO channel for a single consumer.
 * send() waits while the buffer is full, so producers are slowed, never dropped.
 */

export class ChannelClosedError extends Error {
  constructor() {
    super('Channel is closed');
    this.name = 'ChannelClosedError';
  }
}

export class BoundedChannel<T extends object> {
  private buffer: T[] = [];
  private senders: Array<{ item: T; resolve: () => void; reject: (err: Error) => void }> = [];
  private receiver: ((item: T | undefined) => void) | null = null;
  private closed = false;

  constructor(readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Channel capacity must be a positive integer, got ${capacity}`);
    }
  }

  get size(): number {
    return this.buffer.length;
  }

  /** Number of producers currently blocked on a full buffer */
  get waiting(): number {
    return this.senders.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  send(item: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ChannelClosedError());
    }

    if (this.receiver) {
      const receive = this.receiver;
      this.receiver = null;
      receive(item);
      return Promise.resolve();
    }

    if (this.buffer.length < this.capacity) {
      this.buffer.push(item);
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      this.senders.push({ item, resolve, reject });
    });
  }

  /** Resolves with the next item, or undefined once closed and drained */
  receive(): Promise<T | undefined> {
    const item = this.buffer.shift();
    if (item !== undefined) {
      this.admitWaitingSender();
      return Promise.resolve(item);
    }

    if (this.closed) {
      return Promise.resolve(undefined);
    }

    return new Promise<T | undefined>(resolve => {
      this.receiver = resolve;
    });
  }

  /**
   * Stop accepting items. Buffered items are still delivered;
   * producers blocked on a full buffer are rejected.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;

    for (const sender of this.senders.splice(0)) {
      sender.reject(new ChannelClosedError());
    }
    if (this.receiver) {
      const receive = this.receiver;
      this.receiver = null;
      receive(undefined);
    }
  }

  private admitWaitingSender(): void {
    const sender = this.senders.shift();
    if (!sender) return;
    this.buffer.push(sender.item);
    sender.resolve();
  }
}
