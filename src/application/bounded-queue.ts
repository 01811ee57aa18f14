interface BlockedPusher<T> {
  readonly item: T;
  readonly settle: (accepted: boolean) => void;
}

type Receiver<T> = (item: T | undefined) => void;

/**
 * Bounded FIFO shared between producers and a consumer.
 *
 * Offers both a non-blocking `tryPush` (reports fullness instead of
 * waiting) and a blocking `push` that resolves once the item is
 * accepted. A capacity of 0 makes the queue a rendezvous point: an item
 * is only accepted when a receiver is already waiting for it.
 *
 * Node.js runs each method to completion, so no further locking is
 * needed between concurrent producers and the consumer.
 */
export class BoundedQueue<T> implements AsyncIterable<T> {
  private readonly items: T[] = [];
  private readonly pushers: BlockedPusher<T>[] = [];
  private readonly receivers: Receiver<T>[] = [];
  private isClosed = false;

  constructor(public readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 0) {
      throw new RangeError(`Queue capacity must be a non-negative integer, got ${capacity}`);
    }
  }

  /** Buffered items, excluding blocked pushers. */
  get size(): number {
    return this.items.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  /** Accepts the item without waiting. Returns false when full or closed. */
  tryPush(item: T): boolean {
    if (this.isClosed) return false;

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver(item);
      return true;
    }

    if (this.items.length < this.capacity) {
      this.items.push(item);
      return true;
    }

    return false;
  }

  /**
   * Waits until the item is accepted.
   * Resolves false if the queue is closed first.
   */
  push(item: T): Promise<boolean> {
    if (this.tryPush(item)) return Promise.resolve(true);
    if (this.isClosed) return Promise.resolve(false);

    return new Promise<boolean>((settle) => {
      this.pushers.push({ item, settle });
    });
  }

  tryReceive(): T | undefined {
    if (this.items.length > 0) {
      const item = this.items.shift();
      this.admitPusher();
      return item;
    }

    // Rendezvous: take straight from a blocked pusher
    const pusher = this.pushers.shift();
    if (pusher) {
      pusher.settle(true);
      return pusher.item;
    }

    return undefined;
  }

  /**
   * Waits for the next item.
   * Resolves undefined once the queue is closed and empty.
   */
  receive(): Promise<T | undefined> {
    if (this.items.length > 0 || this.pushers.length > 0) {
      return Promise.resolve(this.tryReceive());
    }
    if (this.isClosed) return Promise.resolve(undefined);

    return new Promise<T | undefined>((resolve) => {
      this.receivers.push(resolve);
    });
  }

  /**
   * Takes a snapshot of everything currently queued: buffered items
   * first, then the items of pushers blocked at this moment. Items pushed
   * after the call are left for the next drain.
   */
  drain(): T[] {
    const out = this.items.splice(0);
    const blocked = this.pushers.splice(0);
    for (const pusher of blocked) {
      out.push(pusher.item);
      pusher.settle(true);
    }
    return out;
  }

  /** Wakes every waiter. Buffered items stay readable. */
  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    for (const receiver of this.receivers.splice(0)) {
      receiver(undefined);
    }
    for (const pusher of this.pushers.splice(0)) {
      pusher.settle(false);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    for (;;) {
      const item = await this.receive();
      if (item === undefined && this.isClosed) return;
      if (item !== undefined) yield item;
    }
  }

  /** Moves one blocked pusher into the buffer after a slot frees up. */
  private admitPusher(): void {
    if (this.items.length >= this.capacity) return;
    const pusher = this.pushers.shift();
    if (!pusher) return;
    this.items.push(pusher.item);
    pusher.settle(true);
  }
}
