import { ConfigurationError } from '../../lib/error.js';

/**
 * Overflow policy of a {@link BackpressureQueue}.
 *
 * - `block`: `put()` waits while the queue is full.
 * - `leaky`: `put()` never waits; the oldest item is evicted to make room.
 */
export type QueuePolicy = 'block' | 'leaky';

/**
 * Options for {@link BackpressureQueue}.
 */
export interface BackpressureQueueOptions<T> {
  /**
   * Overflow policy.
   *
   * @default 'block'
   */
  policy?: QueuePolicy;

  /**
   * Called with every item evicted by the leaky policy.
   */
  onDrop?: (queue: BackpressureQueue<T>, item: T) => void;
}

/**
 * Bounded FIFO decoupling a producer from a consumer.
 *
 * Producers `put()`, consumers `get()` with a timeout. With the `block` policy
 * a full queue makes `put()` wait until a consumer removes an item; with
 * `leaky` the oldest item is dropped instead and counted in {@link dropped}.
 *
 * @example
 * ```typescript
 * const queue = new BackpressureQueue<SampleBuffer>(3, { policy: 'leaky' });
 *
 * // Producer
 * await queue.put(buffer); // Never waits, may evict the oldest
 *
 * // Consumer
 * const next = await queue.get(100); // null after 100ms without an item
 *
 * // Cleanup
 * queue.close();
 * ```
 */
export class BackpressureQueue<T> {
  private queue: T[] = [];
  private sendWaiters: (() => void)[] = [];
  private receiveWaiters: (() => void)[] = [];
  private maxSize: number;
  private closed = false;
  private droppedCount = 0;
  private readonly overflowPolicy: QueuePolicy;
  private readonly onDrop?: (queue: BackpressureQueue<T>, item: T) => void;

  /**
   * @param maxSize - Capacity, a positive integer
   *
   * @param options - Policy and drop callback
   *
   * @throws {ConfigurationError} If the capacity is not a positive integer
   */
  constructor(maxSize: number, options: BackpressureQueueOptions<T> = {}) {
    if (!Number.isSafeInteger(maxSize) || maxSize <= 0) {
      throw new ConfigurationError(`Queue capacity must be a positive integer, got ${maxSize}`);
    }
    this.maxSize = maxSize;
    this.overflowPolicy = options.policy ?? 'block';
    this.onDrop = options.onDrop;
  }

  /**
   * Current number of items in the queue.
   */
  get size(): number {
    return this.queue.length;
  }

  /**
   * Maximum queue size (from constructor).
   */
  get capacity(): number {
    return this.maxSize;
  }

  get policy(): QueuePolicy {
    return this.overflowPolicy;
  }

  /**
   * Items evicted by the leaky policy so far. Never decreases.
   */
  get dropped(): number {
    return this.droppedCount;
  }

  /**
   * Whether the queue is closed.
   */
  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Number of producers waiting to put (backpressure indicator).
   */
  get waitingSenders(): number {
    return this.sendWaiters.length;
  }

  /**
   * Number of consumers waiting to get.
   */
  get waitingReceivers(): number {
    return this.receiveWaiters.length;
  }

  /**
   * Adds an item to the queue.
   *
   * With the `block` policy this waits while the queue is full. With `leaky`
   * it never waits: when full, the oldest item is removed first.
   *
   * @param item - Item to add
   *
   * @returns true if the item was queued, false if the queue was closed
   *
   * @example
   * ```typescript
   * if (!(await queue.put(item))) {
   *   // Consumer went away
   * }
   * ```
   */
  async put(item: T): Promise<boolean> {
    if (this.closed) {
      return false;
    }

    if (this.overflowPolicy === 'leaky') {
      while (this.queue.length >= this.maxSize) {
        const [oldest] = this.queue.splice(0, 1);
        this.droppedCount++;
        this.onDrop?.(this, oldest);
      }
    } else {
      while (this.queue.length >= this.maxSize && !this.closed) {
        await new Promise<void>((resolve) => this.sendWaiters.push(resolve));
      }
      if (this.closed) {
        return false;
      }
    }

    this.queue.push(item);

    // Wake up one receiver if waiting (just signal, don't remove item)
    this.receiveWaiters.shift()?.();
    return true;
  }

  /**
   * Removes the next item without waiting.
   *
   * @returns Next item, or null if the queue is empty
   */
  getNowait(): T | null {
    if (this.queue.length === 0) {
      return null;
    }
    const [item] = this.queue.splice(0, 1);

    // Wake up one sender if waiting
    this.sendWaiters.shift()?.();
    return item;
  }

  /**
   * Removes the next item, waiting up to `timeout` milliseconds for one.
   *
   * A closed queue is drained first; once closed and empty this resolves
   * with null at once.
   *
   * @param timeout - Maximum wait in milliseconds. Omit to wait until an item arrives or the queue closes
   *
   * @returns Next item, or null on timeout or when closed and empty
   *
   * @example
   * ```typescript
   * const item = await queue.get(100);
   * ```
   */
  async get(timeout?: number): Promise<T | null> {
    const deadline = timeout === undefined ? Infinity : Date.now() + Math.max(0, timeout);

    // Loop until we get an item, the queue is closed or time runs out
    while (true) {
      const item = this.getNowait();
      if (item !== null || this.closed) {
        return item;
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return null;
      }

      await this.waitForItem(remaining);
    }
  }

  /**
   * Closes the queue.
   *
   * Waiting producers return false without queueing. Waiting consumers are
   * woken; remaining items can still be taken.
   *
   * @example
   * ```typescript
   * queue.close();
   * ```
   */
  close(): void {
    if (this.closed) {
      return;
    }

    this.closed = true;

    // Wake up all waiting senders
    const senders = this.sendWaiters.splice(0);
    for (const sender of senders) {
      sender();
    }

    // Wake up all waiting receivers (they drain what is left, then get null)
    const receivers = this.receiveWaiters.splice(0);
    for (const receiver of receivers) {
      receiver();
    }
  }

  /**
   * Snapshot of the queued items, oldest first.
   */
  toArray(): T[] {
    return [...this.queue];
  }

  private waitForItem(timeout: number): Promise<void> {
    return new Promise<void>((resolve) => {
      if (!Number.isFinite(timeout)) {
        this.receiveWaiters.push(resolve);
        return;
      }

      const wake = () => {
        clearTimeout(timer);
        resolve();
      };
      const timer = setTimeout(() => {
        const index = this.receiveWaiters.indexOf(wake);
        if (index !== -1) {
          this.receiveWaiters.splice(index, 1);
        }
        resolve();
      }, timeout);
      this.receiveWaiters.push(wake);
    });
  }
}
