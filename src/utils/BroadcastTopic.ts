/**
 * @fileoverview Bounded fan-out topic with per-receiver queues.
 *
 * publish() never waits on a receiver: each receiver has its own queue of fixed
 * capacity and a full queue drops its oldest entry. The return value of publish() is
 * the number of receivers reached, which is how a producer learns that nobody is
 * listening anymore.
 */

import { AppError, timeoutError } from './error.utils';

export const DEFAULT_TOPIC_CAPACITY = 32;

interface ReceiveWaiter<T> {
  resolve: (value: T | null) => void;
  reject: (error: Error) => void;
  timer: NodeJS.Timeout | null;
}

/**
 * One subscriber's view of a topic
 */
export class TopicReceiver<T> implements AsyncIterable<T> {
  private readonly queue: T[] = [];
  private readonly waiters: Array<ReceiveWaiter<T>> = [];
  private closed = false;
  private failure: Error | null = null;
  private dropped = 0;

  constructor(
    private readonly capacity: number,
    private readonly onDetach: (receiver: TopicReceiver<T>) => void
  ) {}

  /** Entries discarded because this receiver fell behind */
  get droppedCount(): number {
    return this.dropped;
  }

  /**
   * Wait for the next entry. Resolves null once the receiver is closed and drained;
   * rejects with the failure passed to the topic's failReceivers(), or with a TIMEOUT
   * AppError when `timeoutMs` elapses first.
   */
  async recv(timeoutMs?: number): Promise<T | null> {
    const queued = this.queue.shift();
    if (queued !== undefined) {
      return queued;
    }
    if (this.failure) {
      throw this.failure;
    }
    if (this.closed) {
      return null;
    }

    return await new Promise<T | null>((resolve, reject) => {
      const waiter: ReceiveWaiter<T> = { resolve, reject, timer: null };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          this.removeWaiter(waiter);
          reject(timeoutError('topic receive', timeoutMs));
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }

  /**
   * Detach from the topic. Pending waits resolve null; queued entries stay readable.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.onDetach(this);
    for (const waiter of this.drainWaiters()) {
      waiter.resolve(null);
    }
  }

  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    try {
      while (true) {
        const value = await this.recv();
        if (value === null) return;
        yield value;
      }
    } finally {
      this.close();
    }
  }

  /** @internal called by the topic */
  deliver(value: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timer) clearTimeout(waiter.timer);
      waiter.resolve(value);
      return;
    }

    this.queue.push(value);
    if (this.queue.length > this.capacity) {
      this.queue.shift();
      this.dropped++;
    }
  }

  /** @internal called by the topic */
  fail(error: Error): void {
    if (this.closed) return;
    this.failure = error;
    this.closed = true;
    this.queue.length = 0;
    for (const waiter of this.drainWaiters()) {
      waiter.reject(error);
    }
  }

  private drainWaiters(): Array<ReceiveWaiter<T>> {
    const waiters = this.waiters.splice(0, this.waiters.length);
    for (const waiter of waiters) {
      if (waiter.timer) clearTimeout(waiter.timer);
    }
    return waiters;
  }

  private removeWaiter(waiter: ReceiveWaiter<T>): void {
    const index = this.waiters.indexOf(waiter);
    if (index !== -1) {
      this.waiters.splice(index, 1);
    }
  }
}

export class BroadcastTopic<T> {
  private readonly receivers = new Set<TopicReceiver<T>>();

  constructor(private readonly capacity: number = DEFAULT_TOPIC_CAPACITY) {
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new AppError('topic capacity must be a positive integer');
    }
  }

  get receiverCount(): number {
    return this.receivers.size;
  }

  subscribe(): TopicReceiver<T> {
    const receiver = new TopicReceiver<T>(this.capacity, (detached) => {
      this.receivers.delete(detached);
    });
    this.receivers.add(receiver);
    return receiver;
  }

  /**
   * Deliver to every attached receiver
   *
   * @returns receivers reached; 0 means there are none
   */
  publish(value: T): number {
    for (const receiver of this.receivers) {
      receiver.deliver(value);
    }
    return this.receivers.size;
  }

  /**
   * Fail and detach every receiver attached right now. The topic stays usable for
   * later subscribers.
   *
   * @returns receivers failed
   */
  failReceivers(error: Error): number {
    const failed = [...this.receivers];
    this.receivers.clear();
    for (const receiver of failed) {
      receiver.fail(error);
    }
    return failed.length;
  }

  /**
   * Close every attached receiver
   */
  close(): void {
    for (const receiver of [...this.receivers]) {
      receiver.close();
    }
  }
}
