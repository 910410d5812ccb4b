/**
 * FIFO event channel backing a ProgressStream.
 *
 * The producer (a transport) pushes events in arrival order; the consumer (an
 * execution session) awaits them one at a time. A waiting consumer is resumed
 * directly by the next push, so there is no polling anywhere.
 */

import { ProgressEvent, ProgressStream } from './types';

type Waiter = {
  resolve: (result: IteratorResult<ProgressEvent>) => void;
  reject: (err: Error) => void;
};

export class EventChannel implements ProgressStream {
  private readonly buffer: ProgressEvent[] = [];
  private readonly waiters: Waiter[] = [];
  private ended = false;
  private failure: Error | undefined;
  private consumerClosed = false;

  constructor(private readonly onClose?: () => void) {}

  get closed(): boolean {
    return this.consumerClosed || (this.ended && this.buffer.length === 0);
  }

  /** Deliver an event. Ignored once the channel has ended. */
  push(event: ProgressEvent): void {
    if (this.ended || this.consumerClosed) return;
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: event, done: false });
    } else {
      this.buffer.push(event);
    }
  }

  /** No more events. Buffered events are still delivered. */
  end(): void {
    if (this.ended) return;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.resolve({ value: undefined, done: true });
    }
  }

  /** End with an error, raised to the consumer after buffered events drain. */
  fail(err: Error): void {
    if (this.ended) return;
    this.failure = err;
    this.ended = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(err);
    }
  }

  close(): void {
    if (this.consumerClosed) return;
    this.consumerClosed = true;
    this.buffer.length = 0;
    this.end();
    this.onClose?.();
  }

  next(): Promise<IteratorResult<ProgressEvent>> {
    const event = this.buffer.shift();
    if (event) return Promise.resolve({ value: event, done: false });
    if (this.failure && !this.consumerClosed) return Promise.reject(this.failure);
    if (this.ended) return Promise.resolve({ value: undefined, done: true });
    return new Promise((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  [Symbol.asyncIterator](): AsyncIterator<ProgressEvent> {
    return {
      next: () => this.next(),
      return: async () => {
        this.close();
        return { value: undefined, done: true };
      },
    };
  }
}
