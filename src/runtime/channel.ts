/**
 * Bounded in-memory message channel, usable as both ends of a stream
 */

import { CancelledError, RpcError, StatusCode } from './errors';
import { RecvStream, SendStream } from './rpc';

type Received<T> = { done: false; value: T } | { done: true };

interface PendingReceive<T> {
  resolve(result: Received<T>): void;
  reject(error: Error): void;
}

export class Channel<T> implements SendStream<T>, RecvStream<T> {
  private readonly buffer: T[] = [];
  private readonly receivers: Array<PendingReceive<T>> = [];
  private readonly senders: Array<() => void> = [];
  private closed = false;
  private failure: Error | undefined;

  constructor(private readonly capacity = 16) {
    if (capacity < 1) {
      throw new RangeError('Channel capacity must be at least 1');
    }
  }

  get isClosed(): boolean {
    return this.closed || this.failure !== undefined;
  }

  /**
   * Enqueue a message, waiting while the buffer is full. Rejects once the
   * channel is closed or failed.
   */
  async send(message: T): Promise<void> {
    while (this.buffer.length >= this.capacity && !this.isClosed) {
      await new Promise<void>(resolve => this.senders.push(resolve));
    }
    if (this.failure) {
      throw this.failure;
    }
    if (this.closed) {
      throw new RpcError(StatusCode.FAILED_PRECONDITION, 'Cannot send on a closed stream');
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.resolve({ done: false, value: message });
    } else {
      this.buffer.push(message);
    }
  }

  /**
   * Take the next message. Buffered messages are still delivered after
   * `close`; after `fail` the failure is raised once the buffer is empty.
   */
  async receive(): Promise<Received<T>> {
    if (this.buffer.length > 0) {
      const [value] = this.buffer.splice(0, 1);
      this.senders.shift()?.();
      return { done: false, value };
    }
    if (this.failure) {
      throw this.failure;
    }
    if (this.closed) {
      return { done: true };
    }
    return new Promise<Received<T>>((resolve, reject) => this.receivers.push({ resolve, reject }));
  }

  /** Finish the stream normally */
  close(): void {
    if (this.isClosed) {
      return;
    }
    this.closed = true;
    for (const receiver of this.receivers.splice(0)) {
      receiver.resolve({ done: true });
    }
    this.wakeSenders();
  }

  /** Abort the stream; pending and future operations raise `error` */
  fail(error: Error = new CancelledError()): void {
    if (this.isClosed) {
      return;
    }
    this.failure = error;
    for (const receiver of this.receivers.splice(0)) {
      receiver.reject(error);
    }
    this.wakeSenders();
  }

  private wakeSenders(): void {
    for (const wake of this.senders.splice(0)) {
      wake();
    }
  }

  async *[Symbol.asyncIterator](): AsyncGenerator<T, void, undefined> {
    try {
      for (;;) {
        const next = await this.receive();
        if (next.done) {
          return;
        }
        yield next.value;
      }
    } finally {
      // A consumer that stops early cancels the producer
      this.fail(new CancelledError('Stream consumer stopped reading'));
    }
  }
}
