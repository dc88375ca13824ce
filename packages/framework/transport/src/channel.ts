// Rendezvous channel
// Zero capacity: a send completes only once a receiver has taken the value

import { ClosedResourceError } from "./errors.js";

interface PendingSend<T> {
  value: T;
  resolve: () => void;
  reject: (error: Error) => void;
}

interface PendingReceive<T> {
  resolve: (value: T) => void;
  reject: (error: Error) => void;
}

export class Channel<T> implements AsyncIterable<T> {
  private readonly senders: PendingSend<T>[] = [];
  private readonly receivers: PendingReceive<T>[] = [];
  private closed = false;

  constructor(readonly name = "channel") {}

  get isClosed(): boolean {
    return this.closed;
  }

  /** Hand `value` to a receiver, waiting for one if none is ready */
  send(value: T): Promise<void> {
    if (this.closed) {
      return Promise.reject(new ClosedResourceError(`${this.name} is closed`));
    }
    const receiver = this.receivers.shift();
    if (receiver) {
      receiver.resolve(value);
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.senders.push({ value, resolve, reject });
    });
  }

  /** Take the next value, waiting for a sender if none is ready */
  receive(): Promise<T> {
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve();
      return Promise.resolve(sender.value);
    }
    if (this.closed) {
      return Promise.reject(new ClosedResourceError(`${this.name} is closed`));
    }
    return new Promise<T>((resolve, reject) => {
      this.receivers.push({ resolve, reject });
    });
  }

  /** Close the channel; every pending send and receive fails */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    const error = new ClosedResourceError(`${this.name} is closed`);
    for (const sender of this.senders.splice(0)) sender.reject(error);
    for (const receiver of this.receivers.splice(0)) receiver.reject(error);
  }

  /** Iterate until the channel closes */
  async *[Symbol.asyncIterator](): AsyncIterator<T> {
    while (true) {
      let value: T;
      try {
        value = await this.receive();
      } catch (e) {
        if (e instanceof ClosedResourceError) return;
        throw e;
      }
      yield value;
    }
  }
}
