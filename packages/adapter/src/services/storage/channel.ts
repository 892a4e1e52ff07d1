interface PendingSend<T> {
  value: T;
  resolve: (delivered: boolean) => void;
}

type Receiver<T> = (result: IteratorResult<T, undefined>) => void;

/**
 * Unbuffered (rendezvous) channel. `send` settles once a receiver has taken
 * the value, so a producer can never run ahead of its consumer. Closing the
 * channel ends iteration for every receiver and drops values still waiting to
 * be delivered; their `send` calls resolve to `false`.
 */
export class Channel<T> implements AsyncIterable<T> {
  private readonly senders: PendingSend<T>[] = [];

  private readonly receivers: Receiver<T>[] = [];

  private closed = false;

  get isClosed(): boolean {
    return this.closed;
  }

  send(value: T): Promise<boolean> {
    if (this.closed) {
      return Promise.resolve(false);
    }

    const receiver = this.receivers.shift();
    if (receiver) {
      receiver({ value, done: false });
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      this.senders.push({ value, resolve });
    });
  }

  receive(): Promise<IteratorResult<T, undefined>> {
    const sender = this.senders.shift();
    if (sender) {
      sender.resolve(true);
      return Promise.resolve({ value: sender.value, done: false });
    }

    if (this.closed) {
      return Promise.resolve({ value: undefined, done: true });
    }

    return new Promise((resolve) => {
      this.receivers.push(resolve);
    });
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;

    for (const sender of this.senders.splice(0)) {
      sender.resolve(false);
    }
    for (const receiver of this.receivers.splice(0)) {
      receiver({ value: undefined, done: true });
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T, undefined> {
    return {
      next: () => this.receive(),
      return: async () => ({ value: undefined, done: true }),
    };
  }
}
