type Waiter<T> = {
  resolve: (value: T | undefined) => void;
  timer?: ReturnType<typeof setTimeout>;
};

export class Channel<T> {
  private readonly items: T[] = [];
  private readonly waiters: Waiter<T>[] = [];

  get size(): number {
    return this.items.length;
  }

  send(value: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      if (waiter.timer) {
        clearTimeout(waiter.timer);
      }
      waiter.resolve(value);
      return;
    }
    this.items.push(value);
  }

  tryReceive(): T | undefined {
    return this.items.shift();
  }

  // Resolves undefined when timeoutMs elapses with nothing queued.
  receive(timeoutMs?: number): Promise<T | undefined> {
    if (this.items.length > 0) {
      return Promise.resolve(this.items.shift());
    }

    return new Promise<T | undefined>((resolve) => {
      const waiter: Waiter<T> = { resolve };
      if (timeoutMs !== undefined) {
        waiter.timer = setTimeout(() => {
          const position = this.waiters.indexOf(waiter);
          if (position >= 0) {
            this.waiters.splice(position, 1);
          }
          resolve(undefined);
        }, timeoutMs);
      }
      this.waiters.push(waiter);
    });
  }
}
