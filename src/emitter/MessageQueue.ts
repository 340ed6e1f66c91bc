/**
 * Unbounded FIFO with an async consumer side. Any number of producers push;
 * one consumer awaits `take()`.
 */
export class MessageQueue<T> {
  private readonly items: T[] = [];
  private readonly waiters: Array<(item: T) => void> = [];

  push(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.items.push(item);
    }
  }

  take(): Promise<T> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1);
      return Promise.resolve(item);
    }
    return new Promise<T>(resolve => {
      this.waiters.push(resolve);
    });
  }

  get size(): number {
    return this.items.length;
  }
}
