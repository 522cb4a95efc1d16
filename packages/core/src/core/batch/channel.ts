/**
 * Many producers, one consumer. Producers `push` from whatever task finishes
 * first; the consumer awaits `next()` and sees messages in push order.
 */
export class AsyncChannel<T> {
  private readonly buffer: T[] = [];
  private readonly readers: ((value: T) => void)[] = [];

  push(value: T): void {
    const reader = this.readers.shift();
    if (reader) {
      reader(value);
      return;
    }
    this.buffer.push(value);
  }

  next(): Promise<T> {
    if (this.buffer.length > 0) {
      const value = this.buffer.shift();
      if (value !== undefined) {
        return Promise.resolve(value);
      }
    }
    return new Promise<T>((resolve) => {
      this.readers.push(resolve);
    });
  }

  get size(): number {
    return this.buffer.length;
  }
}
