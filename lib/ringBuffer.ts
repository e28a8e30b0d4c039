export class RingBuffer<T> {
  private items: T[] = [];
  private maxSize: number;

  constructor(capacity: number) {
    this.maxSize = Math.max(1, Math.floor(capacity));
  }

  get capacity(): number {
    return this.maxSize;
  }

  get length(): number {
    return this.items.length;
  }

  push(item: T): void {
    this.items.push(item);
    if (this.items.length > this.maxSize) {
      this.items.splice(0, this.items.length - this.maxSize);
    }
  }

  resize(capacity: number): void {
    this.maxSize = Math.max(1, Math.floor(capacity));
    if (this.items.length > this.maxSize) {
      this.items = this.items.slice(this.items.length - this.maxSize);
    }
  }

  toArray(): T[] {
    return [...this.items];
  }
}
