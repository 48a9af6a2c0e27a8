import { StackOverflowError, StackUnderflowError } from '../emulator/errors';

export const DEFAULT_STACK_DEPTH = 16;

// Fixed-depth LIFO of return addresses
export class Stack<T> {
  private readonly items: T[] = [];

  constructor(readonly capacity: number = DEFAULT_STACK_DEPTH) {}

  get depth(): number {
    return this.items.length;
  }

  push(value: T): void {
    if (this.items.length >= this.capacity) throw new StackOverflowError(this.capacity);
    this.items.push(value);
  }

  pop(): T {
    const v = this.items.pop();
    if (v === undefined) throw new StackUnderflowError();
    return v;
  }

  peek(): T | undefined {
    return this.items[this.items.length - 1];
  }

  clear(): void {
    this.items.length = 0;
  }
}
