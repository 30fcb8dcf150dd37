/**
 * Stores the queries a crawler has yet to visit and decides their order
 */
export interface Scheduler<T> {
  add(query: T): void;
  /**
   * Add the queries found on one page; they are popped in the order given
   */
  addAll(queries: readonly T[]): void;
  pop(): T | undefined;
  readonly size: number;
  readonly empty: boolean;
}

/**
 * Depth-first (LIFO) in-memory scheduler. The links of one page are still
 * visited in the order they appear on it.
 */
export class StackScheduler<T> implements Scheduler<T> {
  private readonly stack: T[] = [];

  add(query: T): void {
    this.stack.push(query);
  }

  addAll(queries: readonly T[]): void {
    for (let i = queries.length - 1; i >= 0; i--) {
      this.stack.push(queries[i]);
    }
  }

  pop(): T | undefined {
    return this.stack.pop();
  }

  get size(): number {
    return this.stack.length;
  }

  get empty(): boolean {
    return this.stack.length === 0;
  }
}

/**
 * Breadth-first (FIFO) in-memory scheduler
 */
export class QueueScheduler<T> implements Scheduler<T> {
  private readonly queue: T[] = [];

  add(query: T): void {
    this.queue.push(query);
  }

  addAll(queries: readonly T[]): void {
    this.queue.push(...queries);
  }

  pop(): T | undefined {
    return this.queue.shift();
  }

  get size(): number {
    return this.queue.length;
  }

  get empty(): boolean {
    return this.queue.length === 0;
  }
}
