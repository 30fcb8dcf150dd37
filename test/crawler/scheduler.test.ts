import { describe, it, expect } from 'vitest';
import { QueueScheduler, StackScheduler } from '../../src/crawler/scheduler.js';

function drain<T>(scheduler: { pop(): T | undefined }): T[] {
  const popped: T[] = [];
  for (let item = scheduler.pop(); item !== undefined; item = scheduler.pop()) {
    popped.push(item);
  }
  return popped;
}

describe('StackScheduler', () => {
  it('should pop the latest page first', () => {
    const scheduler = new StackScheduler<string>();
    scheduler.add('a');
    scheduler.add('b');
    expect(drain(scheduler)).toEqual(['b', 'a']);
  });

  it('should pop a batch in the order it was added', () => {
    const scheduler = new StackScheduler<string>();
    scheduler.add('older');
    scheduler.addAll(['1', '2', '3']);
    expect(scheduler.size).toBe(4);
    expect(drain(scheduler)).toEqual(['1', '2', '3', 'older']);
  });

  it('should report when it is empty', () => {
    const scheduler = new StackScheduler<string>();
    expect(scheduler.empty).toBe(true);
    scheduler.add('a');
    expect(scheduler.empty).toBe(false);
    expect(new StackScheduler<string>().pop()).toBeUndefined();
  });
});

describe('QueueScheduler', () => {
  it('should pop pages in the order they were added', () => {
    const scheduler = new QueueScheduler<string>();
    scheduler.add('older');
    scheduler.addAll(['1', '2']);
    expect(scheduler.size).toBe(3);
    expect(drain(scheduler)).toEqual(['older', '1', '2']);
    expect(scheduler.empty).toBe(true);
  });
});
