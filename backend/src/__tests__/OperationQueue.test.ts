import { describe, expect, it } from 'vitest';
import { OperationQueue } from '../ledger/OperationQueue';

function deferred() {
  let resolve: () => void = () => undefined;
  const promise = new Promise<void>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('OperationQueue', () => {
  it('runs operations one at a time in submission order', async () => {
    const queue = new OperationQueue();
    const order: string[] = [];
    const gate = deferred();

    const first = queue.run(async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
      return 1;
    });
    const second = queue.run(async () => {
      order.push('second');
      return 2;
    });

    expect(queue.pending).toBe(2);
    await Promise.resolve();
    await Promise.resolve();
    expect(order).toEqual(['first:start']);

    gate.resolve();
    await expect(first).resolves.toBe(1);
    await expect(second).resolves.toBe(2);
    expect(order).toEqual(['first:start', 'first:end', 'second']);
    await queue.idle();
    expect(queue.pending).toBe(0);
  });

  it('keeps going after a rejected operation', async () => {
    const queue = new OperationQueue();
    const failed = queue.run(async () => {
      throw new Error('boom');
    });
    const next = queue.run(async () => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('queues work submitted from inside a running operation behind it', async () => {
    const queue = new OperationQueue();
    const order: string[] = [];
    let inner: Promise<void> = Promise.resolve();

    await queue.run(async () => {
      inner = queue.run(async () => {
        order.push('inner');
      });
      await Promise.resolve();
      order.push('outer');
    });
    await inner;

    expect(order).toEqual(['outer', 'inner']);
  });
});
