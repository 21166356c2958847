import { describe, it, expect } from 'vitest';
import { KeyedMutex } from '@/modules/conversation/utils';

function deferred<T = void>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe('KeyedMutex', () => {
  it('should run tasks for one key in submission order', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();
    const order: string[] = [];

    const first = mutex.runExclusive('u1', async () => {
      order.push('first:start');
      await gate.promise;
      order.push('first:end');
    });
    const second = mutex.runExclusive('u1', () => {
      order.push('second');
    });

    expect(mutex.isLocked('u1')).toBe(true);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first:start', 'first:end', 'second']);
  });

  it('should not block other keys', async () => {
    const mutex = new KeyedMutex();
    const gate = deferred();

    const blocked = mutex.runExclusive('u1', () => gate.promise);
    const other = await mutex.runExclusive('u2', () => 'done');

    expect(other).toBe('done');
    expect(mutex.isLocked('u1')).toBe(true);

    gate.resolve();
    await blocked;
  });

  it('should reject the caller and keep the lane moving after a failure', async () => {
    const mutex = new KeyedMutex();

    const failing = mutex.runExclusive('u1', () => {
      throw new Error('boom');
    });
    const next = mutex.runExclusive('u1', () => 42);

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe(42);
  });

  it('should forget idle lanes', async () => {
    const mutex = new KeyedMutex();

    await mutex.runExclusive('u1', () => undefined);
    await new Promise((resolve) => setImmediate(resolve));

    expect(mutex.size()).toBe(0);
    expect(mutex.isLocked('u1')).toBe(false);
  });
});
